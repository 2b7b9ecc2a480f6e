/**
 * Environment parameters — every tunable coefficient of the water model.
 *
 * Built once before a run and frozen.  A tuning change means building a
 * new instance with `createEnvironment()`; nothing mutates one mid-run.
 */

import { InvalidEnvironmentError } from './errors.ts'

export interface EnvironmentParameters {
  /** Gravitational acceleration [m/s²] */
  readonly gravity: number
  /** Fluid density ρ [kg/m³] */
  readonly fluidDensity: number
  /** Height of the flat water surface [m] */
  readonly waterLevel: number

  // ── Lift / drag ──
  /** Lift coefficient on the chord-normal velocity squared */
  readonly liftCoefficient: number
  /** Drag coefficient while skipping */
  readonly dragCoefficient: number
  /** Drag coefficient once sinking (full-drag settle) */
  readonly sinkingDragCoefficient: number

  // ── Vertical hybrid damping ──
  /** Linear term c_lin [m/s] */
  readonly verticalLinearDamping: number
  /** Quadratic term c_quad [–] */
  readonly verticalQuadraticDamping: number

  // ── Suction ──
  /** Adhesion pressure C_s [N/m²] */
  readonly suctionCoefficient: number
  /** Suction acts only shallower than this [m] */
  readonly suctionDepthThreshold: number
  /** Suction acts only below this vertical speed [m/s] */
  readonly suctionSpeedThreshold: number
  /** Decay time of suction after contact begins [s] */
  readonly suctionTimeConstant: number

  // ── Inertia & rotation ──
  /** Fraction of displaced fluid mass/inertia carried with the body */
  readonly addedMassCoefficient: number
  /** Pitch damping torque coefficient (scaled by ½ρA) */
  readonly pitchDamping: number
  /** Angular damping rate β while in contact [1/s] */
  readonly angularDamping: number

  // ── Phase thresholds ──
  /** Submerged area that counts as contact [m²] */
  readonly contactAreaThreshold: number
  /** Submerged fraction past which the sink timer runs */
  readonly sinkFraction: number
  /** Time past `sinkFraction` before the stone is declared sunk [s] */
  readonly sinkDuration: number
  /** Below this speed a stone in contact cannot rebound [m/s] */
  readonly minSkipSpeed: number
}

export const DEFAULT_ENVIRONMENT: EnvironmentParameters = Object.freeze({
  gravity: 9.81,
  fluidDensity: 1000,
  waterLevel: 0,

  liftCoefficient: 5,
  dragCoefficient: 0.1,
  sinkingDragCoefficient: 1,

  verticalLinearDamping: 0.5,
  verticalQuadraticDamping: 1,

  suctionCoefficient: 20,
  suctionDepthThreshold: 0.004,
  suctionSpeedThreshold: 0.3,
  suctionTimeConstant: 0.05,

  addedMassCoefficient: 0.5,
  pitchDamping: 1,
  angularDamping: 0.02,

  contactAreaThreshold: 1e-7,
  sinkFraction: 0.9,
  sinkDuration: 0.05,
  minSkipSpeed: 0.5,
})

// ─── Validation ─────────────────────────────────────────────────────────────

type Rule = 'positive' | 'non-negative' | 'finite' | 'fraction'

const RULES: Record<keyof EnvironmentParameters, Rule> = {
  gravity: 'positive',
  fluidDensity: 'non-negative',
  waterLevel: 'finite',
  liftCoefficient: 'non-negative',
  dragCoefficient: 'non-negative',
  sinkingDragCoefficient: 'non-negative',
  verticalLinearDamping: 'non-negative',
  verticalQuadraticDamping: 'non-negative',
  suctionCoefficient: 'non-negative',
  suctionDepthThreshold: 'non-negative',
  suctionSpeedThreshold: 'positive',
  suctionTimeConstant: 'positive',
  addedMassCoefficient: 'non-negative',
  pitchDamping: 'non-negative',
  angularDamping: 'non-negative',
  contactAreaThreshold: 'non-negative',
  sinkFraction: 'fraction',
  sinkDuration: 'non-negative',
  minSkipSpeed: 'non-negative',
}

/**
 * @throws InvalidEnvironmentError naming the first offending parameter
 */
export function validateEnvironment(env: EnvironmentParameters): void {
  const values: Record<string, number> = { ...env }
  for (const [key, rule] of Object.entries(RULES)) {
    const value = values[key]
    if (!Number.isFinite(value)) {
      throw new InvalidEnvironmentError(key, `must be finite, got ${value}`)
    }
    switch (rule) {
      case 'positive':
        if (value <= 0) throw new InvalidEnvironmentError(key, `must be > 0, got ${value}`)
        break
      case 'non-negative':
        if (value < 0) throw new InvalidEnvironmentError(key, `must be ≥ 0, got ${value}`)
        break
      case 'fraction':
        if (value <= 0 || value > 1) throw new InvalidEnvironmentError(key, `must be in (0, 1], got ${value}`)
        break
      case 'finite':
        break
    }
  }
}

/**
 * Merge overrides onto the defaults, validate, and freeze.
 */
export function createEnvironment(
  overrides: Partial<EnvironmentParameters> = {},
): EnvironmentParameters {
  const env: EnvironmentParameters = { ...DEFAULT_ENVIRONMENT, ...overrides }
  validateEnvironment(env)
  return Object.freeze(env)
}
