/**
 * Phase classifier — contact regime state machine.
 *
 *   flying ⇄ bouncing → sinking
 *
 * Two entry points:
 *   - classifyContact(): per trial state inside the derivative.  Pure
 *     geometry; never changes the committed phase.
 *   - updatePhase(): once per tick after the step.  Applies the
 *     thresholds and timers and returns the next tracker.
 *
 * Sinking is terminal.
 */

import type { SubmergedGeometry } from './clipper.ts'
import type { EnvironmentParameters } from './environment.ts'

export type Phase = 'flying' | 'bouncing' | 'sinking'

export const PHASES: readonly Phase[] = ['flying', 'bouncing', 'sinking']

/**
 * Committed phase plus the history the transitions depend on.
 */
export interface PhaseTracker {
  readonly phase: Phase
  /** Time the current (or last) contact began [s]; null before first contact */
  readonly contactStartedAt: number | null
  /** Continuous time spent past the sink fraction [s] */
  readonly deepTime: number
}

/** What the classifier sees at the end of a tick. */
export interface PhaseObservation {
  /** Simulation time after the step [s] */
  time: number
  /** Step size [s] */
  dt: number
  submerged: Pick<SubmergedGeometry, 'area' | 'fraction'>
  vx: number
  vy: number
}

export function initialPhaseTracker(phase: Phase = 'flying', contactStartedAt: number | null = null): PhaseTracker {
  return { phase, contactStartedAt, deepTime: 0 }
}

// ─── Per-Trial Regime ───────────────────────────────────────────────────────

/**
 * Regime for a single derivative evaluation.
 *
 * Any positive submerged area gets hydrodynamic forces, whatever the
 * committed phase: the forces scale with area, so they fade in
 * continuously and a trial state that dips in mid-step is not ignored.
 */
export function classifyContact(phase: Phase, submerged: Pick<SubmergedGeometry, 'area'>): Phase {
  if (phase === 'sinking') return 'sinking'
  return submerged.area > 0 ? 'bouncing' : 'flying'
}

// ─── Per-Tick Transitions ───────────────────────────────────────────────────

/**
 * Advance the tracker by one tick.
 *
 * flying → bouncing   area > contactAreaThreshold
 * bouncing → flying   area ≤ contactAreaThreshold and v_y > 0
 * bouncing → sinking  speed < minSkipSpeed, or fraction ≥ sinkFraction
 *                     held for sinkDuration
 */
export function updatePhase(
  tracker: PhaseTracker,
  obs: PhaseObservation,
  env: EnvironmentParameters,
): PhaseTracker {
  const { area, fraction } = obs.submerged

  switch (tracker.phase) {
    case 'sinking':
      return tracker

    case 'flying':
      if (area > env.contactAreaThreshold) {
        return { phase: 'bouncing', contactStartedAt: obs.time, deepTime: 0 }
      }
      return tracker

    case 'bouncing': {
      if (area <= env.contactAreaThreshold && obs.vy > 0) {
        return { ...tracker, phase: 'flying', deepTime: 0 }
      }
      if (Math.hypot(obs.vx, obs.vy) < env.minSkipSpeed) {
        return { ...tracker, phase: 'sinking' }
      }
      if (fraction >= env.sinkFraction) {
        const deepTime = tracker.deepTime + obs.dt
        if (deepTime >= env.sinkDuration) {
          return { ...tracker, phase: 'sinking', deepTime }
        }
        return { ...tracker, deepTime }
      }
      return tracker.deepTime === 0 ? tracker : { ...tracker, deepTime: 0 }
    }
  }
}

/** Flying ⇄ bouncing freely, bouncing → sinking, nothing out of sinking. */
export function isLegalTransition(from: Phase, to: Phase): boolean {
  if (from === to) return true
  if (from === 'sinking') return false
  if (to === 'sinking') return from === 'bouncing'
  return true
}
