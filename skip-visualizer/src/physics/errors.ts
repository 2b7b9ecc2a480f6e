/**
 * Error types raised by the physics core.
 *
 * Degenerate submerged geometry is not an error — it is a valid
 * zero-force result — so there is no class for it.
 */

import type { KinematicState } from './sim-state.ts'

const STATE_FIELDS: readonly (keyof KinematicState)[] = ['x', 'y', 'vx', 'vy', 'theta', 'omega']

/** Outline or mass properties rejected before the run starts. */
export class InvalidBlueprintError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidBlueprintError'
  }
}

/** A coefficient outside its admissible range. */
export class InvalidEnvironmentError extends Error {
  readonly parameter: string

  constructor(parameter: string, message: string) {
    super(`${parameter}: ${message}`)
    this.name = 'InvalidEnvironmentError'
    this.parameter = parameter
  }
}

/**
 * NaN or ±∞ appeared in the state after an integration step.
 * Fatal for the run: every later step would inherit the corruption.
 */
export class NonFiniteStateError extends Error {
  readonly state: Readonly<KinematicState>
  readonly time: number

  constructor(state: KinematicState, time: number) {
    const fields = STATE_FIELDS.filter(k => !Number.isFinite(state[k]))
    super(`Non-finite state at t=${time.toFixed(4)} s (${fields.join(', ')})`)
    this.name = 'NonFiniteStateError'
    this.state = { ...state }
    this.time = time
  }
}
