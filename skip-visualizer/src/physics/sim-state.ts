/**
 * Simulation state types — planar rigid-body state vector.
 *
 * Pure types with no logic.
 *
 * Frame: x downrange, y up, water surface at y = waterLevel.
 * Pitch θ is counter-clockwise positive; θ = 0 puts the chord level.
 */

import type { Blueprint } from './blueprint.ts'
import type { EnvironmentParameters } from './environment.ts'
import type { Phase, PhaseTracker } from './phase.ts'
import type { SubmergedGeometry } from './clipper.ts'
import type { Vec2 } from './vec2.ts'

// ─── 6-State Vector ─────────────────────────────────────────────────────────

export interface KinematicState {
  // Centroid position [m]
  x: number;  y: number
  // Centroid velocity [m/s]
  vx: number;  vy: number
  // Pitch [rad] and pitch rate [rad/s]
  theta: number;  omega: number
}

// ─── Derivative Vector ──────────────────────────────────────────────────────

/**
 * Time derivatives of the 6-state vector.
 * Returned by the derivative function, consumed by the integrator.
 */
export interface StateDerivative {
  xDot: number;  yDot: number
  vxDot: number;  vyDot: number
  thetaDot: number;  omegaDot: number
}

/** f(t, y) — anything the integrator can advance. */
export type DerivativeFunction = (t: number, state: KinematicState) => StateDerivative

// ─── Derivative Context ─────────────────────────────────────────────────────

/**
 * Everything the derivative needs besides the trial state.
 *
 * Held fixed for the four evaluations of one RK4 step; the phase is
 * the committed phase from the previous tick.
 */
export interface DynamicsContext {
  blueprint: Blueprint
  env: EnvironmentParameters
  phase: Phase
  /** Simulation time the current contact began [s], null before first contact */
  contactStartedAt: number | null
}

/**
 * Derivative plus the intermediate quantities worth showing on screen.
 */
export interface DynamicsEvaluation {
  derivative: StateDerivative
  /** Regime the trial state was evaluated in */
  regime: Phase
  submerged: SubmergedGeometry
  /** Net force including gravity [N] */
  netForce: Vec2
  /** Net torque about the centroid [N·m] */
  torque: number
  effectiveMass: number
  effectiveInertia: number
}

// ─── Simulation State ───────────────────────────────────────────────────────

/**
 * The single mutable simulation record: kinematics plus phase history
 * and scoring counters.  Replaced wholesale once per tick.
 */
export interface SimulationState {
  time: number
  kinematics: KinematicState
  tracker: PhaseTracker
  /** Completed Bouncing → Flying transitions */
  skips: number
  /** Time spent airborne after first touching the water [s] */
  airTime: number
}

/** Recorded trajectory sample. */
export interface Stamp {
  t: number
  state: KinematicState
  phase: Phase
}

export interface PhaseEvent {
  time: number
  from: Phase
  to: Phase
  /** Centroid speed at the transition [m/s] */
  speed: number
  state: KinematicState
}
