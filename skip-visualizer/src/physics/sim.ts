/**
 * Planar rigid-body simulation core — derivative evaluation and integration.
 *
 * Pure math.  No Three.js, DOM, or rendering dependencies.
 *
 *   1. Derivative evaluation — f(t, state) for a fixed context
 *   2. Forward Euler (baseline, used for the RK4 trial states)
 *   3. Fixed-step RK4
 *   4. Per-tick phase update and the batch `simulate()` loop
 */

import type {
  KinematicState,
  StateDerivative,
  DerivativeFunction,
  DynamicsContext,
  DynamicsEvaluation,
  SimulationState,
  Stamp,
  PhaseEvent,
} from './sim-state.ts'
import type { Blueprint } from './blueprint.ts'
import { validateBlueprint } from './blueprint.ts'
import type { EnvironmentParameters } from './environment.ts'
import type { SubmergedGeometry } from './clipper.ts'
import { outlineToWorld, clipWorldOutline, computeSubmergedGeometry, emptyGeometry } from './clipper.ts'
import { computeHydroLoads } from './hydro-forces.ts'
import { computeAddedMass, effectiveMass, effectiveInertia, NO_ADDED_MASS } from './added-mass.ts'
import { initialPhaseTracker, updatePhase, classifyContact } from './phase.ts'
import { lowestY } from './polygon.ts'
import { NonFiniteStateError } from './errors.ts'

/** Default fixed step [s] */
export const SIMULATION_DT = 1e-4
/** A sinking stone this far below the surface ends the run [m] */
export const DEFAULT_FLOOR_DEPTH = 1
/** Hard stop for `simulate()` [s] */
export const DEFAULT_MAX_TIME = 10

// ─── Derivative Evaluation ──────────────────────────────────────────────────

function ballistic(state: KinematicState, gravity: number, omegaDot: number): StateDerivative {
  return {
    xDot: state.vx,
    yDot: state.vy,
    vxDot: 0,
    vyDot: -gravity,
    thetaDot: state.omega,
    omegaDot,
  }
}

/**
 * Evaluate f(t, state) and keep the intermediate loads.
 *
 *   1. Clear of the water and not sinking → ballistic, no clip
 *   2. Clip    → submerged polygon, area, centroid, depth; regime
 *      from `classifyContact`
 *   3. Loads   → lift, drag, damping, suction, torque at the centroid
 *   4. Added mass from the submerged polygon
 *   5. a = (F_h + m·g) / m_eff,   α = τ / I_eff − β·ω
 *
 * Reads nothing but its arguments; calling it twice with the same
 * inputs gives the same result.
 */
export function evaluateDynamics(
  t: number,
  state: KinematicState,
  ctx: DynamicsContext,
): DynamicsEvaluation {
  const { blueprint, env } = ctx
  const mass = blueprint.mass
  const weight = { x: 0, y: -mass * env.gravity }
  const sinking = ctx.phase === 'sinking'

  const world = outlineToWorld(blueprint.outline, state)

  // Clear of the water: skip the clip entirely
  if (!sinking && lowestY(world) >= env.waterLevel) {
    return {
      derivative: ballistic(state, env.gravity, 0),
      regime: 'flying',
      submerged: emptyGeometry(state),
      netForce: weight,
      torque: 0,
      effectiveMass: mass,
      effectiveInertia: blueprint.inertia,
    }
  }

  const submerged = clipWorldOutline(world, blueprint.area, state, env.waterLevel)
  const regime = classifyContact(ctx.phase, submerged)

  if (submerged.area <= 0) {
    // A sinking stone keeps bleeding spin even when momentarily dry
    const omegaDot = regime === 'sinking' ? -env.angularDamping * state.omega : 0
    return {
      derivative: ballistic(state, env.gravity, omegaDot),
      regime,
      submerged,
      netForce: weight,
      torque: 0,
      effectiveMass: mass,
      effectiveInertia: blueprint.inertia,
    }
  }

  const contactElapsed = ctx.contactStartedAt === null ? 0 : Math.max(0, t - ctx.contactStartedAt)
  const loads = computeHydroLoads(state, submerged, env, { sinking: regime === 'sinking', contactElapsed })

  const added = env.fluidDensity > 0
    ? computeAddedMass(submerged, state, blueprint.width, env.fluidDensity, env.addedMassCoefficient)
    : NO_ADDED_MASS
  const mEff = effectiveMass(mass, added)
  const iEff = effectiveInertia(blueprint.inertia, added)

  const netForce = { x: loads.force.x + weight.x, y: loads.force.y + weight.y }

  return {
    derivative: {
      xDot: state.vx,
      yDot: state.vy,
      vxDot: netForce.x / mEff,
      vyDot: netForce.y / mEff,
      thetaDot: state.omega,
      omegaDot: loads.torque / iEff - env.angularDamping * state.omega,
    },
    regime,
    submerged,
    netForce,
    torque: loads.torque,
    effectiveMass: mEff,
    effectiveInertia: iEff,
  }
}

/**
 * The six state derivatives at (t, state).
 */
export function computeDerivatives(
  t: number,
  state: KinematicState,
  ctx: DynamicsContext,
): StateDerivative {
  return evaluateDynamics(t, state, ctx).derivative
}

/** Bind a context into an f(t, y) the integrator can call. */
export function dynamicsFunction(ctx: DynamicsContext): DerivativeFunction {
  return (t, state) => computeDerivatives(t, state, ctx)
}

// ─── Forward Euler ──────────────────────────────────────────────────────────

/**
 *   state(t + dt) = state(t) + dt · f
 */
export function forwardEuler(
  state: KinematicState,
  deriv: StateDerivative,
  dt: number,
): KinematicState {
  return {
    x:     state.x     + deriv.xDot     * dt,
    y:     state.y     + deriv.yDot     * dt,
    vx:    state.vx    + deriv.vxDot    * dt,
    vy:    state.vy    + deriv.vyDot    * dt,
    theta: state.theta + deriv.thetaDot * dt,
    omega: state.omega + deriv.omegaDot * dt,
  }
}

// ─── RK4 Integrator ─────────────────────────────────────────────────────────

/**
 * Advance the state by one 4th-order Runge-Kutta step.
 *
 *   k1 = f(t,        y)
 *   k2 = f(t + dt/2, y + dt/2 · k1)
 *   k3 = f(t + dt/2, y + dt/2 · k2)
 *   k4 = f(t + dt,   y + dt   · k3)
 *   y(t + dt) = y + dt/6 · (k1 + 2k2 + 2k3 + k4)
 *
 * Does not check the result for NaN; see `assertFiniteState()`.
 *
 * @throws RangeError when dt is not a positive finite number
 */
export function rk4Step(
  state: KinematicState,
  t: number,
  dt: number,
  f: DerivativeFunction,
): KinematicState {
  if (!(dt > 0) || !Number.isFinite(dt)) {
    throw new RangeError(`Time step must be positive and finite, got ${dt}`)
  }

  const k1 = f(t, state)
  const k2 = f(t + dt / 2, forwardEuler(state, k1, dt / 2))
  const k3 = f(t + dt / 2, forwardEuler(state, k2, dt / 2))
  const k4 = f(t + dt, forwardEuler(state, k3, dt))

  const avg: StateDerivative = {
    xDot:     (k1.xDot     + 2 * k2.xDot     + 2 * k3.xDot     + k4.xDot)     / 6,
    yDot:     (k1.yDot     + 2 * k2.yDot     + 2 * k3.yDot     + k4.yDot)     / 6,
    vxDot:    (k1.vxDot    + 2 * k2.vxDot    + 2 * k3.vxDot    + k4.vxDot)    / 6,
    vyDot:    (k1.vyDot    + 2 * k2.vyDot    + 2 * k3.vyDot    + k4.vyDot)    / 6,
    thetaDot: (k1.thetaDot + 2 * k2.thetaDot + 2 * k3.thetaDot + k4.thetaDot) / 6,
    omegaDot: (k1.omegaDot + 2 * k2.omegaDot + 2 * k3.omegaDot + k4.omegaDot) / 6,
  }

  return forwardEuler(state, avg, dt)
}

export function isFiniteState(state: KinematicState): boolean {
  return Number.isFinite(state.x) && Number.isFinite(state.y)
    && Number.isFinite(state.vx) && Number.isFinite(state.vy)
    && Number.isFinite(state.theta) && Number.isFinite(state.omega)
}

/** @throws NonFiniteStateError */
export function assertFiniteState(state: KinematicState, time: number): void {
  if (!isFiniteState(state)) throw new NonFiniteStateError(state, time)
}

// ─── Initial Conditions ─────────────────────────────────────────────────────

export interface LaunchParameters {
  /** Release speed [m/s] */
  speed: number
  /** Flight path angle, positive climbing [rad] */
  pathAngle: number
  /** Pitch attitude [rad] */
  pitch: number
  /** Release height of the centroid [m] */
  height: number
  /** Pitch rate [rad/s] */
  omega?: number
  /** Downrange release position [m] */
  x?: number
}

/**
 * Throw parameters → kinematic state.
 * A downward throw has a negative path angle.
 */
export function launchState(p: LaunchParameters): KinematicState {
  return {
    x: p.x ?? 0,
    y: p.height,
    vx: p.speed * Math.cos(p.pathAngle),
    vy: p.speed * Math.sin(p.pathAngle),
    theta: p.pitch,
    omega: p.omega ?? 0,
  }
}

export function initialSimulationState(kinematics: KinematicState, time: number = 0): SimulationState {
  return {
    time,
    kinematics: { ...kinematics },
    tracker: initialPhaseTracker(),
    skips: 0,
    airTime: 0,
  }
}

/** ½mv² + ½Iω² + mgh, relative to the water level [J] */
export function mechanicalEnergy(
  state: KinematicState,
  blueprint: Blueprint,
  env: EnvironmentParameters,
): number {
  const kinetic = 0.5 * blueprint.mass * (state.vx * state.vx + state.vy * state.vy)
  const rotational = 0.5 * blueprint.inertia * state.omega * state.omega
  const potential = blueprint.mass * env.gravity * (state.y - env.waterLevel)
  return kinetic + rotational + potential
}

// ─── Tick ───────────────────────────────────────────────────────────────────

export interface TickResult {
  next: SimulationState
  /** Phase transition committed this tick, if any */
  event: PhaseEvent | null
  /** Submerged geometry at the end of the tick */
  submerged: SubmergedGeometry
}

/**
 * One fixed step: RK4 with the committed phase held fixed, finiteness
 * check, then the phase update against the new state.
 *
 * Pure — returns a new SimulationState.
 *
 * @throws NonFiniteStateError
 */
export function advanceTick(
  sim: SimulationState,
  blueprint: Blueprint,
  env: EnvironmentParameters,
  dt: number,
): TickResult {
  const ctx: DynamicsContext = {
    blueprint,
    env,
    phase: sim.tracker.phase,
    contactStartedAt: sim.tracker.contactStartedAt,
  }
  const kinematics = rk4Step(sim.kinematics, sim.time, dt, dynamicsFunction(ctx))
  const time = sim.time + dt
  assertFiniteState(kinematics, time)

  const submerged = computeSubmergedGeometry(blueprint, kinematics, env.waterLevel)
  const tracker = updatePhase(
    sim.tracker,
    { time, dt, submerged, vx: kinematics.vx, vy: kinematics.vy },
    env,
  )

  const from = sim.tracker.phase
  const to = tracker.phase
  const skipped = from === 'bouncing' && to === 'flying'
  const airborne = to === 'flying' && tracker.contactStartedAt !== null

  const event: PhaseEvent | null = from === to ? null : {
    time,
    from,
    to,
    speed: Math.hypot(kinematics.vx, kinematics.vy),
    state: { ...kinematics },
  }

  return {
    next: {
      time,
      kinematics,
      tracker,
      skips: sim.skips + (skipped ? 1 : 0),
      airTime: sim.airTime + (airborne ? dt : 0),
    },
    event,
    submerged,
  }
}

/** Sinking and past the floor depth — nothing more to see. */
export function hasSettled(sim: SimulationState, env: EnvironmentParameters, floorDepth: number = DEFAULT_FLOOR_DEPTH): boolean {
  return sim.tracker.phase === 'sinking' && sim.kinematics.y < env.waterLevel - floorDepth
}

// ─── Batch Runner ───────────────────────────────────────────────────────────

export interface SimulateOptions {
  dt?: number
  maxTime?: number
  floorDepth?: number
  /** Record every Nth tick (the first and last are always kept) */
  recordEvery?: number
}

export type StopReason = 'settled' | 'max-time'

export interface SimulationResult {
  trajectory: Stamp[]
  events: PhaseEvent[]
  skips: number
  airTime: number
  final: SimulationState
  stopReason: StopReason
}

/**
 * Run from `initial` until the stone settles or `maxTime` elapses.
 *
 * @throws InvalidBlueprintError before the first step
 * @throws NonFiniteStateError if the integration diverges
 */
export function simulate(
  initial: KinematicState,
  blueprint: Blueprint,
  env: EnvironmentParameters,
  options: SimulateOptions = {},
): SimulationResult {
  validateBlueprint(blueprint)
  const dt = options.dt ?? SIMULATION_DT
  const maxTime = options.maxTime ?? DEFAULT_MAX_TIME
  const floorDepth = options.floorDepth ?? DEFAULT_FLOOR_DEPTH
  const recordEvery = Math.max(1, Math.floor(options.recordEvery ?? 1))
  const maxSteps = Math.ceil(maxTime / dt - 1e-9)

  let sim = initialSimulationState(initial)
  const trajectory: Stamp[] = [{ t: sim.time, state: { ...sim.kinematics }, phase: sim.tracker.phase }]
  const events: PhaseEvent[] = []
  let stopReason: StopReason = 'max-time'

  for (let i = 1; i <= maxSteps; i++) {
    const tick = advanceTick(sim, blueprint, env, dt)
    sim = tick.next
    if (tick.event) events.push(tick.event)

    const settled = hasSettled(sim, env, floorDepth)
    if (i % recordEvery === 0 || settled || i === maxSteps) {
      trajectory.push({ t: sim.time, state: sim.kinematics, phase: sim.tracker.phase })
    }
    if (settled) {
      stopReason = 'settled'
      break
    }
  }

  return { trajectory, events, skips: sim.skips, airTime: sim.airTime, final: sim, stopReason }
}
