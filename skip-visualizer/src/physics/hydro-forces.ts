/**
 * Hydrodynamic force/torque model.
 *
 * Each physical effect is its own pure function so it can be checked in
 * isolation; `computeHydroLoads()` sums them.  All terms act at the
 * submerged centroid c and see the local flow velocity there:
 *
 *   r  = c − x_cg
 *   vp = v + ω × r = (vx − ω·r_y, vy + ω·r_x)
 *
 * Lift, drag, damping and pitch damping carry a factor ½ρA.  Suction is
 * a surface-adhesion term proportional to A alone, so the zero-density
 * switch-off is an explicit guard in computeHydroLoads(), which then
 * leaves only gravity.
 *
 * Gravity is NOT included here — see evaluateDynamics() in sim.ts.
 */

import type { Vec2 } from './vec2.ts'
import type { KinematicState } from './sim-state.ts'
import type { SubmergedGeometry } from './clipper.ts'
import type { EnvironmentParameters } from './environment.ts'
import { add, cross, length, sub, ZERO } from './vec2.ts'

const MIN_FLOW_SPEED = 1e-9

// ─── Types ──────────────────────────────────────────────────────────────────

export interface HydroLoads {
  /** Sum of hydrodynamic forces [N] (no gravity) */
  force: Vec2
  /** Torque about the body centroid [N·m] */
  torque: number
  /** Submerged centroid minus body centroid [m] */
  lever: Vec2
  /** Flow velocity at the submerged centroid [m/s] */
  contactVelocity: Vec2
  lift: Vec2
  drag: Vec2
  damping: Vec2
  suction: Vec2
  dampingTorque: number
}

export interface HydroOptions {
  /** Full-drag settle: sinking drag coefficient, no lift, no suction */
  sinking: boolean
  /** Time since the current contact began [s] */
  contactElapsed: number
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** ½ρA — common prefactor of every pressure-type term [kg/m] */
export function dynamicPressureArea(rho: number, area: number): number {
  return 0.5 * rho * area
}

/**
 * Velocity of the body point at `lever` from the centroid.
 *
 *   v_p = v + ω ẑ × r
 */
export function contactVelocity(state: Pick<KinematicState, 'vx' | 'vy' | 'omega'>, lever: Vec2): Vec2 {
  return {
    x: state.vx - state.omega * lever.y,
    y: state.vy + state.omega * lever.x,
  }
}

// ─── Individual Terms ───────────────────────────────────────────────────────

/**
 * Lift — perpendicular to the flow, always turned upward.
 *
 *   |L| = ½ρA · C_L · (v_p · n)²,   n = (−sinθ, cosθ)
 *
 * Perpendicular to v_p, so it never does work on the body.
 */
export function liftForce(q: number, cl: number, vp: Vec2, theta: number): Vec2 {
  const speed = length(vp)
  if (speed < MIN_FLOW_SPEED) return { x: 0, y: 0 }
  const ux = vp.x / speed
  const uy = vp.y / speed
  const vn = -vp.x * Math.sin(theta) + vp.y * Math.cos(theta)
  const magnitude = q * cl * vn * vn

  let dirX = -uy
  let dirY = ux
  if (dirY < 0) {
    dirX = -dirX
    dirY = -dirY
  }
  return { x: magnitude * dirX, y: magnitude * dirY }
}

/**
 * Drag — opposes the flow.
 *
 *   D = −½ρA · C_D · |v_p| · v_p
 */
export function dragForce(q: number, cd: number, vp: Vec2): Vec2 {
  const speed = length(vp)
  if (speed < MIN_FLOW_SPEED) return { x: 0, y: 0 }
  const k = -q * cd * speed
  return { x: k * vp.x, y: k * vp.y }
}

/**
 * Vertical hybrid damping — linear + signed quadratic on v_y only.
 *
 *   F_y = −½ρA · (c_quad·|v_y| + c_lin) · v_y
 *
 * The linear part dominates at shallow, slow contact where it removes
 * the numerical chatter; the quadratic part takes over on hard impacts.
 */
export function verticalDampingForce(q: number, linear: number, quadratic: number, vy: number): Vec2 {
  return { x: 0, y: -q * (quadratic * Math.abs(vy) + linear) * vy }
}

/**
 * Suction (surface adhesion) — small downward pull on a slow, shallow
 * body that is not moving upward.
 *
 *   F_y = −C_s · A · (1 − |v_y|/v_s)² / (1 + τ/τ_s)
 *
 * Active only while depth < suctionDepthThreshold, v_y ≤ 0 and
 * |v_y| < v_s.  The squared ramp makes it vanish smoothly at v_s;
 * τ is the time since contact began.
 */
export function suctionForce(
  env: EnvironmentParameters,
  area: number,
  depth: number,
  vy: number,
  contactElapsed: number,
): Vec2 {
  const vs = env.suctionSpeedThreshold
  if (area <= 0 || depth >= env.suctionDepthThreshold) return { x: 0, y: 0 }
  if (vy > 0 || -vy >= vs) return { x: 0, y: 0 }

  const ramp = 1 + vy / vs
  const decay = 1 + Math.max(0, contactElapsed) / env.suctionTimeConstant
  return { x: 0, y: -env.suctionCoefficient * area * ramp * ramp / decay }
}

/**
 * Pitch damping — resists rotation in proportion to wetted area.
 *
 *   τ_d = −½ρA · c_pitch · ω
 */
export function pitchDampingTorque(q: number, coefficient: number, omega: number): number {
  return -q * coefficient * omega
}

// ─── Sum ────────────────────────────────────────────────────────────────────

/**
 * Net hydrodynamic force and torque for a trial state.
 *
 * Zero when nothing is submerged or there is no fluid.  In sinking mode
 * lift and suction are dropped and drag switches to the full-drag
 * coefficient so the stone settles instead of oscillating.
 */
export function computeHydroLoads(
  state: KinematicState,
  geometry: SubmergedGeometry,
  env: EnvironmentParameters,
  options: HydroOptions,
): HydroLoads {
  const lever = sub(geometry.centroid, { x: state.x, y: state.y })
  const vp = contactVelocity(state, lever)

  if (geometry.area <= 0 || env.fluidDensity <= 0) {
    return {
      force: ZERO, torque: 0, lever, contactVelocity: vp,
      lift: ZERO, drag: ZERO, damping: ZERO, suction: ZERO, dampingTorque: 0,
    }
  }

  const q = dynamicPressureArea(env.fluidDensity, geometry.area)

  const lift = options.sinking ? ZERO : liftForce(q, env.liftCoefficient, vp, state.theta)
  const cd = options.sinking ? env.sinkingDragCoefficient : env.dragCoefficient
  const drag = dragForce(q, cd, vp)
  const damping = verticalDampingForce(q, env.verticalLinearDamping, env.verticalQuadraticDamping, vp.y)
  const suction = options.sinking
    ? ZERO
    : suctionForce(env, geometry.area, geometry.depth, state.vy, options.contactElapsed)

  const force = add(add(lift, drag), add(damping, suction))
  const dampingTorque = pitchDampingTorque(q, env.pitchDamping, state.omega)
  const torque = cross(lever, force) + dampingTorque

  return { force, torque, lever, contactVelocity: vp, lift, drag, damping, suction, dampingTorque }
}

