/**
 * Real-time simulation runner.
 *
 * Owns the single mutable simulation state and advances it at a fixed
 * timestep from wall-clock frames.  Each tick replaces the published
 * snapshot with a new frozen object, so readers never see a half-updated
 * state.
 *
 * No Three.js or DOM dependency — renderers read `snapshot`,
 * `trajectory` and `events`.
 */

import type { Blueprint } from '../physics/blueprint.ts'
import { validateBlueprint } from '../physics/blueprint.ts'
import type { EnvironmentParameters } from '../physics/environment.ts'
import type { SubmergedGeometry } from '../physics/clipper.ts'
import type { Phase } from '../physics/phase.ts'
import type { Vec2 } from '../physics/vec2.ts'
import type { KinematicState, SimulationState, Stamp, PhaseEvent } from '../physics/sim-state.ts'
import type { TickResult } from '../physics/sim.ts'
import {
  SIMULATION_DT,
  DEFAULT_FLOOR_DEPTH,
  advanceTick,
  evaluateDynamics,
  hasSettled,
  initialSimulationState,
} from '../physics/sim.ts'
import { NonFiniteStateError } from '../physics/errors.ts'

// ─── Options ────────────────────────────────────────────────────────────────

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

export type RunnerStatus = 'ready' | 'running' | 'settled' | 'failed'

export interface RunnerOptions {
  /** Physics timestep [s] */
  dt: number
  /** Max physics steps per frame to prevent spiral of death */
  maxStepsPerFrame: number
  /** Depth below the surface at which a sinking stone ends the run [m] */
  floorDepth: number
  /** Log every phase transition */
  verbose: boolean
  logger: Logger
  /** Wall clock [ms] */
  now: () => number
  /** Timer period for start() [ms] */
  frameInterval: number
  /** Record every Nth tick into the trajectory */
  recordEvery: number
  /** Called after each timer frame with the latest snapshot */
  onFrame?: (snapshot: Readonly<RunnerSnapshot>) => void
}

export const DEFAULT_RUNNER_OPTIONS: Readonly<RunnerOptions> = Object.freeze({
  dt: SIMULATION_DT,
  maxStepsPerFrame: 500,
  floorDepth: DEFAULT_FLOOR_DEPTH,
  verbose: false,
  logger: console,
  now: () => performance.now(),
  frameInterval: 1000 / 60,
  recordEvery: 10,
})

// ─── Snapshot ───────────────────────────────────────────────────────────────

export interface RunnerSnapshot {
  time: number
  state: Readonly<KinematicState>
  phase: Phase
  submerged: Readonly<SubmergedGeometry>
  /** Net force including gravity [N] */
  netForce: Readonly<Vec2>
  /** Net torque about the centroid [N·m] */
  torque: number
  forceMagnitude: number
  skips: number
  /** Airborne time after first contact [s] */
  airTime: number
  status: RunnerStatus
  /** Message of the error that halted the run */
  error: string | null
  /** The non-finite state that halted the run; `state` keeps the last good one */
  failedState: Readonly<KinematicState> | null
}

function freezeSnapshot(snapshot: RunnerSnapshot): Readonly<RunnerSnapshot> {
  return Object.freeze({
    ...snapshot,
    state: Object.freeze({ ...snapshot.state }),
    submerged: Object.freeze({ ...snapshot.submerged, polygon: [...snapshot.submerged.polygon] }),
    netForce: Object.freeze({ ...snapshot.netForce }),
    failedState: snapshot.failedState === null ? null : Object.freeze({ ...snapshot.failedState }),
  })
}

// ─── Runner ─────────────────────────────────────────────────────────────────

export class SkipRunner {
  private sim: SimulationState
  private current: Readonly<RunnerSnapshot>
  private runStatus: RunnerStatus = 'ready'
  private stamps: Stamp[] = []
  private phaseEvents: PhaseEvent[] = []
  private accumulator = 0
  private ticks = 0
  private lastTime = 0
  private timer: ReturnType<typeof setInterval> | null = null
  private readonly options: RunnerOptions

  constructor(
    private readonly blueprint: Blueprint,
    private readonly env: EnvironmentParameters,
    initial: KinematicState,
    options: Partial<RunnerOptions> = {},
  ) {
    validateBlueprint(blueprint)
    this.options = { ...DEFAULT_RUNNER_OPTIONS, ...options }
    if (!(this.options.dt > 0) || !Number.isFinite(this.options.dt)) {
      throw new RangeError(`Time step must be positive and finite, got ${this.options.dt}`)
    }
    if (!Number.isInteger(this.options.maxStepsPerFrame) || this.options.maxStepsPerFrame < 1) {
      throw new RangeError(`maxStepsPerFrame must be a positive integer, got ${this.options.maxStepsPerFrame}`)
    }
    this.sim = initialSimulationState(initial)
    this.current = this.publish()
    this.stamps.push(this.stamp())
  }

  /** Latest published snapshot (frozen) */
  get snapshot(): Readonly<RunnerSnapshot> { return this.current }

  get status(): RunnerStatus { return this.runStatus }

  /** Is the timer loop active? */
  get isRunning(): boolean { return this.timer !== null }

  get trajectory(): readonly Stamp[] { return this.stamps }

  get events(): readonly PhaseEvent[] { return this.phaseEvents }

  /** Fixed timestep [s] */
  get dt(): number { return this.options.dt }

  /**
   * Advance exactly one tick.
   * Returns false once the run has settled or failed.
   */
  step(): boolean {
    if (this.runStatus === 'settled' || this.runStatus === 'failed') return false

    let tick: TickResult
    try {
      tick = advanceTick(this.sim, this.blueprint, this.env, this.options.dt)
    } catch (err) {
      if (err instanceof NonFiniteStateError) {
        this.fail(err)
        return false
      }
      throw err
    }

    this.sim = tick.next
    this.ticks++
    this.runStatus = hasSettled(this.sim, this.env, this.options.floorDepth) ? 'settled' : 'running'

    if (tick.event) {
      this.phaseEvents.push(tick.event)
      if (this.options.verbose) {
        const e = tick.event
        this.options.logger.info(
          `[sim] t=${e.time.toFixed(4)} s  ${e.from} → ${e.to}  speed ${e.speed.toFixed(2)} m/s`,
        )
      }
    }

    if (tick.event || this.runStatus === 'settled' || this.ticks % this.options.recordEvery === 0) {
      this.stamps.push(this.stamp())
    }

    this.current = this.publish()

    if (this.runStatus === 'settled' && this.options.verbose) {
      this.options.logger.info(
        `[sim] settled at t=${this.sim.time.toFixed(3)} s after ${this.sim.skips} skip(s)`,
      )
    }
    return true
  }

  /**
   * Feed wall-clock time [s] through the accumulator.
   *
   * At most `maxStepsPerFrame` steps run; excess time is dropped with a
   * warning.  Returns the number of steps taken.
   */
  advance(elapsed: number): number {
    if (!(elapsed > 0) || !Number.isFinite(elapsed)) return 0

    const { dt, maxStepsPerFrame } = this.options
    const maxElapsed = maxStepsPerFrame * dt
    if (elapsed > maxElapsed) {
      this.options.logger.warn(
        `[sim] frame of ${(elapsed * 1000).toFixed(1)} ms clamped to ${(maxElapsed * 1000).toFixed(1)} ms`,
      )
      elapsed = maxElapsed
    }

    this.accumulator += elapsed
    let steps = 0
    while (this.accumulator >= dt && steps < maxStepsPerFrame) {
      if (!this.step()) {
        this.accumulator = 0
        break
      }
      this.accumulator -= dt
      steps++
    }
    return steps
  }

  /** Start the timer loop */
  start(): void {
    if (this.timer !== null) return
    if (this.runStatus === 'settled' || this.runStatus === 'failed') return
    this.lastTime = this.options.now()
    this.timer = setInterval(this.frame, this.options.frameInterval)
  }

  /** Stop the timer loop */
  stop(): void {
    if (this.timer === null) return
    clearInterval(this.timer)
    this.timer = null
  }

  /** Discard the run and start over from `initial`. */
  reset(initial: KinematicState): void {
    this.stop()
    this.sim = initialSimulationState(initial)
    this.runStatus = 'ready'
    this.accumulator = 0
    this.ticks = 0
    this.stamps = [this.stamp()]
    this.phaseEvents = []
    this.current = this.publish()
  }

  private frame = (): void => {
    const now = this.options.now()
    const elapsed = (now - this.lastTime) / 1000
    this.lastTime = now

    this.advance(elapsed)
    this.options.onFrame?.(this.current)

    if (this.runStatus === 'settled' || this.runStatus === 'failed') this.stop()
  }

  private fail(err: NonFiniteStateError): void {
    this.runStatus = 'failed'
    this.current = freezeSnapshot({ ...this.current, status: 'failed', error: err.message, failedState: err.state })
    this.options.logger.error(`[sim] halted: ${err.message}`)
    this.stop()
  }

  private stamp(): Stamp {
    return { t: this.sim.time, state: { ...this.sim.kinematics }, phase: this.sim.tracker.phase }
  }

  private publish(): Readonly<RunnerSnapshot> {
    const { time, kinematics, tracker } = this.sim
    const evaluation = evaluateDynamics(time, kinematics, {
      blueprint: this.blueprint,
      env: this.env,
      phase: tracker.phase,
      contactStartedAt: tracker.contactStartedAt,
    })
    return freezeSnapshot({
      time,
      state: kinematics,
      phase: tracker.phase,
      submerged: evaluation.submerged,
      netForce: evaluation.netForce,
      torque: evaluation.torque,
      forceMagnitude: Math.hypot(evaluation.netForce.x, evaluation.netForce.y),
      skips: this.sim.skips,
      airTime: this.sim.airTime,
      status: this.runStatus,
      error: null,
      failedState: null,
    })
  }
}
