/**
 * Simulation runner tests — fixed-step accumulator, frame cap, snapshot
 * publishing, halting on non-finite state, and the timer loop.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { SkipRunner } from '../sim/sim-runner.ts'
import type { Logger } from '../sim/sim-runner.ts'
import { launchState } from '../physics/sim.ts'
import { presetBlueprint } from '../physics/stone-presets.ts'
import { DEFAULT_ENVIRONMENT } from '../physics/environment.ts'
import type { KinematicState } from '../physics/sim-state.ts'
import type { Blueprint } from '../physics/blueprint.ts'
import { InvalidBlueprintError } from '../physics/errors.ts'

const DEG = Math.PI / 180
const DT = 1 / 1024
const blueprint = presetBlueprint('flat-ellipse')
const highUp: KinematicState = { x: 0, y: 100, vx: 2, vy: 0, theta: 0, omega: 0 }

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

function runner(initial: KinematicState = highUp, logger: Logger = silentLogger()): SkipRunner {
  return new SkipRunner(blueprint, DEFAULT_ENVIRONMENT, initial, { dt: DT, maxStepsPerFrame: 8, logger })
}

afterEach(() => {
  vi.useRealTimers()
})

// ─── Construction ───────────────────────────────────────────────────────────

describe('SkipRunner construction', () => {
  it('publishes a ready snapshot of the initial state', () => {
    const r = runner()
    expect(r.status).toBe('ready')
    expect(r.snapshot.time).toBe(0)
    expect(r.snapshot.phase).toBe('flying')
    expect(r.snapshot.state).toEqual(highUp)
    expect(r.snapshot.skips).toBe(0)
    expect(r.snapshot.error).toBeNull()
    expect(r.snapshot.failedState).toBeNull()
    expect(r.trajectory).toHaveLength(1)
  })

  it('snapshot carries the weight as net force in flight', () => {
    const r = runner()
    expect(r.snapshot.netForce.x).toBe(0)
    expect(r.snapshot.netForce.y).toBeCloseTo(-blueprint.mass * DEFAULT_ENVIRONMENT.gravity, 12)
    expect(r.snapshot.forceMagnitude).toBeCloseTo(blueprint.mass * DEFAULT_ENVIRONMENT.gravity, 12)
  })

  it('rejects a self-intersecting blueprint', () => {
    const bowTie: Blueprint = {
      ...blueprint,
      outline: [{ x: -0.02, y: -0.01 }, { x: 0.02, y: 0.01 }, { x: 0.02, y: -0.01 }, { x: -0.02, y: 0.02 }],
    }
    expect(() => new SkipRunner(bowTie, DEFAULT_ENVIRONMENT, highUp)).toThrow(InvalidBlueprintError)
  })

  it('rejects a bad timestep or frame cap', () => {
    expect(() => new SkipRunner(blueprint, DEFAULT_ENVIRONMENT, highUp, { dt: 0 })).toThrow(RangeError)
    expect(() => new SkipRunner(blueprint, DEFAULT_ENVIRONMENT, highUp, { maxStepsPerFrame: 0 })).toThrow(RangeError)
  })
})

// ─── Stepping ───────────────────────────────────────────────────────────────

describe('SkipRunner.step', () => {
  it('advances one fixed step', () => {
    const r = runner()
    expect(r.step()).toBe(true)
    expect(r.status).toBe('running')
    expect(r.snapshot.time).toBe(DT)
  })

  it('replaces the snapshot with a new frozen object', () => {
    const r = runner()
    const first = r.snapshot
    r.step()
    const second = r.snapshot
    expect(second).not.toBe(first)
    expect(first.time).toBe(0)
    expect(first.state.y).toBe(100)
    expect(Object.isFrozen(second)).toBe(true)
    expect(Object.isFrozen(second.state)).toBe(true)
    expect(Object.isFrozen(second.netForce)).toBe(true)
  })

  it('halts on a non-finite state and keeps the error', () => {
    const logger = silentLogger()
    const r = runner({ ...highUp, vx: NaN }, logger)
    expect(r.step()).toBe(false)
    expect(r.status).toBe('failed')
    expect(r.snapshot.status).toBe('failed')
    expect(r.snapshot.error).toBe('Non-finite state at t=0.0010 s (x, vx)')
    expect(logger.error).toHaveBeenCalledWith('[sim] halted: Non-finite state at t=0.0010 s (x, vx)')
    // Offending values are published beside the last good state
    expect(r.snapshot.failedState?.x).toBeNaN()
    expect(r.snapshot.failedState?.vx).toBeNaN()
    expect(r.snapshot.failedState?.y).toBeCloseTo(100, 3)
    expect(Object.isFrozen(r.snapshot.failedState)).toBe(true)
    expect(r.snapshot.time).toBe(0)
    expect(r.step()).toBe(false)
  })

  it('runs the reference throw to a settled finish', () => {
    const logger = silentLogger()
    const initial = launchState({ speed: 8, pathAngle: -10 * DEG, pitch: 20 * DEG, height: 0.05 })
    const r = new SkipRunner(blueprint, DEFAULT_ENVIRONMENT, initial, { verbose: true, logger, recordEvery: 100 })

    let steps = 0
    while (r.step() && steps < 50_000) steps++

    expect(r.status).toBe('settled')
    expect(r.snapshot.phase).toBe('sinking')
    expect(r.snapshot.skips).toBe(2)
    expect(r.events).toHaveLength(6)
    // One line per transition plus the settle message
    expect(logger.info).toHaveBeenCalledTimes(7)
    expect(r.step()).toBe(false)
  })
})

// ─── Accumulator ────────────────────────────────────────────────────────────

describe('SkipRunner.advance', () => {
  it('runs whole steps and carries the remainder', () => {
    const r = runner()
    expect(r.advance(3 * DT)).toBe(3)
    expect(r.advance(0.5 * DT)).toBe(0)
    expect(r.advance(0.5 * DT)).toBe(1)
    expect(r.snapshot.time).toBe(4 * DT)
  })

  it('clamps long frames to the step cap and warns', () => {
    const logger = silentLogger()
    const r = runner(highUp, logger)
    expect(r.advance(10 * DT)).toBe(8)
    expect(logger.warn).toHaveBeenCalledWith('[sim] frame of 9.8 ms clamped to 7.8 ms')
    expect(r.snapshot.time).toBe(8 * DT)
  })

  it('ignores non-positive and non-finite frame times', () => {
    const r = runner()
    expect(r.advance(0)).toBe(0)
    expect(r.advance(-1)).toBe(0)
    expect(r.advance(NaN)).toBe(0)
    expect(r.snapshot.time).toBe(0)
  })

  it('records the trajectory every recordEvery ticks', () => {
    const r = new SkipRunner(blueprint, DEFAULT_ENVIRONMENT, highUp, {
      dt: DT, maxStepsPerFrame: 100, recordEvery: 5, logger: silentLogger(),
    })
    r.advance(20 * DT)
    expect(r.trajectory.map(s => s.t)).toEqual([0, 5 * DT, 10 * DT, 15 * DT, 20 * DT])
  })
})

// ─── Timer Loop ─────────────────────────────────────────────────────────────

describe('SkipRunner.start / stop', () => {
  it('drives the accumulator from the injected clock', () => {
    vi.useFakeTimers()
    let clock = 0
    const onFrame = vi.fn()
    const r = new SkipRunner(blueprint, DEFAULT_ENVIRONMENT, highUp, {
      dt: DT, maxStepsPerFrame: 100, frameInterval: 16, now: () => clock, onFrame, logger: silentLogger(),
    })

    r.start()
    expect(r.isRunning).toBe(true)

    clock += 16
    vi.advanceTimersByTime(16)
    // 16 ms at 1/1024 s per step → 16 whole steps
    expect(r.snapshot.time).toBeCloseTo(16 * DT, 12)
    expect(onFrame).toHaveBeenCalledTimes(1)
    expect(onFrame).toHaveBeenCalledWith(r.snapshot)

    r.stop()
    expect(r.isRunning).toBe(false)
    clock += 160
    vi.advanceTimersByTime(160)
    expect(onFrame).toHaveBeenCalledTimes(1)
  })

  it('start is a no-op once failed', () => {
    const r = runner({ ...highUp, y: NaN })
    r.step()
    r.start()
    expect(r.isRunning).toBe(false)
  })

  it('reset returns to a ready state', () => {
    const r = runner()
    r.advance(4 * DT)
    r.reset({ ...highUp, y: 50 })
    expect(r.status).toBe('ready')
    expect(r.snapshot.time).toBe(0)
    expect(r.snapshot.state.y).toBe(50)
    expect(r.trajectory).toHaveLength(1)
    expect(r.events).toHaveLength(0)
  })
})
