/**
 * One-shot throws — launch settings parsed from CLI arguments and run
 * to completion without a timer.
 */

import { presetBlueprint, isStonePresetKey } from '../physics/stone-presets.ts'
import type { StonePresetKey } from '../physics/stone-presets.ts'
import { createEnvironment } from '../physics/environment.ts'
import type { EnvironmentParameters } from '../physics/environment.ts'
import { launchState } from '../physics/sim.ts'
import { SkipRunner } from './sim-runner.ts'
import type { RunnerOptions } from './sim-runner.ts'

const DEG = Math.PI / 180

export interface ThrowSettings {
  preset: StonePresetKey
  speed: number
  pathAngleDeg: number
  pitchDeg: number
  height: number
}

export const DEFAULT_THROW: Readonly<ThrowSettings> = Object.freeze({
  preset: 'flat-ellipse',
  speed: 8,
  pathAngleDeg: -10,
  pitchDeg: 20,
  height: 0.05,
})

function numberArg(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const n = Number(value)
  if (!Number.isFinite(n)) throw new Error(`Expected a number, got "${value}"`)
  return n
}

export function parseThrowArgs(args: readonly string[]): ThrowSettings {
  const [preset, speed, path, pitch]: readonly (string | undefined)[] = args
  let key: StonePresetKey = DEFAULT_THROW.preset
  if (preset !== undefined) {
    if (!isStonePresetKey(preset)) throw new Error(`Unknown stone preset "${preset}"`)
    key = preset
  }
  return {
    preset: key,
    speed: numberArg(speed, DEFAULT_THROW.speed),
    pathAngleDeg: numberArg(path, DEFAULT_THROW.pathAngleDeg),
    pitchDeg: numberArg(pitch, DEFAULT_THROW.pitchDeg),
    height: DEFAULT_THROW.height,
  }
}

/**
 * Run one throw to completion, stepping the runner as fast as it goes.
 */
export function runThrow(
  settings: ThrowSettings,
  env: EnvironmentParameters = createEnvironment(),
  options: Partial<RunnerOptions> = {},
  maxTime: number = 10,
): SkipRunner {
  const blueprint = presetBlueprint(settings.preset)
  const runner = new SkipRunner(blueprint, env, launchState({
    speed: settings.speed,
    pathAngle: settings.pathAngleDeg * DEG,
    pitch: settings.pitchDeg * DEG,
    height: settings.height,
  }), options)

  const maxSteps = Math.ceil(maxTime / runner.dt)
  let steps = 0
  while (steps < maxSteps && runner.step()) steps++
  return runner
}
