/**
 * Headless entry point — throws a preset stone and logs the result.
 *
 *   npm run demo -- [preset] [speed m/s] [path angle °] [pitch °]
 */

import { parseThrowArgs, runThrow } from './sim/throw.ts'
import { formatReadout } from './ui/readout.ts'

function main(): void {
  const settings = parseThrowArgs(process.argv.slice(2))
  console.info(`[demo] ${settings.preset} at ${settings.speed} m/s, path ${settings.pathAngleDeg}°, pitch ${settings.pitchDeg}°`)

  const runner = runThrow(settings, undefined, { verbose: true })
  const readout = formatReadout(runner.snapshot)
  console.info(`[demo] ${readout['r-status']} after ${readout['r-time']}: ${readout['r-skips']} skip(s), ${readout['r-air']} airborne`)
  for (const e of runner.events) {
    console.info(`  ${e.time.toFixed(4)} s  ${e.from.padEnd(8)} → ${e.to.padEnd(8)}  x=${e.state.x.toFixed(3)} m  v=${e.speed.toFixed(2)} m/s`)
  }
  if (runner.status === 'failed') process.exitCode = 1
}

main()
