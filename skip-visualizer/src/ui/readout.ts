/**
 * Simulation readout panel — updates the numeric display.
 */

import type { RunnerSnapshot } from '../sim/sim-runner.ts'

const RAD = 180 / Math.PI

/** The part of `Document` the readout writes through. */
export interface TextTarget {
  getElementById(id: string): { textContent: string | null } | null
}

export type ReadoutField =
  | 'r-time' | 'r-phase' | 'r-status'
  | 'r-height' | 'r-speed' | 'r-pitch' | 'r-omega'
  | 'r-submerged' | 'r-force' | 'r-torque'
  | 'r-skips' | 'r-air'

function fmt(n: number, digits = 3): string {
  return n.toFixed(digits)
}

/**
 * Snapshot → display strings keyed by element id.
 */
export function formatReadout(snap: Readonly<RunnerSnapshot>): Record<ReadoutField, string> {
  const { state } = snap
  const speed = Math.hypot(state.vx, state.vy)

  return {
    'r-time': `${fmt(snap.time)} s`,
    'r-phase': snap.phase,
    'r-status': snap.status === 'failed' && snap.error ? `failed: ${snap.error}` : snap.status,
    'r-height': `${fmt(state.y)} m`,
    'r-speed': `${fmt(speed, 2)} m/s`,
    'r-pitch': `${fmt(state.theta * RAD, 1)}°`,
    'r-omega': `${fmt(state.omega * RAD, 1)}°/s`,
    'r-submerged': `${(snap.submerged.fraction * 100).toFixed(0)}%`,
    'r-force': `${fmt(snap.forceMagnitude, 2)} N`,
    'r-torque': `${fmt(snap.torque, 4)} N·m`,
    'r-skips': String(snap.skips),
    'r-air': `${fmt(snap.airTime, 2)} s`,
  }
}

export function updateReadout(snap: Readonly<RunnerSnapshot>, doc: TextTarget): void {
  const fields = formatReadout(snap)
  for (const [id, text] of Object.entries(fields)) {
    const el = doc.getElementById(id)
    if (el) el.textContent = text
  }
}
