/**
 * Chart data generation — trajectory and speed plots from recorded stamps.
 *
 * The trajectory is split into runs of constant phase, each its own
 * dataset so the line colour follows the contact regime.  Neighbouring
 * runs share their boundary stamp so the drawn path has no gaps.
 */

import type { ChartConfiguration, ChartData, ChartDataset, ScatterDataPoint } from 'chart.js'
import type { Phase } from '../physics/phase.ts'
import type { Stamp, PhaseEvent } from '../physics/sim-state.ts'

// ─── Phase Colours ──────────────────────────────────────────────────────────

export const PHASE_COLORS: Record<Phase, string> = {
  flying: 'hsl(200, 90%, 55%)',
  bouncing: 'hsl(30, 95%, 55%)',
  sinking: 'hsl(0, 80%, 50%)',
}

const EVENT_COLOR = '#ffffff'

// ─── Segments ───────────────────────────────────────────────────────────────

export interface TrajectorySegment {
  phase: Phase
  points: ScatterDataPoint[]
}

/**
 * Split stamps into runs of equal phase.
 *   F F B B F  →  F[0..2]  B[2..4]  F[4]
 */
export function segmentByPhase(stamps: readonly Stamp[]): TrajectorySegment[] {
  const segments: TrajectorySegment[] = []
  let current: TrajectorySegment | null = null

  for (const s of stamps) {
    const point = { x: s.state.x, y: s.state.y }
    if (current && current.phase === s.phase) {
      current.points.push(point)
      continue
    }
    current?.points.push(point)
    current = { phase: s.phase, points: [point] }
    segments.push(current)
  }
  return segments
}

// ─── Datasets ───────────────────────────────────────────────────────────────

export function trajectoryChartData(stamps: readonly Stamp[]): ChartData<'scatter'> {
  const datasets: ChartDataset<'scatter'>[] = segmentByPhase(stamps).map(seg => ({
    label: seg.phase,
    data: seg.points,
    showLine: true,
    borderColor: PHASE_COLORS[seg.phase],
    backgroundColor: PHASE_COLORS[seg.phase],
    borderWidth: 2,
    pointRadius: 0,
  }))
  return { datasets }
}

/** Phase transitions as point markers. */
export function eventDataset(events: readonly PhaseEvent[]): ChartDataset<'scatter'> {
  return {
    label: 'transitions',
    data: events.map(e => ({ x: e.state.x, y: e.state.y })),
    borderColor: EVENT_COLOR,
    backgroundColor: events.map(e => PHASE_COLORS[e.to]),
    pointRadius: 4,
    showLine: false,
  }
}

/** Centroid speed against time [s, m/s]. */
export function speedSeries(stamps: readonly Stamp[]): ScatterDataPoint[] {
  return stamps.map(s => ({ x: s.t, y: Math.hypot(s.state.vx, s.state.vy) }))
}

// ─── Chart Configuration ────────────────────────────────────────────────────

/**
 * Side-view trajectory chart: path coloured by phase plus transition
 * markers.  Axis titles are in metres.
 */
export function trajectoryChartConfig(
  stamps: readonly Stamp[],
  events: readonly PhaseEvent[] = [],
): ChartConfiguration<'scatter'> {
  const data = trajectoryChartData(stamps)
  if (events.length > 0) data.datasets.push(eventDataset(events))

  return {
    type: 'scatter',
    data,
    options: {
      animation: false,
      responsive: true,
      maintainAspectRatio: false,
      scales: {
        x: { type: 'linear', title: { display: true, text: 'Downrange (m)' } },
        y: { type: 'linear', title: { display: true, text: 'Height (m)' } },
      },
      plugins: {
        legend: { display: true },
      },
    },
  }
}
