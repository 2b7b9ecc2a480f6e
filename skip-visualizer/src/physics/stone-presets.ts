/**
 * Stone catalogue — outline generators and named presets.
 *
 * Profiles are side views: length along x, thickness along y.
 * Material density defaults to a typical slate/granite value.
 */

import type { Vec2 } from './vec2.ts'
import type { Blueprint, StoneSpec } from './blueprint.ts'
import { buildBlueprint } from './blueprint.ts'

/** Skipping-stone rock density [kg/m³] */
export const DENSITY_STONE = 2500

// ─── Outline Generators ─────────────────────────────────────────────────────

/**
 * Counter-clockwise ellipse polygon centred on the origin.
 *
 * @param semiMajor  Half-length along x [m]
 * @param semiMinor  Half-thickness along y [m]
 * @param segments   Vertex count (≥ 3)
 */
export function ellipseOutline(semiMajor: number, semiMinor: number, segments: number = 32): Vec2[] {
  const n = Math.max(3, Math.floor(segments))
  const points: Vec2[] = []
  for (let i = 0; i < n; i++) {
    const a = (2 * Math.PI * i) / n
    points.push({ x: semiMajor * Math.cos(a), y: semiMinor * Math.sin(a) })
  }
  return points
}

/**
 * Rectangle with quarter-circle corners, counter-clockwise.
 *
 * `cornerRadius` is clamped to half the smaller side.  Coincident
 * vertices where arcs meet are emitted once.
 */
export function roundedSlabOutline(
  length: number,
  thickness: number,
  cornerRadius: number,
  cornerSegments: number = 4,
): Vec2[] {
  const hx = length / 2
  const hy = thickness / 2
  const r = Math.min(cornerRadius, hx, hy)
  const steps = Math.max(1, Math.floor(cornerSegments))

  // Corner centres, walked counter-clockwise starting bottom-right
  const corners: { cx: number; cy: number; start: number }[] = [
    { cx:  hx - r, cy: -hy + r, start: -Math.PI / 2 },
    { cx:  hx - r, cy:  hy - r, start: 0 },
    { cx: -hx + r, cy:  hy - r, start: Math.PI / 2 },
    { cx: -hx + r, cy: -hy + r, start: Math.PI },
  ]

  // Neighbouring arcs meet on a shared vertex when r = hy or hx, and
  // collapse to a single point when r = 0
  const eps = 1e-12 * (hx + hy)
  const points: Vec2[] = []
  const emit = (p: Vec2): void => {
    const last = points[points.length - 1]
    if (last === undefined || Math.hypot(p.x - last.x, p.y - last.y) > eps) points.push(p)
  }
  for (const { cx, cy, start } of corners) {
    for (let k = 0; k <= steps; k++) {
      const a = start + (k / steps) * (Math.PI / 2)
      emit({ x: cx + r * Math.cos(a), y: cy + r * Math.sin(a) })
    }
  }
  const first = points[0]
  const last = points[points.length - 1]
  if (points.length > 1 && Math.hypot(first.x - last.x, first.y - last.y) <= eps) points.pop()
  return points
}

// ─── Presets ────────────────────────────────────────────────────────────────

export type StonePresetKey = 'flat-ellipse' | 'thick-pebble' | 'slab'

export const STONE_SPECS: Record<StonePresetKey, StoneSpec> = {
  'flat-ellipse': {
    name: 'Flat ellipse',
    outline: ellipseOutline(0.04, 0.006, 32),
    width: 0.06,
    density: DENSITY_STONE,
  },
  'thick-pebble': {
    name: 'Thick pebble',
    outline: ellipseOutline(0.03, 0.012, 32),
    width: 0.05,
    density: DENSITY_STONE,
  },
  'slab': {
    name: 'Rounded slab',
    outline: roundedSlabOutline(0.07, 0.01, 0.004, 4),
    width: 0.05,
    density: DENSITY_STONE,
  },
}

export function isStonePresetKey(key: string): key is StonePresetKey {
  return Object.prototype.hasOwnProperty.call(STONE_SPECS, key)
}

/** Build the blueprint for a named preset. */
export function presetBlueprint(key: StonePresetKey): Blueprint {
  return buildBlueprint(STONE_SPECS[key])
}
