/**
 * Geometry clipper — the part of the stone below the water line.
 *
 * Transforms the body outline to world space (rotate by pitch, then
 * translate) and clips it against the half-plane y < waterLevel with a
 * single Sutherland–Hodgman pass.
 *
 * Tie-break: a vertex lying exactly on the water line counts as ABOVE.
 * Tangent contact therefore yields no polygon rather than a sliver.
 */

import type { Vec2 } from './vec2.ts'
import type { Blueprint } from './blueprint.ts'
import type { KinematicState } from './sim-state.ts'
import { polygonArea, polygonCentroid, lowestY } from './polygon.ts'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface SubmergedGeometry {
  /** Clipped polygon in world coordinates (empty when dry) */
  polygon: Vec2[]
  /** Submerged profile area [m²] */
  area: number
  /** Area centroid of the clipped polygon — point of force application */
  centroid: Vec2
  /** Water level minus the lowest outline point, 0 when clear [m] */
  depth: number
  /** Submerged area / blueprint area */
  fraction: number
}

export function emptyGeometry(position: Vec2, depth: number = 0): SubmergedGeometry {
  return { polygon: [], area: 0, centroid: { x: position.x, y: position.y }, depth, fraction: 0 }
}

// ─── World Transform ────────────────────────────────────────────────────────

/**
 * Body-local outline → world coordinates.
 *
 *   p_world = R(θ) · p_body + (x, y)
 */
export function outlineToWorld(
  outline: readonly Vec2[],
  state: Pick<KinematicState, 'x' | 'y' | 'theta'>,
): Vec2[] {
  const c = Math.cos(state.theta)
  const s = Math.sin(state.theta)
  return outline.map(p => ({
    x: state.x + p.x * c - p.y * s,
    y: state.y + p.x * s + p.y * c,
  }))
}

// ─── Half-Plane Clip ────────────────────────────────────────────────────────

function crossing(a: Vec2, b: Vec2, lineY: number): Vec2 {
  const t = (lineY - a.y) / (b.y - a.y)
  return { x: a.x + t * (b.x - a.x), y: lineY }
}

function pushDistinct(out: Vec2[], p: Vec2): void {
  const last = out[out.length - 1]
  if (last && last.x === p.x && last.y === p.y) return
  out.push(p)
}

/**
 * Sutherland–Hodgman clip keeping the region strictly below `lineY`.
 *
 * Walks each edge cur → next:
 *   in  → in   emit next
 *   in  → out  emit crossing
 *   out → in   emit crossing, next
 *   out → out  emit nothing
 *
 * Consecutive duplicates (from a vertex sitting on the line) are dropped.
 */
export function clipBelowWaterLine(polygon: readonly Vec2[], lineY: number): Vec2[] {
  const out: Vec2[] = []
  const n = polygon.length
  if (n === 0) return out

  for (let i = 0; i < n; i++) {
    const cur = polygon[i]
    const next = polygon[(i + 1) % n]
    const curIn = cur.y < lineY
    const nextIn = next.y < lineY

    if (curIn && nextIn) {
      pushDistinct(out, next)
    } else if (curIn) {
      pushDistinct(out, crossing(cur, next, lineY))
    } else if (nextIn) {
      pushDistinct(out, crossing(cur, next, lineY))
      pushDistinct(out, next)
    }
  }

  if (out.length > 1) {
    const first = out[0]
    const last = out[out.length - 1]
    if (first.x === last.x && first.y === last.y) out.pop()
  }
  return out
}

// ─── Submerged Geometry ─────────────────────────────────────────────────────

/**
 * Clip the stone at `state` against the water line.
 *
 * Returns area 0 for fewer than three clipped vertices; the centroid
 * then defaults to the body position.
 */
export function computeSubmergedGeometry(
  blueprint: Blueprint,
  state: Pick<KinematicState, 'x' | 'y' | 'theta'>,
  waterLevel: number,
): SubmergedGeometry {
  const world = outlineToWorld(blueprint.outline, state)
  return clipWorldOutline(world, blueprint.area, state, waterLevel)
}

/**
 * Same as `computeSubmergedGeometry` for an outline already in world space.
 */
export function clipWorldOutline(
  world: readonly Vec2[],
  totalArea: number,
  position: Pick<KinematicState, 'x' | 'y'>,
  waterLevel: number,
): SubmergedGeometry {
  const depth = Math.max(0, waterLevel - lowestY(world))
  if (depth === 0) return emptyGeometry(position)

  const polygon = clipBelowWaterLine(world, waterLevel)
  if (polygon.length < 3) return emptyGeometry(position, depth)

  const area = polygonArea(polygon)
  if (area === 0) return { ...emptyGeometry(position, depth), polygon }

  return {
    polygon,
    area,
    centroid: polygonCentroid(polygon),
    depth,
    fraction: totalArea > 0 ? Math.min(1, area / totalArea) : 0,
  }
}
