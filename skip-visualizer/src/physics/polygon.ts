/**
 * Polygon measures — area, centroid, second moment, bounds, containment
 * and simplicity.
 *
 * Polygons are vertex arrays with an implicit closing edge from the last
 * vertex back to the first.  Either winding order is accepted; measures
 * that depend on orientation are normalised to be positive.
 */

import type { Vec2 } from './vec2.ts'

const AREA_EPSILON = 1e-15

// ─── Area & Centroid ────────────────────────────────────────────────────────

/**
 * Shoelace signed area: positive for counter-clockwise winding.
 *
 *   A = ½ Σ (xᵢ·yᵢ₊₁ − xᵢ₊₁·yᵢ)
 */
export function signedArea(poly: readonly Vec2[]): number {
  const n = poly.length
  if (n < 3) return 0
  let sum = 0
  for (let i = 0; i < n; i++) {
    const a = poly[i]
    const b = poly[(i + 1) % n]
    sum += a.x * b.y - b.x * a.y
  }
  return sum / 2
}

export function polygonArea(poly: readonly Vec2[]): number {
  return Math.abs(signedArea(poly))
}

/**
 * Area centroid.
 *
 *   Cx = Σ (xᵢ + xᵢ₊₁)·crossᵢ / 6A
 *   Cy = Σ (yᵢ + yᵢ₊₁)·crossᵢ / 6A
 *
 * Falls back to the vertex mean when the area vanishes (collinear or
 * collapsed polygons), and to the origin for an empty array.
 */
export function polygonCentroid(poly: readonly Vec2[]): Vec2 {
  const n = poly.length
  if (n === 0) return { x: 0, y: 0 }

  let twiceArea = 0
  let cx = 0
  let cy = 0
  for (let i = 0; i < n; i++) {
    const a = poly[i]
    const b = poly[(i + 1) % n]
    const c = a.x * b.y - b.x * a.y
    twiceArea += c
    cx += (a.x + b.x) * c
    cy += (a.y + b.y) * c
  }

  if (n < 3 || Math.abs(twiceArea) < AREA_EPSILON) {
    return vertexMean(poly)
  }

  const factor = 1 / (3 * twiceArea)
  return { x: cx * factor, y: cy * factor }
}

export function vertexMean(poly: readonly Vec2[]): Vec2 {
  if (poly.length === 0) return { x: 0, y: 0 }
  let sx = 0
  let sy = 0
  for (const p of poly) {
    sx += p.x
    sy += p.y
  }
  return { x: sx / poly.length, y: sy / poly.length }
}

// ─── Second Moment ──────────────────────────────────────────────────────────

/**
 * Polar second moment of area about `origin` [m⁴].
 *
 *   J = Ix + Iy
 *   Ix = (1/12) Σ crossᵢ·(yᵢ² + yᵢyᵢ₊₁ + yᵢ₊₁²)
 *   Iy = (1/12) Σ crossᵢ·(xᵢ² + xᵢxᵢ₊₁ + xᵢ₊₁²)
 *
 * with coordinates taken relative to `origin`.  Multiply by an areal
 * density to get a moment of inertia about the out-of-plane axis.
 */
export function polygonSecondMoment(poly: readonly Vec2[], origin: Vec2 = { x: 0, y: 0 }): number {
  const n = poly.length
  if (n < 3) return 0
  let sum = 0
  for (let i = 0; i < n; i++) {
    const ax = poly[i].x - origin.x
    const ay = poly[i].y - origin.y
    const bx = poly[(i + 1) % n].x - origin.x
    const by = poly[(i + 1) % n].y - origin.y
    const c = ax * by - bx * ay
    sum += c * (ax * ax + ax * bx + bx * bx + ay * ay + ay * by + by * by)
  }
  return Math.abs(sum) / 12
}

// ─── Bounds & Containment ───────────────────────────────────────────────────

export interface Bounds {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

export function polygonBounds(poly: readonly Vec2[]): Bounds {
  let minX = Infinity, minY = Infinity
  let maxX = -Infinity, maxY = -Infinity
  for (const p of poly) {
    if (p.x < minX) minX = p.x
    if (p.y < minY) minY = p.y
    if (p.x > maxX) maxX = p.x
    if (p.y > maxY) maxY = p.y
  }
  return { minX, minY, maxX, maxY }
}

/** Lowest y of any vertex; +Infinity for an empty polygon. */
export function lowestY(poly: readonly Vec2[]): number {
  let min = Infinity
  for (const p of poly) {
    if (p.y < min) min = p.y
  }
  return min
}

/** Even-odd ray cast.  Points on the boundary may land either way. */
export function pointInPolygon(point: Vec2, poly: readonly Vec2[]): boolean {
  let inside = false
  const n = poly.length
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const pi = poly[i]
    const pj = poly[j]
    const crosses = (pi.y > point.y) !== (pj.y > point.y)
      && point.x < (pj.x - pi.x) * (point.y - pi.y) / (pj.y - pi.y) + pi.x
    if (crosses) inside = !inside
  }
  return inside
}

// ─── Simplicity ─────────────────────────────────────────────────────────────

function orientation(a: Vec2, b: Vec2, c: Vec2): number {
  const v = (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x)
  if (Math.abs(v) < 1e-18) return 0
  return v > 0 ? 1 : -1
}

function onSegment(a: Vec2, b: Vec2, p: Vec2): boolean {
  return Math.min(a.x, b.x) <= p.x && p.x <= Math.max(a.x, b.x)
    && Math.min(a.y, b.y) <= p.y && p.y <= Math.max(a.y, b.y)
}

/** Closed-segment intersection test (touching endpoints count). */
export function segmentsIntersect(p1: Vec2, p2: Vec2, p3: Vec2, p4: Vec2): boolean {
  const o1 = orientation(p1, p2, p3)
  const o2 = orientation(p1, p2, p4)
  const o3 = orientation(p3, p4, p1)
  const o4 = orientation(p3, p4, p2)

  if (o1 !== o2 && o3 !== o4) return true

  if (o1 === 0 && onSegment(p1, p2, p3)) return true
  if (o2 === 0 && onSegment(p1, p2, p4)) return true
  if (o3 === 0 && onSegment(p3, p4, p1)) return true
  if (o4 === 0 && onSegment(p3, p4, p2)) return true
  return false
}

/**
 * True when the closed polygon has at least three vertices, no repeated
 * consecutive vertices, no edge that doubles back over its neighbour,
 * and no two non-adjacent edges that touch.  O(n²).
 */
export function isSimplePolygon(poly: readonly Vec2[]): boolean {
  const n = poly.length
  if (n < 3) return false

  for (let i = 0; i < n; i++) {
    const a = poly[i]
    const b = poly[(i + 1) % n]
    const c = poly[(i + 2) % n]
    if (a.x === b.x && a.y === b.y) return false
    // Adjacent edges a→b, b→c overlapping when collinear and reversed
    const abx = b.x - a.x, aby = b.y - a.y
    const bcx = c.x - b.x, bcy = c.y - b.y
    if (orientation(a, b, c) === 0 && abx * bcx + aby * bcy < 0) return false
  }

  for (let i = 0; i < n; i++) {
    const a1 = poly[i]
    const a2 = poly[(i + 1) % n]
    for (let j = i + 1; j < n; j++) {
      // Skip the edge itself and its two neighbours
      if (j === i + 1 || (i === 0 && j === n - 1)) continue
      const b1 = poly[j]
      const b2 = poly[(j + 1) % n]
      if (segmentsIntersect(a1, a2, b1, b2)) return false
    }
  }
  return true
}
