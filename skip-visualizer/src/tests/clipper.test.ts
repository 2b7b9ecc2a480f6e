/**
 * Geometry clipper tests — world transform, half-plane clip, and the
 * submerged area/centroid/depth the force model consumes.
 */

import { describe, it, expect } from 'vitest'
import {
  outlineToWorld,
  clipBelowWaterLine,
  clipWorldOutline,
  computeSubmergedGeometry,
} from '../physics/clipper.ts'
import { presetBlueprint } from '../physics/stone-presets.ts'
import type { Vec2 } from '../physics/vec2.ts'
import { polygonArea, polygonCentroid, lowestY } from '../physics/polygon.ts'

const square: Vec2[] = [
  { x: -1, y: -1 }, { x: 1, y: -1 }, { x: 1, y: 1 }, { x: -1, y: 1 },
]

// ─── World Transform ────────────────────────────────────────────────────────

describe('outlineToWorld', () => {
  it('rotates counter-clockwise then translates', () => {
    const [p] = outlineToWorld([{ x: 1, y: 0 }], { x: 2, y: 3, theta: Math.PI / 2 })
    expect(p.x).toBeCloseTo(2, 12)
    expect(p.y).toBeCloseTo(4, 12)
  })

  it('identity at θ = 0', () => {
    const world = outlineToWorld(square, { x: 0, y: 0, theta: 0 })
    expect(world).toEqual(square)
  })
})

// ─── Half-Plane Clip ────────────────────────────────────────────────────────

describe('clipBelowWaterLine', () => {
  it('fully above → empty', () => {
    expect(clipBelowWaterLine(square, -2)).toEqual([])
  })

  it('fully below → unchanged vertex set', () => {
    const out = clipBelowWaterLine(square, 2)
    expect(out).toHaveLength(4)
    expect(out).toEqual(expect.arrayContaining(square))
  })

  it('half submerged square keeps the lower half', () => {
    const out = clipBelowWaterLine(square, 0)
    expect(out).toEqual([
      { x: 1, y: -1 },
      { x: 1, y: 0 },
      { x: -1, y: 0 },
      { x: -1, y: -1 },
    ])
  })

  it('a vertex exactly on the line counts as above', () => {
    const tip: Vec2[] = [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: -1, y: 1 }]
    expect(clipBelowWaterLine(tip, 0)).toEqual([])
  })

  it('an edge lying on the line produces no duplicate vertices', () => {
    const box: Vec2[] = [{ x: 0, y: -1 }, { x: 1, y: -1 }, { x: 1, y: 0 }, { x: 0, y: 0 }]
    expect(clipBelowWaterLine(box, 0)).toEqual([
      { x: 1, y: -1 },
      { x: 1, y: 0 },
      { x: 0, y: 0 },
      { x: 0, y: -1 },
    ])
  })
})

// ─── Submerged Geometry ─────────────────────────────────────────────────────

describe('clipWorldOutline', () => {
  const origin = { x: 0, y: 0 }

  it('dry body: zero area, zero depth, centroid at the body', () => {
    const g = clipWorldOutline(square, 4, { x: 5, y: 7 }, -3)
    expect(g.area).toBe(0)
    expect(g.depth).toBe(0)
    expect(g.fraction).toBe(0)
    expect(g.polygon).toEqual([])
    expect(g.centroid).toEqual({ x: 5, y: 7 })
  })

  it('tangent contact is dry', () => {
    const g = clipWorldOutline(square, 4, origin, -1)
    expect(g.area).toBe(0)
    expect(g.depth).toBe(0)
  })

  it('half submerged: area, centroid, depth, fraction', () => {
    const g = clipWorldOutline(square, 4, origin, 0)
    expect(g.area).toBeCloseTo(2, 12)
    expect(g.centroid.x).toBeCloseTo(0, 12)
    expect(g.centroid.y).toBeCloseTo(-0.5, 12)
    expect(g.depth).toBe(1)
    expect(g.fraction).toBeCloseTo(0.5, 12)
  })

  it('fully submerged: whole area at the body centroid', () => {
    const g = clipWorldOutline(square, 4, origin, 10)
    expect(g.area).toBeCloseTo(4, 12)
    expect(g.fraction).toBe(1)
    expect(g.centroid.x).toBeCloseTo(0, 12)
    expect(g.centroid.y).toBeCloseTo(0, 12)
    expect(g.depth).toBe(11)
  })
})

describe('computeSubmergedGeometry', () => {
  const bp = presetBlueprint('flat-ellipse')

  it('never exceeds the blueprint area', () => {
    for (const y of [0.01, 0.003, 0, -0.003, -0.05]) {
      for (const theta of [0, 0.3, -1.2]) {
        const g = computeSubmergedGeometry(bp, { x: 0, y, theta }, 0)
        expect(g.area).toBeGreaterThanOrEqual(0)
        expect(g.area).toBeLessThanOrEqual(bp.area * (1 + 1e-12))
        expect(g.fraction).toBeGreaterThanOrEqual(0)
        expect(g.fraction).toBeLessThanOrEqual(1)
      }
    }
  })

  it('is unchanged by horizontal translation', () => {
    const a = computeSubmergedGeometry(bp, { x: 0.3, y: 0.002, theta: 0.4 }, 0)
    const b = computeSubmergedGeometry(bp, { x: 1.3, y: 0.002, theta: 0.4 }, 0)
    expect(a.area).toBeGreaterThan(0)
    expect(b.area).toBeCloseTo(a.area, 12)
    expect(b.centroid.x - a.centroid.x).toBeCloseTo(1, 10)
    expect(b.centroid.y).toBeCloseTo(a.centroid.y, 10)
    expect(b.depth).toBeCloseTo(a.depth, 12)
  })

  it('matches clipping the outline rotated in place against the shifted line', () => {
    const L = 0.2
    const x = 0.7
    const y = 0.203
    for (const theta of [0, 0.35, -0.8, 1.4, Math.PI / 2, 2.9]) {
      const c = Math.cos(theta)
      const s = Math.sin(theta)
      const rotated = bp.outline.map(p => ({ x: p.x * c - p.y * s, y: p.x * s + p.y * c }))
      const local = clipBelowWaterLine(rotated, L - y)

      const g = computeSubmergedGeometry(bp, { x, y, theta }, L)
      expect(g.area).toBeGreaterThan(0)
      expect(g.area).toBeCloseTo(polygonArea(local), 12)
      const centroid = polygonCentroid(local)
      expect(g.centroid.x).toBeCloseTo(centroid.x + x, 10)
      expect(g.centroid.y).toBeCloseTo(centroid.y + y, 10)
      expect(g.depth).toBeCloseTo((L - y) - lowestY(rotated), 12)
    }
  })

  it('moves with the water level', () => {
    const a = computeSubmergedGeometry(bp, { x: 0, y: 0.002, theta: -0.2 }, 0)
    const b = computeSubmergedGeometry(bp, { x: 0, y: 0.502, theta: -0.2 }, 0.5)
    expect(b.area).toBeCloseTo(a.area, 10)
    expect(b.centroid.y - a.centroid.y).toBeCloseTo(0.5, 10)
  })

  it('submerged centroid sits below the water line', () => {
    const g = computeSubmergedGeometry(bp, { x: 0, y: 0.001, theta: 0.25 }, 0)
    expect(g.area).toBeGreaterThan(0)
    expect(g.centroid.y).toBeLessThan(0)
  })

  it('level stone at the surface is half submerged', () => {
    const g = computeSubmergedGeometry(bp, { x: 0, y: 0, theta: 0 }, 0)
    expect(g.fraction).toBeCloseTo(0.5, 6)
    expect(g.depth).toBeCloseTo(0.006, 6)
  })
})
