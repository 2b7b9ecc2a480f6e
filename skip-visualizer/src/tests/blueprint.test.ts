/**
 * Blueprint builder and stone preset tests.
 */

import { describe, it, expect } from 'vitest'
import { buildBlueprint, validateBlueprint, generatePointCloud } from '../physics/blueprint.ts'
import type { StoneSpec } from '../physics/blueprint.ts'
import {
  ellipseOutline,
  roundedSlabOutline,
  presetBlueprint,
  isStonePresetKey,
  STONE_SPECS,
  DENSITY_STONE,
} from '../physics/stone-presets.ts'
import { InvalidBlueprintError } from '../physics/errors.ts'
import { polygonCentroid, pointInPolygon, isSimplePolygon, signedArea } from '../physics/polygon.ts'

function rectangleSpec(): StoneSpec {
  // 20 mm × 10 mm plate, deliberately away from the origin
  return {
    name: 'plate',
    outline: [
      { x: 1, y: 1 }, { x: 1.02, y: 1 }, { x: 1.02, y: 1.01 }, { x: 1, y: 1.01 },
    ],
    width: 0.05,
    density: 2000,
  }
}

// ─── Mass Properties ────────────────────────────────────────────────────────

describe('buildBlueprint', () => {
  it('rectangle: mass = A·w·ρ, inertia = m(a² + b²)/12', () => {
    const bp = buildBlueprint(rectangleSpec())
    expect(bp.area).toBeCloseTo(2e-4, 12)
    expect(bp.mass).toBeCloseTo(0.02, 12)
    expect(bp.inertia).toBeCloseTo(0.02 * (0.02 ** 2 + 0.01 ** 2) / 12, 12)
  })

  it('recentres the outline and keeps the authored centroid', () => {
    const bp = buildBlueprint(rectangleSpec())
    expect(bp.centroid.x).toBeCloseTo(1.01, 10)
    expect(bp.centroid.y).toBeCloseTo(1.005, 10)
    const c = polygonCentroid(bp.outline)
    expect(c.x).toBeCloseTo(0, 10)
    expect(c.y).toBeCloseTo(0, 10)
  })

  it('maxRadius is the half-diagonal for a rectangle', () => {
    const bp = buildBlueprint(rectangleSpec())
    expect(bp.maxRadius).toBeCloseTo(Math.hypot(0.01, 0.005), 10)
  })

  it('result is frozen', () => {
    const bp = buildBlueprint(rectangleSpec())
    expect(Object.isFrozen(bp)).toBe(true)
    expect(Object.isFrozen(bp.outline)).toBe(true)
  })

  it('point cloud samples lie inside the outline', () => {
    const bp = buildBlueprint(rectangleSpec())
    expect(bp.pointCloud.length).toBeGreaterThan(300)
    expect(bp.pointCloud.length).toBeLessThan(500)
    for (const p of bp.pointCloud) {
      expect(pointInPolygon(p, bp.outline)).toBe(true)
    }
  })

  it('generatePointCloud returns nothing for a zero target', () => {
    expect(generatePointCloud(rectangleSpec().outline, 0)).toEqual([])
  })
})

// ─── Validation ─────────────────────────────────────────────────────────────

describe('blueprint validation', () => {
  it('rejects an empty outline', () => {
    expect(() => buildBlueprint({ ...rectangleSpec(), outline: [] })).toThrow(InvalidBlueprintError)
  })

  it('rejects fewer than three vertices', () => {
    expect(() => buildBlueprint({ ...rectangleSpec(), outline: [{ x: 0, y: 0 }, { x: 1, y: 0 }] }))
      .toThrow('at least 3 vertices')
  })

  it('rejects non-finite coordinates', () => {
    const outline = [{ x: 0, y: 0 }, { x: NaN, y: 0 }, { x: 0, y: 1 }]
    expect(() => buildBlueprint({ ...rectangleSpec(), outline })).toThrow('vertex 1 is not finite')
  })

  it('rejects a zero-area outline', () => {
    const outline = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }]
    expect(() => buildBlueprint({ ...rectangleSpec(), outline })).toThrow('zero area')
  })

  it('rejects a self-intersecting outline', () => {
    const outline = [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 1, y: 0 }, { x: 0, y: 1 }]
    expect(() => buildBlueprint({ ...rectangleSpec(), outline })).toThrow('self-intersecting')
  })

  it('rejects non-positive width and density', () => {
    expect(() => buildBlueprint({ ...rectangleSpec(), width: 0 })).toThrow('width must be positive')
    expect(() => buildBlueprint({ ...rectangleSpec(), density: -1 })).toThrow('density must be positive')
  })

  it('validateBlueprint rejects a non-positive mass', () => {
    const bp = { ...buildBlueprint(rectangleSpec()), mass: 0 }
    expect(() => validateBlueprint(bp)).toThrow('mass must be a positive number')
  })
})

// ─── Presets ────────────────────────────────────────────────────────────────

describe('stone presets', () => {
  it('ellipseOutline is counter-clockwise with the requested vertex count', () => {
    const outline = ellipseOutline(0.04, 0.006, 24)
    expect(outline).toHaveLength(24)
    expect(signedArea(outline)).toBeGreaterThan(0)
    expect(outline[0].x).toBeCloseTo(0.04, 12)
    expect(outline[0].y).toBeCloseTo(0, 12)
  })

  it('roundedSlabOutline is simple and counter-clockwise', () => {
    const outline = roundedSlabOutline(0.07, 0.01, 0.004, 4)
    expect(outline).toHaveLength(20)
    expect(isSimplePolygon(outline)).toBe(true)
    expect(signedArea(outline)).toBeGreaterThan(0)
  })

  it('roundedSlabOutline at the full clamp radius builds without repeated vertices', () => {
    // r = thickness / 2: the side arcs meet at mid-height
    const outline = roundedSlabOutline(0.07, 0.01, 0.005, 4)
    expect(outline).toHaveLength(18)
    expect(isSimplePolygon(outline)).toBe(true)
    const bp = buildBlueprint({ name: 'stadium', outline, width: 0.05, density: DENSITY_STONE })
    // Rectangle less four quarter-arc corners, each arc a 4-segment chord fan
    const r = 0.005
    expect(bp.area).toBeCloseTo(0.07 * 0.01 - 4 * r * r + 8 * r * r * Math.sin(Math.PI / 8), 15)
  })

  it('roundedSlabOutline with zero radius is the plain rectangle', () => {
    const outline = roundedSlabOutline(0.07, 0.01, 0, 4)
    expect(outline).toHaveLength(4)
    expect(outline[0].x).toBeCloseTo(0.035, 15)
    expect(outline[0].y).toBeCloseTo(-0.005, 15)
    const bp = buildBlueprint({ name: 'rectangle', outline, width: 0.05, density: DENSITY_STONE })
    expect(bp.area).toBeCloseTo(7e-4, 15)
  })

  it('flat ellipse mass properties', () => {
    const bp = presetBlueprint('flat-ellipse')
    // Inscribed 32-gon: A = (n/2)·a·b·sin(2π/n)
    const area = 16 * 0.04 * 0.006 * Math.sin(Math.PI / 16)
    expect(bp.area).toBeCloseTo(area, 12)
    expect(bp.mass).toBeCloseTo(area * 0.06 * DENSITY_STONE, 10)
    expect(bp.mass).toBeCloseTo(0.11237, 4)
    // Slightly under the smooth-ellipse value m(a² + b²)/4
    const smooth = bp.mass * (0.04 ** 2 + 0.006 ** 2) / 4
    expect(bp.inertia).toBeLessThan(smooth)
    expect(bp.inertia / smooth).toBeGreaterThan(0.99)
  })

  it('every preset builds', () => {
    for (const key of Object.keys(STONE_SPECS)) {
      expect(isStonePresetKey(key)).toBe(true)
      if (isStonePresetKey(key)) {
        const bp = presetBlueprint(key)
        expect(bp.mass).toBeGreaterThan(0)
        expect(bp.inertia).toBeGreaterThan(0)
      }
    }
  })

  it('isStonePresetKey rejects unknown names', () => {
    expect(isStonePresetKey('boulder')).toBe(false)
    expect(isStonePresetKey('toString')).toBe(false)
  })
})
