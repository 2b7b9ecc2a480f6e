/**
 * Stone blueprint — mass properties from an authored outline.
 *
 * The outline is the stone's profile in the simulation plane.  The
 * out-of-plane extent is `width`, so
 *
 *   mass    = area · width · density
 *   inertia = (mass / area) · J_centroid
 *
 * where J_centroid is the polar second moment of the profile about its
 * centroid.  The stored outline is shifted so the centroid sits at the
 * body origin; `centroid` keeps the offset in authored coordinates.
 *
 * A collision point cloud is grid-sampled inside the outline for
 * renderers and contact probes.
 */

import type { Vec2 } from './vec2.ts'
import { isFiniteVec, length } from './vec2.ts'
import {
  polygonArea,
  polygonBounds,
  polygonCentroid,
  polygonSecondMoment,
  pointInPolygon,
  isSimplePolygon,
} from './polygon.ts'
import { InvalidBlueprintError } from './errors.ts'

/** Default number of collision samples per blueprint (approximate) */
export const DEFAULT_CLOUD_POINTS = 400

// ─── Types ──────────────────────────────────────────────────────────────────

/**
 * Authored description of a stone, before mass properties are derived.
 */
export interface StoneSpec {
  name: string
  /** Profile polygon in authored coordinates [m] */
  outline: Vec2[]
  /** Out-of-plane width [m] */
  width: number
  /** Material density [kg/m³] */
  density: number
  /** Target collision sample count */
  cloudPoints?: number
}

/**
 * Immutable body description consumed by the physics core.
 */
export interface Blueprint {
  readonly name: string
  /** Closed simple polygon, centroid at the origin [m] */
  readonly outline: readonly Vec2[]
  /** Profile area [m²] */
  readonly area: number
  /** Out-of-plane width [m] */
  readonly width: number
  /** Mass [kg] */
  readonly mass: number
  /** Pitch moment of inertia about the centroid [kg·m²] */
  readonly inertia: number
  /** Centroid of the authored outline, in authored coordinates [m] */
  readonly centroid: Vec2
  /** Body-frame collision samples [m] */
  readonly pointCloud: readonly Vec2[]
  /** Distance from centroid to the farthest outline vertex [m] */
  readonly maxRadius: number
}

// ─── Validation ─────────────────────────────────────────────────────────────

/**
 * Reject outlines the clipper and mass model cannot work with:
 * fewer than three vertices, non-finite coordinates, zero area, or
 * self-intersection.
 *
 * @throws InvalidBlueprintError
 */
export function validateOutline(outline: readonly Vec2[]): void {
  if (outline.length === 0) {
    throw new InvalidBlueprintError('outline is empty')
  }
  if (outline.length < 3) {
    throw new InvalidBlueprintError(`outline needs at least 3 vertices, got ${outline.length}`)
  }
  const bad = outline.findIndex(p => !isFiniteVec(p))
  if (bad >= 0) {
    throw new InvalidBlueprintError(`outline vertex ${bad} is not finite`)
  }
  if (polygonArea(outline) < 1e-12) {
    throw new InvalidBlueprintError('outline has zero area')
  }
  if (!isSimplePolygon(outline)) {
    throw new InvalidBlueprintError('outline is self-intersecting')
  }
}

/**
 * Check a blueprint received from an external builder.
 *
 * @throws InvalidBlueprintError
 */
export function validateBlueprint(bp: Blueprint): void {
  validateOutline(bp.outline)
  for (const key of ['area', 'width', 'mass', 'inertia'] as const) {
    const value = bp[key]
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidBlueprintError(`${key} must be a positive number, got ${value}`)
    }
  }
}

// ─── Point Cloud ────────────────────────────────────────────────────────────

/**
 * Grid-sample points strictly inside the polygon.
 *
 * Grid spacing is √(area / target) so the sample count lands near
 * `target` for compact shapes.
 */
export function generatePointCloud(outline: readonly Vec2[], target: number = DEFAULT_CLOUD_POINTS): Vec2[] {
  const area = polygonArea(outline)
  if (area < 1e-12 || target <= 0) return []

  const { minX, minY, maxX, maxY } = polygonBounds(outline)
  const delta = Math.sqrt(area / target)
  const cols = Math.ceil((maxX - minX) / delta) + 1
  const rows = Math.ceil((maxY - minY) / delta) + 1

  const cloud: Vec2[] = []
  for (let i = 0; i < rows; i++) {
    const y = minY + (i + 0.5) * delta
    if (y > maxY) break
    for (let j = 0; j < cols; j++) {
      const x = minX + (j + 0.5) * delta
      if (x > maxX) break
      const p = { x, y }
      if (pointInPolygon(p, outline)) cloud.push(p)
    }
  }
  return cloud
}

// ─── Builder ────────────────────────────────────────────────────────────────

/**
 * Derive mass properties and the centred outline from an authored spec.
 *
 * @throws InvalidBlueprintError for degenerate outlines or non-positive
 *         width/density
 */
export function buildBlueprint(spec: StoneSpec): Blueprint {
  validateOutline(spec.outline)
  if (!(spec.width > 0) || !Number.isFinite(spec.width)) {
    throw new InvalidBlueprintError(`width must be positive, got ${spec.width}`)
  }
  if (!(spec.density > 0) || !Number.isFinite(spec.density)) {
    throw new InvalidBlueprintError(`density must be positive, got ${spec.density}`)
  }

  const area = polygonArea(spec.outline)
  const centroid = polygonCentroid(spec.outline)
  const outline = spec.outline.map(p => ({ x: p.x - centroid.x, y: p.y - centroid.y }))

  const mass = area * spec.width * spec.density
  const inertia = (mass / area) * polygonSecondMoment(outline)
  const maxRadius = outline.reduce((r, p) => Math.max(r, length(p)), 0)

  return Object.freeze({
    name: spec.name,
    outline: Object.freeze(outline),
    area,
    width: spec.width,
    mass,
    inertia,
    centroid,
    pointCloud: Object.freeze(generatePointCloud(outline, spec.cloudPoints ?? DEFAULT_CLOUD_POINTS)),
    maxRadius,
  })
}
