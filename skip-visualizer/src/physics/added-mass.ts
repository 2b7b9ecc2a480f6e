/**
 * Added (apparent) mass model — fluid dragged along with the stone.
 *
 * A body accelerating through water must also accelerate some of the
 * water around it.  This is modelled as extra mass and inertia added to
 * the physical values before evaluating the equations of motion:
 *
 *   (m + m_a) · a = F
 *   (I + I_a) · α = τ
 *
 * For the light stone in dense water this dominates: without it the
 * contact accelerations blow up instead of the fluid carrying momentum.
 *
 * The added terms scale the displaced-fluid mass and inertia of the
 * CURRENT submerged polygon, so they must be recomputed on every
 * derivative evaluation and never cached across steps.
 */

import type { Vec2 } from './vec2.ts'
import type { SubmergedGeometry } from './clipper.ts'
import { polygonSecondMoment } from './polygon.ts'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface AddedMass {
  /** Translational added mass [kg] */
  mass: number
  /** Pitch added inertia about the body centroid [kg·m²] */
  inertia: number
}

export const NO_ADDED_MASS: Readonly<AddedMass> = Object.freeze({ mass: 0, inertia: 0 })

// ─── Displaced Fluid ────────────────────────────────────────────────────────

/**
 * Mass of the displaced fluid slice.
 *
 *   m_d = ρ · w · A_sub
 */
export function displacedMass(rho: number, width: number, area: number): number {
  return rho * width * area
}

/**
 * Pitch inertia of the displaced fluid about `pivot` (the body centroid).
 *
 *   I_d = ρ · w · J_sub(pivot)
 */
export function displacedInertia(
  rho: number,
  width: number,
  polygon: readonly Vec2[],
  pivot: Vec2,
): number {
  return rho * width * polygonSecondMoment(polygon, pivot)
}

/**
 * Added mass and inertia for the current submerged geometry.
 *
 * @param geometry     Submerged polygon at the trial state
 * @param pivot        Body centroid (world frame)
 * @param width        Blueprint out-of-plane width [m]
 * @param rho          Fluid density [kg/m³]
 * @param coefficient  C_a — fraction of displaced fluid carried along
 */
export function computeAddedMass(
  geometry: SubmergedGeometry,
  pivot: Vec2,
  width: number,
  rho: number,
  coefficient: number,
): AddedMass {
  if (geometry.area <= 0 || coefficient === 0) return NO_ADDED_MASS
  return {
    mass: coefficient * displacedMass(rho, width, geometry.area),
    inertia: coefficient * displacedInertia(rho, width, geometry.polygon, pivot),
  }
}

// ─── Effective Values ───────────────────────────────────────────────────────

export function effectiveMass(mass: number, added: AddedMass): number {
  return mass + added.mass
}

export function effectiveInertia(inertia: number, added: AddedMass): number {
  return inertia + added.inertia
}
