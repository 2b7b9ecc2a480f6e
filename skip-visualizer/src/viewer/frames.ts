/**
 * Simulation plane ↔ Three.js frame mapping.
 *
 * Conventions:
 *   Simulation:  x downrange, y up, pitch θ counter-clockwise positive
 *   Three.js:    right-handed Y-up (X-right, Y-up, Z-toward-camera)
 *
 * The side view looks along −Z, so the mapping is the identity in the
 * plane with z = 0, and pitch is a rotation about +Z.  All physics stays
 * in simulation coordinates; conversion happens only at the render
 * boundary.
 */

import * as THREE from 'three'
import type { Vec2 } from '../physics/vec2.ts'
import type { KinematicState } from '../physics/sim-state.ts'

const Z_AXIS = new THREE.Vector3(0, 0, 1)

// ─── Points ─────────────────────────────────────────────────────────────────

/** Simulation point → Three.js position on the z = `depth` plane. */
export function simToThree(p: Vec2, depth: number = 0): THREE.Vector3 {
  return new THREE.Vector3(p.x, p.y, depth)
}

/** Three.js position → simulation plane (z dropped). */
export function threeToSim(v: THREE.Vector3): Vec2 {
  return { x: v.x, y: v.y }
}

// ─── Attitude ───────────────────────────────────────────────────────────────

/** Pitch angle → quaternion about +Z. */
export function pitchQuaternion(theta: number): THREE.Quaternion {
  return new THREE.Quaternion().setFromAxisAngle(Z_AXIS, theta)
}

export interface StonePose {
  position: THREE.Vector3
  quaternion: THREE.Quaternion
}

export function stonePose(state: Pick<KinematicState, 'x' | 'y' | 'theta'>): StonePose {
  return {
    position: simToThree(state),
    quaternion: pitchQuaternion(state.theta),
  }
}

/**
 * Write the stone pose onto a scene object.
 * The object's local origin must sit at the stone centroid.
 */
export function applyStonePose(
  object: THREE.Object3D,
  state: Pick<KinematicState, 'x' | 'y' | 'theta'>,
): void {
  const pose = stonePose(state)
  object.position.copy(pose.position)
  object.quaternion.copy(pose.quaternion)
}

// ─── Shapes ─────────────────────────────────────────────────────────────────

/**
 * Body-local outline → THREE.Shape for ShapeGeometry / ExtrudeGeometry.
 * Returns an empty shape for fewer than three points.
 */
export function outlineToShape(points: readonly Vec2[]): THREE.Shape {
  if (points.length < 3) return new THREE.Shape()
  return new THREE.Shape(points.map(p => new THREE.Vector2(p.x, p.y)))
}

/** Endpoints of the water line between `xMin` and `xMax`. */
export function waterLineSegment(
  waterLevel: number,
  xMin: number,
  xMax: number,
): [THREE.Vector3, THREE.Vector3] {
  return [
    new THREE.Vector3(xMin, waterLevel, 0),
    new THREE.Vector3(xMax, waterLevel, 0),
  ]
}
