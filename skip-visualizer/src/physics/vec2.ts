/**
 * 2D vector helpers for the side-view simulation plane.
 *
 * World frame: x = downrange (forward), y = up.  Pure functions on plain
 * `{ x, y }` objects; nothing here mutates its arguments.
 */

/** Point or vector in the simulation plane [m, m/s or N depending on use] */
export interface Vec2 {
  x: number
  y: number
}

export const ZERO: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 })

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y }
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y }
}

/** z-component of the 3D cross product (a × b) */
export function cross(a: Vec2, b: Vec2): number {
  return a.x * b.y - a.y * b.x
}

export function length(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y)
}

export function isFiniteVec(v: Vec2): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y)
}
