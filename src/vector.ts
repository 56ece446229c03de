import { ValidationError } from './errors'

const { PI, abs, cos, sin, atan2, hypot } = Math

export type Vec3 = readonly [number, number, number]

export const X_AXIS: Vec3 = [1, 0, 0]
export const Y_AXIS: Vec3 = [0, 1, 0]
export const Z_AXIS: Vec3 = [0, 0, 1]

export const add = ([x1, y1, z1]: Vec3, [x2, y2, z2]: Vec3): Vec3 => [x1 + x2, y1 + y2, z1 + z2]
export const subtract = ([x1, y1, z1]: Vec3, [x2, y2, z2]: Vec3): Vec3 => [x1 - x2, y1 - y2, z1 - z2]
export const scale = ([x, y, z]: Vec3, factor: number): Vec3 => [x * factor, y * factor, z * factor]
export const dot = ([x1, y1, z1]: Vec3, [x2, y2, z2]: Vec3) => x1 * x2 + y1 * y2 + z1 * z2
export const magnitude = ([x, y, z]: Vec3) => hypot(x, y, z)
// the null vector stays the null vector
export const normalize = (v: Vec3, length = 1): Vec3 => {
  const m = magnitude(v)
  return m === 0 ? [0, 0, 0] : scale(v, length / m)
}
export const lerp = (a: Vec3, b: Vec3, factor = 0.5): Vec3 => add(a, scale(subtract(b, a), factor))
export const crossProduct = ([a1, a2, a3]: Vec3, [b1, b2, b3]: Vec3): Vec3 => [
  a2 * b3 - a3 * b2,
  a3 * b1 - a1 * b3,
  a1 * b2 - a2 * b1,
]
/** Counter-clockwise orthogonal vector in the xy-plane. */
export const orthogonal = ([x, y, z]: Vec3): Vec3 => [-y, x, z]
export const fromAngle = (radians: number, length = 1): Vec3 => [cos(radians) * length, sin(radians) * length, 0]
export const fromDegAngle = (degrees: number, length = 1) => fromAngle((degrees * PI) / 180, length)
export const angleDeg = ([x, y]: Vec3) => (atan2(y, x) * 180) / PI
export const isEqual = (a: Vec3, b: Vec3) => a[0] === b[0] && a[1] === b[1] && a[2] === b[2]
export const isClose = (a: Vec3, b: Vec3, tolerance = 1e-9) => magnitude(subtract(a, b)) <= tolerance

export interface Ray2D {
  readonly location: Vec3
  readonly direction: Vec3
}

export const ray2D = (location: Vec3, radians: number): Ray2D => ({ location, direction: fromAngle(radians) })

export const intersectRays = (ray1: Ray2D, ray2: Ray2D): Vec3 => {
  const [x11, y11] = ray1.location
  const [x12, y12] = add(ray1.location, ray1.direction)
  const [x21, y21] = ray2.location
  const [x22, y22] = add(ray2.location, ray2.direction)
  const dx1 = x11 - x12
  const dy1 = y11 - y12
  const dx2 = x21 - x22
  const dy2 = y21 - y22
  const det = dx1 * dy2 - dx2 * dy1
  if (abs(det) < 1e-12) {
    throw new ValidationError('Parallel rays have no intersection.')
  }
  const cc = 1 / det
  const c1 = (x11 * y12 - x12 * y11) * cc
  const c2 = (x21 * y22 - x22 * y21) * cc
  return [c1 * dx2 - c2 * dx1, c1 * dy2 - c2 * dy1, 0]
}

/** Object coordinate system of an extrusion vector (arbitrary axis algorithm). */
export class OCS {
  readonly ux: Vec3
  readonly uy: Vec3
  readonly uz: Vec3

  constructor(extrusion: Vec3 = Z_AXIS) {
    this.uz = normalize(extrusion)
    const [x, y] = this.uz
    this.ux = normalize(crossProduct(abs(x) < 1 / 64 && abs(y) < 1 / 64 ? Y_AXIS : Z_AXIS, this.uz))
    this.uy = normalize(crossProduct(this.uz, this.ux))
  }

  fromWcs(point: Vec3): Vec3 {
    return [dot(point, this.ux), dot(point, this.uy), dot(point, this.uz)]
  }

  toWcs([x, y, z]: Vec3): Vec3 {
    return add(add(scale(this.ux, x), scale(this.uy, y)), scale(this.uz, z))
  }
}

export interface UCSOptions {
  readonly origin?: Vec3
  readonly ux?: Vec3
  readonly uy?: Vec3
}

/** User coordinate system, geometry of a DIMENSION is calculated in UCS coordinates. */
export class UCS {
  readonly origin: Vec3
  readonly ux: Vec3
  readonly uy: Vec3
  readonly uz: Vec3
  private readonly ocs: OCS

  constructor({ origin = [0, 0, 0], ux = X_AXIS, uy = Y_AXIS }: UCSOptions = {}) {
    this.origin = origin
    this.ux = normalize(ux)
    this.uy = normalize(uy)
    this.uz = normalize(crossProduct(this.ux, this.uy))
    this.ocs = new OCS(this.uz)
  }

  toWcs([x, y, z]: Vec3): Vec3 {
    return add(this.origin, add(add(scale(this.ux, x), scale(this.uy, y)), scale(this.uz, z)))
  }

  toOcs(point: Vec3): Vec3 {
    return this.ocs.fromWcs(this.toWcs(point))
  }

  /** Converts an angle in the UCS xy-plane into an OCS angle around `uz`. */
  toOcsAngleDeg(degrees: number) {
    const [x, y] = fromDegAngle(degrees)
    const direction = add(scale(this.ux, x), scale(this.uy, y))
    return angleDeg(this.ocs.fromWcs(direction))
  }
}

export class PassThroughUCS extends UCS {
  override toWcs(point: Vec3): Vec3 {
    return point
  }

  override toOcs(point: Vec3): Vec3 {
    return point
  }

  override toOcsAngleDeg(degrees: number) {
    return degrees
  }
}
