import { describe, expect, it } from 'vitest'
import { ValidationError } from './errors'
import {
  OCS,
  PassThroughUCS,
  UCS,
  X_AXIS,
  Y_AXIS,
  angleDeg,
  crossProduct,
  intersectRays,
  isClose,
  normalize,
  orthogonal,
  ray2D,
} from './vector'

describe('vector', () => {
  it('normalizes vectors', () => {
    expect(isClose(normalize([3, 4, 0]), [0.6, 0.8, 0])).toBe(true)
    expect(isClose(normalize([3, 4, 0], 10), [6, 8, 0])).toBe(true)
    expect(normalize([0, 0, 0])).toEqual([0, 0, 0])
  })

  it('calculates cross products and orthogonal vectors', () => {
    expect(crossProduct(X_AXIS, Y_AXIS)).toEqual([0, 0, 1])
    expect(orthogonal([1, 2, 3])).toEqual([-2, 1, 3])
    expect(angleDeg([0, 1, 0])).toBe(90)
  })

  it('intersects rays', () => {
    const [x, y] = intersectRays(ray2D([0, 0, 0], 0), ray2D([2, -1, 0], Math.PI / 2))
    expect(x).toBeCloseTo(2, 9)
    expect(y).toBeCloseTo(0, 9)
    expect(() => intersectRays(ray2D([0, 0, 0], 0), ray2D([0, 1, 0], Math.PI))).toThrow(ValidationError)
  })
})

describe('OCS', () => {
  it('is the WCS for the z-axis', () => {
    const ocs = new OCS()
    expect(ocs.ux).toEqual([1, 0, 0])
    expect(isClose(ocs.toWcs([1, 2, 3]), [1, 2, 3])).toBe(true)
  })

  it('follows the arbitrary axis algorithm', () => {
    const ocs = new OCS([0, -2, 0])
    expect(isClose(ocs.ux, [1, 0, 0])).toBe(true)
    expect(isClose(ocs.uy, [0, 0, 1])).toBe(true)
    expect(isClose(ocs.fromWcs([1, 0, 2]), [1, 2, 0])).toBe(true)
    expect(isClose(ocs.toWcs([1, 2, 0]), [1, 0, 2])).toBe(true)
  })
})

describe('UCS', () => {
  it('transforms points and angles', () => {
    const ucs = new UCS({ origin: [5, 0, 0], ux: [0, 1, 0], uy: [-1, 0, 0] })
    expect(isClose(ucs.uz, [0, 0, 1])).toBe(true)
    expect(isClose(ucs.toWcs([1, 0, 0]), [5, 1, 0])).toBe(true)
    expect(ucs.toOcsAngleDeg(0)).toBeCloseTo(90, 9)
  })

  it('passes coordinates through', () => {
    const ucs = new PassThroughUCS()
    const point = [1, 2, 3] as const
    expect(ucs.toWcs(point)).toBe(point)
    expect(ucs.toOcs(point)).toBe(point)
    expect(ucs.toOcsAngleDeg(30)).toBe(30)
  })
})
