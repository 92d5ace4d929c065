import { describe, expect, it } from '@jest/globals'
import { Axis } from '../src/types/base'
import {
  addPoints,
  axisFromHorizontal,
  scalePoint,
  subtractPoints,
  sumPoints
} from '../src/utils/vector'

describe('Point arithmetic', () => {
  const p = { x: 3, y: -2 }
  const q = { x: 1.5, y: 4 }

  it('should add, subtract and scale component-wise', () => {
    expect(addPoints(p, q)).toEqual({ x: 4.5, y: 2 })
    expect(subtractPoints(p, q)).toEqual({ x: 1.5, y: -6 })
    expect(scalePoint(p, 2)).toEqual({ x: 6, y: -4 })
  })

  it('should not touch its inputs', () => {
    addPoints(p, q)
    scalePoint(p, 10)

    expect(p).toEqual({ x: 3, y: -2 })
  })

  it('should sum any number of points', () => {
    expect(sumPoints(p, q, { x: 0.5, y: 1 })).toEqual({ x: 5, y: 3 })
  })

  it('should index coordinates by axis', () => {
    expect(p[Axis.X]).toBe(3)
    expect(p[Axis.Y]).toBe(-2)
  })

  it('should map the horizontal flag onto the y axis', () => {
    expect(axisFromHorizontal(true)).toBe(Axis.Y)
    expect(axisFromHorizontal(false)).toBe(Axis.X)
  })
})
