import { T_MAX, T_MIN } from '../constants'
import { Axis, Bounds, Point } from '../types/base'
import { computeBounds } from '../utils/bounds'
import { addPoints, scalePoint, subtractPoints, sumPoints } from '../utils/vector'
import {
  CubicParameters,
  CubicTuple,
  QuadraticParameters,
  QuadraticTuple,
  Segment,
  SegmentType
} from './core'
import { solveQuadratic } from './math'

export function isInSegmentRange(t: number): boolean {
  return T_MIN <= t && t < T_MAX
}

export function calcQuadraticParameters(p1: Point, p2: Point, p3: Point): QuadraticParameters {
  const c = p1
  const b = scalePoint(subtractPoints(p2, c), 2)
  const a = subtractPoints(subtractPoints(p3, c), b)
  return { a, b, c }
}

export function calcCubicParameters(
  p1: Point,
  p2: Point,
  p3: Point,
  p4: Point
): CubicParameters {
  const d = p1
  const c = scalePoint(subtractPoints(p2, d), 3)
  const b = subtractPoints(scalePoint(subtractPoints(p3, p2), 3), c)
  const a = subtractPoints(subtractPoints(subtractPoints(p4, d), c), b)
  return { a, b, c, d }
}

// Inverse of calcQuadraticParameters.
export function calcQuadraticPoints(params: QuadraticParameters): QuadraticTuple {
  const { a, b, c } = params
  const p1 = c
  const p2 = addPoints(scalePoint(b, 0.5), c)
  const p3 = sumPoints(a, b, c)
  return [p1, p2, p3]
}

// Inverse of calcCubicParameters.
export function calcCubicPoints(params: CubicParameters): CubicTuple {
  const { a, b, c, d } = params
  const p1 = d
  const p2 = addPoints(scalePoint(c, 1 / 3), d)
  const p3 = addPoints(scalePoint(addPoints(b, c), 1 / 3), p2)
  const p4 = sumPoints(a, d, c, b)
  return [p1, p2, p3, p4]
}

export function evaluateQuadraticParameters(params: QuadraticParameters, t: number): Point {
  const { a, b, c } = params
  return {
    x: a.x * t * t + b.x * t + c.x,
    y: a.y * t * t + b.y * t + c.y
  }
}

export function evaluateCubicParameters(params: CubicParameters, t: number): Point {
  const { a, b, c, d } = params
  return {
    x: a.x * t * t * t + b.x * t * t + c.x * t + d.x,
    y: a.y * t * t * t + b.y * t * t + c.y * t + d.y
  }
}

export function calcQuadraticBounds(p1: Point, p2: Point, p3: Point): Bounds {
  const params = calcQuadraticParameters(p1, p2, p3)

  // The derivative 2a*t + b is linear, so each axis has at most one extremum.
  const roots: number[] = []
  for (const axis of [Axis.X, Axis.Y]) {
    const a2 = params.a[axis] * 2
    if (a2 !== 0) {
      roots.push(-params.b[axis] / a2)
    }
  }

  const points = roots
    .filter(isInSegmentRange)
    .map((t) => evaluateQuadraticParameters(params, t))
  return computeBounds([...points, p1, p3])
}

export function calcCubicBounds(p1: Point, p2: Point, p3: Point, p4: Point): Bounds {
  const params = calcCubicParameters(p1, p2, p3, p4)

  // Derivative: 3a*t^2 + 2b*t + c. Roots from either axis are evaluated on
  // both; an extremum of one axis cannot push the other past its own.
  const roots: number[] = []
  for (const axis of [Axis.X, Axis.Y]) {
    const axisRoots = solveQuadratic(params.a[axis] * 3, params.b[axis] * 2, params.c[axis])
    roots.push(...axisRoots.filter(isInSegmentRange))
  }

  const points = roots.map((t) => evaluateCubicParameters(params, t))
  return computeBounds([...points, p1, p4])
}

export function calcSegmentBounds(segment: Segment): Bounds {
  switch (segment.type) {
    case SegmentType.Line:
      return computeBounds([segment.start, segment.end])
    case SegmentType.Quadratic:
      return calcQuadraticBounds(segment.start, segment.control, segment.end)
    case SegmentType.Cubic:
      return calcCubicBounds(segment.start, segment.control1, segment.control2, segment.end)
  }
}
