import { Axis, Point } from '../types/base'
import { addPoints, scalePoint, subtractPoints, sumPoints } from '../utils/vector'
import {
  CubicParameters,
  CubicTuple,
  LineTuple,
  QuadraticParameters,
  QuadraticTuple,
  Segment,
  SegmentType,
  cubic,
  line,
  quadratic
} from './core'
import {
  calcCubicParameters,
  calcCubicPoints,
  calcQuadraticParameters,
  calcQuadraticPoints,
  isInSegmentRange
} from './helpers'
import { solveCubic, solveQuadratic } from './math'

// Split a line where its `axis` coordinate equals `where`. Returns two lines,
// or the original alone when the crossing is outside [0, 1).
export function splitLine(p1: Point, p2: Point, where: number, axis: Axis): LineTuple[] {
  const a = subtractPoints(p2, p1)
  const b = p1
  const aAxis = a[axis]
  if (aAxis === 0) {
    // Parallel to the split line.
    return [[p1, p2]]
  }

  const t = (where - b[axis]) / aAxis
  if (!isInSegmentRange(t)) {
    return [[p1, p2]]
  }

  const midPoint = addPoints(scalePoint(a, t), b)
  return [
    [p1, midPoint],
    [midPoint, p2]
  ]
}

// Sorted crossing parameters bracketed by 0 and 1, or null when there are none.
function bracketRoots(roots: number[]): number[] | null {
  const ts = roots.filter(isInSegmentRange).sort((a, b) => a - b)
  if (ts.length === 0) {
    return null
  }
  return [0, ...ts, 1]
}

// Coefficients of the sub-curve on [t1, t1 + delta], re-scaled to [0, 1].
function reparameterizeQuadratic(
  params: QuadraticParameters,
  t1: number,
  delta: number
): QuadraticParameters {
  const { a, b, c } = params
  return {
    a: scalePoint(a, delta * delta),
    b: scalePoint(addPoints(scalePoint(a, 2 * t1), b), delta),
    c: sumPoints(scalePoint(a, t1 * t1), scalePoint(b, t1), c)
  }
}

function reparameterizeCubic(params: CubicParameters, t1: number, delta: number): CubicParameters {
  const { a, b, c, d } = params
  return {
    a: scalePoint(a, delta * delta * delta),
    b: scalePoint(addPoints(scalePoint(a, 3 * t1), b), delta * delta),
    c: scalePoint(sumPoints(scalePoint(b, 2 * t1), c, scalePoint(a, 3 * t1 * t1)), delta),
    d: sumPoints(scalePoint(a, t1 * t1 * t1), scalePoint(b, t1 * t1), scalePoint(c, t1), d)
  }
}

// Split a quadratic wherever its `axis` coordinate equals `where`. A curve
// that only touches `where` yields a zero-length piece at the touch point.
export function splitQuadratic(
  p1: Point,
  p2: Point,
  p3: Point,
  where: number,
  axis: Axis
): QuadraticTuple[] {
  const params = calcQuadraticParameters(p1, p2, p3)
  const ts = bracketRoots(
    solveQuadratic(params.a[axis], params.b[axis], params.c[axis] - where)
  )
  if (!ts) {
    return [[p1, p2, p3]]
  }

  const segments: QuadraticTuple[] = []
  for (let i = 0; i < ts.length - 1; i++) {
    const t1 = ts[i]
    const t2 = ts[i + 1]
    segments.push(calcQuadraticPoints(reparameterizeQuadratic(params, t1, t2 - t1)))
  }
  return segments
}

export function splitCubic(
  p1: Point,
  p2: Point,
  p3: Point,
  p4: Point,
  where: number,
  axis: Axis
): CubicTuple[] {
  const params = calcCubicParameters(p1, p2, p3, p4)
  const ts = bracketRoots(
    solveCubic(params.a[axis], params.b[axis], params.c[axis], params.d[axis] - where)
  )
  if (!ts) {
    return [[p1, p2, p3, p4]]
  }

  const segments: CubicTuple[] = []
  for (let i = 0; i < ts.length - 1; i++) {
    const t1 = ts[i]
    const t2 = ts[i + 1]
    segments.push(calcCubicPoints(reparameterizeCubic(params, t1, t2 - t1)))
  }
  return segments
}

export function splitSegment(segment: Segment, where: number, axis: Axis): Segment[] {
  switch (segment.type) {
    case SegmentType.Line:
      return splitLine(segment.start, segment.end, where, axis).map(([start, end]) =>
        line({ start, end })
      )
    case SegmentType.Quadratic:
      return splitQuadratic(segment.start, segment.control, segment.end, where, axis).map(
        ([start, control, end]) => quadratic({ start, control, end })
      )
    case SegmentType.Cubic:
      return splitCubic(
        segment.start,
        segment.control1,
        segment.control2,
        segment.end,
        where,
        axis
      ).map(([start, control1, control2, end]) => cubic({ start, control1, control2, end }))
  }
}
