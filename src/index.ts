export { Axis } from './types/base'
export type { Bounds, BoundsTuple, Point, Vector } from './types/base'
export { EPS_CUBIC_LEADING } from './constants'
export { PreconditionError } from './errors'
export {
  SegmentType,
  cubic,
  line,
  quadratic,
  segmentPoints
} from './bezier/core'
export type {
  BezierPointsCubic,
  BezierPointsQuadratic,
  CubicParameters,
  CubicSegment,
  CubicTuple,
  LinePoints,
  LineSegment,
  LineTuple,
  QuadraticParameters,
  QuadraticSegment,
  QuadraticTuple,
  Segment
} from './bezier/core'
export { solveCubic, solveQuadratic } from './bezier/math'
export {
  calcCubicBounds,
  calcCubicParameters,
  calcCubicPoints,
  calcQuadraticBounds,
  calcQuadraticParameters,
  calcQuadraticPoints,
  calcSegmentBounds,
  evaluateCubicParameters,
  evaluateQuadraticParameters
} from './bezier/helpers'
export { splitCubic, splitLine, splitQuadratic, splitSegment } from './bezier/split'
export { boundsToTuple, computeBounds } from './utils/bounds'
export { addPoints, axisFromHorizontal, scalePoint, subtractPoints } from './utils/vector'
