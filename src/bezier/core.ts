import { Point } from '../types/base'

export enum SegmentType {
  Line = 'line',
  Quadratic = 'quadratic',
  Cubic = 'cubic'
}

export interface LinePoints {
  start: Point
  end: Point
}

export interface BezierPointsQuadratic {
  start: Point
  control: Point
  end: Point
}

export interface BezierPointsCubic {
  start: Point
  control1: Point
  control2: Point
  end: Point
}

export interface LineSegment extends LinePoints {
  type: SegmentType.Line
}

export interface QuadraticSegment extends BezierPointsQuadratic {
  type: SegmentType.Quadratic
}

export interface CubicSegment extends BezierPointsCubic {
  type: SegmentType.Cubic
}

export type Segment = LineSegment | QuadraticSegment | CubicSegment

// Bare control point tuples, the shape the split functions hand back.
export type LineTuple = [Point, Point]
export type QuadraticTuple = [Point, Point, Point]
export type CubicTuple = [Point, Point, Point, Point]

// Power-basis coefficients: B(t) = a*t^2 + b*t + c.
export interface QuadraticParameters {
  a: Point
  b: Point
  c: Point
}

// Power-basis coefficients: B(t) = a*t^3 + b*t^2 + c*t + d.
export interface CubicParameters {
  a: Point
  b: Point
  c: Point
  d: Point
}

// Factory helpers.
export function line(object: LinePoints): LineSegment {
  return { type: SegmentType.Line, start: object.start, end: object.end }
}

export function quadratic(object: BezierPointsQuadratic): QuadraticSegment {
  return {
    type: SegmentType.Quadratic,
    start: object.start,
    control: object.control,
    end: object.end
  }
}

export function cubic(object: BezierPointsCubic): CubicSegment {
  return {
    type: SegmentType.Cubic,
    start: object.start,
    control1: object.control1,
    control2: object.control2,
    end: object.end
  }
}

export function segmentPoints(segment: Segment): Point[] {
  switch (segment.type) {
    case SegmentType.Line:
      return [segment.start, segment.end]
    case SegmentType.Quadratic:
      return [segment.start, segment.control, segment.end]
    case SegmentType.Cubic:
      return [segment.start, segment.control1, segment.control2, segment.end]
  }
}
