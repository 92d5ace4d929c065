import { Axis, Point, Vector } from '../types/base'

export function addPoints(p1: Point, p2: Point): Point {
  return { x: p1.x + p2.x, y: p1.y + p2.y }
}

export function subtractPoints(p1: Point, p2: Point): Vector {
  return { x: p1.x - p2.x, y: p1.y - p2.y }
}

export function scalePoint(p: Point, factor: number): Point {
  return { x: p.x * factor, y: p.y * factor }
}

// Sum of any number of points; handy for power-basis evaluation.
export function sumPoints(...points: Point[]): Point {
  return points.reduce(addPoints, { x: 0, y: 0 })
}

// Old call sites pass `isHorizontal`: true means "split on a y value".
export function axisFromHorizontal(isHorizontal: boolean): Axis {
  return isHorizontal ? Axis.Y : Axis.X
}
