import { PreconditionError } from '../errors'
import { Bounds, BoundsTuple, Point } from '../types/base'

export function computeBounds(points: Point[]): Bounds {
  if (points.length === 0) {
    throw new PreconditionError('Cannot compute bounds of an empty point list.')
  }

  let xMin = Infinity
  let yMin = Infinity
  let xMax = -Infinity
  let yMax = -Infinity

  for (const { x, y } of points) {
    xMin = Math.min(xMin, x)
    yMin = Math.min(yMin, y)
    xMax = Math.max(xMax, x)
    yMax = Math.max(yMax, y)
  }

  return { xMin, yMin, xMax, yMax }
}

export function boundsToTuple(bounds: Bounds): BoundsTuple {
  return [bounds.xMin, bounds.yMin, bounds.xMax, bounds.yMax]
}
