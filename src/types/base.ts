export type Point = {
  x: number
  y: number
}

export type Vector = {
  x: number
  y: number
}

// Selects a coordinate of a point; `point[axis]` reads it directly.
export enum Axis {
  X = 'x',
  Y = 'y'
}

export type Bounds = {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

// (xMin, yMin, xMax, yMax), the order font tools report rectangles in.
export type BoundsTuple = [number, number, number, number]
