import { EPS_CUBIC_LEADING } from '../constants'

// Real roots of a*x^2 + b*x + c = 0. The result is neither sorted nor
// deduplicated: a double root is reported twice.
export function solveQuadratic(a: number, b: number, c: number): number[] {
  if (a === 0) {
    // Nothing to solve when b is also zero; otherwise it's linear.
    return b === 0 ? [] : [-c / b]
  }

  const discriminant = b * b - 4 * a * c
  if (discriminant < 0) {
    // Complex pair, no real geometry.
    return []
  }

  const sqrt_d = Math.sqrt(discriminant)
  return [(-b + sqrt_d) / 2 / a, (-b - sqrt_d) / 2 / a]
}

// Real roots of a*x^3 + b*x^2 + c*x + d = 0, same caveats as solveQuadratic.
// See: https://mathworld.wolfram.com/CubicFormula.html
export function solveCubic(a: number, b: number, c: number, d: number): number[] {
  if (Math.abs(a) < EPS_CUBIC_LEADING) {
    return solveQuadratic(b, c, d)
  }

  const a1 = b / a
  const a2 = c / a
  const a3 = d / a

  const Q = (a1 * a1 - 3 * a2) / 9
  const R = (2 * a1 * a1 * a1 - 9 * a1 * a2 + 27 * a3) / 54
  const R2_Q3 = R * R - Q * Q * Q

  if (R2_Q3 < 0) {
    // Three distinct real roots; Q > 0 is implied here.
    const theta = Math.acos(R / Math.sqrt(Q * Q * Q))
    const rQ2 = -2 * Math.sqrt(Q)
    const offset = a1 / 3
    return [
      rQ2 * Math.cos(theta / 3) - offset,
      rQ2 * Math.cos((theta + 2 * Math.PI) / 3) - offset,
      rQ2 * Math.cos((theta + 4 * Math.PI) / 3) - offset
    ]
  }

  // One real root (the boundary R2_Q3 == 0 lands here too).
  let x = 0
  if (Q !== 0 || R !== 0) {
    x = Math.cbrt(Math.sqrt(R2_Q3) + Math.abs(R))
    x = x + Q / x
  }
  if (R >= 0) {
    x = -x
  }
  return [x - a1 / 3]
}
