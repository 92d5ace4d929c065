// Leading cubic coefficient below which solveCubic falls back to the quadratic
// formula. The trigonometric and Cardano branches lose precision as a -> 0.
export const EPS_CUBIC_LEADING = 1e-6

// Split parameters are kept on the half-open range [T_MIN, T_MAX).
export const T_MIN = 0
export const T_MAX = 1
