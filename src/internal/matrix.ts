/**
 * 2×2 real matrices, row-major: `[a, b, c, d]` is `[[a, b], [c, d]]`.
 * Used for covariances over (real, imaginary) and for the Jacobians of
 * complex operators.
 */
export type Matrix2 = readonly [number, number, number, number]

export const IDENTITY2: Matrix2 = [1, 0, 0, 1]

export const ZERO2: Matrix2 = [0, 0, 0, 0]

export const add2 = (left: Matrix2, right: Matrix2): Matrix2 => [
  left[0] + right[0],
  left[1] + right[1],
  left[2] + right[2],
  left[3] + right[3],
]

export const multiply2 = (left: Matrix2, right: Matrix2): Matrix2 => [
  left[0] * right[0] + left[1] * right[2],
  left[0] * right[1] + left[1] * right[3],
  left[2] * right[0] + left[3] * right[2],
  left[2] * right[1] + left[3] * right[3],
]

export const scale2 = (matrix: Matrix2, factor: number): Matrix2 => [
  matrix[0] * factor,
  matrix[1] * factor,
  matrix[2] * factor,
  matrix[3] * factor,
]

export const transpose2 = (matrix: Matrix2): Matrix2 => [matrix[0], matrix[2], matrix[1], matrix[3]]

/**
 * `J · C · Jᵀ`: the covariance of `J·x` when `x` has covariance `C`.
 */
export const congruence2 = (jacobian: Matrix2, covariance: Matrix2): Matrix2 =>
  multiply2(multiply2(jacobian, covariance), transpose2(jacobian))

/**
 * Jacobian of multiplication by the complex number `a + ib`, viewed as a map
 * on (re, im).
 */
export const holomorphic2 = (re: number, im: number): Matrix2 => [re, -im, im, re]

export const isSymmetric2 = (matrix: Matrix2, tolerance = 1e-12): boolean =>
  Math.abs(matrix[1] - matrix[2]) <= tolerance * Math.max(1, Math.abs(matrix[1]), Math.abs(matrix[2]))

/**
 * Symmetric with non-negative diagonal and determinant (up to rounding).
 */
export const isPositiveSemidefinite2 = (matrix: Matrix2, tolerance = 1e-12): boolean => {
  const [a, b, c, d] = matrix
  if (!matrix.every(Number.isFinite) || !isSymmetric2(matrix, tolerance)) {
    return false
  }
  return a >= 0 && d >= 0 && a * d - b * c >= -tolerance * Math.max(1, a * d)
}
