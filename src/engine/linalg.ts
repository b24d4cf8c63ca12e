/**
 * 3-Dimensional Linear Algebra
 *
 * Pure functions on fixed-size vectors and matrices, sized for the Kalman
 * calibrator's three latent parameters. No classes, no mutation: every
 * function returns a new tuple (or scalar).
 */

export type Vec3 = readonly [number, number, number];
export type Mat3 = readonly [Vec3, Vec3, Vec3];

/** Create a Vec3 from components. */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/** Diagonal matrix with the given entries. */
export function diag3(a: number, b: number, c: number): Mat3 {
  return [
    [a, 0, 0],
    [0, b, 0],
    [0, 0, c],
  ];
}

export const IDENTITY3: Mat3 = diag3(1, 1, 1);

/** Vector addition: a + b. */
export function addVec(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/** Scalar multiplication: v * s. */
export function scaleVec(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/** Dot product. */
export function dot3(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

/** Matrix-vector product: m · v. */
export function mulMatVec(m: Mat3, v: Vec3): Vec3 {
  return [dot3(m[0], v), dot3(m[1], v), dot3(m[2], v)];
}

/** Transpose. */
export function transpose3(m: Mat3): Mat3 {
  return [
    [m[0][0], m[1][0], m[2][0]],
    [m[0][1], m[1][1], m[2][1]],
    [m[0][2], m[1][2], m[2][2]],
  ];
}

/** Matrix product: a · b. */
export function mulMat(a: Mat3, b: Mat3): Mat3 {
  const bt = transpose3(b);
  return [
    [dot3(a[0], bt[0]), dot3(a[0], bt[1]), dot3(a[0], bt[2])],
    [dot3(a[1], bt[0]), dot3(a[1], bt[1]), dot3(a[1], bt[2])],
    [dot3(a[2], bt[0]), dot3(a[2], bt[1]), dot3(a[2], bt[2])],
  ];
}

/** Element-wise subtraction: a - b. */
export function subMat(a: Mat3, b: Mat3): Mat3 {
  return [
    [a[0][0] - b[0][0], a[0][1] - b[0][1], a[0][2] - b[0][2]],
    [a[1][0] - b[1][0], a[1][1] - b[1][1], a[1][2] - b[1][2]],
    [a[2][0] - b[2][0], a[2][1] - b[2][1], a[2][2] - b[2][2]],
  ];
}

/** Outer product: a · bᵀ. */
export function outer3(a: Vec3, b: Vec3): Mat3 {
  return [scaleVec(b, a[0]), scaleVec(b, a[1]), scaleVec(b, a[2])];
}

/** Sum of the diagonal. */
export function trace3(m: Mat3): number {
  return m[0][0] + m[1][1] + m[2][2];
}
