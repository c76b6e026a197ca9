import { Matrix3, Quaternion, Vector3 } from "three";
import type { Mat3, Vec3 } from "@linework/contracts";

export function toVector3(v: Readonly<Vec3>): Vector3 {
  return new Vector3(v[0], v[1], v[2]);
}

export function fromVector3(v: Vector3): Vec3 {
  return [v.x, v.y, v.z];
}

/** Mat3 is row-major; Matrix3.set takes row-major arguments. */
export function toMatrix3(m: Readonly<Mat3>): Matrix3 {
  return new Matrix3().set(m[0], m[1], m[2], m[3], m[4], m[5], m[6], m[7], m[8]);
}

/** Matrix3.elements is column-major. */
export function fromMatrix3(m: Matrix3): Mat3 {
  const e = m.elements;
  return [e[0], e[3], e[6], e[1], e[4], e[7], e[2], e[5], e[8]];
}

export function axisAngleQuaternion(axis: Readonly<Vec3>, angle: number): Quaternion {
  return new Quaternion().setFromAxisAngle(toVector3(axis).normalize(), angle);
}

/**
 * Rotates each column (local axis) of `m` by `q` and reassembles the matrix.
 * Columns are rotated independently, so repeated use can drift slightly
 * from orthonormal.
 */
export function rotateColumns(m: Matrix3, q: Quaternion): Matrix3 {
  const x = new Vector3().setFromMatrix3Column(m, 0).applyQuaternion(q);
  const y = new Vector3().setFromMatrix3Column(m, 1).applyQuaternion(q);
  const z = new Vector3().setFromMatrix3Column(m, 2).applyQuaternion(q);
  return new Matrix3().set(x.x, y.x, z.x, x.y, y.y, z.y, x.z, y.z, z.z);
}

/** In-plane rotation of the local x axis, radians counter-clockwise. */
export function planarAngle(m: Matrix3): number {
  const e = m.elements;
  return Math.atan2(e[1], e[0]);
}
