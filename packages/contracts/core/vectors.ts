/**
 * Plain-data vector types.
 *
 * Scene data is stored as tuples so it can be cloned, compared and printed
 * without a math library. The engine converts to its own math types at the
 * edges.
 */

export type Vec2 = [number, number];

export type Vec3 = [number, number, number];

/**
 * Row-major 3×3 matrix.
 *
 * For orientations the columns are the local x, y and z axes expressed in
 * the parent frame.
 */
export type Mat3 = [
  number, number, number,
  number, number, number,
  number, number, number,
];

export function vec3(x: number, y: number, z = 0): Vec3 {
  return [x, y, z];
}

export function identityMat3(): Mat3 {
  return [1, 0, 0, 0, 1, 0, 0, 0, 1];
}

/**
 * Rotation about +z by `radians` (counter-clockwise when viewed from +z).
 */
export function rotationZ(radians: number): Mat3 {
  const c = Math.cos(radians);
  const s = Math.sin(radians);
  return [c, -s, 0, s, c, 0, 0, 0, 1];
}
