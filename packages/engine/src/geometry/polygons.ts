import { GeometryError } from "../errors";
import type { PlanarPoint } from "./rayPolygon";

/**
 * Whether the vertex loop bounds a convex region.
 *
 * Collinear vertices are allowed. Every turn must go the same way and the
 * loop must wind exactly once, which rejects self-intersecting stars.
 */
export function isConvex(polygon: readonly PlanarPoint[]): boolean {
  const n = polygon.length;
  if (n < 3) {
    throw new GeometryError(`Convexity needs at least 3 vertices, got ${n}`);
  }

  let sign = 0;
  let turning = 0;
  for (let i = 0; i < n; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % n];
    const c = polygon[(i + 2) % n];
    const e1x = b[0] - a[0];
    const e1y = b[1] - a[1];
    const e2x = c[0] - b[0];
    const e2y = c[1] - b[1];
    const cross = e1x * e2y - e1y * e2x;
    const dot = e1x * e2x + e1y * e2y;

    if (cross !== 0) {
      const s = Math.sign(cross);
      if (sign === 0) sign = s;
      else if (s !== sign) return false;
    }
    turning += Math.atan2(cross, dot);
  }

  if (sign === 0) return false;
  return Math.abs(Math.abs(turning) - 2 * Math.PI) < 1e-6;
}

/**
 * Signed area (positive for counter-clockwise loops).
 */
export function signedArea(polygon: readonly PlanarPoint[]): number {
  let twice = 0;
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    twice += a[0] * b[1] - b[0] * a[1];
  }
  return twice / 2;
}
