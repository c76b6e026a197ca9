import type { Vec2, Vec3 } from "@linework/contracts";
import { GeometryError } from "../errors";

/** Anything with x and y; z is ignored. */
export type PlanarPoint = Vec2 | Vec3;

/**
 * Distance from `point` along `direction` to the boundary of `polygon`.
 *
 * Each edge whose endpoints lie on opposite sides of the ray's line (or on
 * it) is a crossing; the forward distance of the crossing is interpolated
 * where the edge meets the line. Returns the smallest non-negative forward
 * distance. If any crossing lies behind the point, the point is inside and
 * the result is negated. Returns Infinity when nothing lies ahead (-Infinity
 * when crossings exist only behind).
 *
 * Edges lying on the ray's line produce NaN and are never selected.
 */
export function rayPolygonDistance(
  polygon: readonly PlanarPoint[],
  point: PlanarPoint,
  direction: PlanarPoint
): number {
  const len = Math.hypot(direction[0], direction[1]);
  if (!(len > 0)) {
    throw new GeometryError("Ray direction must be non-zero");
  }
  const ax = direction[0] / len;
  const ay = direction[1] / len;
  // Normal to the ray
  const nx = -ay;
  const ny = ax;

  let nearest = Infinity;
  let insideFactor = 1;

  for (let i = 0; i < polygon.length; i++) {
    const start = polygon[i];
    const end = polygon[(i + 1) % polygon.length];
    const sx = start[0] - point[0];
    const sy = start[1] - point[1];
    const ex = end[0] - point[0];
    const ey = end[1] - point[1];

    const normStart = nx * sx + ny * sy;
    const normEnd = nx * ex + ny * ey;
    if (normStart * normEnd > 0) continue;

    const axStart = ax * sx + ay * sy;
    const axEnd = ax * ex + ay * ey;
    const forward = axStart + ((0 - normStart) / (normEnd - normStart)) * (axEnd - axStart);

    if (forward < 0) {
      insideFactor = -1;
      continue;
    }
    if (forward < nearest) {
      nearest = forward;
    }
  }

  return insideFactor * nearest;
}
