/**
 * Leader line geometry: a polyline drawn up to a fraction of its length,
 * with optional arrow heads. All coordinates are in the leader's frame.
 */

import { Vector3 } from "three";
import type { Vec3 } from "@linework/contracts";
import { fromVector3, toVector3 } from "../graph/math";

export interface LeaderGeometry {
  vertices: Vec3[];
  startArrow: boolean;
  endArrow: boolean;
  /** Drawn fraction of the total length, 0..1 */
  extension: number;
  arrowLength: number;
  /** Arrow half angle, radians */
  taper: number;
}

/** Total planar length of the polyline. */
export function leaderLength(vertices: readonly Vec3[]): number {
  let total = 0;
  for (let i = 1; i < vertices.length; i++) {
    total += Math.hypot(vertices[i][0] - vertices[i - 1][0], vertices[i][1] - vertices[i - 1][1]);
  }
  return total;
}

function direction(from: Vector3, to: Vector3): Vector3 {
  return to.clone().sub(from).normalize();
}

/** In-plane left normal of a unit direction. */
function leftNormal(e: Vector3): Vector3 {
  return new Vector3(-e.y, e.x, e.z);
}

/**
 * Vertices of the visible part of the line.
 *
 * With arrows the line stops at the arrow bases: a vertex is inserted at the
 * start arrow's base and the last vertex is pulled back to the end arrow's
 * base. The walk itself is measured against the full length, so the end
 * arrow can grow in while the line is already complete.
 */
export function fractionalVertices(leader: LeaderGeometry): Vec3[] {
  const { vertices, extension, arrowLength } = leader;
  if (vertices.length === 0 || extension < 1e-8) return [];
  if (vertices.length === 1) return [[vertices[0][0], vertices[0][1], vertices[0][2]]];

  const verts = vertices.map((v) => toVector3(v));
  if (leader.startArrow) {
    const base = verts[0].clone().addScaledVector(direction(verts[0], verts[1]), arrowLength);
    verts.splice(1, 0, base);
  }
  if (leader.endArrow) {
    const last = verts.length - 1;
    verts[last] = verts[last]
      .clone()
      .addScaledVector(direction(verts[last], verts[last - 1]), arrowLength);
  }

  const target = leaderLength(vertices) * extension;
  const output: Vector3[] = [verts[0].clone()];
  let walked = 0;

  for (let i = 1; i < verts.length; i++) {
    const prev = verts[i - 1];
    const curr = verts[i];
    const step = curr.distanceTo(prev);
    if (walked + step <= target) {
      output.push(curr.clone());
      walked += step;
    } else {
      output.push(prev.clone().addScaledVector(direction(prev, curr), target - walked));
      break;
    }
  }

  if (leader.startArrow) output.shift();
  return output.map(fromVector3);
}

/**
 * Start arrow triangle [tip, base corner, base corner]. While the extension
 * has not yet passed the arrow it is scaled down to the drawn length.
 */
export function startArrowVertices(leader: LeaderGeometry): Vec3[] {
  const { vertices } = leader;
  if (vertices.length < 2) return [];

  const drawn = Math.min(leader.extension * leaderLength(vertices), leader.arrowLength);
  const halfWidth = drawn * Math.tan(leader.taper);
  const start = toVector3(vertices[0]);
  const e = direction(start, toVector3(vertices[1]));
  const n = leftNormal(e);
  const base = start.clone().addScaledVector(e, drawn);

  return [
    fromVector3(start),
    fromVector3(base.clone().addScaledVector(n, halfWidth)),
    fromVector3(base.clone().addScaledVector(n, -halfWidth)),
  ];
}

/**
 * End arrow outline. Appears during the last `arrowLength` of extension as a
 * trapezoid growing from the base toward the tip; a full triangle (with a
 * degenerate top edge) at extension 1.
 */
export function endArrowVertices(leader: LeaderGeometry): Vec3[] {
  const { vertices, arrowLength } = leader;
  if (vertices.length < 2) return [];

  const total = leaderLength(vertices);
  const height = leader.extension * total - (total - arrowLength);
  if (height <= 0) return [];

  const tan = Math.tan(leader.taper);
  const baseWidth = arrowLength * tan;
  const midWidth = (arrowLength - height) * tan;
  const end = toVector3(vertices[vertices.length - 1]);
  const e = direction(toVector3(vertices[vertices.length - 2]), end);
  const n = leftNormal(e);
  const base = end.clone().addScaledVector(e, -arrowLength);
  const mid = end.clone().addScaledVector(e, -(arrowLength - height));

  return [
    fromVector3(base.clone().addScaledVector(n, baseWidth)),
    fromVector3(base.clone().addScaledVector(n, -baseWidth)),
    fromVector3(mid.clone().addScaledVector(n, -midWidth)),
    fromVector3(mid.clone().addScaledVector(n, midWidth)),
  ];
}
