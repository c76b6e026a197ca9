import type { FlatnessResult, FlatnessStep, Vec2 } from "@linework/contracts";
import { GeometryError } from "../errors";

function samePoint(a: Vec2, b: Vec2): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

interface Candidate {
  index: number;
  dot: number;
  dir: Vec2;
}

/**
 * Best next point for an anchor: the first point whose unit direction from
 * the anchor has the largest dot product with the anchor's slope. Points
 * equal to the anchor are not candidates.
 */
function bestCandidate(points: readonly Vec2[], anchor: Vec2, slope: Vec2): Candidate {
  let best: Candidate = { index: -1, dot: -Infinity, dir: [0, 0] };
  for (let i = 0; i < points.length; i++) {
    const p = points[i];
    if (samePoint(p, anchor)) continue;
    const dx = p[0] - anchor[0];
    const dy = p[1] - anchor[1];
    const dist = Math.sqrt(dx * dx + dy * dy);
    const dir: Vec2 = [dx / dist, dy / dist];
    const dot = slope[0] * dir[0] + slope[1] * dir[1];
    if (dot > best.dot) {
      best = { index: i, dot, dir };
    }
  }
  return best;
}

/**
 * Minimum-zone flatness with every roll position of the search.
 *
 * Two anchors start on the lowest and highest points with antiparallel
 * horizontal slopes. Each step rolls the anchor whose best candidate has the
 * larger dot product (ties roll the lower anchor) onto that candidate and
 * realigns both slopes with the new support direction. The search stops once
 * either anchor reaches the other's starting point.
 *
 * Termination compares coordinates by value, so duplicate points can cut
 * the roll short. The step count is bounded; exceeding the bound is a
 * GeometryError.
 */
export function minZoneFlatnessTrace(points: readonly Vec2[]): FlatnessResult {
  if (points.length === 0) {
    throw new GeometryError("Flatness needs at least 2 distinct points, got none");
  }

  let n0 = 0;
  let n1 = 0;
  for (let i = 1; i < points.length; i++) {
    if (points[i][1] < points[n0][1]) n0 = i;
    if (points[i][1] > points[n1][1]) n1 = i;
  }
  const lowStart = points[n0];
  const highStart = points[n1];

  if (!points.some((p) => !samePoint(p, lowStart))) {
    throw new GeometryError("Flatness needs at least 2 distinct points");
  }

  // All points share one height: the band has zero width
  if (n0 === n1) {
    return { flatness: 0, steps: [] };
  }

  let p0 = lowStart;
  let p1 = highStart;
  let slope0: Vec2 = [1, 0];
  let slope1: Vec2 = [-1, 0];

  const maxSteps = 4 * points.length;
  const steps: FlatnessStep[] = [];

  while (!samePoint(p0, highStart) && !samePoint(p1, lowStart)) {
    if (steps.length >= maxSteps) {
      throw new GeometryError(
        `Flatness search did not terminate within ${maxSteps} steps`
      );
    }

    const c0 = bestCandidate(points, p0, slope0);
    const c1 = bestCandidate(points, p1, slope1);

    if (c0.dot >= c1.dot) {
      p0 = points[c0.index];
      slope0 = c0.dir;
      slope1 = [-c0.dir[0], -c0.dir[1]];
    } else {
      p1 = points[c1.index];
      slope1 = c1.dir;
      slope0 = [-c1.dir[0], -c1.dir[1]];
    }

    const separation = Math.abs(
      (p1[0] - p0[0]) * -slope0[1] + (p1[1] - p0[1]) * slope0[0]
    );
    steps.push({
      separation,
      slope: [slope0[0], slope0[1]],
      lower: [p0[0], p0[1]],
      upper: [p1[0], p1[1]],
    });
  }

  let flatness = Infinity;
  for (const step of steps) {
    if (step.separation < flatness) flatness = step.separation;
  }
  return { flatness, steps };
}

/**
 * Minimum perpendicular width of a band of two parallel lines enclosing the
 * points. See minZoneFlatnessTrace.
 */
export function minZoneFlatness(points: readonly Vec2[]): number {
  return minZoneFlatnessTrace(points).flatness;
}
