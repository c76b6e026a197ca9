import type { ArcPath, ContourPath, ContourSamples, Vec2 } from "@linework/contracts";
import { GeometryError } from "../errors";
import { createRng, type Rng } from "./random";

/** Concentration of the Dirichlet draw that spaces the samples. */
const SPACING_CONCENTRATION = 10;

/**
 * Full circle as an arc path. The seam sits at π/4 so jagged endpoints do
 * not land on an axis.
 */
export function circlePath(center: Vec2, radius: number): ArcPath {
  return {
    kind: "arc",
    center,
    radius,
    startAngle: Math.PI / 4,
    endAngle: (9 * Math.PI) / 4,
  };
}

/**
 * Cumulative sample parameters in [0, 1]: starts at exactly 0, ends at
 * exactly 1, with Dirichlet-distributed gaps in between.
 */
function cumulativeSpacing(nPoints: number, rng: Rng): number[] {
  if (!Number.isInteger(nPoints) || nPoints < 2) {
    throw new GeometryError(`Contour needs at least 2 sample points, got ${nPoints}`);
  }
  const gaps = rng.dirichlet(new Array<number>(nPoints - 1).fill(SPACING_CONCENTRATION));
  const params = [0];
  let acc = 0;
  for (const gap of gaps) {
    acc += gap;
    params.push(acc);
  }
  params[nPoints - 1] = 1;
  return params;
}

/**
 * Samples points and unit normals along a path at randomly spaced
 * parameters drawn from `rng`. The first sample is exactly the path start.
 */
export function sampleContour(path: ContourPath, nPoints: number, rng: Rng): ContourSamples {
  const params = cumulativeSpacing(nPoints, rng);

  if (path.kind === "line") {
    const dx = path.end[0] - path.start[0];
    const dy = path.end[1] - path.start[1];
    const len = Math.hypot(dx, dy);
    if (!(len > 0)) {
      throw new GeometryError("Line contour has zero length");
    }
    const normal: Vec2 = [-dy / len, dx / len];
    return {
      points: params.map((t): Vec2 => [path.start[0] + t * dx, path.start[1] + t * dy]),
      normals: params.map((): Vec2 => [normal[0], normal[1]]),
    };
  }

  const sweep = path.endAngle - path.startAngle;
  const normals = params.map((t): Vec2 => {
    const angle = path.startAngle + sweep * t;
    return [Math.cos(angle), Math.sin(angle)];
  });
  return {
    points: normals.map((n): Vec2 => [
      path.center[0] + path.radius * n[0],
      path.center[1] + path.radius * n[1],
    ]),
    normals,
  };
}

export function concatSamples(parts: readonly ContourSamples[]): ContourSamples {
  const points: Vec2[] = [];
  const normals: Vec2[] = [];
  for (const part of parts) {
    points.push(...part.points);
    normals.push(...part.normals);
  }
  return { points, normals };
}

/**
 * Pushes every sample along its normal by a uniform amount in
 * [-jaggedness, jaggedness]. One offset is drawn per sample; the first and
 * last offsets are then forced to 0 so endpoints stay put.
 */
export function offsetAlongNormals(
  samples: ContourSamples,
  jaggedness: number,
  rng: Rng
): Vec2[] {
  const { points, normals } = samples;
  const offsets = points.map(() => rng.uniform(-jaggedness, jaggedness));
  if (offsets.length > 0) {
    offsets[0] = 0;
    offsets[offsets.length - 1] = 0;
  }
  return points.map((p, i): Vec2 => [
    p[0] + offsets[i] * normals[i][0],
    p[1] + offsets[i] * normals[i][1],
  ]);
}

/**
 * Deterministic hand-drawn sampling of a contour.
 *
 * Each path is sampled with `nPoints` samples, in order, from one generator
 * seeded with `seed`; the normal offsets are drawn afterwards from the same
 * generator. Identical arguments give identical output.
 */
export function jaggedSamples(
  contour: ContourPath | readonly ContourPath[],
  jaggedness: number,
  nPoints: number,
  seed: number
): ContourSamples {
  const paths: readonly ContourPath[] = isPathList(contour) ? contour : [contour];
  const rng = createRng(seed);
  const samples = concatSamples(paths.map((path) => sampleContour(path, nPoints, rng)));
  return {
    points: offsetAlongNormals(samples, jaggedness, rng),
    normals: samples.normals,
  };
}

function isPathList(contour: ContourPath | readonly ContourPath[]): contour is readonly ContourPath[] {
  return Array.isArray(contour);
}
