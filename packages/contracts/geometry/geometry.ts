import type { Vec2 } from "../core/vectors";

/**
 * Interpolation profile: the shape of the curve used to distribute samples
 * between a start and an end value.
 */
export type Profile =
  | "linear"
  | "quadratic"
  | "negQuadratic"
  | "sinusoid"
  | "sigmoid";

export const PROFILES: readonly Profile[] = [
  "linear",
  "quadratic",
  "negQuadratic",
  "sinusoid",
  "sigmoid",
];

export interface LinePath {
  kind: "line";
  start: Vec2;
  end: Vec2;
}

/** Arc from `startAngle` to `endAngle` (radians, counter-clockwise from +x) */
export interface ArcPath {
  kind: "arc";
  center: Vec2;
  radius: number;
  startAngle: number;
  endAngle: number;
}

export type ContourPath = LinePath | ArcPath;

/**
 * Sampled contour: `normals[i]` is the unit normal at `points[i]`.
 */
export interface ContourSamples {
  points: Vec2[];
  normals: Vec2[];
}

/**
 * One roll position of the minimum-zone flatness search.
 */
export interface FlatnessStep {
  /** Perpendicular separation of the two support lines */
  separation: number;
  /** Unit direction of the lower support line */
  slope: Vec2;
  /** Anchor on the lower support line */
  lower: Vec2;
  /** Anchor on the upper support line */
  upper: Vec2;
}

export interface FlatnessResult {
  flatness: number;
  steps: FlatnessStep[];
}
