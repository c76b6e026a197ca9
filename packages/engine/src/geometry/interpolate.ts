import type { Profile, Vec2, Vec3 } from "@linework/contracts";
import { GeometryError } from "../errors";

/**
 * n evenly spaced values from a to b; the last one is exactly b.
 */
export function linspace(a: number, b: number, n: number): number[] {
  if (n <= 0) return [];
  if (n === 1) return [a];
  const step = (b - a) / (n - 1);
  const out = new Array<number>(n);
  for (let i = 0; i < n - 1; i++) {
    out[i] = a + i * step;
  }
  out[n - 1] = b;
  return out;
}

function rawShape(n: number, profile: Profile): number[] {
  switch (profile) {
    case "linear":
      return linspace(0, 1, n);
    case "quadratic":
      return linspace(0, 1, n).map((x) => x * x);
    case "negQuadratic":
      return linspace(1, 0, n).map((x) => 1 - x * x);
    case "sinusoid":
      return linspace(0, Math.PI, n).map((x) => 0.5 - Math.cos(x) / 2);
    case "sigmoid":
      return linspace(-0.5, 0.5, n).map((x) => 1 / (1 + Math.exp(-10 * x)));
  }
}

/**
 * Normalized profile curve: n weights running from exactly 0 to exactly 1.
 * Curves that do not touch 0 and 1 on their own (sigmoid, float drift on the
 * others) are shifted and rescaled. For n <= 1 the single weight is 1.
 */
export function profileShape(n: number, profile: Profile): number[] {
  if (n <= 1) return [1];
  const shape = rawShape(n, profile);
  const first = shape[0];
  const span = shape[n - 1] - first;
  const out = shape.map((x) => (x - first) / span);
  out[0] = 0;
  out[n - 1] = 1;
  return out;
}

function spanScalar(start: number, end: number, n: number, profile: Profile): number[] {
  if (n <= 1) return [end];
  const values = profileShape(n, profile).map((w) => start + w * (end - start));
  values[0] = start;
  values[n - 1] = end;
  return values;
}

/**
 * Values spanning start to end, distributed by `profile`.
 *
 * For n > 1 the first element is `start` and the last is `end`, bit for bit.
 * For n <= 1 the result is `[end]`: a single-frame transition snaps to its
 * target. Vectors are interpolated per component.
 */
export function interpolate(start: number, end: number, n: number, profile?: Profile): number[];
export function interpolate(start: Vec2, end: Vec2, n: number, profile?: Profile): Vec2[];
export function interpolate(start: Vec3, end: Vec3, n: number, profile?: Profile): Vec3[];
export function interpolate(
  start: number | Vec2 | Vec3,
  end: number | Vec2 | Vec3,
  n: number,
  profile: Profile = "sigmoid"
): number[] | Vec2[] | Vec3[] {
  if (typeof start === "number") {
    if (typeof end !== "number") {
      throw new GeometryError("interpolate: start and end must have the same shape");
    }
    return spanScalar(start, end, n, profile);
  }
  if (typeof end === "number") {
    throw new GeometryError("interpolate: start and end must have the same shape");
  }

  const xs = spanScalar(start[0], end[0], n, profile);
  const ys = spanScalar(start[1], end[1], n, profile);

  if (start.length === 2 && end.length === 2) {
    return xs.map((x, i): Vec2 => [x, ys[i]]);
  }
  if (start.length === 3 && end.length === 3) {
    const zs = spanScalar(start[2], end[2], n, profile);
    return xs.map((x, i): Vec3 => [x, ys[i], zs[i]]);
  }
  throw new GeometryError("interpolate: start and end must have the same shape");
}
