import { describe, it, expect } from "vitest";
import { GeometryError } from "../../src/errors";
import { isConvex, signedArea } from "../../src/geometry";
import type { Vec2 } from "@linework/contracts";

const square: Vec2[] = [
  [0, 0],
  [1, 0],
  [1, 1],
  [0, 1],
];

describe("isConvex", () => {
  it("accepts convex loops in either winding", () => {
    expect(isConvex(square)).toBe(true);
    expect(isConvex([...square].reverse())).toBe(true);
  });

  it("accepts collinear vertices on an edge", () => {
    expect(
      isConvex([
        [0, 0],
        [1, 0],
        [2, 0],
        [2, 2],
        [0, 2],
      ])
    ).toBe(true);
  });

  it("rejects a concave loop", () => {
    expect(
      isConvex([
        [0, 0],
        [2, 1],
        [0, 2],
        [1, 1],
      ])
    ).toBe(false);
  });

  it("rejects a self-intersecting star", () => {
    const pentagon = [0, 1, 2, 3, 4].map((k): Vec2 => {
      const angle = Math.PI / 2 + (k * 2 * Math.PI) / 5;
      return [Math.cos(angle), Math.sin(angle)];
    });
    const star = [0, 2, 4, 1, 3].map((k) => pentagon[k]);
    expect(isConvex(star)).toBe(false);
  });

  it("rejects a degenerate line", () => {
    expect(
      isConvex([
        [0, 0],
        [1, 0],
        [2, 0],
      ])
    ).toBe(false);
  });

  it("needs three vertices", () => {
    expect(() => isConvex(square.slice(0, 2))).toThrow(GeometryError);
  });
});

describe("signedArea", () => {
  it("is positive counter-clockwise and negative clockwise", () => {
    expect(signedArea(square)).toBe(1);
    expect(signedArea([...square].reverse())).toBe(-1);
  });
});
