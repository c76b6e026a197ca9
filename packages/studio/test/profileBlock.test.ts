import { describe, it, expect } from "vitest";
import { GeometryError, SceneGraph } from "@linework/engine";
import { createProfileBlock } from "../src/profileBlock";

describe("createProfileBlock", () => {
  it("closes the profile with two bottom corners", () => {
    const block = createProfileBlock(
      new SceneGraph(),
      [
        [0, 0.1],
        [1, 0.2],
      ],
      { thickness: 1, overhang: 0.5 }
    );
    expect(block.kind).toBe("polygon");
    expect(block.vec3List("vertices")).toEqual([
      [1.5, -1, 0],
      [-0.5, -1, 0],
      [0, 0.1, 0],
      [1, 0.2, 0],
    ]);
  });

  it("uses the widest x on either side", () => {
    const block = createProfileBlock(
      new SceneGraph(),
      [
        [2, 0],
        [-1, 0],
        [4, 0],
      ],
      { thickness: 2, overhang: 0 }
    );
    expect(block.vec3List("vertices").slice(0, 2)).toEqual([
      [4, -2, 0],
      [-1, -2, 0],
    ]);
  });

  it("applies the style", () => {
    const block = createProfileBlock(
      new SceneGraph(),
      [
        [0, 0],
        [1, 0],
      ],
      {},
      { position: [-3, -1.8, 0], opacity: 0 }
    );
    expect(block.localPosition()).toEqual([-3, -1.8, 0]);
    expect(block.get("opacity")).toBe(0);
  });

  it("needs two points", () => {
    expect(() => createProfileBlock(new SceneGraph(), [[0, 0]])).toThrow(GeometryError);
  });
});
