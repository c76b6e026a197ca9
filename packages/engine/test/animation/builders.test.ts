import { describe, it, expect, beforeEach } from "vitest";
import {
  fadeIn,
  fadeOut,
  frameCount,
  orient,
  pause,
  rotateBy,
  setAttr,
  setCmd,
  slide,
  slideTo,
  startFrame,
  sweepAttr,
  sweepCmd,
} from "../../src/animation/builders";
import { TimelineError } from "../../src/errors";
import { createCircle, createPoint } from "../../src/shapes/factories";
import { Scene } from "../../src/timeline/Scene";
import type { SceneInstruction } from "../../src/timeline/instructions";
import { rotationZ, type Vec3 } from "@linework/contracts";
import { createFakeRasterizer } from "../_harness/fakeRasterizer";

describe("instruction builders", () => {
  let scene: Scene;

  beforeEach(() => {
    scene = new Scene(createFakeRasterizer(), { width: 8, height: 8, fps: 10 });
  });

  describe("timing", () => {
    it("counts whole frames of a duration", () => {
      expect(frameCount(scene, 0.5)).toBe(5);
      expect(frameCount(scene, 0.55)).toBe(5);
      expect(frameCount(scene, "frame")).toBe(1);
      expect(frameCount(scene, 0.01)).toBe(1);
    });

    it("starts at the last scheduled frame unless told otherwise", () => {
      expect(startFrame(scene)).toBe(0);
      scene.appendInstruction(12, { op: "noop" });
      expect(startFrame(scene)).toBe(12);
      expect(startFrame(scene, 1.5)).toBe(15);
    });

    it("rejects start times before the first frame", () => {
      expect(() => startFrame(scene, -1)).toThrow(TimelineError);
    });
  });

  it("pauses by appending a noop", () => {
    scene.appendInstruction(3, { op: "noop" });
    pause(scene, 1);
    expect(scene.lastFrame()).toBe(13);
    expect(scene.instructionsAt(13)).toEqual([{ op: "noop" }]);
  });

  describe("slide", () => {
    it("spreads the displacement over the following frames", () => {
      slide(scene, 0.5, "dot", [4, 0, 0], { profile: "linear" });

      expect(scene.instructionsAt(0)).toEqual([{ op: "noop" }]);
      for (const frame of [1, 2, 3, 4]) {
        expect(scene.instructionsAt(frame)).toEqual([
          { op: "translate", target: "dot", delta: [1, 0, 0] },
        ]);
      }
      expect(scene.lastFrame()).toBe(4);
    });

    it("lands exactly on the displacement", () => {
      const dot = scene.register("dot", createPoint(scene.graph, [1, 1, 0]));
      slide(scene, 1, "dot", [3, -2, 0]);
      scene.seek(scene.lastFrame() + 1);
      const [x, y] = dot.localPosition();
      expect(x).toBeCloseTo(4, 12);
      expect(y).toBeCloseTo(-1, 12);
    });

    it("jumps in one frame", () => {
      slide(scene, "frame", "dot", [1, 2, 3], { tStart: 0.3 });
      expect(scene.instructionsAt(3)).toEqual([{ op: "translate", target: "dot", delta: [1, 2, 3] }]);
    });
  });

  describe("slideTo", () => {
    it("covers the remaining share of the distance each frame", () => {
      slideTo(scene, 0.5, "dot", [2, 0, 0], { profile: "linear" });
      const fractions = [1, 2, 3, 4].map((frame) => {
        const [instruction] = scene.instructionsAt(frame);
        return instruction.op === "translateToward" ? instruction.fraction : NaN;
      });
      expect(fractions[0]).toBe(0.25);
      expect(fractions[1]).toBeCloseTo(1 / 3, 15);
      expect(fractions[2]).toBe(0.5);
      expect(fractions[3]).toBe(1);
    });

    it("absorbs moves made while it runs", () => {
      const dot = scene.register("dot", createPoint(scene.graph, [0, 0, 0]));
      slideTo(scene, 0.5, "dot", [2, 0, 0], { profile: "linear" });
      scene.appendInstruction(2, { op: "translate", target: "dot", delta: [0, 3, 0] });

      scene.seek(5);
      expect(dot.localPosition()).toEqual([2, 0, 0]);
    });

    it("sets the position directly for a single frame", () => {
      slideTo(scene, "frame", "dot", [2, 0, 0]);
      expect(scene.instructionsAt(0)[1]).toEqual({ op: "setPosition", target: "dot", position: [2, 0, 0] });
    });
  });

  describe("rotation", () => {
    it("rotates by angle increments", () => {
      rotateBy(scene, 0.5, "arm", [0, 0, 1], 2, { profile: "linear" });
      const angles = [1, 2, 3, 4].map((frame) => {
        const [instruction] = scene.instructionsAt(frame);
        return instruction.op === "rotate" ? instruction.angle : NaN;
      });
      expect(angles).toEqual([0.5, 0.5, 0.5, 0.5]);
    });

    it("rotates in one frame", () => {
      rotateBy(scene, "frame", "arm", [0, 0, 1], Math.PI);
      expect(scene.instructionsAt(0)[1]).toEqual({ op: "rotate", target: "arm", axis: [0, 0, 1], angle: Math.PI });
    });

    it("orients at the start frame", () => {
      const orientation = rotationZ(1);
      orient(scene, "arm", orientation, { tStart: 0.2 });
      expect(scene.instructionsAt(2)).toEqual([{ op: "setOrientation", target: "arm", orientation }]);
    });
  });

  describe("attributes", () => {
    it("sweeps a number with one sample per frame", () => {
      sweepAttr(scene, 0.5, "ring", "radius", 1, 3, { profile: "linear", tStart: 1 });
      expect(
        [10, 11, 12, 13, 14].map((frame) => scene.instructionsAt(frame))
      ).toEqual(
        [1, 1.5, 2, 2.5, 3].map((value, step) => [
          { op: "sweepAttribute", target: "ring", name: "radius", value, step, steps: 5 },
        ])
      );
    });

    it("sweeps vectors per component", () => {
      sweepAttr(scene, 0.3, "dot", "color", [0, 0, 0], [100, 50, 0], { profile: "linear" });
      const [last] = scene.instructionsAt(2);
      expect(last).toEqual({
        op: "sweepAttribute",
        target: "dot",
        name: "color",
        value: [100, 50, 0],
        step: 2,
        steps: 3,
      });
    });

    it("rejects mismatched sweep values", () => {
      expect(() => sweepAttr(scene, 0.5, "dot", "radius", 1, [1, 2])).toThrow(TimelineError);
    });

    it("sets a single value in one frame", () => {
      sweepAttr(scene, "frame", "ring", "radius", 1, 3);
      expect(scene.instructionsAt(0)[1]).toEqual({
        op: "setAttribute",
        target: "ring",
        name: "radius",
        value: 3,
      });
    });

    it("sets an attribute at the requested start", () => {
      setAttr(scene, "label", "text", "done", { tStart: 0.2 });
      expect(scene.instructionsAt(2)).toEqual([
        { op: "setAttribute", target: "label", name: "text", value: "done" },
      ]);
    });
  });

  describe("fades", () => {
    it("shows the node before raising its opacity", () => {
      fadeIn(scene, 0.5, "ring", { profile: "linear" });
      expect(scene.instructionsAt(0)).toEqual([
        { op: "noop" },
        { op: "setAttribute", target: "ring", name: "visible", value: true },
        { op: "sweepAttribute", target: "ring", name: "opacity", value: 0, step: 0, steps: 5 },
      ]);
      expect(scene.instructionsAt(4)).toEqual([
        { op: "sweepAttribute", target: "ring", name: "opacity", value: 1, step: 4, steps: 5 },
      ]);
    });

    it("hides the node on the last frame of a fade out", () => {
      fadeOut(scene, 0.5, "ring", { profile: "linear" });
      expect(scene.instructionsAt(4)).toEqual([
        { op: "sweepAttribute", target: "ring", name: "opacity", value: 0, step: 4, steps: 5 },
        { op: "setAttribute", target: "ring", name: "visible", value: false },
      ]);
    });

    it("round-trips visibility through the replay", () => {
      const ring = scene.register("ring", createCircle(scene.graph, 1, { visible: false }));
      fadeIn(scene, 0.5, "ring");
      pause(scene, 0.2);
      fadeOut(scene, 0.5, "ring");

      scene.seek(5);
      expect(ring.boolean("visible")).toBe(true);
      expect(ring.number("opacity")).toBe(1);
      scene.seek(scene.lastFrame() + 1);
      expect(ring.boolean("visible")).toBe(false);
      expect(ring.number("opacity")).toBe(0);
    });
  });

  describe("commands", () => {
    const delta: Vec3 = [0, 1, 0];
    const bump: SceneInstruction = { op: "translate", target: "dot", delta };

    it("repeats an instruction on every frame", () => {
      sweepCmd(scene, 0.3, bump, { tStart: 1 });
      expect([10, 11, 12].map((frame) => scene.instructionsAt(frame))).toEqual([[bump], [bump], [bump]]);
      expect(scene.instructionsAt(13)).toEqual([]);
    });

    it("issues an instruction once", () => {
      setCmd(scene, bump);
      expect(scene.instructionsAt(0)).toEqual([{ op: "noop" }, bump]);
    });
  });
});
