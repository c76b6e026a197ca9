import { describe, it, expect, beforeEach } from "vitest";
import { pixelAt } from "../../src/compositing/frameBuffer";
import { ReplayError, TimelineError } from "../../src/errors";
import { SceneGraph } from "../../src/graph/SceneGraph";
import { slide } from "../../src/animation/builders";
import { createDisk, createPoint } from "../../src/shapes/factories";
import { Scene } from "../../src/timeline/Scene";
import { createFakeRasterizer } from "../_harness/fakeRasterizer";

describe("Scene", () => {
  let rasterizer: ReturnType<typeof createFakeRasterizer>;
  let scene: Scene;

  beforeEach(() => {
    rasterizer = createFakeRasterizer();
    scene = new Scene(rasterizer, { width: 4, height: 2, resolution: 10, fps: 10, background: [10, 20, 30] });
  });

  describe("config", () => {
    it("fills in defaults", () => {
      const defaults = new Scene(rasterizer);
      expect(defaults.config).toEqual({
        width: 1920,
        height: 1080,
        resolution: 272,
        fps: 60,
        background: [0, 0, 0],
      });
      expect(defaults.origin).toEqual([960, 540]);
    });

    it("puts the origin at the frame centre", () => {
      expect(scene.origin).toEqual([2, 1]);
      expect(new Scene(rasterizer, { width: 5, height: 3 }).origin).toEqual([2, 1]);
    });
  });

  describe("register", () => {
    it("resolves entities by alias in registration order", () => {
      const a = createPoint(scene.graph, [0, 0, 0]);
      const b = createPoint(scene.graph, [1, 0, 0]);
      scene.registerAll({ b, a });
      expect(scene.entity("a")).toBe(a);
      expect(scene.aliases).toEqual(["b", "a"]);
    });

    it("rejects duplicate aliases", () => {
      scene.register("a", createPoint(scene.graph, [0, 0, 0]));
      expect(() => scene.register("a", createPoint(scene.graph, [0, 0, 0]))).toThrow(
        'Alias "a" is already registered'
      );
    });

    it("rejects nodes of another graph", () => {
      const stray = createPoint(new SceneGraph(), [0, 0, 0]);
      expect(() => scene.register("stray", stray)).toThrow(TimelineError);
    });

    it("rejects child nodes", () => {
      const parent = scene.graph.create("group");
      const child = createPoint(scene.graph, [0, 0, 0]);
      parent.attach(child);
      expect(() => scene.register("child", child)).toThrow("is not a root node");
    });

    it("throws for unknown aliases", () => {
      expect(() => scene.entity("ghost")).toThrow('Unknown entity "ghost"');
    });
  });

  describe("script", () => {
    it("starts with a noop at frame 0", () => {
      expect(scene.lastFrame()).toBe(0);
      expect(scene.instructionsAt(0)).toEqual([{ op: "noop" }]);
    });

    it("keeps insertion order within a frame", () => {
      scene.appendInstruction(3, { op: "translate", target: "a", delta: [1, 0, 0] });
      scene.appendInstruction(3, { op: "noop" });
      expect(scene.instructionsAt(3).map((i) => i.op)).toEqual(["translate", "noop"]);
      expect(scene.instructionsAt(2)).toEqual([]);
      expect(scene.lastFrame()).toBe(3);
    });

    it("rejects negative and fractional frames", () => {
      expect(() => scene.appendInstruction(-1, { op: "noop" })).toThrow(TimelineError);
      expect(() => scene.appendInstruction(1.5, { op: "noop" })).toThrow(TimelineError);
    });
  });

  describe("seek", () => {
    it("applies instructions of frames before the target", () => {
      const dot = scene.register("dot", createPoint(scene.graph, [0, 0, 0]));
      scene.appendInstruction(1, { op: "translate", target: "dot", delta: [1, 0, 0] });
      scene.appendInstruction(2, { op: "translate", target: "dot", delta: [0, 1, 0] });

      scene.seek(2);
      expect(dot.localPosition()).toEqual([1, 0, 0]);
      scene.seek(3);
      expect(dot.localPosition()).toEqual([1, 1, 0]);
      expect(scene.currentFrame).toBe(3);
    });

    it("replays from the registration state when seeking backwards", () => {
      let applied = 0;
      const count = {
        op: "custom" as const,
        label: "count()",
        apply: () => {
          applied++;
        },
      };
      scene.appendInstruction(0, count);
      scene.appendInstruction(1, count);
      scene.appendInstruction(2, count);

      scene.seek(3);
      expect(applied).toBe(3);
      scene.seek(1);
      expect(applied).toBe(4);
      scene.seek(1);
      expect(applied).toBe(4);
    });

    it("reaches the same state however it gets there", () => {
      const dot = scene.register("dot", createPoint(scene.graph, [0, 0, 0]));
      slide(scene, 1, "dot", [1, 2, 0], { profile: "sigmoid" });

      scene.seek(7);
      const direct = dot.localPosition();
      scene.seek(10);
      scene.seek(0);
      expect(dot.localPosition()).toEqual([0, 0, 0]);
      scene.seek(7);
      expect(dot.localPosition()).toEqual(direct);
    });

    it("resets and reports the failing instruction", () => {
      const dot = scene.register("dot", createPoint(scene.graph, [0, 0, 0]));
      scene.appendInstruction(2, { op: "translate", target: "dot", delta: [1, 0, 0] });
      scene.appendInstruction(5, { op: "translate", target: "ghost", delta: [1, 0, 0] });

      let caught: unknown;
      try {
        scene.frames(0, 10);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ReplayError);
      if (!(caught instanceof ReplayError)) return;
      expect(caught.frame).toBe(5);
      expect(caught.time).toBe(0.5);
      expect(caught.instruction).toBe("translate(ghost, [1,0,0])");
      expect(caught.message).toBe(
        'Instruction failed at frame 5 (t=0.500s): translate(ghost, [1,0,0]): Unknown entity "ghost"'
      );
      expect(scene.currentFrame).toBe(0);
      expect(dot.localPosition()).toEqual([0, 0, 0]);
    });
  });

  describe("capture", () => {
    it("starts every frame from the background", () => {
      const buffer = scene.capture();
      expect(buffer.width).toBe(4);
      expect(buffer.height).toBe(2);
      expect(pixelAt(buffer, 3, 1)).toEqual([10, 20, 30]);
    });

    it("renders entities in registration order", () => {
      scene.register("small", createDisk(scene.graph, 1));
      scene.register("large", createDisk(scene.graph, 2, { position: [0.1, 0, 0] }));
      scene.capture();

      expect(rasterizer.calls.map((call) => call.shape)).toEqual([
        { kind: "arc", center: [2, 1], radius: 10, startAngle: 0, endAngle: 2 * Math.PI },
        { kind: "arc", center: [3, 1], radius: 20, startAngle: 0, endAngle: 2 * Math.PI },
      ]);
    });

    it("captures every frame of the range", () => {
      scene.register("disk", createDisk(scene.graph, 1));
      scene.appendInstruction(4, { op: "noop" });

      expect(scene.frames()).toHaveLength(5);
      expect(scene.frames(2, 3)).toHaveLength(2);
      expect(rasterizer.calls).toHaveLength(7);
      expect(scene.currentFrame).toBe(3);
    });
  });
});
