import { describe, it, expect, beforeEach } from "vitest";
import { rotationZ } from "@linework/contracts";
import { AttributeError, CompositionError } from "../../src/errors";
import { SceneGraph } from "../../src/graph/SceneGraph";

describe("SceneGraph", () => {
  let graph: SceneGraph;

  beforeEach(() => {
    graph = new SceneGraph();
  });

  describe("create", () => {
    it("assigns increasing ids and kind defaults", () => {
      const a = graph.create("group");
      const b = graph.create("circle");
      expect(a.id).toBe(0);
      expect(b.id).toBe(1);
      expect(graph.size).toBe(2);
      expect(b.number("radius")).toBe(1);
      expect(b.number("opacity")).toBe(1);
      expect(b.boolean("visible")).toBe(true);
    });

    it("rejects attributes the kind does not declare", () => {
      expect(() => graph.create("circle", { attributes: { slope: [1, 0, 0] } })).toThrow(
        AttributeError
      );
    });

    it("rejects attribute values of the wrong shape", () => {
      expect(() => graph.create("circle", { attributes: { radius: "big" } })).toThrow(
        AttributeError
      );
    });
  });

  describe("attach", () => {
    it("appends children in order and flattens nested arrays", () => {
      const parent = graph.create("group");
      const a = graph.create("point");
      const b = graph.create("point");
      const c = graph.create("point");

      parent.attach(a, [b, [c]]);

      expect(parent.children.map((n) => n.id)).toEqual([a.id, b.id, c.id]);
      expect(c.parent?.id).toBe(parent.id);
    });

    it("rejects a non-node without changing anything", () => {
      const parent = graph.create("group");
      const a = graph.create("point");

      expect(() => graph.attach(parent.id, [a, "not a node"])).toThrow(CompositionError);
      expect(parent.children).toEqual([]);
      expect(a.parent).toBeNull();
    });

    it("rejects a node that already has a parent", () => {
      const first = graph.create("group");
      const second = graph.create("group");
      const child = graph.create("point");
      first.attach(child);

      expect(() => second.attach(child)).toThrow(CompositionError);
      expect(second.children).toEqual([]);
    });

    it("rejects the same node twice in one call", () => {
      const parent = graph.create("group");
      const child = graph.create("point");
      expect(() => parent.attach(child, child)).toThrow(CompositionError);
      expect(parent.children).toEqual([]);
    });

    it("rejects a node created before its parent", () => {
      const early = graph.create("point");
      const parent = graph.create("group");
      expect(() => parent.attach(early)).toThrow(/created after their parent/);
    });

    it("rejects attaching a node to itself", () => {
      const node = graph.create("group");
      expect(() => node.attach(node)).toThrow(CompositionError);
    });

    it("rejects nodes of another graph", () => {
      const parent = graph.create("group");
      const foreign = new SceneGraph().create("point");
      expect(() => parent.attach(foreign)).toThrow(/another scene graph/);
    });
  });

  describe("globalTransform", () => {
    it("accumulates positions down the chain", () => {
      const a = graph.create("group", { position: [1, 0, 0] });
      const b = graph.create("group", { position: [1, 0, 0] });
      const c = graph.create("point", { position: [1, 0, 0] });
      a.attach(b);
      b.attach(c);

      expect(c.globalPosition()).toEqual([3, 0, 0]);
    });

    it("treats a root's local transform as global", () => {
      const root = graph.create("group", { position: [2, 3, 0], orientation: rotationZ(0.5) });
      expect(root.globalPosition()).toEqual([2, 3, 0]);
      expect(root.globalOrientation()).toEqual(root.localOrientation());
    });

    it("carries a rotated root's orientation into its descendants", () => {
      const root = graph.create("group", { position: [1, 0, 0], orientation: rotationZ(Math.PI / 2) });
      const arm = graph.create("group", { position: [1, 0, 0], orientation: rotationZ(Math.PI / 2) });
      const tip = graph.create("point", { position: [1, 0, 0] });
      root.attach(arm);
      arm.attach(tip);

      const [ax, ay] = arm.globalPosition();
      expect(ax).toBeCloseTo(1, 12);
      expect(ay).toBeCloseTo(1, 12);
      const expected = rotationZ(Math.PI);
      arm.globalOrientation().forEach((value, i) => {
        expect(value).toBeCloseTo(expected[i], 12);
      });
      const [tx, ty] = tip.globalPosition();
      expect(tx).toBeCloseTo(0, 12);
      expect(ty).toBeCloseTo(1, 12);
    });

    it("rotates child positions with the parent orientation", () => {
      const parent = graph.create("group", { position: [1, 1, 0], orientation: rotationZ(Math.PI / 2) });
      const child = graph.create("point", { position: [2, 0, 0] });
      parent.attach(child);

      const [x, y, z] = child.globalPosition();
      expect(x).toBeCloseTo(1, 12);
      expect(y).toBeCloseTo(3, 12);
      expect(z).toBe(0);
    });

    it("composes orientations", () => {
      const parent = graph.create("group", { orientation: rotationZ(0.25) });
      const child = graph.create("group", { orientation: rotationZ(0.5) });
      parent.attach(child);

      const expected = rotationZ(0.75);
      child.globalOrientation().forEach((value, i) => {
        expect(value).toBeCloseTo(expected[i], 12);
      });
    });
  });

  describe("snapshot and restore", () => {
    it("restores a subtree in place", () => {
      const root = graph.create("group");
      const child = graph.create("circle", { attributes: { radius: 2 } });
      root.attach(child);
      const snapshot = graph.snapshot(root.id);

      root.move({ position: [5, 5, 0] });
      child.set("radius", 9).set("opacity", 0.5);
      graph.restore(snapshot);

      expect(root.localPosition()).toEqual([0, 0, 0]);
      expect(child.number("radius")).toBe(2);
      expect(child.number("opacity")).toBe(1);
    });

    it("can restore the same snapshot repeatedly", () => {
      const root = graph.create("group");
      const snapshot = graph.snapshot(root.id);

      root.move({ deltaPosition: [1, 0, 0] });
      graph.restore(snapshot);
      root.move({ deltaPosition: [1, 0, 0] });
      graph.restore(snapshot);

      expect(root.localPosition()).toEqual([0, 0, 0]);
    });

    it("lists subtrees parents first", () => {
      const root = graph.create("group");
      const a = graph.create("group");
      const b = graph.create("point");
      const c = graph.create("point");
      root.attach(a, c);
      a.attach(b);
      expect(graph.subtree(root.id)).toEqual([root.id, a.id, b.id, c.id]);
    });
  });

  it("rejects unknown ids", () => {
    expect(() => graph.node(7)).toThrow(CompositionError);
  });
});
