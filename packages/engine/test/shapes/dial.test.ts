import { describe, it, expect, beforeEach } from "vitest";
import { CompositionError } from "../../src/errors";
import { SceneGraph } from "../../src/graph/SceneGraph";
import type { SceneNode } from "../../src/graph/SceneNode";
import { createDialIndicator } from "../../src/shapes/dial/createDialIndicator";
import { DialIndicator, trackInstruction } from "../../src/shapes/dial/DialIndicator";
import { createPolygon } from "../../src/shapes/factories";
import { Scene } from "../../src/timeline/Scene";
import { formatInstruction } from "../../src/timeline/instructions";
import { createFakeRasterizer } from "../_harness/fakeRasterizer";

describe("DialIndicator", () => {
  let graph: SceneGraph;
  let root: SceneNode;
  let dial: DialIndicator;

  const part = (name: string) => graph.node(root.number(name));

  beforeEach(() => {
    graph = new SceneGraph();
    root = createDialIndicator(graph, { diameter: 1 });
    dial = DialIndicator.from(root);
  });

  describe("construction", () => {
    it("builds plunger, body and needle in draw order", () => {
      expect(root.kind).toBe("dial");
      expect(root.children).toHaveLength(3);
      expect(root.children[0].id).toBe(root.number("plungerId"));
      expect(root.children[2].id).toBe(root.number("needleId"));
    });

    it("puts rim, ticks, numerals, highlight and legend on the body", () => {
      const body = root.children[1];
      // 4 rim parts, 100 ticks, 10 numerals, wedge, 2 sweep lines, legend
      expect(body.children).toHaveLength(118);
      expect(body.children.filter((child) => child.kind === "text").map((t) => t.string("text"))).toEqual(
        ["0", "10", "20", "30", "40", "50", "60", "70", "80", "90"]
      );
    });

    it("starts at zero with the highlight hidden and the plunger shown", () => {
      expect(dial.deflection).toBe(0);
      expect(dial.readout).toBe(0);
      expect(part("wedgeId").boolean("visible")).toBe(false);
      expect(part("minLineId").boolean("visible")).toBe(false);
      expect(part("plungerId").boolean("visible")).toBe(true);
    });

    it("applies the initial options", () => {
      const other = DialIndicator.from(
        createDialIndicator(graph, {
          diameter: 2,
          deflection: 0.5,
          readoutScale: 2,
          highlightShow: true,
          plungerShow: false,
        })
      );
      expect(other.readout).toBe(25);
      expect(other.node.number("minSwept")).toBe(25);
      expect(other.node.number("maxSwept")).toBe(25);
      expect(graph.node(other.node.number("wedgeId")).boolean("visible")).toBe(true);
      expect(graph.node(other.node.number("plungerId")).boolean("visible")).toBe(false);
    });
  });

  it("rejects nodes that are not dials", () => {
    expect(() => DialIndicator.from(graph.create("group"))).toThrow(CompositionError);
  });

  describe("deflection", () => {
    it("moves the plunger and turns the readout", () => {
      dial.setDeflection(0.25);

      expect(dial.deflection).toBe(0.25);
      expect(dial.readout).toBe(25);
      expect(part("plungerId").vec3("position")).toEqual([0, 0.25, 0]);
      const needle = part("needleId").mat3("orientation");
      // Quarter turn clockwise
      expect(needle[0]).toBeCloseTo(0, 12);
      expect(needle[1]).toBeCloseTo(1, 12);
      expect(needle[3]).toBeCloseTo(-1, 12);
    });

    it("wraps negative deflection onto the dial", () => {
      dial.setDeflection(-0.1);
      expect(dial.readout).toBeCloseTo(90, 10);
    });

    it("wraps deflection past a full revolution", () => {
      dial.setDeflection(1.5);
      expect(dial.readout).toBeCloseTo(50, 10);
    });
  });

  describe("swept range", () => {
    it("widens the minimum on clockwise travel", () => {
      dial.setDeflection(0.25);

      expect(root.number("minSwept")).toBe(25);
      expect(root.number("maxSwept")).toBe(0);
      expect(part("wedgeId").number("startAngle")).toBeCloseTo(0, 12);
      expect(part("wedgeId").number("endAngle")).toBe(Math.PI / 2);
    });

    it("widens the maximum on counter-clockwise travel", () => {
      dial.setDeflection(-0.1);

      expect(root.number("minSwept")).toBe(0);
      expect(root.number("maxSwept")).toBeCloseTo(90, 10);
    });

    it("keeps the range while the readout stays inside it", () => {
      dial.setDeflection(0.25);
      dial.setDeflection(0.1);

      expect(dial.checkMinMax()).toBe(0);
      expect(root.number("minSwept")).toBe(25);
      expect(root.number("maxSwept")).toBe(0);
    });

    it("collapses the range onto the readout on reset", () => {
      dial.setDeflection(0.25);
      dial.setDeflection(0.1);
      dial.resetHighlight();

      expect(root.number("minSwept")).toBeCloseTo(10, 10);
      expect(root.number("maxSwept")).toBeCloseTo(10, 10);
    });

    it("toggles the highlight parts together", () => {
      dial.displayHighlight(true);
      expect(root.boolean("highlightShow")).toBe(true);
      expect(["wedgeId", "minLineId", "maxLineId"].map((name) => part(name).boolean("visible"))).toEqual([
        true,
        true,
        true,
      ]);
    });
  });

  it("hides the plunger", () => {
    dial.displayPlunger(false);
    expect(root.boolean("plungerShow")).toBe(false);
    expect(part("plungerId").boolean("visible")).toBe(false);
  });

  describe("track", () => {
    // Top edge sits 1.5 below the dial centre
    const block = () =>
      createPolygon(
        graph,
        [
          [-1, -0.5, 0],
          [1, -0.5, 0],
          [1, -2, 0],
          [-1, -2, 0],
        ],
        { position: [0, -1, 0] }
      );

    it("depresses the plunger by the overlap with the polygon", () => {
      dial.track(block());
      expect(dial.deflection).toBeCloseTo(0.11, 10);
      expect(dial.readout).toBeCloseTo(11, 8);
    });

    it("leaves the plunger free when the polygon is out of reach", () => {
      dial.setDeflection(0.3);
      const far = createPolygon(
        graph,
        [
          [5, 0, 0],
          [6, 0, 0],
          [6, 1, 0],
        ]
      );
      dial.track(far);
      expect(dial.deflection).toBe(0);
    });
  });
});

describe("trackInstruction", () => {
  it("tracks registered entities on replay and resets with the scene", () => {
    const scene = new Scene(createFakeRasterizer(), { width: 64, height: 48 });
    const dialNode = createDialIndicator(scene.graph, { diameter: 1 });
    const part = createPolygon(
      scene.graph,
      [
        [-1, -1.5, 0],
        [1, -1.5, 0],
        [0, -3, 0],
      ]
    );
    scene.registerAll({ dial: dialNode, part });

    const instruction = trackInstruction("dial", "part");
    scene.appendInstruction(1, instruction);
    expect(formatInstruction(instruction)).toBe("track(dial, part)");

    scene.seek(2);
    expect(DialIndicator.from(dialNode).deflection).toBeCloseTo(0.11, 10);

    scene.seek(0);
    expect(DialIndicator.from(dialNode).deflection).toBe(0);
  });
});
