import { rotationZ, type ColorRGB, type Vec3 } from "@linework/contracts";
import type { SceneGraph } from "../../graph/SceneGraph";
import type { SceneNode } from "../../graph/SceneNode";
import type { NodeStyle } from "../factories";
import { DialIndicator } from "./DialIndicator";
import proportions from "./dialProportions.json";

// Every length below is a ratio of the dial diameter unless noted.
const P = proportions;

function tuple(values: readonly number[]): Vec3 {
  return [values[0] ?? 0, values[1] ?? 0, values[2] ?? 0];
}

function scaled(values: readonly number[], factor: number): Vec3 {
  const [x, y, z] = tuple(values);
  return [x * factor, y * factor, z * factor];
}

function mirrorX(v: Vec3): Vec3 {
  return [-v[0], v[1], v[2]];
}

const COLORS = {
  needle: tuple(P.colors.needle),
  face: tuple(P.colors.face),
  rim: tuple(P.colors.rim),
  wedge: tuple(P.colors.wedge),
  line: tuple(P.colors.line),
  plunger: tuple(P.colors.plunger),
  tip: tuple(P.colors.tip),
} satisfies Record<string, ColorRGB>;

export interface DialOptions {
  diameter: number;
  /** Plunger depression, mm */
  deflection?: number;
  highlightShow?: boolean;
  plungerShow?: boolean;
  /** Plunger travel (mm) for one full revolution of the needle */
  readoutScale?: number;
}

function createNeedle(graph: SceneGraph, d: number): SceneNode {
  const needle = graph.create("group", { color: COLORS.needle });
  const halfWidth = (d * P.needle.width) / 2;
  needle.attach(
    graph.create("disk", {
      color: COLORS.needle,
      attributes: { radius: (d * P.needle.capDiameter) / 2 },
    }),
    graph.create("polygon", {
      color: COLORS.needle,
      attributes: {
        vertices: [
          [0, d * P.needle.length, 0],
          [halfWidth, 0, 0],
          [-halfWidth, 0, 0],
        ],
      },
    })
  );
  return needle;
}

function createPlunger(graph: SceneGraph, d: number): SceneNode {
  const pl = P.plunger;
  const body = pl.diameter / 2;
  const top = pl.topDiameter / 2;
  const topChamfer = pl.topChamferDiameter / 2;
  const mount = pl.tipMountDiameter / 2;
  const tip = pl.tipChamferDiameter / 2;
  const shoulder = P.rim.columnHigh;

  const outline = (points: Array<[number, number]>): Vec3[] =>
    points.map(([x, y]) => [x * d, y * d, 0]);

  const plunger = graph.create("group");
  plunger.attach(
    graph.create("polygon", {
      color: COLORS.plunger,
      attributes: {
        vertices: outline([
          [-body, -pl.body],
          [-body, shoulder],
          [-top, shoulder],
          [-top, pl.topChamfer],
          [-topChamfer, pl.top],
          [topChamfer, pl.top],
          [top, pl.topChamfer],
          [top, shoulder],
          [body, shoulder],
          [body, -pl.body],
        ]),
      },
    }),
    graph.create("polygon", {
      color: COLORS.tip,
      attributes: {
        vertices: outline([
          [-tip, -pl.tip],
          [-mount, -pl.tipChamfer],
          [-mount, -pl.body],
          [mount, -pl.body],
          [mount, -pl.tipChamfer],
          [tip, -pl.tip],
        ]),
      },
    })
  );
  return plunger;
}

function createLegend(graph: SceneGraph, d: number): SceneNode {
  const lg = P.legend;
  const arrow = lg.arrowScale * d;
  const style = { color: COLORS.rim };
  const segment = (start: Vec3, end: Vec3) =>
    graph.create("segment", { ...style, attributes: { start, end } });

  const leaderStart = scaled(lg.leaderStart, arrow);
  const leaderEnd = scaled(lg.leaderEnd, arrow);
  const barStart = scaled(lg.barStart, arrow);
  const barEnd = scaled(lg.barEnd, arrow);
  const triangle = lg.arrow.map((p) => scaled(p, arrow));

  const legend = graph.create("group", { position: scaled(lg.offset, d) });
  legend.attach(
    segment(leaderStart, leaderEnd),
    segment(barStart, barEnd),
    segment(mirrorX(leaderStart), mirrorX(leaderEnd)),
    segment(mirrorX(barStart), mirrorX(barEnd)),
    graph.create("polygon", { ...style, attributes: { vertices: triangle } }),
    graph.create("polygon", { ...style, attributes: { vertices: triangle.map(mirrorX) } }),
    graph.create("text", {
      ...style,
      position: scaled(lg.textOffset, arrow),
      attributes: { text: lg.label, scale: lg.textScale * d },
    })
  );
  return legend;
}

/**
 * Builds a dial indicator: plunger, dial body and needle, in that draw
 * order. The returned node is the dial root; drive it through
 * DialIndicator.from().
 */
export function createDialIndicator(
  graph: SceneGraph,
  options: DialOptions,
  style: NodeStyle = {}
): SceneNode {
  const d = options.diameter;
  const faceRadius = (P.rim.faceDiameter * d) / 2;
  const root = graph.create("dial", {
    ...style,
    attributes: { diameter: d, readoutScale: options.readoutScale ?? 1 },
  });

  const plunger = createPlunger(graph, d);
  const body = graph.create("group");
  root.attach(plunger, body);

  // Rim and holder
  const r = P.rim;
  const column: Array<[number, number]> = [
    [-r.columnWidth / 2, r.columnHighChamfer],
    [-r.columnChamferWidth / 2, r.columnHigh],
    [r.columnChamferWidth / 2, r.columnHigh],
    [r.columnWidth / 2, r.columnHighChamfer],
    [r.columnWidth / 2, -r.columnLowChamfer],
    [r.columnChamferWidth / 2, -r.columnLow],
    [-r.columnChamferWidth / 2, -r.columnLow],
    [-r.columnWidth / 2, -r.columnLowChamfer],
  ];
  body.attach(
    graph.create("disk", { size: 5, color: COLORS.rim, attributes: { radius: d / 2 } }),
    graph.create("polygon", {
      color: COLORS.rim,
      attributes: { vertices: column.map(([x, y]): Vec3 => [x * d, y * d, 0]) },
    }),
    graph.create("disk", {
      color: COLORS.rim,
      position: [0, -d * r.holderOffset, 0],
      attributes: { radius: (d * r.holderWidth) / 2 },
    }),
    graph.create("disk", { color: COLORS.face, attributes: { radius: faceRadius } })
  );

  // Ticks run from their start radius to the middle of the rim
  const t = P.ticks;
  const tickEnd = (d * (1 + r.faceDiameter)) / 4;
  for (let i = 0; i < t.count; i++) {
    const start = i % 10 === 0 ? t.major : i % 5 === 0 ? t.medium : t.minor;
    body.attach(
      graph.create("segment", {
        size: 1,
        color: COLORS.rim,
        orientation: rotationZ((i / t.count) * 2 * Math.PI),
        attributes: { start: [0, (d * start) / 2, 0], end: [0, tickEnd, 0] },
      })
    );
  }

  const n = P.numerals;
  for (let i = 0; i < t.count; i += 10) {
    const angle = (-2 * Math.PI * i) / t.count + Math.PI / 2;
    // Single digit "0" is nudged right to sit centred
    const x =
      n.shift[0] * d + n.radius * d * Math.cos(angle) + (i === 0 ? n.zeroShift * d : 0);
    const y = n.shift[1] * d + n.radius * d * Math.sin(angle);
    body.attach(
      graph.create("text", {
        size: 1,
        color: COLORS.rim,
        position: [x, y, 0],
        attributes: { text: String(i), scale: n.scale * d },
      })
    );
  }

  const wedge = graph.create("wedge", {
    color: COLORS.wedge,
    opacity: P.opacity.wedge,
    attributes: { radius: faceRadius, startAngle: Math.PI / 2, endAngle: Math.PI / 2 },
  });
  const sweepLine = () =>
    graph.create("segment", {
      size: 2,
      color: COLORS.line,
      opacity: P.opacity.line,
      attributes: { start: [0, 0, 0], end: [0, faceRadius, 0] },
    });
  const minLine = sweepLine();
  const maxLine = sweepLine();
  body.attach(wedge, minLine, maxLine, createLegend(graph, d));

  const needle = createNeedle(graph, d);
  root.attach(needle);

  root
    .set("needleId", needle.id)
    .set("plungerId", plunger.id)
    .set("wedgeId", wedge.id)
    .set("minLineId", minLine.id)
    .set("maxLineId", maxLine.id);

  const dial = DialIndicator.from(root);
  dial.setDeflection(options.deflection ?? 0);
  dial.resetHighlight();
  dial.displayHighlight(options.highlightShow ?? false);
  dial.updatePlunger();
  dial.displayPlunger(options.plungerShow ?? true);
  return root;
}
