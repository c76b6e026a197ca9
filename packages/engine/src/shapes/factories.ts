/**
 * Node constructors for every drawable kind.
 *
 * A parent must exist before its children, so composite shapes (contours,
 * faces) take plain path descriptions and create their child nodes
 * themselves. Groups are created empty and filled with attach().
 */

import type {
  AttributeMap,
  ContourPath,
  NodeInit,
  Vec2,
  Vec3,
} from "@linework/contracts";
import { circlePath } from "../geometry";
import type { SceneGraph } from "../graph/SceneGraph";
import type { SceneNode } from "../graph/SceneNode";
import { LEADER_ARROW_LENGTH } from "../graph/schema";

/** Display and transform options shared by every factory. */
export type NodeStyle = Omit<NodeInit, "attributes">;

export interface ContourSampling {
  /** Largest offset of a sample from the nominal contour, mm */
  jaggedness?: number;
  nPoints?: number;
  seed?: number;
}

/** One path of a composite contour, with its own sampling. */
export type ContourPart = ContourPath & ContourSampling;

/** A face boundary: a single path, or several joined into one loop. */
export type FaceBoundary = ContourPart | { parts: readonly ContourPart[]; sampling?: ContourSampling };

function samplingAttributes(sampling: ContourSampling): AttributeMap {
  const attributes: AttributeMap = {};
  if (sampling.jaggedness !== undefined) attributes.jaggedness = sampling.jaggedness;
  if (sampling.nPoints !== undefined) attributes.nPoints = sampling.nPoints;
  if (sampling.seed !== undefined) attributes.seed = sampling.seed;
  return attributes;
}

export function createGroup(graph: SceneGraph, style: NodeStyle = {}): SceneNode {
  return graph.create("group", style);
}

export function createPoint(graph: SceneGraph, position: Vec3, style: NodeStyle = {}): SceneNode {
  return graph.create("point", { ...style, position });
}

/** Infinite line through `point` along `slope`. */
export function createLine(
  graph: SceneGraph,
  point: Vec3,
  slope: Vec3,
  style: NodeStyle = {}
): SceneNode {
  return graph.create("line", { ...style, position: point, attributes: { slope } });
}

export function createSegment(
  graph: SceneGraph,
  start: Vec3,
  end: Vec3,
  style: NodeStyle = {}
): SceneNode {
  return graph.create("segment", { ...style, attributes: { start, end } });
}

export function createCircle(graph: SceneGraph, radius: number, style: NodeStyle = {}): SceneNode {
  return graph.create("circle", { ...style, attributes: { radius } });
}

export function createDisk(graph: SceneGraph, radius: number, style: NodeStyle = {}): SceneNode {
  return graph.create("disk", { ...style, attributes: { radius } });
}

export function createWedge(
  graph: SceneGraph,
  radius: number,
  startAngle: number,
  endAngle: number,
  style: NodeStyle = {}
): SceneNode {
  return graph.create("wedge", { ...style, attributes: { radius, startAngle, endAngle } });
}

export function createPolygon(
  graph: SceneGraph,
  vertices: Vec3[],
  style: NodeStyle = {}
): SceneNode {
  return graph.create("polygon", { ...style, attributes: { vertices } });
}

export function createText(
  graph: SceneGraph,
  text: string,
  scale = 1,
  style: NodeStyle = {}
): SceneNode {
  return graph.create("text", { ...style, attributes: { text, scale } });
}

export interface LeaderOptions {
  startArrow?: boolean;
  endArrow?: boolean;
  extension?: number;
}

/**
 * Leader line. Arrow heads grow with the square root of the stroke size.
 */
export function createLeader(
  graph: SceneGraph,
  vertices: Vec3[],
  options: LeaderOptions = {},
  style: NodeStyle = {}
): SceneNode {
  const size = style.size ?? 1;
  return graph.create("leader", {
    ...style,
    attributes: {
      vertices,
      startArrow: options.startArrow ?? false,
      endArrow: options.endArrow ?? false,
      extension: options.extension ?? 0,
      arrowLength: Math.sqrt(size) * LEADER_ARROW_LENGTH,
    },
  });
}

export function createLineContour(
  graph: SceneGraph,
  start: Vec2,
  end: Vec2,
  sampling: ContourSampling = {},
  style: NodeStyle = {}
): SceneNode {
  return graph.create("lineContour", {
    ...style,
    attributes: { start, end, ...samplingAttributes(sampling) },
  });
}

export function createArcContour(
  graph: SceneGraph,
  center: Vec2,
  radius: number,
  startAngle: number,
  endAngle: number,
  sampling: ContourSampling = {},
  style: NodeStyle = {}
): SceneNode {
  return graph.create("arcContour", {
    ...style,
    attributes: { center, radius, startAngle, endAngle, ...samplingAttributes(sampling) },
  });
}

export function createCircleContour(
  graph: SceneGraph,
  center: Vec2,
  radius: number,
  sampling: ContourSampling = {},
  style: NodeStyle = {}
): SceneNode {
  const path = circlePath(center, radius);
  return createArcContour(graph, center, radius, path.startAngle, path.endAngle, sampling, style);
}

function createContourPart(graph: SceneGraph, part: ContourPart, style: NodeStyle): SceneNode {
  if (part.kind === "line") {
    return createLineContour(graph, part.start, part.end, part, style);
  }
  return createArcContour(
    graph,
    part.center,
    part.radius,
    part.startAngle,
    part.endAngle,
    part,
    style
  );
}

/**
 * Composite contour: the parts are sampled with their own settings, joined
 * in order, and jittered with the composite's jaggedness and seed.
 */
export function createContour(
  graph: SceneGraph,
  parts: readonly ContourPart[],
  sampling: ContourSampling = {},
  style: NodeStyle = {}
): SceneNode {
  const contour = graph.create("contour", { ...style, attributes: samplingAttributes(sampling) });
  const partStyle: NodeStyle = { color: style.color, size: style.size };
  contour.attach(parts.map((part) => createContourPart(graph, part, partStyle)));
  return contour;
}

/**
 * Filled face bounded by one or more contours. Inner boundaries cut holes.
 */
export function createFace(
  graph: SceneGraph,
  boundaries: readonly FaceBoundary[],
  style: NodeStyle = {}
): SceneNode {
  const face = graph.create("face", style);
  const boundaryStyle: NodeStyle = { color: style.color, size: style.size };
  face.attach(
    boundaries.map((boundary) =>
      "parts" in boundary
        ? createContour(graph, boundary.parts, boundary.sampling, boundaryStyle)
        : createContourPart(graph, boundary, boundaryStyle)
    )
  );
  return face;
}
