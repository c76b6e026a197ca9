/**
 * Sampling of contour nodes in world coordinates.
 *
 * Leaf contours (lineContour, arcContour) own one path and its sampling
 * settings. A composite contour strings its children together and applies
 * its own jaggedness and seed to the joined samples. Faces fill the loops
 * formed by their contour children.
 */

import { Vector3 } from "three";
import type { ContourPath, ContourSamples, NodeKind, Vec2 } from "@linework/contracts";
import {
  concatSamples,
  createRng,
  jaggedSamples,
  offsetAlongNormals,
  sampleContour,
} from "../geometry";
import type { SceneNode } from "../graph/SceneNode";

export function isContourKind(kind: NodeKind): boolean {
  return kind === "contour" || kind === "lineContour" || kind === "arcContour";
}

/** Path of a leaf contour, in the node's frame. */
export function contourPath(node: SceneNode): ContourPath {
  if (node.kind === "lineContour") {
    return { kind: "line", start: node.vec2("start"), end: node.vec2("end") };
  }
  if (node.kind === "arcContour") {
    return {
      kind: "arc",
      center: node.vec2("center"),
      radius: node.number("radius"),
      startAngle: node.number("startAngle"),
      endAngle: node.number("endAngle"),
    };
  }
  throw new TypeError(`Node ${node.id} (${node.kind}) is not a leaf contour`);
}

function toWorld(node: SceneNode, samples: ContourSamples): ContourSamples {
  const { position, orientation } = node.globalTransform();
  return {
    points: samples.points.map((p): Vec2 => {
      const g = new Vector3(p[0], p[1], 0).applyMatrix3(orientation).add(position);
      return [g.x, g.y];
    }),
    normals: samples.normals.map((n): Vec2 => {
      const g = new Vector3(n[0], n[1], 0).applyMatrix3(orientation);
      return [g.x, g.y];
    }),
  };
}

/**
 * Un-jittered samples in world coordinates. Each leaf uses its own seed and
 * sample count.
 */
export function contourSamples(node: SceneNode): ContourSamples {
  if (node.kind === "contour") {
    return concatSamples(
      node.children.filter((child) => isContourKind(child.kind)).map(contourSamples)
    );
  }
  const samples = sampleContour(
    contourPath(node),
    node.number("nPoints"),
    createRng(node.number("seed"))
  );
  return toWorld(node, samples);
}

/**
 * Jagged outline of a contour node in world coordinates.
 */
export function jaggedPoints(node: SceneNode): Vec2[] {
  const jaggedness = node.number("jaggedness");
  const seed = node.number("seed");
  if (node.kind === "contour") {
    return offsetAlongNormals(contourSamples(node), jaggedness, createRng(seed));
  }
  const local = jaggedSamples(contourPath(node), jaggedness, node.number("nPoints"), seed);
  return toWorld(node, local).points;
}
