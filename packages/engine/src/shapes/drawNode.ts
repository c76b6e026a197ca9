import { Vector3 } from "three";
import type { PixelPoint, RasterShape, RasterStyle, Vec2, Vec3 } from "@linework/contracts";
import { toPixel, type RenderTarget } from "../compositing/frameBuffer";
import { planarAngle, toVector3 } from "../graph/math";
import type { SceneNode } from "../graph/SceneNode";
import { contourPath, isContourKind, jaggedPoints } from "./contourNodes";
import {
  endArrowVertices,
  fractionalVertices,
  startArrowVertices,
  type LeaderGeometry,
} from "./leader";

const FULL_TURN = 2 * Math.PI;

/** Leaders with nothing extended are skipped entirely. */
export function skipsRender(node: SceneNode): boolean {
  return node.kind === "leader" && node.number("extension") <= 0;
}

export function leaderGeometry(node: SceneNode): LeaderGeometry {
  return {
    vertices: node.vec3List("vertices"),
    startArrow: node.boolean("startArrow"),
    endArrow: node.boolean("endArrow"),
    extension: node.number("extension"),
    arrowLength: node.number("arrowLength"),
    taper: node.number("taper"),
  };
}

/**
 * Draws a node's own shape, then renders its children in order. Contours
 * and faces consume their children as geometry instead.
 */
export function drawNode(node: SceneNode, target: RenderTarget): void {
  drawShape(node, target);
  if (node.kind === "contour" || node.kind === "face") return;
  for (const child of node.children) {
    child.render(target.buffer, target.scale, target.origin, target.rasterizer);
  }
}

function drawShape(node: SceneNode, target: RenderTarget): void {
  const { scale, origin } = target;
  const local = (p: Readonly<Vec3>): PixelPoint => node.toPixel(p, scale, origin);
  const world = (p: Readonly<Vec2>): PixelPoint => toPixel([p[0], p[1], 0], scale, origin);
  const draw = (shape: RasterShape, mode: RasterStyle["mode"]) =>
    target.rasterizer.draw(target.buffer, shape, {
      color: node.vec3("color"),
      thickness: node.number("size"),
      mode,
    });

  switch (node.kind) {
    case "group":
    case "dial":
      return;

    case "point":
      draw({ kind: "point", at: local([0, 0, 0]), radius: node.number("size") }, "fill");
      return;

    case "line": {
      const { position, orientation } = node.globalTransform();
      const dir = toVector3(node.vec3("slope")).applyMatrix3(orientation).normalize();
      // Far enough past the frame edges in both directions
      const reach =
        (target.buffer.width + target.buffer.height) / scale + Math.hypot(position.x, position.y);
      const a = position.clone().addScaledVector(dir, reach);
      const b = position.clone().addScaledVector(dir, -reach);
      draw(
        {
          kind: "segment",
          from: toPixel([a.x, a.y, a.z], scale, origin),
          to: toPixel([b.x, b.y, b.z], scale, origin),
        },
        "stroke"
      );
      return;
    }

    case "segment":
      draw({ kind: "segment", from: local(node.vec3("start")), to: local(node.vec3("end")) }, "stroke");
      return;

    case "circle":
    case "disk":
      draw(
        {
          kind: "arc",
          center: local([0, 0, 0]),
          radius: node.number("radius") * scale,
          startAngle: 0,
          endAngle: FULL_TURN,
        },
        node.kind === "disk" ? "fill" : "stroke"
      );
      return;

    case "wedge": {
      const turn = planarAngle(node.globalTransform().orientation);
      const a = node.number("startAngle") + turn;
      const b = node.number("endAngle") + turn;
      draw(
        {
          kind: "arc",
          center: local([0, 0, 0]),
          radius: node.number("radius") * scale,
          startAngle: Math.min(a, b),
          endAngle: Math.max(a, b),
        },
        "fill"
      );
      return;
    }

    case "polygon": {
      const vertices = node.vec3List("vertices");
      if (vertices.length < 3) return;
      draw({ kind: "polygon", loops: [vertices.map(local)] }, "fill");
      return;
    }

    case "text":
      draw(
        {
          kind: "text",
          at: local([0, 0, 0]),
          text: node.string("text"),
          scale: node.number("scale") * scale,
        },
        "fill"
      );
      return;

    case "leader": {
      const geometry = leaderGeometry(node);
      const line = fractionalVertices(geometry);
      if (line.length >= 2) {
        draw({ kind: "polyline", points: line.map(local), closed: false }, "stroke");
      }
      if (geometry.startArrow) {
        const arrow = startArrowVertices(geometry);
        if (arrow.length > 0) draw({ kind: "polygon", loops: [arrow.map(local)] }, "fill");
      }
      if (geometry.endArrow) {
        const arrow = endArrowVertices(geometry);
        if (arrow.length > 0) draw({ kind: "polygon", loops: [arrow.map(local)] }, "fill");
      }
      return;
    }

    case "lineContour":
    case "arcContour": {
      if (node.number("jaggedness") > 0) {
        draw({ kind: "polyline", points: jaggedPoints(node).map(world), closed: false }, "stroke");
        return;
      }
      const path = contourPath(node);
      if (path.kind === "line") {
        draw(
          {
            kind: "segment",
            from: local([path.start[0], path.start[1], 0]),
            to: local([path.end[0], path.end[1], 0]),
          },
          "stroke"
        );
        return;
      }
      const turn = planarAngle(node.globalTransform().orientation);
      draw(
        {
          kind: "arc",
          center: local([path.center[0], path.center[1], 0]),
          radius: path.radius * scale,
          startAngle: Math.min(path.startAngle, path.endAngle) + turn,
          endAngle: Math.max(path.startAngle, path.endAngle) + turn,
        },
        "stroke"
      );
      return;
    }

    case "contour": {
      const points = jaggedPoints(node);
      if (points.length < 2) return;
      draw({ kind: "polyline", points: points.map(world), closed: true }, "stroke");
      return;
    }

    case "face": {
      const loops = node.children
        .filter((child) => isContourKind(child.kind))
        .map((child) => jaggedPoints(child).map(world))
        .filter((loop) => loop.length >= 3);
      if (loops.length === 0) return;
      draw({ kind: "polygon", loops }, "fill");
      return;
    }
  }
}

/** World-space direction of the node's local axis. */
export function globalAxis(node: SceneNode, axis: Readonly<Vec3>): Vector3 {
  return toVector3(axis).applyMatrix3(node.globalTransform().orientation);
}
