import type { Mat3, Vec3 } from "../core/vectors";
import type { ColorRGB } from "../style/colors";
import type { AttributeMap } from "./attributes";

/** Index of a node in its scene graph arena. */
export type NodeId = number;

/** Alias under which a root-level node is registered on a scene. */
export type EntityAlias = string;

export type NodeKind =
  | "group"
  | "point"
  | "line"
  | "segment"
  | "circle"
  | "disk"
  | "wedge"
  | "polygon"
  | "text"
  | "leader"
  | "contour"
  | "lineContour"
  | "arcContour"
  | "face"
  | "dial";

/**
 * Transform and display attributes shared by every node kind.
 */
export interface NodeStyle {
  /** 0 = transparent, 1 = opaque. Local, not pre-multiplied. */
  opacity?: number;
  color?: ColorRGB;
  /** Stroke thickness or point radius in pixels */
  size?: number;
  visible?: boolean;
}

export interface NodeInit extends NodeStyle {
  /** Origin in the parent frame */
  position?: Vec3;
  /** Local axes (columns) in the parent frame */
  orientation?: Mat3;
  /** Kind-specific attributes; unknown names are rejected */
  attributes?: AttributeMap;
}
