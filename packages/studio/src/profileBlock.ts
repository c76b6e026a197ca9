import type { Vec2, Vec3 } from "@linework/contracts";
import { GeometryError, createPolygon, type NodeStyle, type SceneGraph, type SceneNode } from "@linework/engine";

export interface ProfileBlockOptions {
  /** Depth of the block below y = 0, mm */
  thickness?: number;
  /** Extra width on both ends, sloping down to the bottom edge, mm */
  overhang?: number;
}

const DEFAULT_OPTIONS: Required<ProfileBlockOptions> = {
  thickness: 0.25,
  overhang: 0.01,
};

/**
 * A part whose top face follows the measured profile: two bottom corners
 * followed by the profile points, left to right.
 */
export function createProfileBlock(
  graph: SceneGraph,
  profile: readonly Vec2[],
  options: ProfileBlockOptions = {},
  style: NodeStyle = {}
): SceneNode {
  if (profile.length < 2) {
    throw new GeometryError(`Profile needs at least 2 points, got ${profile.length}`);
  }
  const { thickness, overhang } = { ...DEFAULT_OPTIONS, ...options };
  const xs = profile.map(([x]) => x);
  const right = Math.max(...xs) + overhang;
  const left = Math.min(...xs) - overhang;

  const vertices: Vec3[] = [
    [right, -thickness, 0],
    [left, -thickness, 0],
    ...profile.map(([x, y]): Vec3 => [x, y, 0]),
  ];
  return createPolygon(graph, vertices, style);
}
