/**
 * Attribute schema per node kind.
 *
 * Every kind declares its attributes with a default; the default also fixes
 * the value shape accepted on write. Names outside the schema go to a small
 * per-node extension map.
 */

import type { AttributeMap, NodeKind } from "@linework/contracts";

/** Transform and display fields readable and writable by name. */
export const CORE_ATTRIBUTES = [
  "position",
  "orientation",
  "opacity",
  "color",
  "size",
  "visible",
] as const;

export type CoreAttribute = (typeof CORE_ATTRIBUTES)[number];

export function isCoreAttribute(name: string): name is CoreAttribute {
  return CORE_ATTRIBUTES.some((core) => core === name);
}

export const MAX_EXTENSIONS = 16;

/** Default arrow head taper of a leader (half angle, radians). */
export const LEADER_ARROW_TAPER = 0.25;
/** Arrow head length of a leader with size 1, mm. Scales with sqrt(size). */
export const LEADER_ARROW_LENGTH = 0.09;

const contourSampling = (): AttributeMap => ({
  jaggedness: 0,
  nPoints: 30,
  seed: 0,
});

/**
 * Fresh default attributes for a kind.
 */
export function kindDefaults(kind: NodeKind): AttributeMap {
  switch (kind) {
    case "group":
    case "point":
    case "face":
      return {};
    case "line":
      return { slope: [1, 0, 0] };
    case "segment":
      return { start: [0, 0, 0], end: [0, 0, 0] };
    case "circle":
    case "disk":
      return { radius: 1 };
    case "wedge":
      return { radius: 1, startAngle: 0, endAngle: 0 };
    case "polygon":
      return { vertices: [] };
    case "text":
      return { text: "", scale: 1 };
    case "leader":
      return {
        vertices: [],
        startArrow: false,
        endArrow: false,
        extension: 0,
        arrowLength: LEADER_ARROW_LENGTH,
        taper: LEADER_ARROW_TAPER,
      };
    case "contour":
      return contourSampling();
    case "lineContour":
      return { start: [0, 0], end: [1, 0], ...contourSampling() };
    case "arcContour":
      return {
        center: [0, 0],
        radius: 1,
        startAngle: 0,
        endAngle: 2 * Math.PI,
        ...contourSampling(),
      };
    case "dial":
      return {
        diameter: 1,
        deflection: 0,
        readout: 0,
        readoutScale: 1,
        minSwept: 0,
        maxSwept: 0,
        highlightShow: false,
        plungerShow: true,
        // Ids of the moving parts, filled in by createDialIndicator
        needleId: -1,
        plungerId: -1,
        wedgeId: -1,
        minLineId: -1,
        maxLineId: -1,
      };
  }
}
