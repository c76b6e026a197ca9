/**
 * Rasterization contracts.
 *
 * The engine resolves every shape to pixel space and hands it to a
 * rasterizer together with a style. It never sets pixels itself, apart from
 * clearing and blending whole frame buffers.
 */

import type { Vec2 } from "../core/vectors";
import type { ColorRGB } from "../style/colors";

/** Pixel coordinates, +y pointing down. */
export type PixelPoint = Vec2;

/**
 * RGBA pixel buffer, row-major, 4 bytes per pixel.
 * Shape-compatible with ImageData.
 */
export interface FrameBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export type RasterShape =
  | { kind: "point"; at: PixelPoint; radius: number }
  | { kind: "segment"; from: PixelPoint; to: PixelPoint }
  | { kind: "polyline"; points: PixelPoint[]; closed: boolean }
  /** One or more closed loops; with "fill", inner loops cut holes (even-odd) */
  | { kind: "polygon"; loops: PixelPoint[][] }
  /**
   * Circular arc. Angles in radians, measured counter-clockwise on screen
   * from +x (the engine has already applied the y flip). With "fill" this is
   * a sector; a full turn is a disk.
   */
  | { kind: "arc"; center: PixelPoint; radius: number; startAngle: number; endAngle: number }
  | { kind: "text"; at: PixelPoint; text: string; scale: number };

export type RasterShapeKind = RasterShape["kind"];

export interface RasterStyle {
  color: ColorRGB;
  /** Stroke width in pixels; ignored for fills */
  thickness: number;
  mode: "fill" | "stroke";
}

/**
 * Rasterization backend. Draws a single resolved shape into a buffer.
 */
export interface IRasterizer {
  readonly id: string;
  draw(buffer: FrameBuffer, shape: RasterShape, style: RasterStyle): void;
}
