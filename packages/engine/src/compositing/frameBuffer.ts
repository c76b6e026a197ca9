import type {
  ColorRGB,
  FrameBuffer,
  IRasterizer,
  PixelPoint,
  Vec3,
} from "@linework/contracts";

/**
 * Everything a node needs to draw itself.
 */
export interface RenderTarget {
  buffer: FrameBuffer;
  /** Pixels per mm */
  scale: number;
  /** Pixel position of the world origin */
  origin: PixelPoint;
  rasterizer: IRasterizer;
}

/**
 * Opaque buffer filled with `background`.
 */
export function createFrameBuffer(
  width: number,
  height: number,
  background: Readonly<ColorRGB>
): FrameBuffer {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Invalid frame size ${width}x${height}`);
  }
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = background[0];
    data[i + 1] = background[1];
    data[i + 2] = background[2];
    data[i + 3] = 255;
  }
  return { width, height, data };
}

export function cloneFrameBuffer(buffer: FrameBuffer): FrameBuffer {
  return {
    width: buffer.width,
    height: buffer.height,
    data: new Uint8ClampedArray(buffer.data),
  };
}

/**
 * base = base * (1 - weight) + overlay * weight, per channel, in place.
 * Both buffers must have the same size.
 */
export function blendInto(base: FrameBuffer, overlay: FrameBuffer, weight: number): void {
  if (base.width !== overlay.width || base.height !== overlay.height) {
    throw new RangeError(
      `Cannot blend ${overlay.width}x${overlay.height} onto ${base.width}x${base.height}`
    );
  }
  const a = base.data;
  const b = overlay.data;
  const keep = 1 - weight;
  for (let i = 0; i < a.length; i++) {
    a[i] = a[i] * keep + b[i] * weight;
  }
}

/**
 * Scene millimetres to pixels: origin + [x, -y] * scale.
 */
export function toPixel(global: Readonly<Vec3>, scale: number, origin: PixelPoint): PixelPoint {
  return [origin[0] + global[0] * scale, origin[1] - global[1] * scale];
}

/** RGB triple of the pixel at (x, y). */
export function pixelAt(buffer: FrameBuffer, x: number, y: number): ColorRGB {
  const i = (y * buffer.width + x) * 4;
  return [buffer.data[i], buffer.data[i + 1], buffer.data[i + 2]];
}
