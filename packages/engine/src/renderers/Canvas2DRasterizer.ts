import {
  rgbToCss,
  type FrameBuffer,
  type IRasterizer,
  type PixelPoint,
  type RasterShape,
  type RasterStyle,
} from "@linework/contracts";

/** Pixel data as exchanged with a 2D context. */
export interface ImageDataLike {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

/**
 * The part of CanvasRenderingContext2D the rasterizer uses. Browser
 * contexts and Node canvas implementations both satisfy it.
 */
export interface Canvas2DContext {
  fillStyle: unknown;
  strokeStyle: unknown;
  lineWidth: number;
  font: string;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  closePath(): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number, counterclockwise?: boolean): void;
  fill(fillRule?: "nonzero" | "evenodd"): void;
  stroke(): void;
  fillText(text: string, x: number, y: number): void;
  createImageData(width: number, height: number): ImageDataLike;
  putImageData(image: ImageDataLike, dx: number, dy: number): void;
  getImageData(sx: number, sy: number, sw: number, sh: number): ImageDataLike;
}

/** Creates a 2D context backed by a canvas of the given size. */
export type ContextFactory = (width: number, height: number) => Canvas2DContext;

export interface Canvas2DRasterizerConfig {
  /** CSS font family for text runs */
  fontFamily?: string;
  /** Font size in pixels for a text run of scale 1 */
  textPxPerScale?: number;
}

const DEFAULT_CONFIG: Required<Canvas2DRasterizerConfig> = {
  fontFamily: "sans-serif",
  textPxPerScale: 22,
};

/**
 * Rasterizer over a Canvas 2D context.
 *
 * The frame buffer is the source of truth: each draw uploads it into the
 * context, draws the shape and copies the pixels back.
 */
export class Canvas2DRasterizer implements IRasterizer {
  readonly id = "canvas2d";

  private config: Required<Canvas2DRasterizerConfig>;
  private ctx: Canvas2DContext | null = null;
  private size: { width: number; height: number } | null = null;

  constructor(
    private createContext: ContextFactory,
    config: Canvas2DRasterizerConfig = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  draw(buffer: FrameBuffer, shape: RasterShape, style: RasterStyle): void {
    const ctx = this.contextFor(buffer);

    const image = ctx.createImageData(buffer.width, buffer.height);
    image.data.set(buffer.data);
    ctx.putImageData(image, 0, 0);

    const css = rgbToCss(style.color);
    ctx.fillStyle = css;
    ctx.strokeStyle = css;
    ctx.lineWidth = style.thickness;

    switch (shape.kind) {
      case "point":
        ctx.beginPath();
        ctx.arc(shape.at[0], shape.at[1], shape.radius, 0, Math.PI * 2);
        ctx.fill();
        break;
      case "segment":
        ctx.beginPath();
        ctx.moveTo(shape.from[0], shape.from[1]);
        ctx.lineTo(shape.to[0], shape.to[1]);
        ctx.stroke();
        break;
      case "polyline":
        this.drawPolyline(ctx, shape.points, shape.closed, style.mode);
        break;
      case "polygon":
        this.drawPolygon(ctx, shape.loops, style.mode);
        break;
      case "arc":
        this.drawArc(ctx, shape, style.mode);
        break;
      case "text":
        ctx.font = `${shape.scale * this.config.textPxPerScale}px ${this.config.fontFamily}`;
        ctx.fillText(shape.text, shape.at[0], shape.at[1]);
        break;
    }

    buffer.data.set(ctx.getImageData(0, 0, buffer.width, buffer.height).data);
  }

  private contextFor(buffer: FrameBuffer): Canvas2DContext {
    if (
      !this.ctx ||
      !this.size ||
      this.size.width !== buffer.width ||
      this.size.height !== buffer.height
    ) {
      this.ctx = this.createContext(buffer.width, buffer.height);
      this.size = { width: buffer.width, height: buffer.height };
    }
    return this.ctx;
  }

  private tracePath(ctx: Canvas2DContext, points: readonly PixelPoint[], closed: boolean): void {
    points.forEach(([x, y], i) => (i === 0 ? ctx.moveTo(x, y) : ctx.lineTo(x, y)));
    if (closed) ctx.closePath();
  }

  private drawPolyline(
    ctx: Canvas2DContext,
    points: readonly PixelPoint[],
    closed: boolean,
    mode: RasterStyle["mode"]
  ): void {
    if (points.length < 2) return;
    ctx.beginPath();
    this.tracePath(ctx, points, closed);
    if (mode === "fill") ctx.fill();
    else ctx.stroke();
  }

  private drawPolygon(
    ctx: Canvas2DContext,
    loops: readonly PixelPoint[][],
    mode: RasterStyle["mode"]
  ): void {
    ctx.beginPath();
    for (const loop of loops) {
      this.tracePath(ctx, loop, true);
    }
    if (mode === "fill") ctx.fill("evenodd");
    else ctx.stroke();
  }

  /**
   * Arc angles run counter-clockwise as seen on screen, which is clockwise
   * in canvas angles, hence the negation.
   */
  private drawArc(
    ctx: Canvas2DContext,
    shape: Extract<RasterShape, { kind: "arc" }>,
    mode: RasterStyle["mode"]
  ): void {
    const [cx, cy] = shape.center;
    const full = Math.abs(shape.endAngle - shape.startAngle) >= Math.PI * 2;
    ctx.beginPath();
    if (mode === "fill" && !full) {
      ctx.moveTo(cx, cy);
    }
    ctx.arc(cx, cy, shape.radius, -shape.startAngle, -shape.endAngle, true);
    if (mode === "fill") {
      ctx.closePath();
      ctx.fill();
    } else {
      ctx.stroke();
    }
  }
}
