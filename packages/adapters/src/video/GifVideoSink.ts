import { writeFile } from "node:fs/promises";
import * as gifenc from "gifenc";
import type { FrameBuffer, IVideoSink } from "@linework/contracts";
import { Logger } from "@linework/engine";
import { assertFps, frameSize } from "./frames";

const log = Logger.create("GifVideoSink");

export interface GifSinkConfig {
  /** Output file */
  path: string;
  /** Palette size per frame, 2..256 */
  maxColors?: number;
  /** 0 loops forever, -1 plays once */
  repeat?: number;
}

const DEFAULT_CONFIG: Required<Omit<GifSinkConfig, "path">> = {
  maxColors: 256,
  repeat: 0,
};

export type OutputWriter = (path: string, bytes: Uint8Array) => Promise<void>;

/**
 * Animated GIF sink. Each frame gets its own quantized palette; the frame
 * delay is rounded to whole milliseconds.
 */
export class GifVideoSink implements IVideoSink {
  readonly id = "gif";

  private config: Required<GifSinkConfig>;

  constructor(
    config: GifSinkConfig,
    private writeOutput: OutputWriter = (path, bytes) => writeFile(path, bytes)
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  encode(frames: readonly FrameBuffer[], fps: number): Uint8Array {
    const { width, height } = frameSize(frames);
    assertFps(fps);
    const delay = Math.round(1000 / fps);

    const gif = gifenc.GIFEncoder();
    for (const frame of frames) {
      const palette = gifenc.quantize(frame.data, this.config.maxColors);
      const index = gifenc.applyPalette(frame.data, palette);
      gif.writeFrame(index, width, height, { palette, delay, repeat: this.config.repeat });
    }
    gif.finish();
    return gif.bytes();
  }

  async write(frames: readonly FrameBuffer[], fps: number): Promise<void> {
    const bytes = this.encode(frames, fps);
    await this.writeOutput(this.config.path, bytes);
    log.info(`Wrote ${frames.length} frames to ${this.config.path} (${bytes.byteLength} bytes)`);
  }
}
