/**
 * I/O contracts: where point data comes from and where frames go.
 */

import type { Fps } from "../core/time";
import type { Vec2 } from "../core/vectors";
import type { FrameBuffer } from "../raster/raster";

/**
 * Source of ordered 2D point data (e.g. a measured surface profile).
 */
export interface IPointSource {
  load(): Promise<Vec2[]>;
}

/**
 * Consumes an ordered sequence of equally sized frames and encodes them.
 */
export interface IVideoSink {
  readonly id: string;
  write(frames: readonly FrameBuffer[], fps: Fps): Promise<void>;
}
