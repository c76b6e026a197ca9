import type { FrameBuffer } from "@linework/contracts";
import { VideoSinkError } from "../errors";

/**
 * Size shared by every frame. Sinks encode a single resolution, so an
 * empty sequence or a frame of a different size is rejected.
 */
export function frameSize(frames: readonly FrameBuffer[]): { width: number; height: number } {
  const [first] = frames;
  if (!first) {
    throw new VideoSinkError("No frames to write");
  }
  const { width, height } = first;
  frames.forEach((frame, i) => {
    if (frame.width !== width || frame.height !== height) {
      throw new VideoSinkError(
        `Frame ${i} is ${frame.width}x${frame.height}, expected ${width}x${height}`
      );
    }
  });
  return { width, height };
}

export function assertFps(fps: number): void {
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new VideoSinkError(`Invalid frame rate ${fps}`);
  }
}
