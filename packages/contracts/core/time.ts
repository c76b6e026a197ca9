/** Zero-based frame number on the timeline. */
export type FrameIndex = number;

/** Animation time in seconds. */
export type Seconds = number;

/** Frames per second of the produced animation. */
export type Fps = number;

export function frameToSeconds(frame: FrameIndex, fps: Fps): Seconds {
  return frame / fps;
}
