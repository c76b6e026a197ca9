/**
 * Point data that cannot be parsed. `line` is 1-based.
 */
export class PointDataError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(message);
    this.name = "PointDataError";
    this.line = line;
  }
}

/** A sink rejected its frames or its encoder failed. */
export class VideoSinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VideoSinkError";
  }
}
