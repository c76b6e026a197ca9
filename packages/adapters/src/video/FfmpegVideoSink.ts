import { spawn } from "node:child_process";
import type { FrameBuffer, IVideoSink } from "@linework/contracts";
import { Logger } from "@linework/engine";
import { VideoSinkError } from "../errors";
import { assertFps, frameSize } from "./frames";

const log = Logger.create("FfmpegVideoSink");

export interface FfmpegSinkConfig {
  /** Output file; the container follows its extension */
  path: string;
  /** ffmpeg executable */
  ffmpeg?: string;
  codec?: string;
  pixelFormat?: string;
}

const DEFAULT_CONFIG: Required<Omit<FfmpegSinkConfig, "path">> = {
  ffmpeg: "ffmpeg",
  codec: "libx264",
  pixelFormat: "yuv420p",
};

/**
 * The parts of a spawned child process the sink talks to.
 */
export interface EncoderProcess {
  stdin: {
    write(chunk: Uint8Array | Uint8ClampedArray): boolean;
    once(event: "drain" | "close" | "error", listener: () => void): unknown;
    on(event: "error", listener: (error: Error) => void): unknown;
    end(): void;
  };
  stderr: {
    on(event: "data", listener: (chunk: Uint8Array) => void): unknown;
  };
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: (code: number | null) => void): unknown;
}

export type Spawner = (command: string, args: string[]) => EncoderProcess;

const spawnEncoder: Spawner = (command, args) =>
  spawn(command, args, { stdio: ["pipe", "ignore", "pipe"] });

/**
 * Video sink that pipes raw RGBA frames into an ffmpeg process.
 */
export class FfmpegVideoSink implements IVideoSink {
  readonly id = "ffmpeg";

  private config: Required<FfmpegSinkConfig>;

  constructor(
    config: FfmpegSinkConfig,
    private spawnProcess: Spawner = spawnEncoder
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  args(width: number, height: number, fps: number): string[] {
    return [
      "-v",
      "error",
      "-y",
      "-f",
      "rawvideo",
      "-pix_fmt",
      "rgba",
      "-s",
      `${width}x${height}`,
      "-r",
      String(fps),
      "-i",
      "-",
      "-c:v",
      this.config.codec,
      "-pix_fmt",
      this.config.pixelFormat,
      this.config.path,
    ];
  }

  async write(frames: readonly FrameBuffer[], fps: number): Promise<void> {
    const { width, height } = frameSize(frames);
    assertFps(fps);
    const { ffmpeg, path } = this.config;
    const child = this.spawnProcess(ffmpeg, this.args(width, height, fps));

    await new Promise<void>((resolve, reject) => {
      const stderr: Uint8Array[] = [];
      // EPIPE once ffmpeg has gone; the exit code is reported on close
      let pipeError: Error | null = null;
      let piped = false;

      child.stderr.on("data", (chunk) => stderr.push(chunk));
      child.stdin.on("error", (error) => {
        pipeError = error;
      });
      child.on("error", reject);
      child.on("close", (code) => {
        if (code !== 0) {
          const output = Buffer.concat(stderr).toString("utf8").trim();
          reject(new VideoSinkError(`${ffmpeg} exited with code ${code}${output ? `\n${output}` : ""}`));
          return;
        }
        if (pipeError || !piped) {
          reject(
            new VideoSinkError(`${ffmpeg} stopped reading frames${pipeError ? `: ${pipeError.message}` : ""}`)
          );
          return;
        }
        log.info(`Wrote ${frames.length} frames to ${path}`);
        resolve();
      });
      pipeFrames(child.stdin, frames, () => pipeError !== null).then((done) => {
        piped = done;
      }, reject);
    });
  }
}

/**
 * Writes every frame, waiting out back pressure. Stops early once the pipe
 * breaks; resolves to whether all frames went in and stdin was ended.
 */
async function pipeFrames(
  stdin: EncoderProcess["stdin"],
  frames: readonly FrameBuffer[],
  broken: () => boolean
): Promise<boolean> {
  for (const frame of frames) {
    if (broken()) return false;
    if (!stdin.write(frame.data)) {
      await new Promise<void>((resolve) => {
        const settle = () => resolve();
        stdin.once("drain", settle);
        stdin.once("close", settle);
        stdin.once("error", settle);
      });
    }
  }
  if (broken()) return false;
  stdin.end();
  return true;
}
