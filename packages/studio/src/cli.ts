import type { SceneConfig } from "@linework/contracts";
import { DEFAULT_SCENE_CONFIG } from "@linework/engine";

export interface RenderOptions {
  /** Output file; .gif is encoded in-process, anything else through ffmpeg */
  output: string;
  /** CSV of x,y profile points; a seeded random profile when absent */
  points?: string;
  seed: number;
  /** Frame size and resolution relative to full HD */
  scale: number;
  fps: number;
  /** First and last second to render */
  from: number;
  to?: number;
  ffmpeg: string;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  output: "dial_flatness.gif",
  seed: 7,
  scale: 0.25,
  fps: 30,
  from: 0,
  ffmpeg: "ffmpeg",
};

function positiveNumber(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${flag} value: ${raw ?? "(missing)"}`);
  }
  return value;
}

function nonNegativeNumber(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid ${flag} value: ${raw ?? "(missing)"}`);
  }
  return value;
}

export function parseRenderArgs(argv: readonly string[]): RenderOptions {
  const options: RenderOptions = { ...DEFAULT_RENDER_OPTIONS };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--output":
      case "-o":
        options.output = argv[++i] ?? "";
        break;
      case "--points":
        options.points = argv[++i];
        break;
      case "--seed":
        options.seed = Math.trunc(nonNegativeNumber(arg, argv[++i]));
        break;
      case "--scale":
        options.scale = positiveNumber(arg, argv[++i]);
        break;
      case "--fps":
        options.fps = positiveNumber(arg, argv[++i]);
        break;
      case "--from":
        options.from = nonNegativeNumber(arg, argv[++i]);
        break;
      case "--to":
        options.to = nonNegativeNumber(arg, argv[++i]);
        break;
      case "--ffmpeg":
        options.ffmpeg = argv[++i] ?? "ffmpeg";
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }
  if (!options.output) {
    throw new Error("Missing --output path");
  }
  if (options.to !== undefined && options.to < options.from) {
    throw new Error(`--to (${options.to}) is before --from (${options.from})`);
  }
  return options;
}

/** Full HD scene scaled down (or up) by `scale`, keeping the framing. */
export function sceneConfigFor(options: Pick<RenderOptions, "scale" | "fps">): SceneConfig {
  return {
    width: Math.round(DEFAULT_SCENE_CONFIG.width * options.scale),
    height: Math.round(DEFAULT_SCENE_CONFIG.height * options.scale),
    resolution: DEFAULT_SCENE_CONFIG.resolution * options.scale,
    fps: options.fps,
  };
}
