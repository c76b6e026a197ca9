/**
 * Renders the dial-indicator flatness animation to a video file.
 *
 *   tsx packages/studio/src/render.ts --output dial.gif --scale 0.25
 */

import { pathToFileURL } from "node:url";
import type { IPointSource, IVideoSink, Vec2 } from "@linework/contracts";
import { CsvPointSource, FfmpegVideoSink, GifVideoSink } from "@linework/adapters";
import { Canvas2DRasterizer, Logger, Scene, generateFlatnessProfile } from "@linework/engine";
import { parseRenderArgs, sceneConfigFor, type RenderOptions } from "./cli";
import { buildFlatnessAnimation } from "./flatnessAnimation";
import { createNodeContext } from "./nodeCanvas";

const log = Logger.create("Render");

function loadProfile(options: RenderOptions): Promise<Vec2[]> {
  if (options.points) {
    const source: IPointSource = new CsvPointSource(options.points);
    return source.load();
  }
  return Promise.resolve(generateFlatnessProfile({}, options.seed));
}

function sinkFor(options: RenderOptions): IVideoSink {
  if (options.output.toLowerCase().endsWith(".gif")) {
    return new GifVideoSink({ path: options.output });
  }
  return new FfmpegVideoSink({ path: options.output, ffmpeg: options.ffmpeg });
}

export async function render(options: RenderOptions): Promise<void> {
  const scene = new Scene(new Canvas2DRasterizer(createNodeContext), sceneConfigFor(options));
  buildFlatnessAnimation(scene, await loadProfile(options));

  const first = Math.trunc(options.from * scene.fps);
  const last =
    options.to === undefined
      ? scene.lastFrame()
      : Math.min(scene.lastFrame(), Math.trunc(options.to * scene.fps));
  log.info(`Rendering frames ${first}..${last} at ${scene.config.width}x${scene.config.height}`);

  const frames = scene.frames(first, last);
  await sinkFor(options).write(frames, scene.fps);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  render(parseRenderArgs(process.argv.slice(2))).catch((error: unknown) => {
    log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
