import { createCanvas } from "@napi-rs/canvas";
import type { ContextFactory } from "@linework/engine";

/** Canvas 2D contexts backed by @napi-rs/canvas. */
export const createNodeContext: ContextFactory = (width, height) =>
  createCanvas(width, height).getContext("2d");
