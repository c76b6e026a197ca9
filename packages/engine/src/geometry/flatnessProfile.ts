import type { Vec2 } from "@linework/contracts";
import { createRng } from "./random";

/**
 * Random-walk surface profile used to author flatness demos.
 * All distances in mm.
 */
export interface FlatnessProfileOptions {
  /** Length of the profile along x */
  length?: number;
  /** Spacing between samples along x */
  increment?: number;
  /** Largest height change between neighbouring samples */
  maxDelta?: number;
  startHeight?: number;
  minHeight?: number;
  maxHeight?: number;
}

export const DEFAULT_FLATNESS_PROFILE: Required<FlatnessProfileOptions> = {
  length: 6,
  increment: 0.05,
  maxDelta: 0.04,
  startHeight: 0.15,
  minHeight: 0.04,
  maxHeight: 0.62,
};

/**
 * Heights as [x, height] pairs. The walk starts at `startHeight` and is
 * clamped to [minHeight, maxHeight]. The first x position is sampled twice:
 * once at the start height and once after the first step.
 */
export function generateFlatnessProfile(
  options: FlatnessProfileOptions = {},
  seed = 0
): Vec2[] {
  const config = { ...DEFAULT_FLATNESS_PROFILE, ...options };
  const rng = createRng(seed);

  let x = 0;
  let height = config.startHeight;
  const points: Vec2[] = [[x, height]];

  while (x < config.length) {
    const delta = rng.uniform(-config.maxDelta, config.maxDelta);
    if (height + delta > config.maxHeight) {
      height = config.maxHeight;
    } else if (height + delta < config.minHeight) {
      height = config.minHeight;
    } else {
      height += delta;
    }
    points.push([x, height]);
    x += config.increment;
  }
  return points;
}
