/**
 * Instruction builders.
 *
 * Each builder samples a transition over a number of frames and appends one
 * instruction per frame to the scene script. Durations are in seconds; the
 * string "frame" (or any duration shorter than one frame) means a single
 * frame, which snaps straight to the end value.
 *
 * `tStart` is in seconds. When omitted the builder starts at the last frame
 * currently scheduled, resolved once when the builder is called.
 */

import type {
  AttributeValue,
  EntityAlias,
  FrameIndex,
  Mat3,
  Profile,
  Vec2,
  Vec3,
} from "@linework/contracts";
import { TimelineError } from "../errors";
import { interpolate } from "../geometry";
import type { Scene } from "../timeline/Scene";
import type { SceneInstruction } from "../timeline/instructions";

export type Duration = number | "frame";

/** Values an attribute sweep can interpolate. */
export type SweepValue = number | Vec2 | Vec3;

export interface TransitionOptions {
  profile?: Profile;
  tStart?: number;
}

export interface StartOptions {
  tStart?: number;
}

const DEFAULT_PROFILE: Profile = "sigmoid";

export function frameCount(scene: Scene, duration: Duration): number {
  if (duration === "frame") return 1;
  return Math.max(1, Math.trunc(duration * scene.fps));
}

export function startFrame(scene: Scene, tStart?: number): FrameIndex {
  if (tStart === undefined) return scene.lastFrame();
  const frame = Math.trunc(tStart * scene.fps);
  if (frame < 0) {
    throw new TimelineError(`Start time ${tStart}s lies before the first frame`);
  }
  return frame;
}

function sweepValues(start: SweepValue, end: SweepValue, n: number, profile: Profile): AttributeValue[] {
  if (typeof start === "number" && typeof end === "number") {
    return interpolate(start, end, n, profile);
  }
  if (typeof start !== "number" && typeof end !== "number") {
    if (start.length === 3 && end.length === 3) return interpolate(start, end, n, profile);
    if (start.length === 2 && end.length === 2) return interpolate(start, end, n, profile);
  }
  throw new TimelineError("Sweep start and end values must have the same shape");
}

function difference(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/** Holds the last scheduled state for `duration`. */
export function pause(scene: Scene, duration: Duration): void {
  scene.appendInstruction(scene.lastFrame() + frameCount(scene, duration), { op: "noop" });
}

/** Relative move by `displacement` over `duration`. */
export function slide(
  scene: Scene,
  duration: Duration,
  target: EntityAlias,
  displacement: Vec3,
  options: TransitionOptions = {}
): void {
  const n = frameCount(scene, duration);
  const values = interpolate([0, 0, 0], displacement, n, options.profile ?? DEFAULT_PROFILE);
  const start = startFrame(scene, options.tStart);

  if (values.length === 1) {
    scene.appendInstruction(start, { op: "translate", target, delta: values[0] });
    return;
  }
  for (let i = 1; i < values.length; i++) {
    scene.appendInstruction(start + i, {
      op: "translate",
      target,
      delta: difference(values[i], values[i - 1]),
    });
  }
}

/**
 * Absolute move to `position` in the parent frame. Each frame covers its
 * share of the distance still remaining, so earlier moves of the same node
 * are absorbed.
 */
export function slideTo(
  scene: Scene,
  duration: Duration,
  target: EntityAlias,
  position: Vec3,
  options: TransitionOptions = {}
): void {
  const n = frameCount(scene, duration);
  const values = interpolate(0, 1, n, options.profile ?? DEFAULT_PROFILE);
  const start = startFrame(scene, options.tStart);

  if (values.length === 1) {
    scene.appendInstruction(start, { op: "setPosition", target, position });
    return;
  }
  const last = values[values.length - 1];
  for (let i = 1; i < values.length; i++) {
    scene.appendInstruction(start + i, {
      op: "translateToward",
      target,
      position,
      fraction: (values[i] - values[i - 1]) / (last - values[i - 1]),
    });
  }
}

/** Relative rotation about `axis` by `angle` radians. */
export function rotateBy(
  scene: Scene,
  duration: Duration,
  target: EntityAlias,
  axis: Vec3,
  angle: number,
  options: TransitionOptions = {}
): void {
  const n = frameCount(scene, duration);
  const values = interpolate(0, angle, n, options.profile ?? DEFAULT_PROFILE);
  const start = startFrame(scene, options.tStart);

  if (values.length === 1) {
    scene.appendInstruction(start, { op: "rotate", target, axis, angle: values[0] });
    return;
  }
  for (let i = 1; i < values.length; i++) {
    scene.appendInstruction(start + i, {
      op: "rotate",
      target,
      axis,
      angle: values[i] - values[i - 1],
    });
  }
}

export function orient(
  scene: Scene,
  target: EntityAlias,
  orientation: Mat3,
  options: StartOptions = {}
): void {
  scene.appendInstruction(startFrame(scene, options.tStart), {
    op: "setOrientation",
    target,
    orientation,
  });
}

function appendSweep(
  scene: Scene,
  start: FrameIndex,
  n: number,
  target: EntityAlias,
  name: string,
  values: AttributeValue[]
): void {
  if (values.length === 1) {
    scene.appendInstruction(start, { op: "setAttribute", target, name, value: values[0] });
    return;
  }
  values.forEach((value, step) => {
    scene.appendInstruction(start + step, {
      op: "sweepAttribute",
      target,
      name,
      value,
      step,
      steps: n,
    });
  });
}

/** Sets `name` to each sampled value, one frame apart. */
export function sweepAttr(
  scene: Scene,
  duration: Duration,
  target: EntityAlias,
  name: string,
  from: SweepValue,
  to: SweepValue,
  options: TransitionOptions = {}
): void {
  const n = frameCount(scene, duration);
  const values = sweepValues(from, to, n, options.profile ?? DEFAULT_PROFILE);
  appendSweep(scene, startFrame(scene, options.tStart), n, target, name, values);
}

export function setAttr(
  scene: Scene,
  target: EntityAlias,
  name: string,
  value: AttributeValue,
  options: StartOptions = {}
): void {
  scene.appendInstruction(startFrame(scene, options.tStart), {
    op: "setAttribute",
    target,
    name,
    value,
  });
}

/** Makes the node visible and raises its opacity from 0 to 1. */
export function fadeIn(
  scene: Scene,
  duration: Duration,
  target: EntityAlias,
  options: TransitionOptions = {}
): void {
  const n = frameCount(scene, duration);
  const start = startFrame(scene, options.tStart);
  scene.appendInstruction(start, { op: "setAttribute", target, name: "visible", value: true });
  const values = interpolate(0, 1, n, options.profile ?? DEFAULT_PROFILE);
  appendSweep(scene, start, n, target, "opacity", values);
}

/** Lowers the opacity from 1 to 0 and hides the node on the last frame. */
export function fadeOut(
  scene: Scene,
  duration: Duration,
  target: EntityAlias,
  options: TransitionOptions = {}
): void {
  const n = frameCount(scene, duration);
  const start = startFrame(scene, options.tStart);
  const values = interpolate(1, 0, n, options.profile ?? DEFAULT_PROFILE);
  appendSweep(scene, start, n, target, "opacity", values);
  scene.appendInstruction(start + n - 1, {
    op: "setAttribute",
    target,
    name: "visible",
    value: false,
  });
}

/** Repeats `instruction` on every frame of `duration`. */
export function sweepCmd(
  scene: Scene,
  duration: Duration,
  instruction: SceneInstruction,
  options: StartOptions = {}
): void {
  const n = frameCount(scene, duration);
  const start = startFrame(scene, options.tStart);
  for (let i = 0; i < n; i++) {
    scene.appendInstruction(start + i, instruction);
  }
}

export function setCmd(scene: Scene, instruction: SceneInstruction, options: StartOptions = {}): void {
  sweepCmd(scene, "frame", instruction, options);
}
