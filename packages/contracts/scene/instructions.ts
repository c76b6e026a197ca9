/**
 * Timeline instructions.
 *
 * One instruction is one mutation scheduled on a frame. The set is closed:
 * the replay engine dispatches on `op`. Anything the fixed operations cannot
 * express goes through `custom`, which captures its arguments in a closure.
 */

import type { FrameIndex, Fps } from "../core/time";
import type { Mat3, Vec3 } from "../core/vectors";
import type { AttributeValue } from "./attributes";
import type { EntityAlias } from "./nodes";

/**
 * What a custom instruction sees while the scene is being replayed.
 */
export interface ReplayContext<TNode> {
  readonly frame: FrameIndex;
  readonly fps: Fps;
  /** Resolve a registered alias; throws for unknown aliases */
  entity(alias: EntityAlias): TNode;
}

export interface NoopInstruction {
  op: "noop";
}

/** Relative move: position += delta */
export interface TranslateInstruction {
  op: "translate";
  target: EntityAlias;
  delta: Vec3;
}

/** Move a fraction of the remaining way toward an absolute position */
export interface TranslateTowardInstruction {
  op: "translateToward";
  target: EntityAlias;
  position: Vec3;
  fraction: number;
}

export interface SetPositionInstruction {
  op: "setPosition";
  target: EntityAlias;
  position: Vec3;
}

/** Relative rotation of the local axes about `axis` by `angle` radians */
export interface RotateInstruction {
  op: "rotate";
  target: EntityAlias;
  axis: Vec3;
  angle: number;
}

export interface SetOrientationInstruction {
  op: "setOrientation";
  target: EntityAlias;
  orientation: Mat3;
}

export interface SetAttributeInstruction {
  op: "setAttribute";
  target: EntityAlias;
  name: string;
  value: AttributeValue;
}

/** One sample (`step` of `steps`) of an attribute sweep */
export interface SweepAttributeInstruction {
  op: "sweepAttribute";
  target: EntityAlias;
  name: string;
  value: AttributeValue;
  step: number;
  steps: number;
}

export interface CustomInstruction<TNode> {
  op: "custom";
  /** Printable content, e.g. `track(dial, poly)` */
  label: string;
  apply(ctx: ReplayContext<TNode>): void;
}

export type Instruction<TNode = unknown> =
  | NoopInstruction
  | TranslateInstruction
  | TranslateTowardInstruction
  | SetPositionInstruction
  | RotateInstruction
  | SetOrientationInstruction
  | SetAttributeInstruction
  | SweepAttributeInstruction
  | CustomInstruction<TNode>;

export type InstructionOp = Instruction["op"];

/**
 * Sparse frame-indexed script. Instruction order within a frame is
 * execution order.
 */
export type Script<TNode = unknown> = Map<FrameIndex, Instruction<TNode>[]>;
