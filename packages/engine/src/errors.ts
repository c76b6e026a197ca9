import type { FrameIndex, Seconds } from "@linework/contracts";

/**
 * Invalid tree construction: attaching a non-node, a node that already has a
 * parent, a node from another graph, or a node created before its parent.
 * Raised before anything is mutated.
 */
export class CompositionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CompositionError";
  }
}

/** Unknown attribute, shape mismatch, or a full extension map. */
export class AttributeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AttributeError";
  }
}

/** Degenerate input to a geometry routine. */
export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeometryError";
  }
}

/** Bad script edits or alias lookups outside of replay. */
export class TimelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimelineError";
  }
}

/**
 * An instruction failed while the scene was being replayed.
 */
export class ReplayError extends Error {
  readonly frame: FrameIndex;
  /** Elapsed animation time at `frame` */
  readonly time: Seconds;
  /** Single-line form of the failing instruction */
  readonly instruction: string;

  constructor(frame: FrameIndex, time: Seconds, instruction: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Instruction failed at frame ${frame} (t=${time.toFixed(3)}s): ${instruction}: ${reason}`,
      { cause }
    );
    this.name = "ReplayError";
    this.frame = frame;
    this.time = time;
    this.instruction = instruction;
  }
}
