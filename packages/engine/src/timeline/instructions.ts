import {
  formatAttribute,
  type Instruction,
  type ReplayContext,
  type Vec3,
} from "@linework/contracts";
import type { SceneNode } from "../graph/SceneNode";

/** Instruction bound to scene nodes. */
export type SceneInstruction = Instruction<SceneNode>;

/**
 * Applies one instruction to the scene it is replayed against.
 */
export function applyInstruction(
  instruction: SceneInstruction,
  ctx: ReplayContext<SceneNode>
): void {
  switch (instruction.op) {
    case "noop":
      return;

    case "translate":
      ctx.entity(instruction.target).move({ deltaPosition: instruction.delta });
      return;

    case "translateToward": {
      const node = ctx.entity(instruction.target);
      const current = node.localPosition();
      const { position, fraction } = instruction;
      const next: Vec3 = [
        current[0] + (position[0] - current[0]) * fraction,
        current[1] + (position[1] - current[1]) * fraction,
        current[2] + (position[2] - current[2]) * fraction,
      ];
      node.move({ position: next });
      return;
    }

    case "setPosition":
      ctx.entity(instruction.target).move({ position: instruction.position });
      return;

    case "rotate":
      ctx.entity(instruction.target).move({
        deltaRotation: { axis: instruction.axis, angle: instruction.angle },
      });
      return;

    case "setOrientation":
      ctx.entity(instruction.target).move({ orientation: instruction.orientation });
      return;

    case "setAttribute":
    case "sweepAttribute":
      ctx.entity(instruction.target).set(instruction.name, instruction.value);
      return;

    case "custom":
      instruction.apply(ctx);
      return;
  }
}

/**
 * Single-line form of an instruction, e.g. `translate(slider, [1,0,0])`.
 */
export function formatInstruction(instruction: Instruction<unknown>): string {
  switch (instruction.op) {
    case "noop":
      return "noop()";
    case "translate":
      return `translate(${instruction.target}, ${formatAttribute(instruction.delta)})`;
    case "translateToward":
      return `translateToward(${instruction.target}, ${formatAttribute(instruction.position)}, ${instruction.fraction})`;
    case "setPosition":
      return `setPosition(${instruction.target}, ${formatAttribute(instruction.position)})`;
    case "rotate":
      return `rotate(${instruction.target}, ${formatAttribute(instruction.axis)}, ${instruction.angle})`;
    case "setOrientation":
      return `setOrientation(${instruction.target}, ${formatAttribute(instruction.orientation)})`;
    case "setAttribute":
      return `setAttribute(${instruction.target}, ${instruction.name}, ${formatAttribute(instruction.value)})`;
    case "sweepAttribute":
      return `sweepAttribute(${instruction.target}, ${instruction.name}, ${formatAttribute(instruction.value)}, ${instruction.step}/${instruction.steps})`;
    case "custom":
      return instruction.label;
  }
}
