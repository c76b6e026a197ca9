import { rotationZ, type CustomInstruction, type EntityAlias, type Vec3 } from "@linework/contracts";
import { CompositionError } from "../../errors";
import { rayPolygonDistance } from "../../geometry";
import type { SceneNode } from "../../graph/SceneNode";
import { globalAxis } from "../drawNode";
import proportions from "./dialProportions.json";

const READOUT_SPAN = 100;

function readoutAngle(readout: number): number {
  return (-readout * 2 * Math.PI) / READOUT_SPAN;
}

function unit(angle: number): [number, number] {
  return [Math.cos(angle), Math.sin(angle)];
}

/**
 * Behaviour of a dial indicator node.
 *
 * All state lives in the dial node's attributes, so a DialIndicator is only
 * a view and stays valid across scene resets.
 *
 * Readout runs 0..100 with 0 at twelve o'clock, increasing clockwise.
 */
export class DialIndicator {
  private constructor(readonly node: SceneNode) {}

  static from(node: SceneNode): DialIndicator {
    if (node.kind !== "dial") {
      throw new CompositionError(`Node ${node.id} (${node.kind}) is not a dial indicator`);
    }
    return new DialIndicator(node);
  }

  private part(name: "needleId" | "plungerId" | "wedgeId" | "minLineId" | "maxLineId"): SceneNode {
    return this.node.graph.node(this.node.number(name));
  }

  get deflection(): number {
    return this.node.number("deflection");
  }

  get readout(): number {
    return this.node.number("readout");
  }

  /** Moves the plunger and turns the needle to match. */
  setDeflection(deflection: number): void {
    this.node.set("deflection", deflection);
    this.updatePlunger();
    const revolutions = (deflection / this.node.number("readoutScale")) * READOUT_SPAN;
    this.setReadout(((revolutions % READOUT_SPAN) + READOUT_SPAN) % READOUT_SPAN);
  }

  setReadout(readout: number): void {
    this.node.set("readout", readout);
    this.part("needleId").move({ orientation: rotationZ(readoutAngle(readout)) });

    const exceeded = this.checkMinMax();
    if (exceeded === -1) this.node.set("minSwept", readout);
    else if (exceeded === 1) this.node.set("maxSwept", readout);
    this.setMinMaxSwept();
  }

  /**
   * Where the readout sits against the swept range: 0 inside, -1 past the
   * minimum, 1 past the maximum. When both bounds are passed the closer one
   * wins.
   */
  checkMinMax(): -1 | 0 | 1 {
    const r = unit(readoutAngle(this.readout));
    const min = unit(readoutAngle(this.node.number("minSwept")));
    const max = unit(readoutAngle(this.node.number("maxSwept")));

    const cross = (a: [number, number], b: [number, number]) => a[0] * b[1] - a[1] * b[0];
    const dot = (a: [number, number], b: [number, number]) => a[0] * b[0] + a[1] * b[1];

    const minExceeded = cross(min, r) <= 0;
    const maxExceeded = cross(r, max) <= 0;

    if (minExceeded && !maxExceeded) return -1;
    if (maxExceeded && !minExceeded) return 1;
    if (minExceeded || maxExceeded) {
      return dot(min, r) >= dot(max, r) ? -1 : 1;
    }
    return 0;
  }

  /** Collapses the swept range onto the current readout. */
  resetHighlight(): void {
    this.node.set("minSwept", this.readout).set("maxSwept", this.readout);
    this.setMinMaxSwept();
  }

  setMinMaxSwept(): void {
    const minAngle = readoutAngle(this.node.number("minSwept"));
    const maxAngle = readoutAngle(this.node.number("maxSwept"));
    this.part("minLineId").move({ orientation: rotationZ(minAngle) });
    this.part("maxLineId").move({ orientation: rotationZ(maxAngle) });
    this.part("wedgeId")
      .set("startAngle", Math.PI / 2 + minAngle)
      .set("endAngle", Math.PI / 2 + maxAngle);
  }

  displayHighlight(show: boolean): void {
    this.node.set("highlightShow", show);
    for (const name of ["wedgeId", "minLineId", "maxLineId"] as const) {
      this.part(name).set("visible", show);
    }
  }

  updatePlunger(): void {
    this.part("plungerId").move({ position: [0, this.deflection, 0] });
  }

  displayPlunger(show: boolean): void {
    this.node.set("plungerShow", show);
    this.part("plungerId").set("visible", show);
  }

  /**
   * Sets the deflection from the distance between the dial centre and the
   * polygon, measured along the plunger axis. A polygon out of reach leaves
   * the plunger fully extended.
   */
  track(polygon: SceneNode): void {
    const free = proportions.plunger.track * this.node.number("diameter");
    const axis = globalAxis(this.node, [0, -1, 0]);
    const vertices = polygon.vec3List("vertices").map((v) => polygon.toGlobal(v));
    const direction: Vec3 = [axis.x, axis.y, axis.z];
    const distance = Math.abs(
      rayPolygonDistance(vertices, this.node.globalPosition(), direction)
    );
    this.setDeflection(Math.max(free - distance, 0));
  }
}

/**
 * Script instruction that makes a registered dial track a registered
 * polygon on replay.
 */
export function trackInstruction(
  dial: EntityAlias,
  polygon: EntityAlias
): CustomInstruction<SceneNode> {
  return {
    op: "custom",
    label: `track(${dial}, ${polygon})`,
    apply: (ctx) => DialIndicator.from(ctx.entity(dial)).track(ctx.entity(polygon)),
  };
}
