import type {
  EntityAlias,
  FrameBuffer,
  FrameIndex,
  IRasterizer,
  Instruction,
  PixelPoint,
  ReplayContext,
  SceneConfig,
  Script,
} from "@linework/contracts";
import { frameToSeconds } from "@linework/contracts";
import { createFrameBuffer } from "../compositing/frameBuffer";
import { ReplayError, TimelineError } from "../errors";
import { SceneGraph, type NodeRecord } from "../graph/SceneGraph";
import type { SceneNode } from "../graph/SceneNode";
import { Logger } from "../logger";
import { applyInstruction, formatInstruction, type SceneInstruction } from "./instructions";

const log = Logger.create("Scene");

/**
 * Default scene configuration: full HD, 272 px/mm, 60 fps on black.
 */
export const DEFAULT_SCENE_CONFIG: Required<SceneConfig> = {
  width: 1920,
  height: 1080,
  resolution: 272,
  fps: 60,
  background: [0, 0, 0],
};

function assertFrame(frame: FrameIndex, what: string): void {
  if (!Number.isInteger(frame) || frame < 0) {
    throw new TimelineError(`${what} must be a non-negative integer frame, got ${frame}`);
  }
}

/**
 * Timeline and replay engine.
 *
 * Registered entities are root nodes of the scene graph, rendered in
 * registration order. The script maps frames to instructions; the state at
 * frame N is the registration state with every instruction of frames
 * 0..N-1 applied in order.
 *
 * Instructions are not invertible, so seeking backwards restores the
 * registration snapshots and replays from frame 0.
 */
export class Scene {
  readonly config: Required<SceneConfig>;
  /** Pixel position of the world origin */
  readonly origin: PixelPoint;

  private entities: Map<EntityAlias, SceneNode> = new Map();
  private entitiesInit: Map<EntityAlias, NodeRecord[]> = new Map();
  private script: Script<SceneNode> = new Map<FrameIndex, SceneInstruction[]>([
    [0, [{ op: "noop" }]],
  ]);
  private frame: FrameIndex = 0;

  constructor(
    private rasterizer: IRasterizer,
    config: SceneConfig = {},
    readonly graph: SceneGraph = new SceneGraph()
  ) {
    this.config = { ...DEFAULT_SCENE_CONFIG, ...config };
    this.origin = [Math.floor(this.config.width / 2), Math.floor(this.config.height / 2)];
  }

  get fps(): number {
    return this.config.fps;
  }

  get currentFrame(): FrameIndex {
    return this.frame;
  }

  // === Entities ===

  /**
   * Registers a root node under `alias` and snapshots its subtree as the
   * state that resets return to.
   */
  register(alias: EntityAlias, node: SceneNode): SceneNode {
    if (this.entities.has(alias)) {
      throw new TimelineError(`Alias "${alias}" is already registered`);
    }
    if (node.graph !== this.graph) {
      throw new TimelineError(`Node ${node.id} for "${alias}" belongs to another scene graph`);
    }
    if (node.parent !== null) {
      throw new TimelineError(`Node ${node.id} for "${alias}" is not a root node`);
    }
    this.entities.set(alias, node);
    this.entitiesInit.set(alias, this.graph.snapshot(node.id));
    return node;
  }

  registerAll(nodes: Record<EntityAlias, SceneNode>): void {
    for (const [alias, node] of Object.entries(nodes)) {
      this.register(alias, node);
    }
  }

  entity(alias: EntityAlias): SceneNode {
    const node = this.entities.get(alias);
    if (!node) {
      throw new TimelineError(`Unknown entity "${alias}"`);
    }
    return node;
  }

  get aliases(): EntityAlias[] {
    return [...this.entities.keys()];
  }

  // === Script ===

  appendInstruction(frame: FrameIndex, instruction: SceneInstruction): void {
    assertFrame(frame, "Instruction frame");
    const list = this.script.get(frame);
    if (list) {
      list.push(instruction);
    } else {
      this.script.set(frame, [instruction]);
    }
  }

  /** Highest frame that carries an instruction. */
  lastFrame(): FrameIndex {
    return Math.max(...this.script.keys());
  }

  instructionsAt(frame: FrameIndex): readonly Instruction<SceneNode>[] {
    return this.script.get(frame) ?? [];
  }

  // === Replay ===

  /** Restores every entity to its registration state. */
  reset(): void {
    for (const snapshot of this.entitiesInit.values()) {
      this.graph.restore(snapshot);
    }
    this.frame = 0;
  }

  /**
   * Brings the entities to the state of `frame`. A failing instruction
   * resets the scene and raises a ReplayError.
   */
  seek(frame: FrameIndex): void {
    assertFrame(frame, "Seek target");
    if (frame < this.frame) {
      this.reset();
    }
    for (let f = this.frame; f < frame; f++) {
      const instructions = this.script.get(f);
      if (!instructions) continue;
      const ctx: ReplayContext<SceneNode> = {
        frame: f,
        fps: this.config.fps,
        entity: (alias) => this.entity(alias),
      };
      for (const instruction of instructions) {
        try {
          applyInstruction(instruction, ctx);
        } catch (error) {
          this.reset();
          throw new ReplayError(
            f,
            frameToSeconds(f, this.config.fps),
            formatInstruction(instruction),
            error
          );
        }
      }
    }
    this.frame = frame;
  }

  /** Renders the current state into a fresh buffer. */
  capture(): FrameBuffer {
    const { width, height, resolution, background } = this.config;
    const buffer = createFrameBuffer(width, height, background);
    for (const node of this.entities.values()) {
      node.render(buffer, resolution, this.origin, this.rasterizer);
    }
    return buffer;
  }

  /**
   * Seeks and captures every frame in [start, end]. Either every frame is
   * returned or the first replay failure is thrown.
   */
  frames(start: FrameIndex = 0, end: FrameIndex = this.lastFrame()): FrameBuffer[] {
    assertFrame(start, "First frame");
    assertFrame(end, "Last frame");
    const captured: FrameBuffer[] = [];
    for (let f = start; f <= end; f++) {
      this.seek(f);
      captured.push(this.capture());
      const done = f - start + 1;
      if (done % 10 === 0 || f === end) {
        log.debug(`Captured frame ${f} of ${end}`);
      }
    }
    return captured;
  }
}
