import {
  attributeShape,
  cloneAttribute,
  isMat3,
  isVec2,
  isVec3,
  isVec3List,
  type AttributeValue,
  type FrameBuffer,
  type IRasterizer,
  type Mat3,
  type NodeId,
  type NodeKind,
  type PixelPoint,
  type Vec2,
  type Vec3,
} from "@linework/contracts";
import { AttributeError } from "../errors";
import { blendInto, cloneFrameBuffer, toPixel } from "../compositing/frameBuffer";
import { drawNode, skipsRender } from "../shapes/drawNode";
import {
  axisAngleQuaternion,
  fromMatrix3,
  fromVector3,
  rotateColumns,
  toMatrix3,
  toVector3,
} from "./math";
import { MAX_EXTENSIONS, isCoreAttribute, type CoreAttribute } from "./schema";
import type { GlobalTransform, NodeRecord, SceneGraph } from "./SceneGraph";

/** A node, or arbitrarily nested arrays of nodes. */
export type Attachable = SceneNode | readonly Attachable[];

export interface MoveOptions {
  /** New local position; wins over deltaPosition */
  position?: Vec3;
  deltaPosition?: Vec3;
  /** New local orientation; wins over deltaRotation */
  orientation?: Mat3;
  /** Rotation of the local axes about `axis` by `angle` radians */
  deltaRotation?: { axis: Vec3; angle: number };
}

/**
 * Handle to a node in a SceneGraph.
 *
 * Handles are cheap and carry no state of their own: two handles with the
 * same graph and id address the same node, and stay valid when the scene
 * restores a snapshot.
 */
export class SceneNode {
  constructor(
    readonly graph: SceneGraph,
    readonly id: NodeId
  ) {}

  private get record(): NodeRecord {
    return this.graph.record(this.id);
  }

  get kind(): NodeKind {
    return this.record.kind;
  }

  get parent(): SceneNode | null {
    const { parent } = this.record;
    return parent === null ? null : this.graph.node(parent);
  }

  get children(): SceneNode[] {
    return this.record.children.map((id) => this.graph.node(id));
  }

  attach(...children: Attachable[]): this {
    this.graph.attach(this.id, children);
    return this;
  }

  // ==========================================================================
  // Attributes
  // ==========================================================================

  has(name: string): boolean {
    const record = this.record;
    return isCoreAttribute(name) || record.attributes.has(name) || record.extensions.has(name);
  }

  /** Copy of the named value. */
  get(name: string): AttributeValue {
    const record = this.record;
    if (isCoreAttribute(name)) {
      return readCore(record, name);
    }
    const value = record.attributes.get(name) ?? record.extensions.get(name);
    if (value === undefined) {
      throw new AttributeError(`Node ${this.id} (${record.kind}) has no attribute "${name}"`);
    }
    return cloneAttribute(value);
  }

  /**
   * Writes a value. Schema and core attributes keep their shape; unknown
   * names are added to the extension map while it has room.
   */
  set(name: string, value: AttributeValue): this {
    const record = this.record;
    if (isCoreAttribute(name)) {
      writeCore(record, name, value);
      return this;
    }

    const declared = record.attributes.get(name);
    const extension = record.extensions.get(name);
    const current = declared ?? extension;

    if (current !== undefined && attributeShape(current) !== attributeShape(value)) {
      throw new AttributeError(
        `Attribute "${name}" of node ${this.id} expects ${attributeShape(current)}, got ${attributeShape(value)}`
      );
    }
    if (declared !== undefined) {
      record.attributes.set(name, cloneAttribute(value));
      return this;
    }
    if (extension === undefined && record.extensions.size >= MAX_EXTENSIONS) {
      throw new AttributeError(
        `Node ${this.id} cannot take attribute "${name}": extension map is full (${MAX_EXTENSIONS})`
      );
    }
    if (attributeShape(value) === null) {
      throw new AttributeError(`Unsupported value for attribute "${name}"`);
    }
    record.extensions.set(name, cloneAttribute(value));
    return this;
  }

  number(name: string): number {
    const value = this.get(name);
    if (typeof value !== "number") throw shapeError(this, name, "number");
    return value;
  }

  boolean(name: string): boolean {
    const value = this.get(name);
    if (typeof value !== "boolean") throw shapeError(this, name, "boolean");
    return value;
  }

  string(name: string): string {
    const value = this.get(name);
    if (typeof value !== "string") throw shapeError(this, name, "string");
    return value;
  }

  vec2(name: string): Vec2 {
    const value = this.get(name);
    if (!isVec2(value)) throw shapeError(this, name, "vec2");
    return value;
  }

  vec3(name: string): Vec3 {
    const value = this.get(name);
    if (!isVec3(value)) throw shapeError(this, name, "vec3");
    return value;
  }

  mat3(name: string): Mat3 {
    const value = this.get(name);
    if (!isMat3(value)) throw shapeError(this, name, "mat3");
    return value;
  }

  vec3List(name: string): Vec3[] {
    const value = this.get(name);
    if (!isVec3List(value)) throw shapeError(this, name, "vec3[]");
    return value;
  }

  // ==========================================================================
  // Transforms
  // ==========================================================================

  localPosition(): Vec3 {
    return fromVector3(this.record.position);
  }

  localOrientation(): Mat3 {
    return fromMatrix3(this.record.orientation);
  }

  globalTransform(): GlobalTransform {
    return this.graph.globalTransform(this.id);
  }

  globalPosition(): Vec3 {
    return fromVector3(this.globalTransform().position);
  }

  globalOrientation(): Mat3 {
    return fromMatrix3(this.globalTransform().orientation);
  }

  /** Maps a point in this node's frame to world coordinates. */
  toGlobal(local: Readonly<Vec3>): Vec3 {
    const { position, orientation } = this.globalTransform();
    return fromVector3(toVector3(local).applyMatrix3(orientation).add(position));
  }

  /** Maps a point in this node's frame to pixels. */
  toPixel(local: Readonly<Vec3>, scale: number, origin: PixelPoint): PixelPoint {
    return toPixel(this.toGlobal(local), scale, origin);
  }

  move(options: MoveOptions): this {
    const record = this.record;
    if (options.position) {
      record.position = toVector3(options.position);
    } else if (options.deltaPosition) {
      record.position.add(toVector3(options.deltaPosition));
    }
    if (options.orientation) {
      record.orientation = toMatrix3(options.orientation);
    } else if (options.deltaRotation) {
      const { axis, angle } = options.deltaRotation;
      record.orientation = rotateColumns(record.orientation, axisAngleQuaternion(axis, angle));
    }
    return this;
  }

  /** Product of local opacities from the root down to this node. */
  effectiveOpacity(): number {
    let opacity = 1;
    let id: NodeId | null = this.id;
    while (id !== null) {
      const record: NodeRecord = this.graph.record(id);
      opacity *= record.opacity;
      id = record.parent;
    }
    return opacity;
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  /**
   * Draws the subtree into `buffer`. A partly transparent node is drawn on a
   * scratch copy that is then blended over the buffer with the node's
   * effective opacity.
   */
  render(buffer: FrameBuffer, scale: number, origin: PixelPoint, rasterizer: IRasterizer): void {
    const record = this.record;
    if (!record.visible || record.opacity <= 0 || skipsRender(this)) return;

    if (record.opacity === 1) {
      drawNode(this, { buffer, scale, origin, rasterizer });
      return;
    }
    const scratch = cloneFrameBuffer(buffer);
    drawNode(this, { buffer: scratch, scale, origin, rasterizer });
    blendInto(buffer, scratch, this.effectiveOpacity());
  }
}

function shapeError(node: SceneNode, name: string, expected: string): AttributeError {
  return new AttributeError(`Attribute "${name}" of node ${node.id} is not a ${expected}`);
}

function readCore(record: NodeRecord, name: CoreAttribute): AttributeValue {
  switch (name) {
    case "position":
      return fromVector3(record.position);
    case "orientation":
      return fromMatrix3(record.orientation);
    case "opacity":
      return record.opacity;
    case "color":
      return [record.color[0], record.color[1], record.color[2]];
    case "size":
      return record.size;
    case "visible":
      return record.visible;
  }
}

function writeCore(record: NodeRecord, name: CoreAttribute, value: AttributeValue): void {
  const fail = (expected: string) =>
    new AttributeError(`Attribute "${name}" of node ${record.id} expects ${expected}`);

  switch (name) {
    case "position":
      if (!isVec3(value)) throw fail("vec3");
      record.position = toVector3(value);
      return;
    case "orientation":
      if (!isMat3(value)) throw fail("mat3");
      record.orientation = toMatrix3(value);
      return;
    case "opacity":
      if (typeof value !== "number" || !(value >= 0 && value <= 1)) throw fail("a number in [0, 1]");
      record.opacity = value;
      return;
    case "color":
      if (!isVec3(value)) throw fail("vec3");
      record.color = [value[0], value[1], value[2]];
      return;
    case "size":
      if (typeof value !== "number") throw fail("number");
      record.size = value;
      return;
    case "visible":
      if (typeof value !== "boolean") throw fail("boolean");
      record.visible = value;
      return;
  }
}
