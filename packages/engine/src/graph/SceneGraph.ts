import { Matrix3, Vector3 } from "three";
import {
  attributeShape,
  cloneAttribute,
  identityMat3,
  WHITE,
  type AttributeValue,
  type ColorRGB,
  type NodeId,
  type NodeInit,
  type NodeKind,
} from "@linework/contracts";
import { AttributeError, CompositionError } from "../errors";
import { toMatrix3, toVector3 } from "./math";
import { kindDefaults } from "./schema";
import { SceneNode } from "./SceneNode";

/**
 * Storage for one node. Transforms are kept as three.js math objects; every
 * other value is plain data.
 */
export interface NodeRecord {
  readonly id: NodeId;
  readonly kind: NodeKind;
  parent: NodeId | null;
  children: NodeId[];
  position: Vector3;
  orientation: Matrix3;
  opacity: number;
  color: ColorRGB;
  size: number;
  visible: boolean;
  attributes: Map<string, AttributeValue>;
  extensions: Map<string, AttributeValue>;
}

export interface GlobalTransform {
  position: Vector3;
  orientation: Matrix3;
}

function cloneValues(values: Map<string, AttributeValue>): Map<string, AttributeValue> {
  const out = new Map<string, AttributeValue>();
  for (const [name, value] of values) {
    out.set(name, cloneAttribute(value));
  }
  return out;
}

export function cloneRecord(record: NodeRecord): NodeRecord {
  return {
    id: record.id,
    kind: record.kind,
    parent: record.parent,
    children: [...record.children],
    position: record.position.clone(),
    orientation: record.orientation.clone(),
    opacity: record.opacity,
    color: [record.color[0], record.color[1], record.color[2]],
    size: record.size,
    visible: record.visible,
    attributes: cloneValues(record.attributes),
    extensions: cloneValues(record.extensions),
  };
}

/**
 * Arena of scene nodes.
 *
 * Nodes are addressed by index. A parent link is written once, when the
 * node is attached, and only to a parent created earlier (lower id), so
 * every edge points from a lower id to a higher one and the graph cannot
 * contain a cycle.
 */
export class SceneGraph {
  private records: NodeRecord[] = [];

  get size(): number {
    return this.records.length;
  }

  create(kind: NodeKind, init: NodeInit = {}): SceneNode {
    const attributes = new Map<string, AttributeValue>(Object.entries(kindDefaults(kind)));

    for (const [name, value] of Object.entries(init.attributes ?? {})) {
      const current = attributes.get(name);
      if (current === undefined) {
        throw new AttributeError(`Node kind "${kind}" has no attribute "${name}"`);
      }
      if (attributeShape(value) !== attributeShape(current)) {
        throw new AttributeError(
          `Attribute "${name}" of "${kind}" expects ${attributeShape(current)}, got ${attributeShape(value)}`
        );
      }
      attributes.set(name, cloneAttribute(value));
    }

    const color = init.color ?? WHITE;
    const record: NodeRecord = {
      id: this.records.length,
      kind,
      parent: null,
      children: [],
      position: toVector3(init.position ?? [0, 0, 0]),
      orientation: toMatrix3(init.orientation ?? identityMat3()),
      opacity: init.opacity ?? 1,
      color: [color[0], color[1], color[2]],
      size: init.size ?? 1,
      visible: init.visible ?? true,
      attributes,
      extensions: new Map(),
    };
    this.records.push(record);
    return new SceneNode(this, record.id);
  }

  has(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.records.length;
  }

  record(id: NodeId): NodeRecord {
    if (!this.has(id)) {
      throw new CompositionError(`Unknown node id ${id}`);
    }
    return this.records[id];
  }

  node(id: NodeId): SceneNode {
    this.record(id);
    return new SceneNode(this, id);
  }

  /**
   * Attaches children in order. Nested arrays are flattened depth-first.
   * Every candidate is validated before any link is written; on error
   * nothing changes.
   */
  attach(parentId: NodeId, children: readonly unknown[]): void {
    const parent = this.record(parentId);
    const flat: SceneNode[] = [];
    this.collect(children, flat);

    const seen = new Set<NodeId>();
    for (const child of flat) {
      if (child.graph !== this) {
        throw new CompositionError(`Node ${child.id} belongs to another scene graph`);
      }
      const record = this.record(child.id);
      if (record.parent !== null || seen.has(child.id)) {
        throw new CompositionError(`Node ${child.id} already has a parent`);
      }
      if (child.id <= parent.id) {
        throw new CompositionError(
          `Node ${child.id} cannot be attached to node ${parent.id}: children must be created after their parent`
        );
      }
      seen.add(child.id);
    }

    for (const child of flat) {
      this.records[child.id].parent = parent.id;
      parent.children.push(child.id);
    }
  }

  private collect(items: readonly unknown[], out: SceneNode[]): void {
    for (const item of items) {
      if (item instanceof SceneNode) {
        out.push(item);
      } else if (Array.isArray(item)) {
        this.collect(item, out);
      } else {
        throw new CompositionError(`${describe(item)} is not a scene node`);
      }
    }
  }

  /** Ids of the subtree rooted at `id`, parents before children. */
  subtree(id: NodeId): NodeId[] {
    const ids: NodeId[] = [];
    const stack = [id];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined) break;
      ids.push(next);
      const { children } = this.record(next);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
    return ids;
  }

  /** Independent deep copies of every record in the subtree. */
  snapshot(id: NodeId): NodeRecord[] {
    return this.subtree(id).map((nodeId) => cloneRecord(this.record(nodeId)));
  }

  /**
   * Writes copies of snapshot records back in place. Handles to the
   * restored nodes stay valid; the snapshot can be restored again.
   */
  restore(snapshot: readonly NodeRecord[]): void {
    for (const saved of snapshot) {
      this.record(saved.id);
      this.records[saved.id] = cloneRecord(saved);
    }
  }

  /**
   * Composes transforms down the ancestor chain. The parent of a root-level
   * node is the world frame, so a root's global transform is its local one.
   */
  globalTransform(id: NodeId): GlobalTransform {
    const record = this.record(id);
    if (record.parent === null) {
      return {
        position: record.position.clone(),
        orientation: record.orientation.clone(),
      };
    }
    const parent = this.globalTransform(record.parent);
    return {
      position: record.position.clone().applyMatrix3(parent.orientation).add(parent.position),
      orientation: new Matrix3().multiplyMatrices(record.orientation, parent.orientation),
    };
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (value === null || value === undefined) return String(value);
  if (typeof value === "object") return Object.prototype.toString.call(value);
  return String(value);
}
