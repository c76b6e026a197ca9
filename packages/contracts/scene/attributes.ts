/**
 * Node attribute values.
 *
 * Attributes are restricted to a closed set of plain-data variants so they
 * can be snapshotted, validated and printed. RGB colors use the Vec3 variant.
 */

import type { Mat3, Vec2, Vec3 } from "../core/vectors";

export type AttributeValue =
  | number
  | boolean
  | string
  | Vec2
  | Vec3
  | Mat3
  | Vec3[];

export type AttributeShape =
  | "number"
  | "boolean"
  | "string"
  | "vec2"
  | "vec3"
  | "mat3"
  | "vec3[]";

export type AttributeMap = Record<string, AttributeValue>;

function isNumberTuple(value: AttributeValue, length: number): boolean {
  if (!Array.isArray(value) || value.length !== length) return false;
  for (let i = 0; i < length; i++) {
    if (typeof value[i] !== "number") return false;
  }
  return true;
}

export function isVec2(value: AttributeValue): value is Vec2 {
  return isNumberTuple(value, 2);
}

export function isVec3(value: AttributeValue): value is Vec3 {
  return isNumberTuple(value, 3);
}

export function isMat3(value: AttributeValue): value is Mat3 {
  return isNumberTuple(value, 9);
}

/** An empty array counts as an (empty) vertex list. */
export function isVec3List(value: AttributeValue): value is Vec3[] {
  if (!Array.isArray(value)) return false;
  for (let i = 0; i < value.length; i++) {
    const item = value[i];
    if (!Array.isArray(item) || !isNumberTuple(item, 3)) return false;
  }
  return true;
}

/**
 * Classify a value. Returns null for arrays that match no variant.
 */
export function attributeShape(value: AttributeValue): AttributeShape | null {
  switch (typeof value) {
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    case "string":
      return "string";
  }
  if (isVec3List(value)) return "vec3[]";
  if (isVec2(value)) return "vec2";
  if (isVec3(value)) return "vec3";
  if (isMat3(value)) return "mat3";
  return null;
}

/**
 * Deep copy of an attribute value. Scalars are returned as-is.
 */
export function cloneAttribute(value: AttributeValue): AttributeValue {
  if (!Array.isArray(value)) return value;
  if (isVec3List(value)) {
    return value.map((v): Vec3 => [v[0], v[1], v[2]]);
  }
  if (isVec2(value)) return [value[0], value[1]];
  if (isVec3(value)) return [value[0], value[1], value[2]];
  if (isMat3(value)) {
    const [a, b, c, d, e, f, g, h, i] = value;
    return [a, b, c, d, e, f, g, h, i];
  }
  throw new Error("Unsupported attribute value");
}

/**
 * Single-line textual form used in logs and replay errors.
 */
export function formatAttribute(value: AttributeValue): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (!Array.isArray(value)) return String(value);
  return JSON.stringify(value);
}
