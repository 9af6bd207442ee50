import { DecodeError } from "../../errors";
import type { Quat, Vec3 } from "../messages/types";

/**
 * A decoded-but-untyped JSON object, as it appears on the wire.
 */
export type WireObject = { [key: string]: WireValue };
export type WireValue = string | number | boolean | null | WireValue[] | WireObject;

/**
 * Field readers used by message schemas.
 *
 * Each reader validates presence and type of a single field and throws a
 * DecodeError naming the field, so schemas read top-to-bottom without
 * repeating the checks.
 */

export function isWireObject(value: unknown): value is WireObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function missing(obj: WireObject, key: string): boolean {
  return !(key in obj) || obj[key] === null;
}

function fail(key: string, expected: string): DecodeError {
  return new DecodeError("invalid-field", `Field "${key}" must be ${expected}`);
}

export function readString(obj: WireObject, key: string): string {
  if (missing(obj, key)) {
    throw new DecodeError("missing-field", `Missing required field "${key}"`);
  }
  const value = obj[key];
  if (typeof value !== "string") throw fail(key, "a string");
  return value;
}

export function readOptionalString(obj: WireObject, key: string): string | undefined {
  return missing(obj, key) ? undefined : readString(obj, key);
}

export function readNumber(obj: WireObject, key: string): number {
  if (missing(obj, key)) {
    throw new DecodeError("missing-field", `Missing required field "${key}"`);
  }
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) throw fail(key, "a finite number");
  return value;
}

export function readOptionalNumber(obj: WireObject, key: string): number | undefined {
  return missing(obj, key) ? undefined : readNumber(obj, key);
}

export function readInteger(obj: WireObject, key: string, min: number = 0): number {
  const value = readNumber(obj, key);
  if (!Number.isInteger(value) || value < min) throw fail(key, `an integer >= ${min}`);
  return value;
}

export function readOptionalBoolean(obj: WireObject, key: string): boolean | undefined {
  if (missing(obj, key)) return undefined;
  const value = obj[key];
  if (typeof value !== "boolean") throw fail(key, "a boolean");
  return value;
}

export function readObject(obj: WireObject, key: string): WireObject {
  if (missing(obj, key)) {
    throw new DecodeError("missing-field", `Missing required field "${key}"`);
  }
  const value = obj[key];
  if (!isWireObject(value)) throw fail(key, "an object");
  return value;
}

export function readArray(obj: WireObject, key: string): WireValue[] {
  if (missing(obj, key)) {
    throw new DecodeError("missing-field", `Missing required field "${key}"`);
  }
  const value = obj[key];
  if (!Array.isArray(value)) throw fail(key, "an array");
  return value;
}

export function readStringArray(obj: WireObject, key: string): string[] {
  const items = readArray(obj, key);
  const out: string[] = [];
  for (const item of items) {
    if (typeof item !== "string") throw fail(key, "an array of strings");
    out.push(item);
  }
  return out;
}

export function readOptionalStringArray(obj: WireObject, key: string): string[] | undefined {
  return missing(obj, key) ? undefined : readStringArray(obj, key);
}

export function readVec3(obj: WireObject, key: string): Vec3 {
  const v = readObject(obj, key);
  return { x: readNumber(v, "x"), y: readNumber(v, "y"), z: readNumber(v, "z") };
}

export function readQuat(obj: WireObject, key: string): Quat {
  const q = readObject(obj, key);
  return { x: readNumber(q, "x"), y: readNumber(q, "y"), z: readNumber(q, "z"), w: readNumber(q, "w") };
}

export function vec3ToWire(v: Vec3): WireObject {
  return { x: v.x, y: v.y, z: v.z };
}

export function quatToWire(q: Quat): WireObject {
  return { x: q.x, y: q.y, z: q.z, w: q.w };
}
