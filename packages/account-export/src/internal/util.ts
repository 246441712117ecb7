import { Buffer } from "node:buffer";

import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";

import { schemaError } from "../errors.js";

export function encodeCbor(value: unknown): Uint8Array {
  return cborEncode(value, rfc8949EncodeOptions);
}

export function decodeCbor(bytes: Uint8Array): unknown {
  return cborDecode(bytes, { useMaps: true });
}

export function assertArray(val: unknown, field: string): readonly unknown[] {
  if (!Array.isArray(val)) throw schemaError(field, "must be an array");
  return val;
}

export function elementAt(arr: readonly unknown[], index: number, field: string): unknown {
  if (index >= arr.length) throw schemaError(field, `is missing (array has ${arr.length} elements)`);
  return arr[index];
}

export function assertString(val: unknown, field: string): string {
  if (typeof val !== "string") throw schemaError(field, "must be a string");
  return val;
}

export function assertBoolean(val: unknown, field: string): boolean {
  if (typeof val !== "boolean") throw schemaError(field, "must be a boolean");
  return val;
}

export function assertInteger(val: unknown, field: string): number {
  if (typeof val === "bigint") {
    if (val < BigInt(Number.MIN_SAFE_INTEGER) || val > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw schemaError(field, `is out of safe integer range: ${val}`);
    }
    return Number(val);
  }
  if (typeof val !== "number" || !Number.isSafeInteger(val)) throw schemaError(field, "must be an integer");
  return val;
}

/** Text passes through; a byte string becomes standard base64. */
export function assertStringOrBytes(val: unknown, field: string): string {
  if (val instanceof Uint8Array) return Buffer.from(val).toString("base64");
  if (typeof val !== "string") throw schemaError(field, "must be a string or bytes");
  return val;
}
