import { gzipSync, unzipSync } from "node:zlib";

import { containerError } from "./errors.js";
import { decodeCbor, encodeCbor } from "./internal/util.js";
import type { ValueTree } from "./types.js";

export const DEFAULT_MAX_INFLATED_BYTES = 16 * 1024 * 1024;

export type UnwrapContainerOptions = {
  /** Upper bound on the decompressed size of the inner container. */
  maxInflatedBytes?: number;
  debug?: boolean;
  log?: (line: string) => void;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function assertMaxInflatedBytes(value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`maxInflatedBytes must be a positive integer, got: ${value}`);
  }
  return value;
}

function readOuterBytes(body: Uint8Array): Uint8Array {
  let outer: unknown;
  try {
    outer = decodeCbor(body);
  } catch (err) {
    throw containerError(`outer CBOR decode failed: ${errorMessage(err)}`, err);
  }
  if (!(outer instanceof Uint8Array)) throw containerError("outer CBOR item must be a byte string");
  return outer;
}

function inflate(compressed: Uint8Array, maxInflatedBytes: number): Uint8Array {
  try {
    return unzipSync(compressed, { maxOutputLength: maxInflatedBytes });
  } catch (err) {
    if (err instanceof RangeError) {
      throw containerError(`inflated payload exceeds ${maxInflatedBytes} bytes`, err);
    }
    throw containerError(`inflate failed: ${errorMessage(err)}`, err);
  }
}

function readInnerTree(inner: Uint8Array): ValueTree {
  try {
    return decodeCbor(inner);
  } catch (err) {
    throw containerError(`inner CBOR decode failed: ${errorMessage(err)}`, err);
  }
}

/**
 * CBOR byte string → gzip (or zlib) stream → CBOR value tree. Any failure
 * throws an `AccountExportError` of kind `container-decode`.
 */
export function unwrapContainer(body: Uint8Array, opts: UnwrapContainerOptions = {}): ValueTree {
  const maxInflatedBytes = assertMaxInflatedBytes(opts.maxInflatedBytes ?? DEFAULT_MAX_INFLATED_BYTES);
  const debug = Boolean(opts.debug);
  const log = opts.log ?? ((line) => console.debug(line));

  const outer = readOuterBytes(body);
  if (debug) log(`[account-export] outer container: ${outer.length} compressed bytes`);

  const inner = inflate(outer, maxInflatedBytes);
  if (debug) log(`[account-export] inflated: ${inner.length} bytes`);

  return readInnerTree(inner);
}

export function wrapContainer(tree: ValueTree): Uint8Array {
  return encodeCbor(new Uint8Array(gzipSync(encodeCbor(tree))));
}
