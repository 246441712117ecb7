import { deflateSync, gzipSync } from "node:zlib";

import { encode } from "cborg";
import { expect, test } from "vitest";

import { unwrapContainer, wrapContainer } from "../src/container.js";
import { AccountExportError } from "../src/errors.js";

function unwrapFailure(body: Uint8Array, maxInflatedBytes?: number): AccountExportError {
  try {
    unwrapContainer(body, { maxInflatedBytes });
  } catch (err) {
    if (err instanceof AccountExportError) return err;
    throw err;
  }
  throw new Error("expected unwrapContainer to fail");
}

test("container: unwraps what wrapContainer produces", () => {
  expect(unwrapContainer(wrapContainer([1, "a", true, null]))).toEqual([1, "a", true, null]);
});

test("container: byte strings and maps survive the layers", () => {
  const tree = unwrapContainer(wrapContainer([new Uint8Array([9, 8, 7]), new Map([["k", 1]])]));
  if (!Array.isArray(tree)) throw new Error("expected an array");
  const [bytes, map] = tree;
  expect(bytes).toBeInstanceOf(Uint8Array);
  expect(Array.from(bytes)).toEqual([9, 8, 7]);
  expect(map).toEqual(new Map([["k", 1]]));
});

test("container: accepts a zlib stream as well as gzip", () => {
  const body = encode(new Uint8Array(deflateSync(encode([7, "seven"]))));
  expect(unwrapContainer(body)).toEqual([7, "seven"]);
});

test("container: body that is not CBOR", () => {
  const err = unwrapFailure(new Uint8Array([0x1c]));
  expect(err.kind).toBe("container-decode");
  expect(err.message).toMatch(/^outer CBOR decode failed: /);
  expect(err.cause).toBeInstanceOf(Error);
});

test("container: outer item that is not a byte string", () => {
  const err = unwrapFailure(encode("not bytes"));
  expect(err.kind).toBe("container-decode");
  expect(err.message).toBe("outer CBOR item must be a byte string");
});

test("container: trailing data after the outer item", () => {
  const wrapped = wrapContainer([1]);
  const body = new Uint8Array(wrapped.length + 1);
  body.set(wrapped, 0);
  const err = unwrapFailure(body);
  expect(err.kind).toBe("container-decode");
  expect(err.message).toMatch(/^outer CBOR decode failed: /);
});

test("container: outer bytes that are not compressed", () => {
  const err = unwrapFailure(encode(new Uint8Array([1, 2, 3, 4])));
  expect(err.kind).toBe("container-decode");
  expect(err.message).toMatch(/^inflate failed: /);
});

test("container: truncated gzip stream", () => {
  const gz = new Uint8Array(gzipSync(encode([1, 2, 3])));
  const err = unwrapFailure(encode(gz.subarray(0, gz.length - 6)));
  expect(err.kind).toBe("container-decode");
  expect(err.message).toMatch(/^inflate failed: /);
});

test("container: inflated bytes that are not CBOR", () => {
  const err = unwrapFailure(encode(new Uint8Array(gzipSync(new Uint8Array([0x1c])))));
  expect(err.kind).toBe("container-decode");
  expect(err.message).toMatch(/^inner CBOR decode failed: /);
});

test("container: inflated size is capped", () => {
  const body = wrapContainer(new Uint8Array(1000));
  const err = unwrapFailure(body, 100);
  expect(err.kind).toBe("container-decode");
  expect(err.message).toBe("inflated payload exceeds 100 bytes");

  const tree = unwrapContainer(body, { maxInflatedBytes: 2000 });
  expect(tree).toBeInstanceOf(Uint8Array);
  expect(tree).toHaveLength(1000);
});

test("container: rejects a non-positive cap", () => {
  expect(() => unwrapContainer(wrapContainer([1]), { maxInflatedBytes: 0 })).toThrow(
    "maxInflatedBytes must be a positive integer, got: 0",
  );
});

test("container: debug lines go to the supplied log", () => {
  const lines: string[] = [];
  unwrapContainer(wrapContainer([1, "a", true]), { debug: true, log: (line) => lines.push(line) });
  expect(lines).toHaveLength(2);
  expect(lines[0]).toMatch(/^\[account-export\] outer container: \d+ compressed bytes$/);
  expect(lines[1]).toBe("[account-export] inflated: 5 bytes");
});

test("container: nothing is logged without debug", () => {
  const lines: string[] = [];
  unwrapContainer(wrapContainer([1]), { log: (line) => lines.push(line) });
  expect(lines).toEqual([]);
});
