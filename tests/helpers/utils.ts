import assert from "assert";
import { DerError, type DerErrorKind } from "../../src/common/errors.js";
import { fromHex, toHex } from "../../src/common/codecs.js";
import type { DerType } from "../../src/schema/types.js";
import { SchemaBuilder } from "../../src/builder/schema-builder.js";
import { SchemaParser } from "../../src/parser/schema-parser.js";

export function fromHexString(hexString: string): ArrayBuffer {
  if (hexString.length % 2 !== 0) {
    throw new Error("Invalid hex string");
  }
  const byteLength = hexString.length / 2;
  const buffer = new ArrayBuffer(byteLength);
  const uint8 = new Uint8Array(buffer);
  for (let i = 0; i < byteLength; i++) {
    uint8[i] = parseInt(hexString.slice(i * 2, i * 2 + 2), 16);
  }
  return buffer;
}

/**
 * Assert that `fn` throws a DerError of `kind`, optionally at `offset`.
 */
export function assertDerError(
  fn: () => unknown,
  kind: DerErrorKind,
  offset?: number,
): void {
  assert.throws(fn, (e: unknown) => {
    assert.ok(e instanceof DerError, `expected DerError, got ${String(e)}`);
    assert.strictEqual(e.kind, kind, e.message);
    if (offset !== undefined) assert.strictEqual(e.offset, offset, e.message);
    return true;
  });
}

export function encodeHex<T>(type: DerType<T>, value: T): string {
  const bytes = new SchemaBuilder(type).build(value);
  assert.strictEqual(bytes.length, type.encodedLength(value));
  return toHex(bytes);
}

export function decodeHex<T>(type: DerType<T>, hex: string): T {
  return new SchemaParser(type).parse(fromHex(hex));
}

export function asciiHex(text: string): string {
  return Buffer.from(text, "latin1").toString("hex");
}
