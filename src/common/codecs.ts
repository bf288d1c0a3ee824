/**
 * Byte helpers and content-octet codecs for ASN.1 DER values.
 *
 * The content codecs here work on the value octets only (no tag or length)
 * and throw {@link DerError} without an offset; the decoder positions them.
 */
import { DerError, DerErrorKind } from "./errors.js";

export function toHex(input: ArrayBuffer | Uint8Array): string {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, "");
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new Error(`Invalid hex string: '${hex}'`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function toUint8Array(input: Uint8Array | ArrayBuffer): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

export function encodeUtf8(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (cause) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `Malformed UTF-8 content: ${String(cause)}`,
    );
  }
}

export function decodeAscii(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    if (b > 0x7f) {
      throw new DerError(
        DerErrorKind.InvalidValue,
        `Non-ASCII octet 0x${b.toString(16).padStart(2, "0")}`,
      );
    }
    out += String.fromCharCode(b);
  }
  return out;
}

/**
 * Lexicographic comparison of raw DER bytes (a < b => negative, a > b => positive).
 */
export function compareUnsignedLex(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

// INTEGER

/**
 * Reject an INTEGER content whose first octet is redundant under
 * two's-complement sign extension.
 */
export function checkIntegerContent(bytes: Uint8Array): void {
  if (bytes.length === 0) {
    throw new DerError(DerErrorKind.InvalidValue, "INTEGER has no content octets");
  }
  if (bytes.length > 1) {
    const redundantZero = bytes[0] === 0x00 && (bytes[1] & 0x80) === 0;
    const redundantOnes = bytes[0] === 0xff && (bytes[1] & 0x80) !== 0;
    if (redundantZero || redundantOnes) {
      throw new DerError(
        DerErrorKind.NonCanonical,
        `INTEGER has a redundant leading 0x${bytes[0].toString(16).padStart(2, "0")} octet`,
      );
    }
  }
}

export function decodeIntegerContent(bytes: Uint8Array): bigint {
  checkIntegerContent(bytes);
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  if (bytes[0] & 0x80) n -= 1n << BigInt(bytes.length * 8);
  return n;
}

export function integerContentLength(value: bigint): number {
  let len = 1;
  // Smallest len with -2^(8len-1) <= value < 2^(8len-1)
  while (value >= 1n << BigInt(len * 8 - 1) || value < -(1n << BigInt(len * 8 - 1))) {
    len++;
  }
  return len;
}

export function encodeIntegerContent(value: bigint): Uint8Array {
  const len = integerContentLength(value);
  let n = value < 0n ? value + (1n << BigInt(len * 8)) : value;
  const out = new Uint8Array(len);
  for (let i = len - 1; i >= 0; i--) {
    out[i] = Number(n & 0xffn);
    n >>= 8n;
  }
  return out;
}

/**
 * Strip redundant leading zeros from an unsigned big-endian magnitude,
 * keeping at least one octet.
 */
export function trimUnsigned(bytes: Uint8Array): Uint8Array {
  let start = 0;
  while (start < bytes.length - 1 && bytes[start] === 0) start++;
  return bytes.length === 0 ? Uint8Array.of(0) : bytes.subarray(start);
}

// OBJECT IDENTIFIER

function parseArcs(oid: string): number[] {
  const parts = oid.split(".");
  if (parts.length < 2) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `OID must have at least two arcs; got '${oid}'`,
    );
  }
  return parts.map((s) => {
    if (!/^(0|[1-9][0-9]*)$/.test(s)) {
      throw new DerError(DerErrorKind.InvalidValue, `Invalid OID arc: '${s}' in '${oid}'`);
    }
    const n = Number(s);
    if (!Number.isSafeInteger(n)) {
      throw new DerError(DerErrorKind.Overflow, `OID arc ${s} is too large`);
    }
    return n;
  });
}

function oidSubidentifiers(oid: string): number[] {
  const arcs = parseArcs(oid);
  const [first, second] = arcs;
  if (first > 2) {
    throw new DerError(DerErrorKind.InvalidValue, `OID first arc must be 0, 1 or 2; got ${first}`);
  }
  if (first < 2 && second >= 40) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `OID second arc must be below 40 under arc ${first}; got ${second}`,
    );
  }
  const head = first * 40 + second;
  if (!Number.isSafeInteger(head)) {
    throw new DerError(DerErrorKind.Overflow, `OID arc ${second} is too large`);
  }
  return [head, ...arcs.slice(2)];
}

function base128Length(n: number): number {
  let len = 1;
  while (n >= 128) {
    n = Math.floor(n / 128);
    len++;
  }
  return len;
}

function encodeBase128(n: number, out: number[]): void {
  const len = base128Length(n);
  const start = out.length;
  for (let i = len - 1; i >= 0; i--) {
    out[start + i] = (n % 128) | (i === len - 1 ? 0x00 : 0x80);
    n = Math.floor(n / 128);
  }
}

export function oidContentLength(oid: string): number {
  return oidSubidentifiers(oid).reduce((sum, n) => sum + base128Length(n), 0);
}

export function encodeOidContent(oid: string): Uint8Array {
  const out: number[] = [];
  for (const n of oidSubidentifiers(oid)) encodeBase128(n, out);
  return Uint8Array.from(out);
}

export function decodeOidContent(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    throw new DerError(DerErrorKind.InvalidValue, "Empty OID encoding (0 bytes)");
  }
  const subidentifiers: number[] = [];
  let i = 0;
  while (i < bytes.length) {
    if (bytes[i] === 0x80) {
      throw new DerError(
        DerErrorKind.NonCanonical,
        `OID subidentifier at byte index ${i} has a redundant leading group`,
      );
    }
    let val = 0;
    let b: number;
    do {
      if (i >= bytes.length) {
        throw new DerError(DerErrorKind.InvalidValue, `Truncated OID at byte index ${i}`);
      }
      b = bytes[i++];
      val = val * 128 + (b & 0x7f);
      if (!Number.isSafeInteger(val)) {
        throw new DerError(DerErrorKind.Overflow, "OID arc exceeds the safe integer range");
      }
    } while (b & 0x80);
    subidentifiers.push(val);
  }

  const head = subidentifiers[0];
  const first = head < 40 ? 0 : head < 80 ? 1 : 2;
  const arcs = [first, head - first * 40, ...subidentifiers.slice(1)];
  return arcs.join(".");
}

// BIT STRING

export function checkBitString(unusedBits: number, data: Uint8Array): void {
  if (!Number.isInteger(unusedBits) || unusedBits < 0 || unusedBits > 7) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `BIT STRING unused bit count must be 0..7; got ${unusedBits}`,
    );
  }
  if (data.length === 0) {
    if (unusedBits !== 0) {
      throw new DerError(
        DerErrorKind.NonCanonical,
        `Empty BIT STRING declares ${unusedBits} unused bits`,
      );
    }
    return;
  }
  const mask = (1 << unusedBits) - 1;
  if ((data[data.length - 1] & mask) !== 0) {
    throw new DerError(DerErrorKind.NonCanonical, "BIT STRING padding bits are not zero");
  }
}
