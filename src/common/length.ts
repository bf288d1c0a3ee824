import { DerError, DerErrorKind } from "./errors.js";
import { MAX_LENGTH } from "./types.js";

function assertEncodableLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new DerError(
      DerErrorKind.InvalidLength,
      `Length must be a non-negative integer; got ${length}`,
    );
  }
  if (length > MAX_LENGTH) {
    throw new DerError(
      DerErrorKind.Overflow,
      `Length ${length} exceeds ${MAX_LENGTH}`,
    );
  }
}

/**
 * Number of octets the canonical encoding of `length` occupies.
 */
export function encodedLengthSize(length: number): number {
  assertEncodableLength(length);
  if (length < 128) return 1;
  let n = 0;
  let temp = length;
  do {
    n++;
    temp = Math.floor(temp / 256);
  } while (temp > 0);
  return 1 + n;
}

export function encodeLength(length: number): Uint8Array {
  const size = encodedLengthSize(length);
  if (size === 1) return Uint8Array.of(length);

  const out = new Uint8Array(size);
  out[0] = 0x80 | (size - 1);
  let temp = length;
  for (let i = size - 1; i >= 1; i--) {
    out[i] = temp % 256;
    temp = Math.floor(temp / 256);
  }
  return out;
}

/**
 * Read a definite length starting at `offset`.
 *
 * Only the minimal form is accepted: short form below 128, otherwise the
 * fewest big-endian octets with no leading zero.
 */
export function decodeLength(
  bytes: Uint8Array,
  offset: number,
  end: number = bytes.length,
): { length: number; newOffset: number } {
  const start = offset;
  if (offset >= end) {
    throw new DerError(DerErrorKind.Incomplete, "Missing length octet", offset);
  }
  const first = bytes[offset++];
  if ((first & 0x80) === 0) {
    return { length: first, newOffset: offset };
  }
  // DER forbids indefinite length (0x80)
  if (first === 0x80) {
    throw new DerError(
      DerErrorKind.InvalidLength,
      "Indefinite length encoding is not allowed (DER)",
      start,
    );
  }
  if (first === 0xff) {
    throw new DerError(
      DerErrorKind.InvalidLength,
      "Length octet 0xFF is reserved",
      start,
    );
  }

  const numBytes = first & 0x7f;
  if (numBytes > 4) {
    throw new DerError(
      DerErrorKind.Overflow,
      `Length of ${numBytes} octets exceeds ${MAX_LENGTH}`,
      start,
    );
  }
  if (offset + numBytes > end) {
    throw new DerError(DerErrorKind.Incomplete, "Truncated length", start);
  }
  if (bytes[offset] === 0x00) {
    throw new DerError(
      DerErrorKind.InvalidLength,
      "Long-form length has a leading zero octet",
      start,
    );
  }

  let length = 0;
  for (let i = 0; i < numBytes; i++) {
    length = length * 256 + bytes[offset++];
  }
  if (length < 128) {
    throw new DerError(
      DerErrorKind.InvalidLength,
      `Length ${length} must use the short form`,
      start,
    );
  }
  return { length, newOffset: offset };
}
