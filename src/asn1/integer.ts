import { ByteSlice } from "../common/byte-slice.js";
import {
  checkIntegerContent,
  decodeIntegerContent,
  encodeIntegerContent,
  integerContentLength,
  trimUnsigned,
} from "../common/codecs.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";

/**
 * INTEGER as a signed bigint.
 */
export const DerInteger = Schema.primitive<bigint>("INTEGER", UniversalTag.Integer, {
  contentLength: (value) => integerContentLength(value),
  writeContent: (value, encoder) => encoder.writeBytes(encodeIntegerContent(value)),
  readContent: (content) => decodeIntegerContent(content.bytes()),
});

/**
 * INTEGER restricted to the safe integer range of `number`.
 */
export const DerSafeInteger = Schema.primitive<number>("INTEGER", UniversalTag.Integer, {
  contentLength: (value) => integerContentLength(toBigInt(value)),
  writeContent: (value, encoder) =>
    encoder.writeBytes(encodeIntegerContent(toBigInt(value))),
  readContent(content) {
    const n = decodeIntegerContent(content.bytes());
    if (n > BigInt(Number.MAX_SAFE_INTEGER) || n < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new DerError(DerErrorKind.Overflow, `INTEGER ${n} does not fit a safe integer`);
    }
    return Number(n);
  },
});

function toBigInt(value: number): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new DerError(DerErrorKind.InvalidValue, `Not a safe integer: ${value}`);
  }
  return BigInt(value);
}

/**
 * Unsigned big-endian magnitude of a non-negative INTEGER, without the
 * sign octet. Used for key material that should not pass through bigint.
 */
export const DerUintBytes = Schema.primitive<ByteSlice>("INTEGER", UniversalTag.Integer, {
  contentLength(value) {
    const magnitude = trimUnsigned(value.bytes());
    return magnitude.length + (magnitude[0] & 0x80 ? 1 : 0);
  },
  writeContent(value, encoder) {
    const magnitude = trimUnsigned(value.bytes());
    if (magnitude[0] & 0x80) encoder.writeByte(0x00);
    encoder.writeBytes(magnitude);
  },
  readContent(content) {
    const bytes = content.bytes();
    checkIntegerContent(bytes);
    if (bytes[0] & 0x80) {
      throw new DerError(DerErrorKind.InvalidValue, "Unsigned INTEGER is negative");
    }
    if (bytes.length > 1 && bytes[0] === 0x00) {
      return new ByteSlice(bytes, 1);
    }
    return content;
  },
});
