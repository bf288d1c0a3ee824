import { ByteSlice } from "../common/byte-slice.js";
import { checkBitString } from "../common/codecs.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";

export interface BitString {
  /** Number of padding bits in the last octet (0..7). */
  readonly unusedBits: number;
  readonly data: ByteSlice;
}

/**
 * BIT STRING (primitive form). Padding bits must be zero.
 */
export const DerBitString = Schema.primitive<BitString>("BIT STRING", UniversalTag.BitString, {
  contentLength: (value) => 1 + value.data.length,
  writeContent(value, encoder) {
    const data = value.data.bytes();
    checkBitString(value.unusedBits, data);
    encoder.writeByte(value.unusedBits);
    encoder.writeBytes(data);
  },
  readContent(content) {
    const bytes = content.bytes();
    if (bytes.length === 0) {
      throw new DerError(DerErrorKind.InvalidValue, "BIT STRING has no unused-bits octet");
    }
    const data = new ByteSlice(bytes, 1);
    checkBitString(bytes[0], data.bytes());
    return { unusedBits: bytes[0], data };
  },
});

/**
 * Bit string made of whole octets, the common case for keys and signatures.
 */
export function octetAligned(data: ByteSlice | Uint8Array): BitString {
  return { unusedBits: 0, data: data instanceof ByteSlice ? data : ByteSlice.from(data) };
}
