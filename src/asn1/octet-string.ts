import { ByteSlice } from "../common/byte-slice.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";

/**
 * OCTET STRING (primitive form only). Decoded values borrow the input.
 */
export const DerOctetString = Schema.primitive<ByteSlice>(
  "OCTET STRING",
  UniversalTag.OctetString,
  {
    contentLength: (value) => value.length,
    writeContent: (value, encoder) => encoder.writeBytes(value.bytes()),
    readContent: (content) => content,
  },
);
