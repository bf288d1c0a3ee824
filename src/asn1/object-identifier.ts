import { decodeOidContent, encodeOidContent, oidContentLength } from "../common/codecs.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";

/**
 * OBJECT IDENTIFIER in dotted-decimal form, e.g. "1.2.840.113549.1.1.1".
 */
export const DerObjectIdentifier = Schema.primitive<string>(
  "OBJECT IDENTIFIER",
  UniversalTag.ObjectIdentifier,
  {
    contentLength: (value) => oidContentLength(value),
    writeContent: (value, encoder) => encoder.writeBytes(encodeOidContent(value)),
    readContent: (content) => decodeOidContent(content.bytes()),
  },
);
