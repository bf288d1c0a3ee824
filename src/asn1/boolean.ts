import { DerError, DerErrorKind } from "../common/errors.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";

/**
 * BOOLEAN. DER allows only 0x00 and 0xFF.
 */
export const DerBoolean = Schema.primitive<boolean>("BOOLEAN", UniversalTag.Boolean, {
  contentLength: () => 1,
  writeContent: (value, encoder) => encoder.writeByte(value ? 0xff : 0x00),
  readContent(content) {
    const bytes = content.bytes();
    if (bytes.length !== 1) {
      throw new DerError(
        DerErrorKind.InvalidValue,
        `BOOLEAN needs exactly 1 content octet; got ${bytes.length}`,
      );
    }
    if (bytes[0] === 0x00) return false;
    if (bytes[0] === 0xff) return true;
    throw new DerError(
      DerErrorKind.NonCanonical,
      `BOOLEAN content must be 0x00 or 0xFF; got 0x${bytes[0].toString(16).padStart(2, "0")}`,
    );
  },
});
