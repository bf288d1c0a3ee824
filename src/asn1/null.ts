import { DerError, DerErrorKind } from "../common/errors.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";

export const DerNull = Schema.primitive<null>("NULL", UniversalTag.Null, {
  contentLength: () => 0,
  writeContent: () => {},
  readContent(content) {
    if (!content.isEmpty) {
      throw new DerError(
        DerErrorKind.InvalidValue,
        `NULL must have no content octets; got ${content.length}`,
      );
    }
    return null;
  },
});
