import { decodeAscii, decodeUtf8, encodeUtf8 } from "../common/codecs.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";
import type { TaggedType } from "../schema/types.js";

const PRINTABLE = /^[A-Za-z0-9 '()+,\-./:=?]*$/;
const IA5 = /^[\x00-\x7f]*$/;

function restrictedString(
  name: string,
  tagNumber: number,
  allowed: RegExp,
): TaggedType<string> {
  const check = (value: string): string => {
    if (!allowed.test(value)) {
      throw new DerError(
        DerErrorKind.InvalidValue,
        `${name} contains a character outside its set: '${value}'`,
      );
    }
    return value;
  };
  return Schema.primitive<string>(name, tagNumber, {
    contentLength: (value) => check(value).length,
    writeContent: (value, encoder) => encoder.writeBytes(encodeUtf8(check(value))),
    readContent: (content) => check(decodeAscii(content.bytes())),
  });
}

export const DerUtf8String = Schema.primitive<string>("UTF8String", UniversalTag.Utf8String, {
  contentLength: (value) => encodeUtf8(value).length,
  writeContent: (value, encoder) => encoder.writeBytes(encodeUtf8(value)),
  readContent: (content) => decodeUtf8(content.bytes()),
});

export const DerPrintableString = restrictedString(
  "PrintableString",
  UniversalTag.PrintableString,
  PRINTABLE,
);

export const DerIa5String = restrictedString("IA5String", UniversalTag.Ia5String, IA5);
