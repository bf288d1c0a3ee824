import { decodeAscii, encodeUtf8 } from "../common/codecs.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import { UniversalTag } from "../common/tag.js";
import { Schema } from "../schema/schema.js";
import type { DerType } from "../schema/types.js";

const UTC_TIME = /^(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})Z$/;
const UTC_TIME_LOOSE = /^\d{10}(\d{2})?(Z|[+-]\d{4})?$/;
const GENERALIZED_TIME = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?:\.(\d+))?Z$/;
const GENERALIZED_TIME_LOOSE = /^\d{10}(\d{2}(\d{2}([.,]\d*)?)?)?(Z|[+-]\d{4})?$/;

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

function makeDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millis = 0,
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `Not a calendar date: ${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)} ${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}`,
    );
  }
  return date;
}

function checkDate(date: Date): void {
  if (Number.isNaN(date.getTime())) {
    throw new DerError(DerErrorKind.InvalidValue, "Invalid Date");
  }
}

function formatUtcTime(date: Date): string {
  checkDate(date);
  const year = date.getUTCFullYear();
  if (year < 1950 || year > 2049) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `UTCTime covers 1950 to 2049; got year ${year}`,
    );
  }
  if (date.getUTCMilliseconds() !== 0) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `UTCTime has whole seconds only; got ${date.toISOString()}`,
    );
  }
  return (
    pad(year % 100, 2) +
    pad(date.getUTCMonth() + 1, 2) +
    pad(date.getUTCDate(), 2) +
    pad(date.getUTCHours(), 2) +
    pad(date.getUTCMinutes(), 2) +
    pad(date.getUTCSeconds(), 2) +
    "Z"
  );
}

function parseUtcTime(text: string): Date {
  const m = UTC_TIME.exec(text);
  if (!m) {
    throw new DerError(
      UTC_TIME_LOOSE.test(text) ? DerErrorKind.NonCanonical : DerErrorKind.InvalidValue,
      `UTCTime must read YYMMDDHHMMSSZ; got '${text}'`,
    );
  }
  const [yy, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  return makeDate(yy >= 50 ? 1900 + yy : 2000 + yy, month, day, hour, minute, second);
}

function formatGeneralizedTime(date: Date): string {
  checkDate(date);
  const year = date.getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `GeneralizedTime covers years 0 to 9999; got ${year}`,
    );
  }
  const millis = date.getUTCMilliseconds();
  const fraction = millis === 0 ? "" : "." + pad(millis, 3).replace(/0+$/, "");
  return (
    pad(year, 4) +
    pad(date.getUTCMonth() + 1, 2) +
    pad(date.getUTCDate(), 2) +
    pad(date.getUTCHours(), 2) +
    pad(date.getUTCMinutes(), 2) +
    pad(date.getUTCSeconds(), 2) +
    fraction +
    "Z"
  );
}

function parseGeneralizedTime(text: string): Date {
  const m = GENERALIZED_TIME.exec(text);
  if (!m) {
    throw new DerError(
      GENERALIZED_TIME_LOOSE.test(text) ? DerErrorKind.NonCanonical : DerErrorKind.InvalidValue,
      `GeneralizedTime must read YYYYMMDDHHMMSS[.fff]Z; got '${text}'`,
    );
  }
  const fraction = m[7];
  if (fraction !== undefined && fraction.endsWith("0")) {
    throw new DerError(
      DerErrorKind.NonCanonical,
      `GeneralizedTime fraction has trailing zeros: '${text}'`,
    );
  }
  if (fraction !== undefined && fraction.length > 3) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `GeneralizedTime fraction finer than milliseconds: '${text}'`,
    );
  }
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  const millis = fraction === undefined ? 0 : Number(fraction.padEnd(3, "0"));
  return makeDate(year, month, day, hour, minute, second, millis);
}

/**
 * UTCTime, `YYMMDDHHMMSSZ`. Two-digit years 50..99 are 19xx.
 */
export const DerUtcTime = Schema.primitive<Date>("UTCTime", UniversalTag.UtcTime, {
  contentLength: (value) => formatUtcTime(value).length,
  writeContent: (value, encoder) => encoder.writeBytes(encodeUtf8(formatUtcTime(value))),
  readContent: (content) => parseUtcTime(decodeAscii(content.bytes())),
});

/**
 * GeneralizedTime, `YYYYMMDDHHMMSS[.fff]Z`.
 */
export const DerGeneralizedTime = Schema.primitive<Date>(
  "GeneralizedTime",
  UniversalTag.GeneralizedTime,
  {
    contentLength: (value) => formatGeneralizedTime(value).length,
    writeContent: (value, encoder) =>
      encoder.writeBytes(encodeUtf8(formatGeneralizedTime(value))),
    readContent: (content) => parseGeneralizedTime(decodeAscii(content.bytes())),
  },
);

function timeTypeFor(value: Date): DerType<Date> {
  checkDate(value);
  const year = value.getUTCFullYear();
  return year >= 1950 && year < 2050 ? DerUtcTime : DerGeneralizedTime;
}

/**
 * X.509 `Time ::= CHOICE { utcTime UTCTime, generalTime GeneralizedTime }`.
 * Dates in 1950..2049 are written as UTCTime, so they must fall on a
 * whole second.
 */
export const DerTime: DerType<Date> = {
  name: "Time",
  matches: (tag) => DerUtcTime.matches(tag) || DerGeneralizedTime.matches(tag),
  tagOf: (value) => timeTypeFor(value).tagOf(value),
  encodedLength: (value) => timeTypeFor(value).encodedLength(value),
  encode: (value, encoder) => timeTypeFor(value).encode(value, encoder),
  decode(decoder) {
    const tag = decoder.peekTag();
    if (tag !== null && DerGeneralizedTime.matches(tag)) {
      return DerGeneralizedTime.decode(decoder);
    }
    return DerUtcTime.decode(decoder);
  },
};
