import { DerError, DerErrorKind } from "./errors.js";
import { MAX_TAG_NUMBER, TagClass, type TagInfo } from "./types.js";

/**
 * UNIVERSAL tag numbers of the types this codec knows.
 */
export const UniversalTag = {
  Boolean: 1,
  Integer: 2,
  BitString: 3,
  OctetString: 4,
  Null: 5,
  ObjectIdentifier: 6,
  Utf8String: 12,
  Sequence: 16,
  Set: 17,
  PrintableString: 19,
  Ia5String: 22,
  UtcTime: 23,
  GeneralizedTime: 24,
} as const;
export type UniversalTag = (typeof UniversalTag)[keyof typeof UniversalTag];

const TAG_CLASS_NAMES = ["UNIVERSAL", "APPLICATION", "CONTEXT", "PRIVATE"];

/**
 * Convert tag class bits into a TagClass value.
 */
function getTagClass(bits: number): TagClass {
  switch (bits) {
    case 0:
      return TagClass.Universal;
    case 1:
      return TagClass.Application;
    case 2:
      return TagClass.ContextSpecific;
    default:
      return TagClass.Private;
  }
}

/**
 * Read an identifier octet sequence starting at `offset`.
 *
 * Rejects every form X.690 allows but DER does not: a leading 0x80
 * continuation group and the high-tag-number form for numbers below 31.
 */
export function decodeTag(
  bytes: Uint8Array,
  offset: number,
  end: number = bytes.length,
): { tag: TagInfo; newOffset: number } {
  const start = offset;
  if (offset >= end) {
    throw new DerError(DerErrorKind.Incomplete, "Missing tag octet", offset);
  }
  const firstByte = bytes[offset++];
  const tagClass = getTagClass((firstByte & 0xc0) >> 6);
  const constructed = (firstByte & 0x20) !== 0;
  let tagNumber = firstByte & 0x1f;

  if (tagNumber === 0x1f) {
    if (offset < end && bytes[offset] === 0x80) {
      throw new DerError(
        DerErrorKind.InvalidTag,
        "High tag number has a leading zero group",
        offset,
      );
    }
    tagNumber = 0;
    let b: number;
    do {
      if (offset >= end) {
        throw new DerError(
          DerErrorKind.InvalidTag,
          "Unterminated high tag number",
          start,
        );
      }
      b = bytes[offset++];
      tagNumber = tagNumber * 128 + (b & 0x7f);
      if (tagNumber > MAX_TAG_NUMBER) {
        throw new DerError(
          DerErrorKind.InvalidTag,
          `Tag number exceeds ${MAX_TAG_NUMBER}`,
          start,
        );
      }
    } while (b & 0x80);

    if (tagNumber < 31) {
      throw new DerError(
        DerErrorKind.InvalidTag,
        `Tag number ${tagNumber} must use the single-octet form`,
        start,
      );
    }
  }

  return { tag: { tagClass, constructed, tagNumber }, newOffset: offset };
}

function assertEncodableTag(tag: TagInfo): void {
  const { tagClass, tagNumber } = tag;
  if (!Number.isInteger(tagNumber) || tagNumber < 0 || tagNumber > MAX_TAG_NUMBER) {
    throw new DerError(
      DerErrorKind.InvalidTag,
      `Invalid tagNumber: ${tagNumber}. Expected integer in range [0, ${MAX_TAG_NUMBER}]`,
    );
  }
  if (
    typeof tagClass !== "number" ||
    tagClass < TagClass.Universal ||
    tagClass > TagClass.Private
  ) {
    throw new DerError(
      DerErrorKind.InvalidTag,
      `Invalid tagClass: ${tagClass} (expected 0..3)`,
    );
  }
}

export function encodedTagLength(tag: TagInfo): number {
  assertEncodableTag(tag);
  if (tag.tagNumber < 31) return 1;
  let groups = 0;
  let num = tag.tagNumber;
  do {
    groups++;
    num = Math.floor(num / 128);
  } while (num > 0);
  return 1 + groups;
}

export function encodeTag(tag: TagInfo): Uint8Array {
  assertEncodableTag(tag);
  const { tagClass, tagNumber, constructed } = tag;
  const firstByte = (tagClass << 6) | (constructed ? 0x20 : 0x00);

  if (tagNumber < 31) {
    return Uint8Array.of(firstByte | tagNumber);
  }

  const groups: number[] = [];
  let num = tagNumber;
  do {
    groups.unshift(num % 128);
    num = Math.floor(num / 128); // Use division for numbers > 32-bit
  } while (num > 0);

  const out = new Uint8Array(1 + groups.length);
  out[0] = firstByte | 0x1f;
  for (let i = 0; i < groups.length; i++) {
    out[i + 1] = i < groups.length - 1 ? groups[i] | 0x80 : groups[i];
  }
  return out;
}

/**
 * Tag construction and comparison helpers.
 */
export const Tag = {
  universal(tagNumber: number, constructed = false): TagInfo {
    return { tagClass: TagClass.Universal, constructed, tagNumber };
  },

  application(tagNumber: number, constructed = false): TagInfo {
    return { tagClass: TagClass.Application, constructed, tagNumber };
  },

  contextSpecific(tagNumber: number, constructed = false): TagInfo {
    return { tagClass: TagClass.ContextSpecific, constructed, tagNumber };
  },

  private(tagNumber: number, constructed = false): TagInfo {
    return { tagClass: TagClass.Private, constructed, tagNumber };
  },

  equals(a: TagInfo, b: TagInfo): boolean {
    return (
      a.tagClass === b.tagClass &&
      a.tagNumber === b.tagNumber &&
      a.constructed === b.constructed
    );
  },

  /**
   * Canonical ordering of X.690 11.6: by class (UNIVERSAL first), then number.
   */
  compare(a: TagInfo, b: TagInfo): number {
    if (a.tagClass !== b.tagClass) return a.tagClass - b.tagClass;
    return a.tagNumber - b.tagNumber;
  },

  format(tag: TagInfo): string {
    const form = tag.constructed ? "constructed" : "primitive";
    return `[${TAG_CLASS_NAMES[tag.tagClass]} ${tag.tagNumber}] ${form}`;
  },
} as const;
