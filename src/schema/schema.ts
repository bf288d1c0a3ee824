import { Encoder, encodedHeaderLength } from "../builder/encoder.js";
import { compareUnsignedLex } from "../common/codecs.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import { Tag, UniversalTag } from "../common/tag.js";
import { TagMode } from "../common/tag-mode.js";
import { TagClass, type TagInfo } from "../common/types.js";
import type { Decoder } from "../parser/decoder.js";
import {
  isTaggedType,
  type DerType,
  type FieldOptions,
  type FieldSchema,
  type OptionalFlag,
  type PrimitiveCodec,
  type SchemaOptions,
  type SequenceValue,
  type TaggedType,
} from "./types.js";

type ValueHooks<T> = Pick<TaggedType<T>, "valueLength" | "encodeValue" | "decodeValue">;

export interface RepeatedOptions extends SchemaOptions {
  /** SIZE lower bound. */
  readonly min?: number;
  /** SIZE upper bound. */
  readonly max?: number;
}

export interface TaggingOptions {
  readonly tagNumber: number;
  readonly tagClass?: TagClass;
  readonly mode?: TagMode;
}

type InternalField = FieldSchema<string, unknown> & {
  readonly defaultEncoding: Uint8Array | undefined;
};

/**
 * Wrap value-level hooks with the header handling every tagged type shares.
 */
function taggedType<T>(
  name: string,
  tag: TagInfo,
  hooks: ValueHooks<T>,
): TaggedType<T> {
  return {
    name,
    tag,
    matches: (candidate) => Tag.equals(candidate, tag),
    tagOf: () => tag,
    valueLength: hooks.valueLength,
    encodeValue: hooks.encodeValue,
    decodeValue: hooks.decodeValue,
    encodedLength(value) {
      const length = hooks.valueLength(value);
      return encodedHeaderLength({ tag, length }) + length;
    },
    encode(value, encoder) {
      encoder.writeHeader({ tag, length: hooks.valueLength(value) });
      hooks.encodeValue(value, encoder);
    },
    decode(decoder) {
      const header = decoder.expectHeader(tag, name);
      return hooks.decodeValue(decoder, header.length);
    },
  };
}

function encodeToBytes<T>(type: DerType<T>, value: T): Uint8Array {
  const encoder = new Encoder(new Uint8Array(type.encodedLength(value)));
  type.encode(value, encoder);
  return encoder.finish();
}

function asRecord(value: unknown, name: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `Constructed '${name}' expects an object; got ${value === null ? "null" : typeof value}`,
    );
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Fields of `record` that go on the wire, in field order. DEFAULT values
 * are left out as DER requires.
 */
function presentFields(
  name: string,
  fields: readonly InternalField[],
  record: Record<string, unknown>,
): [InternalField, unknown][] {
  const out: [InternalField, unknown][] = [];
  for (const field of fields) {
    const v = record[field.name];
    if (v === undefined) {
      if (field.optional || field.hasDefault) continue;
      throw new DerError(
        DerErrorKind.InvalidValue,
        `Missing required property '${field.name}' in constructed '${name}'`,
      );
    }
    if (
      field.defaultEncoding !== undefined &&
      compareUnsignedLex(encodeToBytes(field.type, v), field.defaultEncoding) === 0
    ) {
      continue;
    }
    out.push([field, v]);
  }
  return out;
}

function decodeField(
  decoder: Decoder,
  field: InternalField,
  out: Record<string, unknown>,
): void {
  const start = decoder.offset;
  out[field.name] = field.type.decode(decoder);
  if (
    field.defaultEncoding !== undefined &&
    decoder.sliceFrom(start).equals(field.defaultEncoding)
  ) {
    throw new DerError(
      DerErrorKind.NonCanonical,
      `Field '${field.name}' encodes its DEFAULT value`,
      start,
    );
  }
}

function fillAbsent(
  decoder: Decoder,
  field: InternalField,
  out: Record<string, unknown>,
  container: string,
  missingKind: DerErrorKind,
): void {
  if (field.hasDefault) {
    out[field.name] = field.defaultValue;
    return;
  }
  if (!field.optional) {
    throw decoder.error(
      missingKind,
      `Missing required property '${field.name}' in constructed '${container}'`,
    );
  }
}

function checkSize(
  name: string,
  count: number,
  options: RepeatedOptions,
  offset?: number,
): void {
  const { min, max } = options;
  if ((min !== undefined && count < min) || (max !== undefined && count > max)) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `'${name}' has ${count} element(s); SIZE(${min ?? 0}..${max ?? "MAX"}) required`,
      offset,
    );
  }
}

/**
 * Factory for DER types: primitives from content codecs and the structural
 * combinators that compose them.
 */
export class Schema {
  static primitive<T>(
    name: string,
    tag: TagInfo | number,
    codec: PrimitiveCodec<T>,
  ): TaggedType<T> {
    const tagInfo = typeof tag === "number" ? Tag.universal(tag) : tag;
    if (tagInfo.constructed) {
      throw new Error(`Primitive schema '${name}' cannot use a constructed tag`);
    }
    return taggedType<T>(name, tagInfo, {
      valueLength: (value) => codec.contentLength(value),
      encodeValue: (value, encoder) => codec.writeContent(value, encoder),
      decodeValue: (decoder, length) =>
        decoder.decodeContent(length, (content) => codec.readContent(content)),
    });
  }

  static field<N extends string, T, O extends FieldOptions<T> = {}>(
    name: N,
    type: DerType<T>,
    options?: O,
  ): FieldSchema<N, T> & OptionalFlag<O> {
    const hasDefault = options?.default !== undefined;
    if (hasDefault && options?.optional) {
      throw new Error(`Field '${name}' cannot be both OPTIONAL and DEFAULT`);
    }
    const obj = {
      name,
      type,
      optional: options?.optional ? (true as const) : (false as const),
      hasDefault,
      defaultValue: options?.default,
    };
    return obj as FieldSchema<N, T> & OptionalFlag<O>;
  }

  /**
   * Ordered field SEQUENCE.
   */
  static sequence<N extends string, Fields extends readonly FieldSchema[]>(
    name: N,
    fields: Fields,
    options?: SchemaOptions,
  ): TaggedType<SequenceValue<Fields>> {
    const tag: TagInfo = {
      tagClass: options?.tagClass ?? TagClass.Universal,
      constructed: true,
      tagNumber: options?.tagNumber ?? UniversalTag.Sequence,
    };
    Schema.checkAbsentFields(name, fields);
    const internal = Schema.internalFields(fields);

    return taggedType<SequenceValue<Fields>>(name, tag, {
      valueLength: (value) =>
        presentFields(name, internal, asRecord(value, name)).reduce(
          (sum, [field, v]) => sum + field.type.encodedLength(v),
          0,
        ),
      encodeValue: (value, encoder) => {
        for (const [field, v] of presentFields(name, internal, asRecord(value, name))) {
          field.type.encode(v, encoder);
        }
      },
      decodeValue: (decoder, length) =>
        decoder.nested(length, (inner) => {
          const out: Record<string, unknown> = {};
          for (const field of internal) {
            if (field.optional || field.hasDefault) {
              const tagAhead = inner.peekTag();
              if (tagAhead === null || !field.type.matches(tagAhead)) {
                fillAbsent(inner, field, out, name, DerErrorKind.Incomplete);
                continue;
              }
            } else if (inner.isFinished()) {
              fillAbsent(inner, field, out, name, DerErrorKind.Incomplete);
            }
            decodeField(inner, field, out);
          }
          return out as SequenceValue<Fields>;
        }),
    });
  }

  /**
   * SET of distinct, fixed-tag fields. Components are written in canonical
   * tag order and must arrive in that order.
   */
  static set<N extends string, Fields extends readonly FieldSchema[]>(
    name: N,
    fields: Fields,
    options?: SchemaOptions,
  ): TaggedType<SequenceValue<Fields>> {
    const tag: TagInfo = {
      tagClass: options?.tagClass ?? TagClass.Universal,
      constructed: true,
      tagNumber: options?.tagNumber ?? UniversalTag.Set,
    };
    const tagged = Schema.internalFields(fields)
      .map((field) => ({ field, tag: Schema.fixedTag(name, field) }))
      .sort((a, b) => Tag.compare(a.tag, b.tag));
    for (let i = 1; i < tagged.length; i++) {
      if (Tag.compare(tagged[i - 1].tag, tagged[i].tag) === 0) {
        throw new Error(
          `SET '${name}' has two fields with the tag of '${tagged[i].field.name}'`,
        );
      }
    }
    const sorted = tagged.map(({ field }) => field);

    return taggedType<SequenceValue<Fields>>(name, tag, {
      valueLength: (value) =>
        presentFields(name, sorted, asRecord(value, name)).reduce(
          (sum, [field, v]) => sum + field.type.encodedLength(v),
          0,
        ),
      encodeValue: (value, encoder) => {
        for (const [field, v] of presentFields(name, sorted, asRecord(value, name))) {
          field.type.encode(v, encoder);
        }
      },
      decodeValue: (decoder, length) =>
        decoder.nested(length, (inner) => {
          const out: Record<string, unknown> = {};
          let next = 0;
          for (let tagAhead = inner.peekTag(); tagAhead !== null; tagAhead = inner.peekTag()) {
            const found = tagAhead;
            const index = sorted.findIndex((field) => field.type.matches(found));
            if (index === -1) {
              throw inner.error(
                DerErrorKind.UnexpectedTag,
                `Unknown child ${Tag.format(found)} in SET '${name}'`,
              );
            }
            if (index < next) {
              throw inner.error(
                DerErrorKind.NonCanonical,
                `SET '${name}' component '${sorted[index].name}' is out of canonical order`,
              );
            }
            for (; next < index; next++) {
              fillAbsent(inner, sorted[next], out, name, DerErrorKind.UnexpectedTag);
            }
            decodeField(inner, sorted[index], out);
            next = index + 1;
          }
          for (; next < sorted.length; next++) {
            fillAbsent(inner, sorted[next], out, name, DerErrorKind.Incomplete);
          }
          return out as SequenceValue<Fields>;
        }),
    });
  }

  /**
   * SEQUENCE OF: element count is implied by the declared length.
   */
  static sequenceOf<T>(
    name: string,
    item: DerType<T>,
    options: RepeatedOptions = {},
  ): TaggedType<T[]> {
    return Schema.repeated(name, item, options, false);
  }

  /**
   * SET OF: elements are sorted by their encodings on the wire.
   */
  static setOf<T>(
    name: string,
    item: DerType<T>,
    options: RepeatedOptions = {},
  ): TaggedType<T[]> {
    return Schema.repeated(name, item, options, true);
  }

  static tagged<T>(
    name: string,
    options: TaggingOptions & { mode: typeof TagMode.Implicit },
    inner: TaggedType<T>,
  ): TaggedType<T>;
  static tagged<T>(
    name: string,
    options: TaggingOptions,
    inner: DerType<T>,
  ): TaggedType<T>;
  static tagged<T>(
    name: string,
    options: TaggingOptions,
    inner: DerType<T>,
  ): TaggedType<T> {
    const tagClass = options.tagClass ?? TagClass.ContextSpecific;
    const mode = options.mode ?? TagMode.Explicit;

    if (mode === TagMode.Implicit) {
      if (!isTaggedType(inner)) {
        throw new Error(
          `IMPLICIT tagging of '${name}' needs an inner type with a fixed tag`,
        );
      }
      const base: TaggedType<T> = inner;
      const tag: TagInfo = {
        tagClass,
        constructed: base.tag.constructed,
        tagNumber: options.tagNumber,
      };
      return taggedType<T>(name, tag, {
        valueLength: (value) => base.valueLength(value),
        encodeValue: (value, encoder) => base.encodeValue(value, encoder),
        decodeValue: (decoder, length) => base.decodeValue(decoder, length),
      });
    }

    const tag: TagInfo = { tagClass, constructed: true, tagNumber: options.tagNumber };
    return taggedType<T>(name, tag, {
      valueLength: (value) => inner.encodedLength(value),
      encodeValue: (value, encoder) => inner.encode(value, encoder),
      decodeValue: (decoder, length) =>
        decoder.nested(length, (scope) => inner.decode(scope)),
    });
  }

  static explicit<T>(
    name: string,
    tagNumber: number,
    inner: DerType<T>,
    options?: { tagClass?: TagClass },
  ): TaggedType<T> {
    return Schema.tagged(
      name,
      { tagNumber, tagClass: options?.tagClass, mode: TagMode.Explicit },
      inner,
    );
  }

  static implicit<T>(
    name: string,
    tagNumber: number,
    inner: TaggedType<T>,
    options?: { tagClass?: TagClass },
  ): TaggedType<T> {
    return Schema.tagged(
      name,
      { tagNumber, tagClass: options?.tagClass, mode: TagMode.Implicit },
      inner,
    );
  }

  /**
   * Attach a value check run after decoding and before encoding. `check`
   * returns a message for an invalid value.
   */
  static refine<T>(
    type: TaggedType<T>,
    check: (value: T) => string | undefined,
  ): TaggedType<T> {
    const verify = (value: T, offset?: number): void => {
      const problem = check(value);
      if (problem !== undefined) {
        throw new DerError(DerErrorKind.InvalidValue, `${type.name}: ${problem}`, offset);
      }
    };
    return taggedType<T>(type.name, type.tag, {
      valueLength: (value) => {
        verify(value);
        return type.valueLength(value);
      },
      encodeValue: (value, encoder) => type.encodeValue(value, encoder),
      decodeValue: (decoder, length) => {
        const start = decoder.offset;
        const value = type.decodeValue(decoder, length);
        verify(value, start);
        return value;
      },
    });
  }

  private static repeated<T>(
    name: string,
    item: DerType<T>,
    options: RepeatedOptions,
    sortElements: boolean,
  ): TaggedType<T[]> {
    const tag: TagInfo = {
      tagClass: options.tagClass ?? TagClass.Universal,
      constructed: true,
      tagNumber: options.tagNumber ?? (sortElements ? UniversalTag.Set : UniversalTag.Sequence),
    };

    return taggedType<T[]>(name, tag, {
      valueLength: (values) => {
        checkSize(name, values.length, options);
        return values.reduce((sum, v) => sum + item.encodedLength(v), 0);
      },
      encodeValue: (values, encoder) => {
        if (!sortElements) {
          for (const v of values) item.encode(v, encoder);
          return;
        }
        const encoded = values.map((v) => encodeToBytes(item, v));
        encoded.sort(compareUnsignedLex);
        for (const bytes of encoded) encoder.writeBytes(bytes);
      },
      decodeValue: (decoder, length) =>
        decoder.nested(length, (inner) => {
          const items: T[] = [];
          let previous: Uint8Array | undefined;
          while (!inner.isFinished()) {
            const start = inner.offset;
            items.push(item.decode(inner));
            if (sortElements) {
              const current = inner.sliceFrom(start).bytes();
              if (previous !== undefined && compareUnsignedLex(previous, current) > 0) {
                throw new DerError(
                  DerErrorKind.NonCanonical,
                  `SET OF '${name}' elements are not in canonical order`,
                  start,
                );
              }
              previous = current;
            }
          }
          checkSize(name, items.length, options, decoder.offset);
          return items;
        }),
    });
  }

  private static internalFields(fields: readonly FieldSchema[]): InternalField[] {
    return fields.map((field) => ({
      ...field,
      defaultEncoding:
        field.defaultValue === undefined ? undefined : encodeToBytes(field.type, field.defaultValue),
    }));
  }

  /**
   * An OPTIONAL or DEFAULT field must not share a tag with any field that
   * can follow it before the next required one, or decoding would hand
   * that field's value to the wrong member.
   */
  private static checkAbsentFields(container: string, fields: readonly FieldSchema[]): void {
    fields.forEach((field, i) => {
      if (!field.optional && !field.hasDefault) return;
      for (const later of fields.slice(i + 1)) {
        const clash =
          (isTaggedType(field.type) && later.type.matches(field.type.tag)) ||
          (isTaggedType(later.type) && field.type.matches(later.type.tag));
        if (clash) {
          throw new Error(
            `SEQUENCE '${container}' field '${field.name}' may be absent but shares a tag with '${later.name}'`,
          );
        }
        if (!later.optional && !later.hasDefault) return;
      }
    });
  }

  private static fixedTag(container: string, field: FieldSchema): TagInfo {
    if (!isTaggedType(field.type)) {
      throw new Error(
        `SET '${container}' field '${field.name}' needs a type with a fixed tag`,
      );
    }
    return field.type.tag;
  }
}
