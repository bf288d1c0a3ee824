import type { Encoder } from "../builder/encoder.js";
import type { ByteSlice } from "../common/byte-slice.js";
import type { TagInfo } from "../common/types.js";
import type { Decoder } from "../parser/decoder.js";

/*
 * Capability interfaces. Members use method signatures so that a
 * DerType<number> stays assignable to DerType<unknown> inside field lists.
 */

export interface Encodable<T> {
  readonly name: string;
  /** Tag the value is written under. */
  tagOf(value: T): TagInfo;
  /** Exact byte count `encode` writes, header included. */
  encodedLength(value: T): number;
  encode(value: T, encoder: Encoder): void;
}

export interface Decodable<T> {
  readonly name: string;
  /** Whether a TLV carrying `tag` belongs to this type. */
  matches(tag: TagInfo): boolean;
  decode(decoder: Decoder): T;
}

export interface DerType<T> extends Encodable<T>, Decodable<T> {}

/**
 * A type with one fixed tag, exposing its value octets separately from its
 * header. IMPLICIT tagging swaps the tag and reuses these hooks.
 */
export interface TaggedType<T> extends DerType<T> {
  readonly tag: TagInfo;
  /** Length of the value octets, sans header. */
  valueLength(value: T): number;
  encodeValue(value: T, encoder: Encoder): void;
  /** Decode `length` value octets at the cursor (header already read). */
  decodeValue(decoder: Decoder, length: number): T;
}

/**
 * Content-octet codec for a primitive type.
 */
export interface PrimitiveCodec<T> {
  contentLength(value: T): number;
  writeContent(value: T, encoder: Encoder): void;
  readContent(content: ByteSlice): T;
}

export type SchemaOptions = {
  readonly tagClass?: TagInfo["tagClass"];
  readonly tagNumber?: number;
};

export interface FieldOptions<T> {
  readonly optional?: boolean;
  /** DER omits a field equal to its DEFAULT. */
  readonly default?: T;
}

export type OptionalFlag<O extends FieldOptions<unknown> | undefined> = {
  readonly optional: O extends { optional: true } ? true : false;
};

/**
 * A named member of a SEQUENCE or SET.
 */
export interface FieldSchema<N extends string = string, T = unknown> {
  readonly name: N;
  readonly type: DerType<T>;
  /**
   * When present, this field is optional in a constructed container.
   */
  readonly optional: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue: T | undefined;
}

type FieldValue<K> = K extends FieldSchema<string, infer T> ? T : never;

export type SequenceValue<Fields extends readonly FieldSchema[]> = {
  // required fields
  [K in Fields[number] as K["optional"] extends true
    ? never
    : K["name"]]: FieldValue<K>;
} & {
  // optional fields
  [K in Fields[number] as K["optional"] extends true
    ? K["name"]
    : never]?: FieldValue<K>;
};

/** Value type carried by a DerType. */
export type ValueOf<D> = D extends DerType<infer T> ? T : never;

export function isTaggedType<T>(type: DerType<T>): type is TaggedType<T> {
  return "tag" in type && "decodeValue" in type;
}
