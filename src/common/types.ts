export const TagClass = {
  Universal: 0,
  Application: 1,
  ContextSpecific: 2,
  Private: 3,
} as const;
export type TagClass = (typeof TagClass)[keyof typeof TagClass];

export interface TagInfo {
  tagClass: TagClass;
  constructed: boolean;
  tagNumber: number;
}

/**
 * Tag and length read in front of every value.
 */
export interface Header {
  readonly tag: TagInfo;
  readonly length: number;
}

export interface TLVResult {
  tag: TagInfo;
  length: number;
  /** Zero-copy view of the value octets. */
  value: Uint8Array;
  endOffset: number;
}

/** Largest length (and tag number) this codec reads or writes. */
export const MAX_LENGTH = 0xffffffff;
export const MAX_TAG_NUMBER = 0xffffffff;

export const DEFAULT_MAX_DEPTH = 100;

export interface DecoderOptions {
  /**
   * Maximum number of nested decoding scopes. Guards against stack
   * exhaustion on pathologically nested input.
   */
  readonly maxDepth?: number;
}

export type BinaryInput = Uint8Array | ArrayBuffer;
