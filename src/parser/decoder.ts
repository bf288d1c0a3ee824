import { ByteSlice } from "../common/byte-slice.js";
import { toUint8Array } from "../common/codecs.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import { decodeLength } from "../common/length.js";
import { Tag, decodeTag } from "../common/tag.js";
import {
  DEFAULT_MAX_DEPTH,
  type BinaryInput,
  type DecoderOptions,
  type Header,
  type TagInfo,
} from "../common/types.js";
import type { Decodable } from "../schema/types.js";

/**
 * @internal Bounds of a nested decoding scope.
 */
export interface DecoderScope {
  readonly start: number;
  readonly end: number;
  readonly depth: number;
}

/**
 * Cursor over a borrowed DER buffer.
 *
 * Every read is bounds-checked against the end of the current scope and
 * every header is checked for canonical form. Nothing read out of the
 * decoder is copied: values are views into the input.
 */
export class Decoder {
  private readonly bytes: Uint8Array;
  private readonly end: number;
  private readonly depth: number;
  private readonly maxDepth: number;
  private position: number;

  public constructor(
    input: BinaryInput,
    options: DecoderOptions = {},
    scope?: DecoderScope,
  ) {
    this.bytes = toUint8Array(input);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.position = scope?.start ?? 0;
    this.end = scope?.end ?? this.bytes.length;
    this.depth = scope?.depth ?? 0;
  }

  /** Absolute position of the cursor in the input. */
  public get offset(): number {
    return this.position;
  }

  public get remainingLength(): number {
    return this.end - this.position;
  }

  public isFinished(): boolean {
    return this.position >= this.end;
  }

  public error(kind: DerErrorKind, message: string): DerError {
    return new DerError(kind, message, this.position);
  }

  /**
   * Look at the next tag without consuming it.
   * @returns The tag, or null when the scope is exhausted.
   */
  public peekTag(): TagInfo | null {
    if (this.isFinished()) return null;
    return decodeTag(this.bytes, this.position, this.end).tag;
  }

  public peekHeader(): Header | null {
    if (this.isFinished()) return null;
    return this.readHeaderAt(this.position).header;
  }

  public decodeHeader(): Header {
    const { header, newOffset } = this.readHeaderAt(this.position);
    this.position = newOffset;
    return header;
  }

  /**
   * Read a header and require its tag to equal `tag`.
   */
  public expectHeader(tag: TagInfo, name?: string): Header {
    const start = this.position;
    const header = this.decodeHeader();
    if (!Tag.equals(header.tag, tag)) {
      const what = name ? ` for '${name}'` : "";
      throw new DerError(
        DerErrorKind.UnexpectedTag,
        `Expected ${Tag.format(tag)}${what} but found ${Tag.format(header.tag)}`,
        start,
      );
    }
    return header;
  }

  public readByte(): number {
    this.ensureRemaining(1);
    return this.bytes[this.position++];
  }

  /**
   * Zero-copy view of the next `length` bytes.
   */
  public readValue(length: number): Uint8Array {
    this.ensureRemaining(length);
    const value = this.bytes.subarray(this.position, this.position + length);
    this.position += length;
    return value;
  }

  public readSlice(length: number): ByteSlice {
    this.ensureRemaining(length);
    const slice = new ByteSlice(this.bytes, this.position, length);
    this.position += length;
    return slice;
  }

  /**
   * Borrowed view of the bytes between `start` and the cursor.
   */
  public sliceFrom(start: number): ByteSlice {
    return new ByteSlice(this.bytes, start, this.position - start);
  }

  /**
   * Hand the next `length` content octets to a content codec. Errors the
   * codec raises without a position are placed at the first content octet.
   */
  public decodeContent<T>(length: number, fn: (content: ByteSlice) => T): T {
    const start = this.position;
    const content = this.readSlice(length);
    try {
      return fn(content);
    } catch (e) {
      if (e instanceof DerError) throw e.at(start);
      throw e;
    }
  }

  /**
   * Run `fn` against a scope of exactly `length` bytes at the cursor. The
   * scope has to be consumed completely.
   */
  public nested<T>(length: number, fn: (decoder: Decoder) => T): T {
    this.ensureRemaining(length);
    if (this.depth + 1 > this.maxDepth) {
      throw this.error(
        DerErrorKind.DepthExceeded,
        `Maximum parsing depth exceeded: ${this.maxDepth}`,
      );
    }
    const child = new Decoder(
      this.bytes,
      { maxDepth: this.maxDepth },
      { start: this.position, end: this.position + length, depth: this.depth + 1 },
    );
    const result = fn(child);
    child.finish();
    this.position += length;
    return result;
  }

  public decode<T>(type: Decodable<T>): T {
    return type.decode(this);
  }

  /**
   * Decode `type` when the next tag belongs to it; otherwise consume
   * nothing and report the value as absent.
   */
  public decodeOptional<T>(type: Decodable<T>): T | undefined {
    const tag = this.peekTag();
    if (tag === null || !type.matches(tag)) return undefined;
    return type.decode(this);
  }

  /**
   * Require the scope to be fully consumed.
   */
  public finish(): void {
    if (this.position !== this.end) {
      throw this.error(
        DerErrorKind.TrailingData,
        `${this.end - this.position} unexpected trailing byte(s)`,
      );
    }
  }

  private readHeaderAt(offset: number): { header: Header; newOffset: number } {
    const tagInfo = decodeTag(this.bytes, offset, this.end);
    const lengthInfo = decodeLength(this.bytes, tagInfo.newOffset, this.end);
    const available = this.end - lengthInfo.newOffset;
    if (lengthInfo.length > available) {
      throw new DerError(
        DerErrorKind.Incomplete,
        `Declared length ${lengthInfo.length} exceeds the ${available} available byte(s)`,
        offset,
      );
    }
    return {
      header: { tag: tagInfo.tag, length: lengthInfo.length },
      newOffset: lengthInfo.newOffset,
    };
  }

  private ensureRemaining(length: number): void {
    if (!Number.isInteger(length) || length < 0 || length > this.end - this.position) {
      throw this.error(
        DerErrorKind.Incomplete,
        `Need ${length} byte(s) but only ${this.end - this.position} remain`,
      );
    }
  }
}
