import { DerError, DerErrorKind } from "../common/errors.js";
import { encodeLength, encodedLengthSize } from "../common/length.js";
import { encodeTag, encodedTagLength } from "../common/tag.js";
import type { Header, TagInfo } from "../common/types.js";
import type { Encodable } from "../schema/types.js";

export function encodedHeaderLength(header: Header): number {
  return encodedTagLength(header.tag) + encodedLengthSize(header.length);
}

/**
 * Writer over a caller-supplied output buffer.
 *
 * Callers size the buffer from `encodedLength()` first; writing past the
 * end is a contract violation reported as `BufferTooSmall`.
 */
export class Encoder {
  private readonly output: Uint8Array;
  private cursor = 0;

  public constructor(output: Uint8Array) {
    this.output = output;
  }

  public get position(): number {
    return this.cursor;
  }

  public get remainingLength(): number {
    return this.output.length - this.cursor;
  }

  public writeByte(byte: number): void {
    this.reserve(1);
    this.output[this.cursor++] = byte & 0xff;
  }

  public writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.output.set(bytes, this.cursor);
    this.cursor += bytes.length;
  }

  public writeTag(tag: TagInfo): void {
    this.writeBytes(encodeTag(tag));
  }

  public writeLength(length: number): void {
    this.writeBytes(encodeLength(length));
  }

  public writeHeader(header: Header): void {
    this.reserve(encodedHeaderLength(header) + header.length);
    this.writeTag(header.tag);
    this.writeLength(header.length);
  }

  public encode<T>(type: Encodable<T>, value: T): void {
    type.encode(value, this);
  }

  /**
   * View of the bytes written so far.
   */
  public finish(): Uint8Array {
    return this.output.subarray(0, this.cursor);
  }

  private reserve(length: number): void {
    if (length > this.remainingLength) {
      throw new DerError(
        DerErrorKind.BufferTooSmall,
        `Cannot write ${length} byte(s): only ${this.remainingLength} left in the output buffer`,
        this.cursor,
      );
    }
  }
}
