import { toHex } from "./codecs.js";
import { DerError, DerErrorKind } from "./errors.js";
import { inspectSymbol, SecretBytes } from "./secret-bytes.js";

/**
 * Borrowed window into a decoded input buffer.
 *
 * The slice keeps a reference to the whole input and resolves its bytes on
 * access, so a view never outlives a detached (transferred) source without
 * noticing. Bytes returned by {@link ByteSlice.bytes} alias the input: they
 * change if the caller mutates the input afterwards. Inspecting a slice
 * shows its length only, since the source may hold key material.
 */
export class ByteSlice {
  public static readonly empty = new ByteSlice(new Uint8Array(0));

  private readonly source: Uint8Array;
  private readonly start: number;
  public readonly length: number;

  public constructor(source: Uint8Array, start = 0, length = source.byteLength - start) {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(length) ||
      start < 0 ||
      length < 0 ||
      start + length > source.byteLength
    ) {
      throw new DerError(
        DerErrorKind.Incomplete,
        `Slice [${start}, ${start + length}) is outside a source of ${source.byteLength} bytes`,
      );
    }
    this.source = source;
    this.start = start;
    this.length = length;
  }

  /**
   * Wrap existing bytes without copying (a number array is copied once).
   */
  public static from(input: Uint8Array | ArrayBuffer | readonly number[]): ByteSlice {
    if (input instanceof Uint8Array) return new ByteSlice(input);
    if (input instanceof ArrayBuffer) return new ByteSlice(new Uint8Array(input));
    return new ByteSlice(Uint8Array.from(input));
  }

  public get isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Zero-copy view of the borrowed bytes.
   */
  public bytes(): Uint8Array {
    if (this.start + this.length > this.source.byteLength) {
      throw new DerError(
        DerErrorKind.DetachedSource,
        "Borrowed bytes are no longer backed by their source buffer",
      );
    }
    return this.source.subarray(this.start, this.start + this.length);
  }

  /** Copy into a buffer owned by the caller. */
  public toOwned(): Uint8Array {
    return this.bytes().slice();
  }

  /** Copy into a buffer that is zeroed when released. */
  public toSecret(): SecretBytes {
    return new SecretBytes(this.bytes());
  }

  public equals(other: ByteSlice | Uint8Array): boolean {
    const a = this.bytes();
    const b = other instanceof ByteSlice ? other.bytes() : other;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return false;
    }
    return true;
  }

  public toHex(): string {
    return toHex(this.bytes());
  }

  public [inspectSymbol](): string {
    return `ByteSlice { length: ${this.length} }`;
  }
}
