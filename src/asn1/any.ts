import { Encoder, encodedHeaderLength } from "../builder/encoder.js";
import { ByteSlice } from "../common/byte-slice.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import { Tag } from "../common/tag.js";
import type { DecoderOptions, TagInfo } from "../common/types.js";
import { Decoder } from "../parser/decoder.js";
import type { Decodable, DerType, Encodable } from "../schema/types.js";

/**
 * One TLV captured without interpretation.
 *
 * Decoding only checks that the header is canonical and the value fits;
 * {@link Any.decodeAs} interprets it later, e.g. the `parameters` of an
 * AlgorithmIdentifier once the algorithm is known.
 */
export class Any {
  /** Type for fields declared `ANY`. Matches every tag. */
  public static readonly type: DerType<Any> = {
    name: "ANY",
    matches: () => true,
    tagOf: (value) => value.tag,
    encodedLength: (value) => value.encoded.length,
    encode: (value, encoder) => encoder.writeBytes(value.encoded.bytes()),
    decode: (decoder) => Any.decode(decoder),
  };

  public readonly tag: TagInfo;
  /** Value octets, borrowed from the input. */
  public readonly value: ByteSlice;
  private readonly encoded: ByteSlice;

  private constructor(tag: TagInfo, value: ByteSlice, encoded: ByteSlice) {
    this.tag = tag;
    this.value = value;
    this.encoded = encoded;
  }

  public static decode(decoder: Decoder): Any {
    const start = decoder.offset;
    const header = decoder.decodeHeader();
    const value = decoder.readSlice(header.length);
    return new Any(header.tag, value, decoder.sliceFrom(start));
  }

  /**
   * Build a TLV from a tag and raw value octets. The octets are copied.
   */
  public static fromParts(tag: TagInfo, content: ByteSlice | Uint8Array): Any {
    const bytes = content instanceof ByteSlice ? content.bytes() : content;
    const header = { tag, length: bytes.length };
    const encoder = new Encoder(new Uint8Array(encodedHeaderLength(header) + bytes.length));
    encoder.writeHeader(header);
    encoder.writeBytes(bytes);
    return Any.decode(new Decoder(encoder.finish()));
  }

  public static fromValue<T>(type: Encodable<T>, value: T): Any {
    const encoder = new Encoder(new Uint8Array(type.encodedLength(value)));
    type.encode(value, encoder);
    const decoder = new Decoder(encoder.finish());
    const any = Any.decode(decoder);
    decoder.finish();
    return any;
  }

  /**
   * Interpret the captured TLV as `type`. The whole TLV must be consumed.
   */
  public decodeAs<T>(type: Decodable<T>, options?: DecoderOptions): T {
    if (!type.matches(this.tag)) {
      throw new DerError(
        DerErrorKind.UnexpectedTag,
        `Cannot read ${Tag.format(this.tag)} as '${type.name}'`,
      );
    }
    const decoder = new Decoder(this.encoded.bytes(), options);
    const value = type.decode(decoder);
    decoder.finish();
    return value;
  }

  public get encodedLength(): number {
    return this.encoded.length;
  }

  /** Owned copy of the complete TLV. */
  public toBytes(): Uint8Array {
    return this.encoded.toOwned();
  }

  public equals(other: Any): boolean {
    return this.encoded.equals(other.encoded);
  }
}

export const DerAny = Any.type;
