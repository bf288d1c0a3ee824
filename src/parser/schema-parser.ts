import { DEFAULT_MAX_DEPTH, type BinaryInput, type DecoderOptions } from "../common/types.js";
import type { Decodable } from "../schema/types.js";
import { Decoder } from "./decoder.js";

/**
 * Decodes complete DER documents with a schema type.
 */
export class SchemaParser<T> {
  public readonly schema: Decodable<T>;
  public readonly maxDepth: number;

  public constructor(schema: Decodable<T>, options?: DecoderOptions) {
    this.schema = schema;
    this.maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Decode one value that spans the whole buffer. Values that hold
   * {@link ByteSlice} views keep borrowing `buffer`.
   */
  public parse(buffer: BinaryInput): T {
    const decoder = new Decoder(buffer, { maxDepth: this.maxDepth });
    const value = decoder.decode(this.schema);
    decoder.finish();
    return value;
  }
}
