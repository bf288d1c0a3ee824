import { toUint8Array } from "../common/codecs.js";
import { decodeTag } from "../common/tag.js";
import type { BinaryInput, TLVResult, TagInfo } from "../common/types.js";
import { Decoder } from "./decoder.js";

export class BasicTLVParser {
  /**
   * Parse the TLV at the start of a buffer. Bytes after it are left alone;
   * `endOffset` tells where the next TLV begins.
   * @param buffer - Buffer that begins with a DER TLV.
   * @returns The parsed result including tag, length, and a view of the value.
   */
  public static parse(buffer: BinaryInput): TLVResult {
    const decoder = new Decoder(buffer);
    const { tag, length } = decoder.decodeHeader();
    const value = decoder.readValue(length);
    return { tag, length, value, endOffset: decoder.offset };
  }

  /**
   * Peek the tag information of the next TLV without consuming it.
   * @param buffer - Buffer that holds a TLV at `offset`.
   * @returns Tag information, or null when no bytes remain.
   */
  public static peekTag(buffer: BinaryInput, offset = 0): { tag: TagInfo } | null {
    const bytes = toUint8Array(buffer);
    if (offset >= bytes.length) {
      return null;
    }
    return { tag: decodeTag(bytes, offset).tag };
  }
}
