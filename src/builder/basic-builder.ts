import { toUint8Array } from "../common/codecs.js";
import type { BinaryInput, TagInfo } from "../common/types.js";
import { Encoder, encodedHeaderLength } from "./encoder.js";

/**
 * Tag and raw value of a single TLV to write.
 */
export interface TLVInput {
  readonly tag: TagInfo;
  readonly value: BinaryInput;
}

/**
 * Writes single TLVs with canonical DER headers.
 */
export class BasicTLVBuilder {
  /**
   * Encode one TLV. The value octets are copied as given.
   * @param tlv - Tag and value octets.
   * @returns DER bytes of the TLV.
   */
  public static build(tlv: TLVInput): Uint8Array {
    const value = toUint8Array(tlv.value);
    const header = { tag: tlv.tag, length: value.byteLength };
    const encoder = new Encoder(
      new Uint8Array(encodedHeaderLength(header) + value.byteLength),
    );
    encoder.writeHeader(header);
    encoder.writeBytes(value);
    return encoder.finish();
  }
}
