import { DerError, DerErrorKind } from "../common/errors.js";
import type { Encodable } from "../schema/types.js";
import { Encoder } from "./encoder.js";

/**
 * Encodes values to DER with a schema type in two passes: measure, then
 * write into a buffer of exactly that size.
 */
export class SchemaBuilder<T> {
  public readonly schema: Encodable<T>;

  public constructor(schema: Encodable<T>) {
    this.schema = schema;
  }

  public encodedLength(data: T): number {
    return this.schema.encodedLength(data);
  }

  public build(data: T): Uint8Array {
    const length = this.schema.encodedLength(data);
    return this.write(data, new Uint8Array(length), length);
  }

  /**
   * Encode into `output`, which must hold at least `encodedLength(data)`
   * bytes.
   * @returns View of the written prefix of `output`.
   */
  public buildInto(data: T, output: Uint8Array): Uint8Array {
    const length = this.schema.encodedLength(data);
    if (length > output.length) {
      throw new DerError(
        DerErrorKind.BufferTooSmall,
        `'${this.schema.name}' needs ${length} byte(s); the output buffer holds ${output.length}`,
      );
    }
    return this.write(data, output, length);
  }

  private write(data: T, output: Uint8Array, expected: number): Uint8Array {
    const encoder = new Encoder(output);
    encoder.encode(this.schema, data);
    if (encoder.position !== expected) {
      throw new Error(
        `'${this.schema.name}' wrote ${encoder.position} byte(s) but measured ${expected}`,
      );
    }
    return encoder.finish();
  }
}
