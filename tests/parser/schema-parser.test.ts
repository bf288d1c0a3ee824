import { describe, it } from "vitest";
import assert from "assert";
import { DerInteger } from "../../src/asn1/integer.js";
import { DerNull } from "../../src/asn1/null.js";
import { fromHex } from "../../src/common/codecs.js";
import { DerErrorKind } from "../../src/common/errors.js";
import { DEFAULT_MAX_DEPTH } from "../../src/common/types.js";
import { SchemaParser } from "../../src/parser/schema-parser.js";
import { Schema } from "../../src/schema/schema.js";
import { assertDerError, fromHexString } from "../helpers/utils.js";

const Nested = Schema.sequenceOf(
  "l1",
  Schema.sequenceOf("l2", Schema.sequenceOf("l3", DerNull)),
);

describe("SchemaParser", () => {
  it("accepts ArrayBuffer and Uint8Array input", () => {
    const parser = new SchemaParser(DerInteger);
    assert.strictEqual(parser.parse(fromHexString("020105")), 5n);
    assert.strictEqual(parser.parse(fromHex("020105")), 5n);
  });

  it("requires the value to span the whole input", () => {
    assertDerError(
      () => new SchemaParser(DerInteger).parse(fromHex("02010500")),
      DerErrorKind.TrailingData,
      3,
    );
  });

  it("reports an empty input as Incomplete", () => {
    assertDerError(() => new SchemaParser(DerInteger).parse(new Uint8Array(0)), DerErrorKind.Incomplete, 0);
  });

  it("defaults the depth limit", () => {
    assert.strictEqual(new SchemaParser(DerNull).maxDepth, DEFAULT_MAX_DEPTH);
  });

  it("enforces the depth limit", () => {
    const input = fromHex("300430023000");
    assert.deepStrictEqual(new SchemaParser(Nested, { maxDepth: 3 }).parse(input), [[[]]]);
    assertDerError(
      () => new SchemaParser(Nested, { maxDepth: 2 }).parse(input),
      DerErrorKind.DepthExceeded,
      6,
    );
  });
});
