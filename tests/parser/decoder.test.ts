import { describe, it } from "vitest";
import assert from "assert";
import { DerBoolean } from "../../src/asn1/boolean.js";
import { DerInteger } from "../../src/asn1/integer.js";
import { fromHex, toHex } from "../../src/common/codecs.js";
import { DerErrorKind } from "../../src/common/errors.js";
import { Tag } from "../../src/common/tag.js";
import { Decoder } from "../../src/parser/decoder.js";
import { assertDerError } from "../helpers/utils.js";

describe("Decoder: headers", () => {
  it("reads a header and its value", () => {
    const decoder = new Decoder(fromHex("04020a0b"));
    const header = decoder.decodeHeader();
    assert.deepStrictEqual(header, { tag: Tag.universal(4), length: 2 });
    assert.strictEqual(toHex(decoder.readValue(header.length)), "0a0b");
    assert.ok(decoder.isFinished());
    assert.strictEqual(decoder.peekTag(), null);
    assert.strictEqual(decoder.peekHeader(), null);
  });

  it("peeks without moving", () => {
    const decoder = new Decoder(fromHex("0500"));
    assert.deepStrictEqual(decoder.peekHeader(), { tag: Tag.universal(5), length: 0 });
    assert.strictEqual(decoder.offset, 0);
  });

  it("checks the expected tag", () => {
    const decoder = new Decoder(fromHex("0101ff"));
    assertDerError(() => decoder.expectHeader(Tag.universal(2), "n"), DerErrorKind.UnexpectedTag, 0);
  });

  it("refuses a length that overruns the input", () => {
    const decoder = new Decoder(fromHex("300502"));
    assertDerError(() => decoder.decodeHeader(), DerErrorKind.Incomplete, 0);
  });
});

describe("Decoder: scopes", () => {
  it("requires a nested scope to be consumed", () => {
    const decoder = new Decoder(fromHex("3003020101"));
    const { length } = decoder.decodeHeader();
    assertDerError(
      () => decoder.nested(length, (inner) => inner.decodeHeader()),
      DerErrorKind.TrailingData,
      4,
    );
  });

  it("advances past a consumed scope", () => {
    const decoder = new Decoder(fromHex("30030201050101ff"));
    const { length } = decoder.decodeHeader();
    const n = decoder.nested(length, (inner) => inner.decode(DerInteger));
    assert.strictEqual(n, 5n);
    assert.strictEqual(decoder.decode(DerBoolean), true);
    decoder.finish();
  });

  it("bounds the nesting depth", () => {
    const decoder = new Decoder(fromHex("30023000"), { maxDepth: 1 });
    const { length } = decoder.decodeHeader();
    assertDerError(
      () =>
        decoder.nested(length, (inner) => {
          const child = inner.decodeHeader();
          return inner.nested(child.length, () => null);
        }),
      DerErrorKind.DepthExceeded,
      4,
    );
  });

  it("positions content errors at the first content octet", () => {
    const decoder = new Decoder(fromHex("0500020200" + "7f"));
    decoder.readValue(2);
    assertDerError(() => decoder.decode(DerInteger), DerErrorKind.NonCanonical, 4);
  });

  it("reports trailing bytes at the top level", () => {
    const decoder = new Decoder(fromHex("0500ff"));
    decoder.readValue(2);
    assertDerError(() => decoder.finish(), DerErrorKind.TrailingData, 2);
  });
});

describe("Decoder: reads", () => {
  it("skips optional values that are absent", () => {
    const decoder = new Decoder(fromHex("020101"));
    assert.strictEqual(decoder.decodeOptional(DerBoolean), undefined);
    assert.strictEqual(decoder.offset, 0);
    assert.strictEqual(decoder.decodeOptional(DerInteger), 1n);
    assert.strictEqual(decoder.decodeOptional(DerInteger), undefined);
  });

  it("slices the bytes it has read", () => {
    const decoder = new Decoder(fromHex("0101ff0500"));
    decoder.decode(DerBoolean);
    assert.strictEqual(decoder.sliceFrom(0).toHex(), "0101ff");
    assert.strictEqual(decoder.readByte(), 0x05);
    assert.strictEqual(decoder.remainingLength, 1);
  });

  it("reports reads past the end as Incomplete", () => {
    const decoder = new Decoder(fromHex("01"));
    assertDerError(() => decoder.readValue(2), DerErrorKind.Incomplete, 0);
  });
});
