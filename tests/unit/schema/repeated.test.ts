import { describe, it } from "vitest";
import assert from "assert";
import { DerInteger } from "../../../src/asn1/integer.js";
import { DerErrorKind } from "../../../src/common/errors.js";
import { Schema } from "../../../src/schema/schema.js";
import { assertDerError, decodeHex, encodeHex } from "../../helpers/utils.js";

const Ints = Schema.sequenceOf("Ints", DerInteger);
const IntSet = Schema.setOf("IntSet", DerInteger);

describe("Schema.sequenceOf", () => {
  it("keeps element order", () => {
    assert.strictEqual(encodeHex(Ints, [2n, 1n]), "3006020102020101");
    assert.deepStrictEqual(decodeHex(Ints, "3006020102020101"), [2n, 1n]);
  });

  it("infers the count from the length", () => {
    assert.deepStrictEqual(decodeHex(Ints, "3000"), []);
  });

  it("enforces SIZE bounds both ways", () => {
    const NonEmpty = Schema.sequenceOf("NonEmpty", DerInteger, { min: 1 });
    const AtMostOne = Schema.sequenceOf("AtMostOne", DerInteger, { max: 1 });
    assertDerError(() => decodeHex(NonEmpty, "3000"), DerErrorKind.InvalidValue);
    assertDerError(() => encodeHex(NonEmpty, []), DerErrorKind.InvalidValue);
    assertDerError(() => encodeHex(AtMostOne, [1n, 2n]), DerErrorKind.InvalidValue);
  });

  it("reports a truncated element", () => {
    assertDerError(() => decodeHex(Ints, "3003020201"), DerErrorKind.Incomplete, 2);
  });
});

describe("Schema.setOf", () => {
  it("sorts elements by their encodings", () => {
    assert.strictEqual(encodeHex(IntSet, [256n, 2n, 1n]), "310a02010102010202020100");
  });

  it("accepts sorted input and equal neighbours", () => {
    assert.deepStrictEqual(decodeHex(IntSet, "310a02010102010202020100"), [1n, 2n, 256n]);
    assert.deepStrictEqual(decodeHex(IntSet, "3106020101020101"), [1n, 1n]);
  });

  it("rejects descending elements", () => {
    assertDerError(() => decodeHex(IntSet, "3106020102020101"), DerErrorKind.NonCanonical, 5);
  });

  it("takes a custom tag", () => {
    const Tagged = Schema.setOf("Tagged", DerInteger, { tagClass: 2, tagNumber: 1 });
    assert.strictEqual(encodeHex(Tagged, [1n]), "a103020101");
  });
});
