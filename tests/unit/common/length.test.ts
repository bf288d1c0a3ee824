import { describe, it } from "vitest";
import assert from "assert";
import { toHex } from "../../../src/common/codecs.js";
import { DerErrorKind } from "../../../src/common/errors.js";
import { decodeLength, encodeLength, encodedLengthSize } from "../../../src/common/length.js";
import { assertDerError } from "../../helpers/utils.js";

describe("Length: definite form", () => {
  it("encodes short and long forms minimally", () => {
    assert.strictEqual(toHex(encodeLength(0)), "00");
    assert.strictEqual(toHex(encodeLength(127)), "7f");
    assert.strictEqual(toHex(encodeLength(128)), "8180");
    assert.strictEqual(toHex(encodeLength(256)), "820100");
    assert.strictEqual(toHex(encodeLength(0xffffffff)), "84ffffffff");
    assert.strictEqual(encodedLengthSize(65535), 3);
  });

  it("decodes what it encodes", () => {
    assert.deepStrictEqual(decodeLength(Uint8Array.of(0x7f), 0), { length: 127, newOffset: 1 });
    assert.deepStrictEqual(decodeLength(Uint8Array.of(0x81, 0x80), 0), {
      length: 128,
      newOffset: 2,
    });
    assert.deepStrictEqual(decodeLength(Uint8Array.of(0x00, 0x82, 0x01, 0x00), 1), {
      length: 256,
      newOffset: 4,
    });
  });

  it("rejects the indefinite form", () => {
    assertDerError(() => decodeLength(Uint8Array.of(0x80), 0), DerErrorKind.InvalidLength, 0);
  });

  it("rejects the reserved 0xFF octet", () => {
    assertDerError(() => decodeLength(Uint8Array.of(0xff), 0), DerErrorKind.InvalidLength);
  });

  it("rejects non-minimal long forms", () => {
    assertDerError(() => decodeLength(Uint8Array.of(0x81, 0x7f), 0), DerErrorKind.InvalidLength);
    assertDerError(
      () => decodeLength(Uint8Array.of(0x82, 0x00, 0x80), 0),
      DerErrorKind.InvalidLength,
    );
  });

  it("rejects lengths wider than four octets", () => {
    assertDerError(
      () => decodeLength(Uint8Array.of(0x85, 1, 0, 0, 0, 0), 0),
      DerErrorKind.Overflow,
    );
  });

  it("reports truncation as Incomplete", () => {
    assertDerError(() => decodeLength(Uint8Array.of(0x82, 0x01), 0), DerErrorKind.Incomplete);
    assertDerError(() => decodeLength(new Uint8Array(0), 0), DerErrorKind.Incomplete);
  });

  it("refuses to encode invalid lengths", () => {
    assertDerError(() => encodeLength(-1), DerErrorKind.InvalidLength);
    assertDerError(() => encodeLength(0x100000000), DerErrorKind.Overflow);
  });
});
