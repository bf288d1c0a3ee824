// tests/unit/tlv/basic-tlv.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import { BasicTLVParser } from "../../../src/parser/index.js";
import { TagClass } from "../../../src/common/types.js";
import { BasicTLVBuilder } from "../../../src/builder/index.js";
import { toHex } from "../../../src/common/codecs.js";
import { DerErrorKind } from "../../../src/common/errors.js";
import { Tag } from "../../../src/common/tag.js";
import { assertDerError, fromHexString } from "../../helpers/utils.js";

describe("BasicTLVParser: length and tag-number forms", () => {
  it("reads a long-form length (>=128)", () => {
    const value = new Uint8Array(130);
    for (let i = 0; i < value.length; i++) value[i] = i & 0xff;
    const buf = fromHexString("c18182" + toHex(value));

    const parsed = BasicTLVParser.parse(buf);
    assert.strictEqual(parsed.length, 130);
    assert.strictEqual(parsed.endOffset, 133);
    assert.strictEqual(toHex(parsed.value), toHex(value));
  });

  it("throws on indefinite length (0x80)", () => {
    assertDerError(
      () => BasicTLVParser.parse(new Uint8Array([0xc1, 0x80]).buffer),
      DerErrorKind.InvalidLength,
      1,
    );
  });

  it("parses high-tag-number form", () => {
    const parsed = BasicTLVParser.parse(fromHexString("df81490100"));
    assert.strictEqual(parsed.tag.tagNumber, 201);
    assert.strictEqual(parsed.tag.tagClass, TagClass.Private);
    assert.strictEqual(parsed.tag.constructed, false);
    assert.strictEqual(toHex(parsed.value), "00");
  });

  it("leaves bytes after the first TLV alone", () => {
    const parsed = BasicTLVParser.parse(fromHexString("0101ff0500"));
    assert.strictEqual(parsed.endOffset, 3);
  });

  it("reports a value that overruns the buffer", () => {
    assertDerError(() => BasicTLVParser.parse(fromHexString("040301")), DerErrorKind.Incomplete, 0);
  });

  it("peeks without consuming", () => {
    const buf = fromHexString("0500a003020101");
    assert.deepStrictEqual(BasicTLVParser.peekTag(buf, 2), {
      tag: Tag.contextSpecific(0, true),
    });
    assert.strictEqual(BasicTLVParser.peekTag(buf, 7), null);
  });
});

describe("BasicTLVBuilder", () => {
  it("writes canonical headers", () => {
    const out = BasicTLVBuilder.build({
      tag: Tag.contextSpecific(0, true),
      value: Uint8Array.of(0x02, 0x01, 0x01),
    });
    assert.strictEqual(toHex(out), "a003020101");
  });

  it("uses the long form from 128 bytes", () => {
    const out = BasicTLVBuilder.build({ tag: Tag.universal(4), value: new ArrayBuffer(128) });
    assert.strictEqual(toHex(out.subarray(0, 3)), "048180");
    assert.strictEqual(out.length, 131);
  });

  it("throws when tagNumber is negative", () => {
    assertDerError(
      () =>
        BasicTLVBuilder.build({
          tag: { tagClass: TagClass.Universal, constructed: false, tagNumber: -1 },
          value: new ArrayBuffer(0),
        }),
      DerErrorKind.InvalidTag,
    );
  });

  it("round-trips through the parser", () => {
    const built = BasicTLVBuilder.build({ tag: Tag.private(201), value: Uint8Array.of(0) });
    const parsed = BasicTLVParser.parse(built);
    assert.deepStrictEqual(parsed.tag, Tag.private(201));
    assert.strictEqual(parsed.endOffset, built.length);
  });
});
