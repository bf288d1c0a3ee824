import { describe, it } from "vitest";
import assert from "assert";
import { inspect } from "util";
import { ByteSlice } from "../../../src/common/byte-slice.js";
import { DerErrorKind } from "../../../src/common/errors.js";
import { SecretBytes } from "../../../src/common/secret-bytes.js";
import { assertDerError } from "../../helpers/utils.js";

describe("ByteSlice", () => {
  it("borrows without copying", () => {
    const source = Uint8Array.of(1, 2, 3, 4);
    const slice = new ByteSlice(source, 1, 2);
    assert.strictEqual(slice.toHex(), "0203");
    source[1] = 9;
    assert.strictEqual(slice.toHex(), "0903");
  });

  it("copies on toOwned", () => {
    const source = Uint8Array.of(1, 2);
    const owned = ByteSlice.from(source).toOwned();
    source[0] = 7;
    assert.deepStrictEqual(Array.from(owned), [1, 2]);
  });

  it("compares by content", () => {
    const slice = ByteSlice.from([0xaa, 0xbb]);
    assert.ok(slice.equals(Uint8Array.of(0xaa, 0xbb)));
    assert.ok(slice.equals(new ByteSlice(Uint8Array.of(0, 0xaa, 0xbb), 1)));
    assert.ok(!slice.equals(Uint8Array.of(0xaa)));
    assert.ok(ByteSlice.empty.isEmpty);
  });

  it("rejects windows outside the source", () => {
    assertDerError(() => new ByteSlice(Uint8Array.of(1), 1, 1), DerErrorKind.Incomplete);
    assertDerError(() => new ByteSlice(Uint8Array.of(1), -1, 1), DerErrorKind.Incomplete);
  });

  it("notices a transferred source buffer", () => {
    const buffer = new ArrayBuffer(4);
    const slice = ByteSlice.from(buffer);
    structuredClone(buffer, { transfer: [buffer] });
    assertDerError(() => slice.bytes(), DerErrorKind.DetachedSource);
  });

  it("inspects as its length only", () => {
    const slice = new ByteSlice(Uint8Array.of(1, 2, 3, 4), 1, 2);
    assert.strictEqual(inspect(slice), "ByteSlice { length: 2 }");
  });
});

describe("SecretBytes", () => {
  it("holds an independent copy", () => {
    const source = Uint8Array.of(5, 6, 7);
    const secret = new ByteSlice(source).toSecret();
    source.fill(0);
    assert.deepStrictEqual(Array.from(secret.expose()), [5, 6, 7]);
    assert.strictEqual(secret.length, 3);
  });

  it("inspects as its length only", () => {
    assert.strictEqual(inspect(new SecretBytes(Uint8Array.of(5, 6, 7))), "SecretBytes { length: 3 }");
  });

  it("zeroizes the buffer it handed out", () => {
    const secret = new SecretBytes(Uint8Array.of(1, 2));
    const view = secret.expose();
    secret.zeroize();
    assert.deepStrictEqual(Array.from(view), [0, 0]);
    assert.ok(secret.isZeroized);
    assertDerError(() => secret.expose(), DerErrorKind.DetachedSource);
  });

  it("zeroizes after use, even on failure", () => {
    const secret = new SecretBytes(Uint8Array.of(3));
    assert.throws(() =>
      secret.use(() => {
        throw new Error("boom");
      }),
    );
    assert.ok(secret.isZeroized);

    const other = new SecretBytes(Uint8Array.of(4, 5));
    assert.strictEqual(other.use((bytes) => bytes.length), 2);
    assert.ok(other.isZeroized);
  });
});
