import { DerError, DerErrorKind } from "./errors.js";

/** Hook `util.inspect` and `console.log` consult before printing an object. */
export const inspectSymbol: unique symbol = Symbol.for("nodejs.util.inspect.custom");

/**
 * Owned copy of sensitive material (private key scalars, primes).
 *
 * The copy is independent of the decoded input. Call {@link zeroize} (or
 * run the work inside {@link use}) to overwrite it with zeros once done.
 */
export class SecretBytes {
  private readonly buffer: Uint8Array;
  private released = false;

  public constructor(bytes: Uint8Array) {
    this.buffer = bytes.slice();
  }

  public get length(): number {
    return this.buffer.length;
  }

  public get isZeroized(): boolean {
    return this.released;
  }

  public expose(): Uint8Array {
    if (this.released) {
      throw new DerError(
        DerErrorKind.DetachedSource,
        "Secret bytes were zeroized",
      );
    }
    return this.buffer;
  }

  public zeroize(): void {
    this.buffer.fill(0);
    this.released = true;
  }

  public [inspectSymbol](): string {
    return `SecretBytes { length: ${this.length} }`;
  }

  /**
   * Run `fn` with the secret and zeroize afterwards, even when `fn` throws.
   */
  public use<T>(fn: (bytes: Uint8Array) => T): T {
    try {
      return fn(this.expose());
    } finally {
      this.zeroize();
    }
  }
}
