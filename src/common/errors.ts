export const DerErrorKind = {
  /** Buffer exhausted before a declared length could be satisfied. */
  Incomplete: "Incomplete",
  InvalidTag: "InvalidTag",
  InvalidLength: "InvalidLength",
  /** Decodable, but not the distinguished encoding of the value. */
  NonCanonical: "NonCanonical",
  UnexpectedTag: "UnexpectedTag",
  TrailingData: "TrailingData",
  Overflow: "Overflow",
  BufferTooSmall: "BufferTooSmall",
  InvalidValue: "InvalidValue",
  DepthExceeded: "DepthExceeded",
  DetachedSource: "DetachedSource",
} as const;
export type DerErrorKind = (typeof DerErrorKind)[keyof typeof DerErrorKind];

export class DerError extends Error {
  public override readonly name = "DerError";
  public readonly kind: DerErrorKind;
  /** Absolute byte offset in the decoded input, when known. */
  public readonly offset: number | undefined;
  private readonly detail: string;

  public constructor(kind: DerErrorKind, message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`);
    this.kind = kind;
    this.offset = offset;
    this.detail = message;
  }

  /**
   * Returns this error positioned at `offset`, unless it already carries one.
   */
  public at(offset: number): DerError {
    if (this.offset !== undefined) return this;
    return new DerError(this.kind, this.detail, offset);
  }

  public static is(error: unknown, kind?: DerErrorKind): error is DerError {
    return error instanceof DerError && (kind === undefined || error.kind === kind);
  }
}
