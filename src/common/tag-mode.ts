import { DerError, DerErrorKind } from "./errors.js";

/**
 * Tagging modes: `EXPLICIT` versus `IMPLICIT`.
 */
export const TagMode = {
  /** The new tag wraps the inner TLV, which keeps its own tag. */
  Explicit: "EXPLICIT",
  /** The new tag replaces the tag of the inner type. */
  Implicit: "IMPLICIT",
} as const;
export type TagMode = (typeof TagMode)[keyof typeof TagMode];

export function parseTagMode(s: string): TagMode {
  switch (s) {
    case "EXPLICIT":
    case "explicit":
      return TagMode.Explicit;
    case "IMPLICIT":
    case "implicit":
      return TagMode.Implicit;
  }
  throw new DerError(DerErrorKind.InvalidValue, `Unknown tag mode '${s}'`);
}
