import { DerBitString } from "../asn1/bit-string.js";
import { DerSafeInteger } from "../asn1/integer.js";
import { DerObjectIdentifier } from "../asn1/object-identifier.js";
import { DerOctetString } from "../asn1/octet-string.js";
import type { SecretBytes } from "../common/secret-bytes.js";
import { Schema } from "../schema/schema.js";
import type { ValueOf } from "../schema/types.js";

export const EC_PRIVATE_KEY_VERSION = 1;

/**
 * ECPrivateKey (RFC 5915).
 *
 * ```text
 * ECPrivateKey ::= SEQUENCE {
 *   version        INTEGER { ecPrivkeyVer1(1) },
 *   privateKey     OCTET STRING,
 *   parameters [0] ECParameters {{ NamedCurve }} OPTIONAL,
 *   publicKey  [1] BIT STRING OPTIONAL
 * }
 * ```
 */
export const EcPrivateKey = Schema.sequence("ECPrivateKey", [
  Schema.field(
    "version",
    Schema.refine(DerSafeInteger, (v) =>
      v === EC_PRIVATE_KEY_VERSION ? undefined : `unsupported EC key version ${v}`,
    ),
  ),
  Schema.field("privateKey", DerOctetString),
  Schema.field("parameters", Schema.explicit("parameters", 0, DerObjectIdentifier), {
    optional: true,
  }),
  Schema.field("publicKey", Schema.explicit("publicKey", 1, DerBitString), {
    optional: true,
  }),
]);
export type EcPrivateKey = ValueOf<typeof EcPrivateKey>;

/**
 * Copy the private scalar out of the borrowed input. Zeroize the copy when
 * done with it.
 */
export function ecPrivateKeySecret(key: EcPrivateKey): SecretBytes {
  return key.privateKey.toSecret();
}
