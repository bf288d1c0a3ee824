import { Any, DerAny } from "../asn1/any.js";
import { DerBitString, octetAligned } from "../asn1/bit-string.js";
import { DerNull } from "../asn1/null.js";
import { DerObjectIdentifier } from "../asn1/object-identifier.js";
import { SchemaBuilder } from "../builder/schema-builder.js";
import { DerError, DerErrorKind } from "../common/errors.js";
import type { DecoderOptions } from "../common/types.js";
import { SchemaParser } from "../parser/schema-parser.js";
import { Schema } from "../schema/schema.js";
import type { ValueOf } from "../schema/types.js";
import { RsaPublicKey } from "./pkcs1.js";

export const Oids = {
  rsaEncryption: "1.2.840.113549.1.1.1",
  idEcPublicKey: "1.2.840.10045.2.1",
  prime256v1: "1.2.840.10045.3.1.7",
  secp384r1: "1.3.132.0.34",
} as const;

/**
 * AlgorithmIdentifier ::= SEQUENCE {
 *   algorithm  OBJECT IDENTIFIER,
 *   parameters ANY DEFINED BY algorithm OPTIONAL }
 */
export const AlgorithmIdentifier = Schema.sequence("AlgorithmIdentifier", [
  Schema.field("algorithm", DerObjectIdentifier),
  Schema.field("parameters", DerAny, { optional: true }),
]);
export type AlgorithmIdentifier = ValueOf<typeof AlgorithmIdentifier>;

export const SubjectPublicKeyInfo = Schema.sequence("SubjectPublicKeyInfo", [
  Schema.field("algorithm", AlgorithmIdentifier),
  Schema.field("subjectPublicKey", DerBitString),
]);
export type SubjectPublicKeyInfo = ValueOf<typeof SubjectPublicKeyInfo>;

function expectAlgorithm(algorithm: AlgorithmIdentifier, oid: string): void {
  if (algorithm.algorithm !== oid) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `Expected algorithm ${oid}; got ${algorithm.algorithm}`,
    );
  }
}

/**
 * Named curve OID of an id-ecPublicKey algorithm identifier.
 */
export function ecNamedCurveOf(algorithm: AlgorithmIdentifier): string {
  expectAlgorithm(algorithm, Oids.idEcPublicKey);
  if (algorithm.parameters === undefined) {
    throw new DerError(DerErrorKind.InvalidValue, "id-ecPublicKey requires curve parameters");
  }
  return algorithm.parameters.decodeAs(DerObjectIdentifier);
}

/**
 * Extract the PKCS#1 key of an rsaEncryption SubjectPublicKeyInfo.
 */
export function rsaPublicKeyFromSpki(
  spki: SubjectPublicKeyInfo,
  options?: DecoderOptions,
): RsaPublicKey {
  expectAlgorithm(spki.algorithm, Oids.rsaEncryption);
  const parameters = spki.algorithm.parameters;
  if (parameters !== undefined) {
    parameters.decodeAs(DerNull);
  }
  const { unusedBits, data } = spki.subjectPublicKey;
  if (unusedBits !== 0) {
    throw new DerError(
      DerErrorKind.InvalidValue,
      `RSA subjectPublicKey must be octet aligned; ${unusedBits} unused bit(s)`,
    );
  }
  return new SchemaParser(RsaPublicKey, options).parse(data.bytes());
}

/**
 * Wrap a PKCS#1 key in an rsaEncryption SubjectPublicKeyInfo.
 */
export function spkiFromRsaPublicKey(key: RsaPublicKey): SubjectPublicKeyInfo {
  return {
    algorithm: {
      algorithm: Oids.rsaEncryption,
      parameters: Any.fromValue(DerNull, null),
    },
    subjectPublicKey: octetAligned(new SchemaBuilder(RsaPublicKey).build(key)),
  };
}
