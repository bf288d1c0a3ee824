import { DerSafeInteger, DerUintBytes } from "../asn1/integer.js";
import { Schema } from "../schema/schema.js";
import type { ValueOf } from "../schema/types.js";

/*
 * PKCS#1 RSA keys (RFC 8017 appendix A.1). Integers are kept as unsigned
 * byte views so key material never passes through bigint.
 */

export const RsaVersion = {
  TwoPrime: 0,
  Multi: 1,
} as const;
export type RsaVersion = (typeof RsaVersion)[keyof typeof RsaVersion];

const Version = Schema.refine(DerSafeInteger, (v) =>
  v === RsaVersion.TwoPrime || v === RsaVersion.Multi
    ? undefined
    : `unsupported RSA key version ${v}`,
);

/**
 * RSAPublicKey ::= SEQUENCE { modulus INTEGER, publicExponent INTEGER }
 */
export const RsaPublicKey = Schema.sequence("RSAPublicKey", [
  Schema.field("modulus", DerUintBytes),
  Schema.field("publicExponent", DerUintBytes),
]);
export type RsaPublicKey = ValueOf<typeof RsaPublicKey>;

export const OtherPrimeInfo = Schema.sequence("OtherPrimeInfo", [
  Schema.field("prime", DerUintBytes),
  Schema.field("exponent", DerUintBytes),
  Schema.field("coefficient", DerUintBytes),
]);
export type OtherPrimeInfo = ValueOf<typeof OtherPrimeInfo>;

/** OtherPrimeInfos ::= SEQUENCE SIZE(1..MAX) OF OtherPrimeInfo */
export const OtherPrimeInfos = Schema.sequenceOf("OtherPrimeInfos", OtherPrimeInfo, {
  min: 1,
});

/**
 * RSAPrivateKey. A multi-prime key (version 1) carries `otherPrimeInfos`;
 * a two-prime key (version 0) must not.
 */
export const RsaPrivateKey = Schema.refine(
  Schema.sequence("RSAPrivateKey", [
    Schema.field("version", Version),
    Schema.field("modulus", DerUintBytes),
    Schema.field("publicExponent", DerUintBytes),
    Schema.field("privateExponent", DerUintBytes),
    Schema.field("prime1", DerUintBytes),
    Schema.field("prime2", DerUintBytes),
    Schema.field("exponent1", DerUintBytes),
    Schema.field("exponent2", DerUintBytes),
    Schema.field("coefficient", DerUintBytes),
    Schema.field("otherPrimeInfos", OtherPrimeInfos, { optional: true }),
  ]),
  (key) => {
    const multi = key.version === RsaVersion.Multi;
    if (multi && key.otherPrimeInfos === undefined) {
      return "multi-prime key has no otherPrimeInfos";
    }
    if (!multi && key.otherPrimeInfos !== undefined) {
      return "two-prime key carries otherPrimeInfos";
    }
    return undefined;
  },
);
export type RsaPrivateKey = ValueOf<typeof RsaPrivateKey>;

export function rsaPublicKeyOf(key: RsaPrivateKey): RsaPublicKey {
  return { modulus: key.modulus, publicExponent: key.publicExponent };
}
