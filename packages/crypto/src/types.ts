import type { KeyObject } from 'crypto';

/** NIST curves usable for ECDSA signing. */
export type EcCurve = 'P-256' | 'P-384' | 'P-521';

/** Signature algorithms, named as in the COSE/JOSE registries. */
export type Algorithm = 'ES256' | 'ES384' | 'ES512' | 'EdDSA' | 'PS256' | 'PS384' | 'PS512';

/** Base64url-encoded string (no padding) */
export type Base64Url = string;

/** Public half of an EC key in JWK form. */
export interface EcPublicJwk {
  kty: 'EC';
  crv: EcCurve;
  x: Base64Url;
  y: Base64Url;
  alg?: string;
}

/** Public half of an Ed25519 key in JWK form. */
export interface OkpPublicJwk {
  kty: 'OKP';
  crv: 'Ed25519';
  x: Base64Url;
  alg?: string;
}

/** Public half of an RSA key in JWK form. */
export interface RsaPublicJwk {
  kty: 'RSA';
  n: Base64Url;
  e: Base64Url;
  alg?: string;
}

export type PublicJwk = EcPublicJwk | OkpPublicJwk | RsaPublicJwk;

/** ECDSA private key: raw scalar plus its public point. */
export interface EcPrivateKey {
  kty: 'EC';
  crv: EcCurve;
  d: Uint8Array;
  publicJwk: EcPublicJwk;
}

/** Ed25519 private key: 32-byte seed plus its public key. */
export interface OkpPrivateKey {
  kty: 'OKP';
  crv: 'Ed25519';
  d: Uint8Array;
  publicJwk: OkpPublicJwk;
}

/** RSA private key, kept as an opaque key object. */
export interface RsaPrivateKey {
  kty: 'RSA';
  keyObject: KeyObject;
  publicJwk: RsaPublicJwk;
}

/** An in-memory signing key. Never serialized by pactseal. */
export type PrivateKey = EcPrivateKey | OkpPrivateKey | RsaPrivateKey;

/** Key family, shared by private keys and public JWKs. */
export type KeyType = PrivateKey['kty'];

/**
 * Everything needed to produce one signature: the key, the identity
 * written into the signature's protected header, and the algorithm.
 */
export interface Signer {
  key: PrivateKey;
  /** Issuer stored in the signature header (a DID when resolved from a DID document). */
  issuer?: string;
  /** Key id stored in the signature header. */
  keyId?: string;
  algorithm: Algorithm;
}

/** Options for {@link generateKeyPem}. */
export type KeyGenerationOptions =
  | { type: 'ec'; curve?: EcCurve }
  | { type: 'ed25519' }
  | { type: 'rsa'; modulusLength?: number };
