import * as ed from '@noble/ed25519';
import { p256 } from '@noble/curves/p256';
import { p384 } from '@noble/curves/p384';
import { p521 } from '@noble/curves/p521';
import { sha256 } from '@noble/hashes/sha256';
import { sha384, sha512 } from '@noble/hashes/sha512';
import { constants, createPublicKey, sign as nodeSign, verify as nodeVerify } from 'crypto';

import { SignatureFailedError, isPactsealError, errorMessage } from '@pactseal/types';

import { assertAlgorithmCompatible, isAlgorithmCompatible } from './algorithms';
import { base64urlDecode, concatBytes } from './encoding';

export type {
  Algorithm,
  Base64Url,
  EcCurve,
  EcPrivateKey,
  EcPublicJwk,
  KeyGenerationOptions,
  KeyType,
  OkpPrivateKey,
  OkpPublicJwk,
  PrivateKey,
  PublicJwk,
  RsaPrivateKey,
  RsaPublicJwk,
  Signer,
} from './types';

import type { Algorithm, EcCurve, EcPublicJwk, PrivateKey, PublicJwk } from './types';

export {
  ALGORITHMS,
  algorithmFromCoseId,
  assertAlgorithmCompatible,
  coseAlgorithmId,
  defaultAlgorithm,
  isAlgorithmCompatible,
  parseAlgorithm,
} from './algorithms';

export {
  generateKeyPem,
  jwkThumbprint,
  loadPrivateKey,
  loadPublicKey,
  parsePrivateKey,
  parsePublicJwk,
  parsePublicKey,
  publicJwkEquals,
} from './keys';

export { base64urlDecode, base64urlEncode, concatBytes, sha256Hex, toHex } from './encoding';

// ─── ECDSA curve table ────────────────────────────────────────────────────────

const ECDSA = {
  'P-256': { curve: p256, digest: sha256 },
  'P-384': { curve: p384, digest: sha384 },
  'P-521': { curve: p521, digest: sha512 },
} satisfies Record<EcCurve, unknown>;

/** Node digest name for an RSASSA-PSS algorithm. */
function pssDigest(algorithm: Algorithm): string {
  switch (algorithm) {
    case 'PS384':
      return 'sha384';
    case 'PS512':
      return 'sha512';
    default:
      return 'sha256';
  }
}

function ecPublicPoint(jwk: EcPublicJwk): Uint8Array {
  return concatBytes(new Uint8Array([0x04]), base64urlDecode(jwk.x), base64urlDecode(jwk.y));
}

// ─── Signing ──────────────────────────────────────────────────────────────────

/**
 * Sign `message` with `key` under `algorithm`.
 *
 * ECDSA signatures are deterministic (RFC 6979) and returned as the
 * fixed-length `r || s` concatenation COSE expects. EdDSA is Ed25519.
 * RSA uses PSS with a salt as long as the digest.
 *
 * @throws {UnsupportedAlgorithmError} When the key type cannot produce `algorithm`.
 * @throws {SignatureFailedError} When the underlying primitive fails.
 *
 * @example
 * ```typescript
 * const key = loadPrivateKey('signer.pem');
 * const sig = await signMessage(toBeSigned, key, defaultAlgorithm(key));
 * ```
 */
export async function signMessage(
  message: Uint8Array,
  key: PrivateKey,
  algorithm: Algorithm,
): Promise<Uint8Array> {
  assertAlgorithmCompatible(key, algorithm);
  try {
    switch (key.kty) {
      case 'EC': {
        const { curve, digest } = ECDSA[key.crv];
        return curve.sign(digest(message), key.d).toCompactRawBytes();
      }
      case 'OKP':
        return await ed.signAsync(message, key.d);
      case 'RSA':
        return new Uint8Array(
          nodeSign(pssDigest(algorithm), message, {
            key: key.keyObject,
            padding: constants.RSA_PKCS1_PSS_PADDING,
            saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
          }),
        );
    }
  } catch (err) {
    if (isPactsealError(err)) {
      throw err;
    }
    throw new SignatureFailedError(`${algorithm} signing failed: ${errorMessage(err)}`, { cause: err });
  }
}

// ─── Verification ─────────────────────────────────────────────────────────────

/**
 * Verify a signature produced by {@link signMessage}.
 *
 * Safe to call with untrusted inputs: malformed keys, truncated
 * signatures and incompatible algorithms all yield `false`.
 */
export async function verifyMessage(
  message: Uint8Array,
  signature: Uint8Array,
  publicKey: PublicJwk,
  algorithm: Algorithm,
): Promise<boolean> {
  if (!isAlgorithmCompatible(publicKey, algorithm)) {
    return false;
  }
  try {
    switch (publicKey.kty) {
      case 'EC': {
        const { curve, digest } = ECDSA[publicKey.crv];
        return curve.verify(curve.Signature.fromCompact(signature), digest(message), ecPublicPoint(publicKey));
      }
      case 'OKP':
        return await ed.verifyAsync(signature, message, base64urlDecode(publicKey.x));
      case 'RSA': {
        const keyObject = createPublicKey({
          key: { kty: 'RSA', n: publicKey.n, e: publicKey.e },
          format: 'jwk',
        });
        return nodeVerify(
          pssDigest(algorithm),
          message,
          {
            key: keyObject,
            padding: constants.RSA_PKCS1_PSS_PADDING,
            saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
          },
          signature,
        );
      }
    }
  } catch {
    return false;
  }
}
