/**
 * Key loading: PEM private and public keys into the in-memory shapes the
 * signing primitives use, plus PEM key generation.
 *
 * PEM/ASN.1 parsing goes through Node's `crypto` key objects; the raw
 * scalars and seeds they export as JWK are what the noble curves sign with.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { createPrivateKey, createPublicKey, generateKeyPairSync } from 'crypto';
import type { ED25519KeyPairOptions, JsonWebKey, KeyObject } from 'crypto';

import { FileAccessError, KeyFormatError, errorMessage } from '@pactseal/types';

import { sha256 } from '@noble/hashes/sha256';

import { base64urlDecode, base64urlEncode } from './encoding';
import type {
  Base64Url,
  EcCurve,
  KeyGenerationOptions,
  PrivateKey,
  PublicJwk,
} from './types';

const EC_CURVES: readonly EcCurve[] = ['P-256', 'P-384', 'P-521'];

const OPENSSL_CURVE_NAMES: Record<EcCurve, string> = {
  'P-256': 'prime256v1',
  'P-384': 'secp384r1',
  'P-521': 'secp521r1',
};

function isEcCurve(value: unknown): value is EcCurve {
  return typeof value === 'string' && EC_CURVES.some((curve) => curve === value);
}

function requireMember(jwk: JsonWebKey, member: 'x' | 'y' | 'n' | 'e' | 'd'): string {
  const value = jwk[member];
  if (typeof value !== 'string' || value.length === 0) {
    throw new KeyFormatError(`Key is missing its '${member}' component`);
  }
  return value;
}

/** Narrow an exported JWK to the public half pactseal understands. */
function publicJwkFromExport(jwk: JsonWebKey): PublicJwk {
  if (jwk.kty === 'EC') {
    if (!isEcCurve(jwk.crv)) {
      throw new KeyFormatError(`Unsupported EC curve: ${String(jwk.crv)}`, {
        hint: `Supported curves: ${EC_CURVES.join(', ')}`,
      });
    }
    return { kty: 'EC', crv: jwk.crv, x: requireMember(jwk, 'x'), y: requireMember(jwk, 'y') };
  }
  if (jwk.kty === 'OKP') {
    if (jwk.crv !== 'Ed25519') {
      throw new KeyFormatError(`Unsupported OKP curve: ${String(jwk.crv)}`, {
        hint: 'Only Ed25519 OKP keys are supported',
      });
    }
    return { kty: 'OKP', crv: 'Ed25519', x: requireMember(jwk, 'x') };
  }
  if (jwk.kty === 'RSA') {
    return { kty: 'RSA', n: requireMember(jwk, 'n'), e: requireMember(jwk, 'e') };
  }
  throw new KeyFormatError(`Unsupported key type: ${String(jwk.kty)}`);
}

function privateKeyFromObject(keyObject: KeyObject): PrivateKey {
  const jwk = keyObject.export({ format: 'jwk' });
  const publicJwk = publicJwkFromExport(jwk);
  switch (publicJwk.kty) {
    case 'EC':
      return { kty: 'EC', crv: publicJwk.crv, d: base64urlDecode(requireMember(jwk, 'd')), publicJwk };
    case 'OKP':
      return { kty: 'OKP', crv: 'Ed25519', d: base64urlDecode(requireMember(jwk, 'd')), publicJwk };
    case 'RSA':
      if (keyObject.asymmetricKeyType !== 'rsa') {
        throw new KeyFormatError(`Unsupported RSA key variant: ${String(keyObject.asymmetricKeyType)}`);
      }
      return { kty: 'RSA', keyObject, publicJwk };
  }
}

/**
 * Parse a PEM-encoded (PKCS#8, SEC1 or PKCS#1) private key.
 *
 * @throws {KeyFormatError} When the input is not a private key of a supported type.
 *
 * @example
 * ```typescript
 * const key = parsePrivateKey(readFileSync('signer.pem', 'utf-8'));
 * console.log(key.kty, key.publicJwk);
 * ```
 */
export function parsePrivateKey(pem: string | Uint8Array): PrivateKey {
  let keyObject: KeyObject;
  try {
    keyObject = createPrivateKey(typeof pem === 'string' ? pem : Buffer.from(pem));
  } catch (err) {
    throw new KeyFormatError(`Could not parse private key: ${errorMessage(err)}`, {
      hint: 'Provide a PEM-encoded private key (e.g. from `pactseal keygen`).',
      cause: err,
    });
  }
  return privateKeyFromObject(keyObject);
}

/**
 * Parse a PEM public key. A private key PEM is accepted as well; its
 * public half is returned.
 *
 * @throws {KeyFormatError} When the input is not a key of a supported type.
 */
export function parsePublicKey(pem: string | Uint8Array): PublicJwk {
  let keyObject: KeyObject;
  try {
    keyObject = createPublicKey(typeof pem === 'string' ? pem : Buffer.from(pem));
  } catch (err) {
    throw new KeyFormatError(`Could not parse public key: ${errorMessage(err)}`, { cause: err });
  }
  return publicJwkFromExport(keyObject.export({ format: 'jwk' }));
}

function readKeyFile(path: string): Buffer {
  const resolved = resolve(path);
  try {
    return readFileSync(resolved);
  } catch (err) {
    throw new FileAccessError(resolved, `Failed to read key file '${resolved}': ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Read and parse a PEM private key file.
 *
 * @throws {FileAccessError} When the file cannot be read.
 * @throws {KeyFormatError} When the contents are not a supported private key.
 */
export function loadPrivateKey(path: string): PrivateKey {
  return parsePrivateKey(readKeyFile(path));
}

/** Read and parse a PEM public (or private) key file. */
export function loadPublicKey(path: string): PublicJwk {
  return parsePublicKey(readKeyFile(path));
}

/**
 * Validate an untrusted value (e.g. a DID document's `publicKeyJwk`) as a
 * supported public JWK. Private members are not copied.
 *
 * @throws {KeyFormatError} When required members are missing or the type is unsupported.
 */
export function parsePublicJwk(value: unknown): PublicJwk {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new KeyFormatError('Public JWK must be a JSON object');
  }
  const jwk: JsonWebKey = { ...value };
  const parsed = publicJwkFromExport(jwk);
  return typeof jwk.alg === 'string' ? { ...parsed, alg: jwk.alg } : parsed;
}

/** Compare the key material of two public JWKs, ignoring `alg`. */
export function publicJwkEquals(a: PublicJwk, b: PublicJwk): boolean {
  if (a.kty === 'EC' && b.kty === 'EC') {
    return a.crv === b.crv && a.x === b.x && a.y === b.y;
  }
  if (a.kty === 'OKP' && b.kty === 'OKP') {
    return a.crv === b.crv && a.x === b.x;
  }
  if (a.kty === 'RSA' && b.kty === 'RSA') {
    return a.n === b.n && a.e === b.e;
  }
  return false;
}

/**
 * RFC 7638 JWK thumbprint (SHA-256, base64url). Only the required members
 * take part, in lexicographic order, so `alg` never changes the result.
 */
export function jwkThumbprint(jwk: PublicJwk): Base64Url {
  let canonical: string;
  switch (jwk.kty) {
    case 'EC':
      canonical = JSON.stringify({ crv: jwk.crv, kty: jwk.kty, x: jwk.x, y: jwk.y });
      break;
    case 'OKP':
      canonical = JSON.stringify({ crv: jwk.crv, kty: jwk.kty, x: jwk.x });
      break;
    case 'RSA':
      canonical = JSON.stringify({ e: jwk.e, kty: jwk.kty, n: jwk.n });
      break;
  }
  return base64urlEncode(sha256(new TextEncoder().encode(canonical)));
}

/**
 * Generate a new private key and return it as PKCS#8 PEM.
 *
 * @example
 * ```typescript
 * const pem = generateKeyPem({ type: 'ec', curve: 'P-384' });
 * const key = parsePrivateKey(pem);
 * ```
 */
export function generateKeyPem(options: KeyGenerationOptions): string {
  const encoding: ED25519KeyPairOptions<'pem', 'pem'> = {
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  } as const;

  switch (options.type) {
    case 'ec':
      return generateKeyPairSync('ec', {
        namedCurve: OPENSSL_CURVE_NAMES[options.curve ?? 'P-256'],
        ...encoding,
      }).privateKey;
    case 'ed25519':
      return generateKeyPairSync('ed25519', encoding).privateKey;
    case 'rsa':
      return generateKeyPairSync('rsa', {
        modulusLength: options.modulusLength ?? 2048,
        ...encoding,
      }).privateKey;
  }
}
