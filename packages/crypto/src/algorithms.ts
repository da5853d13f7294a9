/**
 * Signature algorithm table: COSE identifiers, defaults per key type and
 * key/algorithm compatibility.
 *
 * @packageDocumentation
 */

import { UnsupportedAlgorithmError } from '@pactseal/types';

import type { Algorithm, EcCurve, KeyType, PrivateKey, PublicJwk } from './types';

/** Every algorithm pactseal can sign and verify with. */
export const ALGORITHMS: readonly Algorithm[] = ['ES256', 'ES384', 'ES512', 'EdDSA', 'PS256', 'PS384', 'PS512'];

const COSE_IDS: Record<Algorithm, number> = {
  ES256: -7,
  ES384: -35,
  ES512: -36,
  EdDSA: -8,
  PS256: -37,
  PS384: -38,
  PS512: -39,
};

const EC_ALGORITHMS: Record<EcCurve, Algorithm> = {
  'P-256': 'ES256',
  'P-384': 'ES384',
  'P-521': 'ES512',
};

/** The subset of a key that decides which algorithms it can produce. */
interface KeyShape {
  kty: KeyType;
  crv?: string;
}

function shapeOf(key: PrivateKey | PublicJwk): KeyShape {
  return 'crv' in key ? { kty: key.kty, crv: key.crv } : { kty: key.kty };
}

function describeKey(shape: KeyShape): string {
  return shape.crv !== undefined ? `${shape.kty} ${shape.crv}` : shape.kty;
}

/** COSE algorithm identifier (header label 1) for an algorithm. */
export function coseAlgorithmId(algorithm: Algorithm): number {
  return COSE_IDS[algorithm];
}

/**
 * Reverse lookup of a COSE algorithm identifier.
 *
 * @throws {UnsupportedAlgorithmError} For identifiers outside {@link ALGORITHMS}.
 */
export function algorithmFromCoseId(id: number): Algorithm {
  const found = ALGORITHMS.find((alg) => COSE_IDS[alg] === id);
  if (found === undefined) {
    throw new UnsupportedAlgorithmError(`Unsupported COSE algorithm identifier: ${id}`);
  }
  return found;
}

/**
 * Parse an algorithm name. Matching is case-insensitive, so `es256` and
 * `eddsa` are accepted.
 *
 * @throws {UnsupportedAlgorithmError} When the name is not a known algorithm.
 */
export function parseAlgorithm(name: string): Algorithm {
  const wanted = name.trim().toLowerCase();
  const found = ALGORITHMS.find((alg) => alg.toLowerCase() === wanted);
  if (found === undefined) {
    throw new UnsupportedAlgorithmError(`Unsupported signing algorithm: '${name}'`, {
      hint: `Use one of: ${ALGORITHMS.join(', ')}`,
    });
  }
  return found;
}

/**
 * The algorithm used when none is given: the curve's matching ECDSA
 * variant, EdDSA for Ed25519, PS256 for RSA.
 */
export function defaultAlgorithm(key: PrivateKey | PublicJwk): Algorithm {
  switch (key.kty) {
    case 'EC':
      return EC_ALGORITHMS[key.crv];
    case 'OKP':
      return 'EdDSA';
    case 'RSA':
      return 'PS256';
  }
}

/** Whether `key` can produce signatures with `algorithm`. */
export function isAlgorithmCompatible(key: PrivateKey | PublicJwk, algorithm: Algorithm): boolean {
  switch (key.kty) {
    case 'EC':
      return EC_ALGORITHMS[key.crv] === algorithm;
    case 'OKP':
      return algorithm === 'EdDSA';
    case 'RSA':
      return algorithm === 'PS256' || algorithm === 'PS384' || algorithm === 'PS512';
  }
}

/**
 * @throws {UnsupportedAlgorithmError} When the key type cannot produce `algorithm`.
 */
export function assertAlgorithmCompatible(key: PrivateKey | PublicJwk, algorithm: Algorithm): void {
  if (!isAlgorithmCompatible(key, algorithm)) {
    throw new UnsupportedAlgorithmError(
      `Algorithm ${algorithm} cannot be used with a ${describeKey(shapeOf(key))} key`,
      { hint: `This key signs with ${defaultAlgorithm(key)}`, context: { algorithm } },
    );
  }
}
