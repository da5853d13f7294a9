/**
 * Signer factory.
 *
 * A signer is configured in one of two ways: ad hoc, with an optional
 * issuer, key id and algorithm given directly, or from a DID document,
 * which then supplies the issuer and algorithm. {@link SignerConfig}
 * keeps the two apart in the type system; {@link createSignerFromOptions}
 * is the flag-shaped entry point that checks the same rule at run time.
 *
 * @packageDocumentation
 */

import { ConfigurationConflictError, silentLogger } from '@pactseal/types';
import type { Logger } from '@pactseal/types';
import { assertAlgorithmCompatible, defaultAlgorithm, parseAlgorithm } from '@pactseal/crypto';
import type { Algorithm, PrivateKey, Signer } from '@pactseal/crypto';
import { resolveSignerFromDid } from '@pactseal/did';
import type { DidDocument } from '@pactseal/did';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Identity and algorithm given directly. All fields are optional. */
export interface AdHocSignerConfig {
  kind: 'ad-hoc';
  issuer?: string;
  keyId?: string;
  /** Defaults to the key type's algorithm. */
  algorithm?: Algorithm;
}

/** Identity and algorithm taken from a DID document. */
export interface DidSignerConfig {
  kind: 'did';
  didDocument: DidDocument;
  /** Selects the verification method when the document has several. */
  keyId?: string;
}

export type SignerConfig = AdHocSignerConfig | DidSignerConfig;

/** Loose, flag-shaped signer options as a command line collects them. */
export interface SignerOptions {
  didDocument?: DidDocument;
  keyId?: string;
  issuer?: string;
  /** Algorithm name, matched case-insensitively. */
  algorithm?: string;
}

/**
 * Which signer options are present. `didDocument` may be the document
 * itself or just the path it will be read from.
 */
export interface SignerOptionPresence {
  didDocument?: unknown;
  issuer?: string;
  algorithm?: string;
}

export const SIGNER_CONFLICT_MESSAGE = 'issuer/alg and DID document are mutually exclusive';

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Reject a DID document combined with an explicit issuer or algorithm.
 * Needs no file access, so it can run before anything is read.
 *
 * @throws {ConfigurationConflictError}
 */
export function assertSignerOptionsCompatible(options: SignerOptionPresence): void {
  if (options.didDocument !== undefined && (options.issuer !== undefined || options.algorithm !== undefined)) {
    throw new ConfigurationConflictError(SIGNER_CONFLICT_MESSAGE, {
      hint: 'The DID document determines the issuer and algorithm. Drop --issuer/--alg or --did-doc.',
    });
  }
}

/**
 * Build a {@link Signer} for `key`.
 *
 * @throws {UnsupportedAlgorithmError} When an ad-hoc algorithm does not fit the key.
 * @throws {DidResolutionError} When the DID document yields no signer for the key.
 *
 * @example
 * ```typescript
 * const signer = createSigner(key, { kind: 'ad-hoc', issuer: 'did:web:example.com', keyId: '#key-1' });
 * const fromDid = createSigner(key, { kind: 'did', didDocument: loadDidDocument('did.json') });
 * ```
 */
export function createSigner(key: PrivateKey, config: SignerConfig, logger: Logger = silentLogger): Signer {
  let signer: Signer;
  if (config.kind === 'did') {
    signer = resolveSignerFromDid(key, config.didDocument, config.keyId);
  } else {
    const algorithm = config.algorithm ?? defaultAlgorithm(key);
    assertAlgorithmCompatible(key, algorithm);
    signer = { key, algorithm };
    if (config.issuer !== undefined) {
      signer.issuer = config.issuer;
    }
    if (config.keyId !== undefined) {
      signer.keyId = config.keyId;
    }
  }
  logger.debug('Signer ready', {
    source: config.kind,
    issuer: signer.issuer,
    keyId: signer.keyId,
    algorithm: signer.algorithm,
  });
  return signer;
}

/**
 * Build a signer from loose options.
 *
 * @throws {ConfigurationConflictError} When a DID document is combined with issuer or algorithm.
 * @throws {UnsupportedAlgorithmError} When the algorithm name is unknown or does not fit the key.
 */
export function createSignerFromOptions(key: PrivateKey, options: SignerOptions, logger?: Logger): Signer {
  assertSignerOptionsCompatible(options);
  if (options.didDocument !== undefined) {
    const config: DidSignerConfig = { kind: 'did', didDocument: options.didDocument };
    if (options.keyId !== undefined) {
      config.keyId = options.keyId;
    }
    return createSigner(key, config, logger);
  }
  const config: AdHocSignerConfig = { kind: 'ad-hoc' };
  if (options.issuer !== undefined) {
    config.issuer = options.issuer;
  }
  if (options.keyId !== undefined) {
    config.keyId = options.keyId;
  }
  if (options.algorithm !== undefined) {
    config.algorithm = parseAlgorithm(options.algorithm);
  }
  return createSigner(key, config, logger);
}
