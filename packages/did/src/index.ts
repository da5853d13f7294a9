/**
 * DID documents: validation, signer resolution and creation.
 *
 * Documents are always local JSON; no DID method is resolved over the
 * network. A document names the keys that may sign on behalf of its
 * subject through `assertionMethod`, and each key is published as a
 * `publicKeyJwk`.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';

import {
  DidDocumentInvalidError,
  DidResolutionError,
  FileAccessError,
  errorMessage,
} from '@pactseal/types';
import {
  assertAlgorithmCompatible,
  defaultAlgorithm,
  jwkThumbprint,
  parseAlgorithm,
  parsePublicJwk,
  publicJwkEquals,
} from '@pactseal/crypto';
import type { Algorithm, PrivateKey, PublicJwk, Signer } from '@pactseal/crypto';

export type { CreateDidDocumentOptions, DidDocument, VerificationMethod } from './types';

import type { CreateDidDocumentOptions, DidDocument, VerificationMethod } from './types';

/** Contexts written into documents produced by {@link createDidDocument}. */
export const DID_CONTEXTS: readonly string[] = [
  'https://www.w3.org/ns/did/v1',
  'https://w3id.org/security/suites/jws-2020/v1',
];

const DID_PATTERN = '^did:[a-z0-9]+:[A-Za-z0-9._:%-]+$';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const verificationMethodSchema: SchemaObject = {
  type: 'object',
  required: ['id', 'type', 'controller'],
  properties: {
    id: { type: 'string', minLength: 1 },
    type: { type: 'string', minLength: 1 },
    controller: { type: 'string', minLength: 1 },
    publicKeyJwk: { type: 'object' },
  },
};

/** JSON Schema for the DID document members pactseal depends on. */
export const DID_DOCUMENT_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', pattern: DID_PATTERN },
    verificationMethod: { type: 'array', items: verificationMethodSchema },
    assertionMethod: {
      type: 'array',
      items: { anyOf: [{ type: 'string', minLength: 1 }, verificationMethodSchema] },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateDidDocument = ajv.compile<DidDocument>(DID_DOCUMENT_SCHEMA);

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate an untrusted JSON value as a DID document.
 *
 * @throws {DidDocumentInvalidError} When the value does not match {@link DID_DOCUMENT_SCHEMA}.
 */
export function parseDidDocument(value: unknown): DidDocument {
  if (!validateDidDocument(value)) {
    throw new DidDocumentInvalidError(
      `Invalid DID document: ${ajv.errorsText(validateDidDocument.errors, { dataVar: 'document' })}`,
    );
  }
  return value;
}

/**
 * Read, parse and validate a DID document JSON file.
 *
 * @throws {FileAccessError} When the file cannot be read.
 * @throws {DidDocumentInvalidError} When it is not JSON or not a DID document.
 */
export function loadDidDocument(path: string): DidDocument {
  const resolved = resolve(path);
  let text: string;
  try {
    text = readFileSync(resolved, 'utf-8');
  } catch (err) {
    throw new FileAccessError(resolved, `Failed to read DID document '${resolved}': ${errorMessage(err)}`, {
      cause: err,
    });
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DidDocumentInvalidError(`DID document '${resolved}' is not valid JSON`, { cause: err });
  }
  return parseDidDocument(json);
}

// ---------------------------------------------------------------------------
// Method ids
// ---------------------------------------------------------------------------

/** `did:x:y#frag`, `#frag` and a bare `frag` all become `did:x:y#frag`. */
export function absoluteMethodId(id: string, did: string): string {
  if (id.startsWith('#')) {
    return `${did}${id}`;
  }
  return id.includes(':') ? id : `${did}#${id}`;
}

/** `did:x:y#frag` becomes `#frag` when it belongs to `did`; other ids are returned unchanged. */
export function relativeMethodId(id: string, did: string): string {
  return id.startsWith(`${did}#`) ? id.slice(did.length) : id;
}

function findVerificationMethod(doc: DidDocument, id: string): VerificationMethod | undefined {
  const wanted = absoluteMethodId(id, doc.id);
  const embedded = (doc.assertionMethod ?? []).filter(
    (entry): entry is VerificationMethod => typeof entry !== 'string',
  );
  return [...(doc.verificationMethod ?? []), ...embedded].find(
    (method) => absoluteMethodId(method.id, doc.id) === wanted,
  );
}

/**
 * The methods allowed to sign for the document's subject: every
 * `assertionMethod` (references looked up in `verificationMethod`), or
 * every `verificationMethod` when the document has no `assertionMethod`.
 *
 * @throws {DidResolutionError} When an `assertionMethod` reference points nowhere.
 */
export function assertionMethods(doc: DidDocument): VerificationMethod[] {
  if (doc.assertionMethod === undefined) {
    return doc.verificationMethod ?? [];
  }
  return doc.assertionMethod.map((entry) => {
    if (typeof entry !== 'string') {
      return entry;
    }
    const method = (doc.verificationMethod ?? []).find(
      (candidate) => absoluteMethodId(candidate.id, doc.id) === absoluteMethodId(entry, doc.id),
    );
    if (method === undefined) {
      throw new DidResolutionError(`assertionMethod '${entry}' does not match any verificationMethod`);
    }
    return method;
  });
}

function methodPublicKey(method: VerificationMethod): PublicJwk {
  if (method.publicKeyJwk === undefined) {
    throw new DidResolutionError(`Verification method '${method.id}' has no publicKeyJwk`, {
      hint: 'Only JWK-based verification methods (e.g. JsonWebKey2020) are supported.',
    });
  }
  try {
    return parsePublicJwk(method.publicKeyJwk);
  } catch (err) {
    throw new DidResolutionError(`Verification method '${method.id}' has an unusable publicKeyJwk`, {
      cause: err,
    });
  }
}

// ---------------------------------------------------------------------------
// Signer resolution
// ---------------------------------------------------------------------------

/**
 * Build a {@link Signer} for `key` from a DID document.
 *
 * The verification method is chosen by `keyId` (relative or absolute
 * form) among the document's assertion methods; without `keyId` the
 * document must have exactly one. The chosen method's key must be the
 * public half of `key`. The signer's issuer is the document id, its key
 * id the relative method id, and its algorithm the JWK's `alg` or the
 * key type's default.
 *
 * @throws {DidResolutionError} When no single matching method exists or the keys differ.
 *
 * @example
 * ```typescript
 * const signer = resolveSignerFromDid(loadPrivateKey('key.pem'), loadDidDocument('did.json'), '#key-1');
 * // { issuer: 'did:web:example.com', keyId: '#key-1', algorithm: 'ES256', key }
 * ```
 */
export function resolveSignerFromDid(key: PrivateKey, doc: DidDocument, keyId?: string): Signer {
  const candidates = assertionMethods(doc);
  let method: VerificationMethod | undefined;

  if (keyId !== undefined) {
    const wanted = absoluteMethodId(keyId, doc.id);
    method = candidates.find((candidate) => absoluteMethodId(candidate.id, doc.id) === wanted);
    if (method === undefined) {
      throw new DidResolutionError(`DID document ${doc.id} has no assertion method '${keyId}'`, {
        hint: `Available: ${candidates.map((c) => relativeMethodId(c.id, doc.id)).join(', ') || 'none'}`,
      });
    }
  } else {
    if (candidates.length !== 1) {
      throw new DidResolutionError(
        `DID document ${doc.id} has ${candidates.length} assertion methods; exactly one is required without a key id`,
        { hint: 'Select a verification method with --kid.' },
      );
    }
    method = candidates[0];
  }
  if (method === undefined) {
    throw new DidResolutionError(`DID document ${doc.id} has no usable assertion method`);
  }

  const publicKey = methodPublicKey(method);
  if (!publicJwkEquals(publicKey, key.publicJwk)) {
    throw new DidResolutionError(
      `The private key does not match verification method '${relativeMethodId(method.id, doc.id)}'`,
    );
  }

  let algorithm: Algorithm;
  try {
    algorithm = publicKey.alg !== undefined ? parseAlgorithm(publicKey.alg) : defaultAlgorithm(key);
    assertAlgorithmCompatible(key, algorithm);
  } catch (err) {
    throw new DidResolutionError(
      `Verification method '${relativeMethodId(method.id, doc.id)}' names an unusable algorithm: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return {
    key,
    issuer: doc.id,
    keyId: relativeMethodId(method.id, doc.id),
    algorithm,
  };
}

/**
 * Public key of the verification method `keyId` (relative or absolute).
 * Embedded assertion methods are searched as well.
 *
 * @throws {DidResolutionError} When the method is missing or has no usable JWK.
 */
export function publicKeyFromDid(doc: DidDocument, keyId: string): PublicJwk {
  const method = findVerificationMethod(doc, keyId);
  if (method === undefined) {
    throw new DidResolutionError(`DID document ${doc.id} has no verification method '${keyId}'`);
  }
  return methodPublicKey(method);
}

// ---------------------------------------------------------------------------
// Creation
// ---------------------------------------------------------------------------

function keyMaterial(jwk: PublicJwk): PublicJwk {
  switch (jwk.kty) {
    case 'EC':
      return { kty: 'EC', crv: jwk.crv, x: jwk.x, y: jwk.y };
    case 'OKP':
      return { kty: 'OKP', crv: jwk.crv, x: jwk.x };
    case 'RSA':
      return { kty: 'RSA', n: jwk.n, e: jwk.e };
  }
}

/**
 * Create a DID document publishing the public half of `key` as a single
 * `JsonWebKey2020` assertion method.
 *
 * @throws {DidDocumentInvalidError} When `did` is not a DID.
 *
 * @example
 * ```typescript
 * const doc = createDidDocument('did:web:example.com', key, { keyId: 'key-1' });
 * doc.assertionMethod; // ['did:web:example.com#key-1']
 * ```
 */
export function createDidDocument(
  did: string,
  key: PrivateKey | PublicJwk,
  options: CreateDidDocumentOptions = {},
): DidDocument {
  if (!new RegExp(DID_PATTERN).test(did)) {
    throw new DidDocumentInvalidError(`'${did}' is not a DID`, {
      hint: 'DIDs look like did:web:example.com',
    });
  }
  const publicJwk = 'publicJwk' in key ? key.publicJwk : key;
  if (options.algorithm !== undefined) {
    assertAlgorithmCompatible(publicJwk, options.algorithm);
  }
  const material = keyMaterial(publicJwk);
  const fragment = (options.keyId ?? jwkThumbprint(publicJwk)).replace(/^.*#/, '');
  const methodId = `${did}#${fragment}`;

  return parseDidDocument({
    '@context': [...DID_CONTEXTS],
    id: did,
    verificationMethod: [
      {
        id: methodId,
        type: 'JsonWebKey2020',
        controller: did,
        publicKeyJwk: options.algorithm !== undefined ? { ...material, alg: options.algorithm } : material,
      },
    ],
    assertionMethod: [methodId],
  });
}
