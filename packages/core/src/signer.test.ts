import { describe, it, expect, beforeAll } from 'vitest';

import {
  ConfigurationConflictError,
  DidResolutionError,
  Logger,
  LogLevel,
  UnsupportedAlgorithmError,
} from '@pactseal/types';
import type { LogEntry } from '@pactseal/types';
import { generateKeyPem, parsePrivateKey } from '@pactseal/crypto';
import type { PrivateKey } from '@pactseal/crypto';
import { createDidDocument } from '@pactseal/did';

import {
  SIGNER_CONFLICT_MESSAGE,
  assertSignerOptionsCompatible,
  createSigner,
  createSignerFromOptions,
} from './index';

const DID = 'did:web:signer.example.com';

let ecKey: PrivateKey;
let edKey: PrivateKey;

beforeAll(() => {
  ecKey = parsePrivateKey(generateKeyPem({ type: 'ec', curve: 'P-384' }));
  edKey = parsePrivateKey(generateKeyPem({ type: 'ed25519' }));
});

// ---------------------------------------------------------------------------
// createSigner
// ---------------------------------------------------------------------------

describe('createSigner (ad hoc)', () => {
  it('infers the algorithm from the key type', () => {
    const signer = createSigner(ecKey, { kind: 'ad-hoc' });
    expect(signer).toEqual({ key: ecKey, algorithm: 'ES384' });
    expect('issuer' in signer).toBe(false);
    expect('keyId' in signer).toBe(false);
  });

  it('takes issuer, key id and algorithm as given', () => {
    const signer = createSigner(edKey, { kind: 'ad-hoc', issuer: 'contoso', keyId: 'k1', algorithm: 'EdDSA' });
    expect(signer).toEqual({ key: edKey, issuer: 'contoso', keyId: 'k1', algorithm: 'EdDSA' });
  });

  it('rejects an algorithm the key cannot produce', () => {
    expect(() => createSigner(ecKey, { kind: 'ad-hoc', algorithm: 'ES256' })).toThrow(UnsupportedAlgorithmError);
  });
});

describe('createSigner (DID)', () => {
  it('takes issuer, key id and algorithm from the document', () => {
    const didDocument = createDidDocument(DID, ecKey, { keyId: 'k1' });
    expect(createSigner(ecKey, { kind: 'did', didDocument })).toEqual({
      key: ecKey,
      issuer: DID,
      keyId: '#k1',
      algorithm: 'ES384',
    });
  });

  it('fails when the key is not in the document', () => {
    const didDocument = createDidDocument(DID, edKey, { keyId: 'k1' });
    expect(() => createSigner(ecKey, { kind: 'did', didDocument })).toThrow(DidResolutionError);
  });

  it('logs the resolved identity without key material', () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: LogLevel.DEBUG, output: (entry) => entries.push(entry) });
    createSigner(edKey, { kind: 'did', didDocument: createDidDocument(DID, edKey, { keyId: 'k1' }) }, logger);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.message).toBe('Signer ready');
    expect(entries[0]?.['source']).toBe('did');
    expect(entries[0]?.['issuer']).toBe(DID);
    expect(entries[0]?.['algorithm']).toBe('EdDSA');
    expect(entries[0]?.['key']).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// createSignerFromOptions
// ---------------------------------------------------------------------------

describe('createSignerFromOptions', () => {
  it('parses the algorithm name case-insensitively', () => {
    expect(createSignerFromOptions(edKey, { algorithm: 'eddsa' }).algorithm).toBe('EdDSA');
  });

  it('rejects an unknown algorithm name', () => {
    expect(() => createSignerFromOptions(edKey, { algorithm: 'HS256' })).toThrow(UnsupportedAlgorithmError);
  });

  it('rejects a DID document combined with an issuer', () => {
    const didDocument = createDidDocument(DID, ecKey);
    expect(() => createSignerFromOptions(ecKey, { didDocument, issuer: 'contoso' })).toThrow(ConfigurationConflictError);
  });

  it('rejects a DID document combined with an algorithm', () => {
    const didDocument = createDidDocument(DID, ecKey);
    expect(() => createSignerFromOptions(ecKey, { didDocument, algorithm: 'ES384' })).toThrow(SIGNER_CONFLICT_MESSAGE);
  });

  it('passes the key id to DID resolution', () => {
    const didDocument = createDidDocument(DID, ecKey, { keyId: 'main' });
    expect(createSignerFromOptions(ecKey, { didDocument, keyId: `${DID}#main` }).keyId).toBe('#main');
  });
});

describe('assertSignerOptionsCompatible', () => {
  it('accepts either path on its own', () => {
    expect(() => assertSignerOptionsCompatible({ didDocument: 'did.json' })).not.toThrow();
    expect(() => assertSignerOptionsCompatible({ issuer: 'contoso', algorithm: 'ES256' })).not.toThrow();
  });

  it('rejects a DID document path with issuer or algorithm', () => {
    expect(() => assertSignerOptionsCompatible({ didDocument: 'did.json', issuer: 'contoso' })).toThrow(
      ConfigurationConflictError,
    );
    expect(() => assertSignerOptionsCompatible({ didDocument: 'did.json', algorithm: 'ES256' })).toThrow(
      ConfigurationConflictError,
    );
  });
});
