/**
 * Contract signing and verification.
 *
 * A signed contract is a tagged `COSE_Sign` message whose payload is the
 * contract bytes. The body protected header carries the content type,
 * feed and registration info; each signature's protected header carries
 * the algorithm, key id and issuer of its signer.
 *
 * @packageDocumentation
 */

import {
  ConfigurationConflictError,
  DidResolutionError,
  EnvelopeDecodeError,
  UnsupportedAlgorithmError,
  silentLogger,
} from '@pactseal/types';
import type { Logger } from '@pactseal/types';
import {
  algorithmFromCoseId,
  coseAlgorithmId,
  sha256Hex,
  signMessage,
  verifyMessage,
} from '@pactseal/crypto';
import type { Algorithm, PublicJwk, Signer } from '@pactseal/crypto';
import { assertionMethods, publicKeyFromDid, relativeMethodId } from '@pactseal/did';
import type { DidDocument } from '@pactseal/did';

import {
  HeaderLabel,
  decodeCoseSign,
  decodeHeaderMap,
  encodeCoseSign,
  encodeHeaderMap,
  sigStructure,
} from './cose';
import type { CoseSign, CoseSignature, HeaderMap } from './cose';
import { foldRegistrationInfo } from './registration-info';
import type { RegistrationInfo, RegistrationInfoEntry, RegistrationInfoValue } from './registration-info';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Start a new envelope around the contract. */
export interface CreateEnvelopeOptions {
  mode: 'create';
  contentType: string;
  feed?: string;
  /** Folded by name; a later duplicate overwrites an earlier one. */
  registrationInfo?: readonly RegistrationInfoEntry[];
  logger?: Logger;
}

/** Add a signature to an envelope that is already signed. */
export interface AppendSignatureOptions {
  mode: 'append';
  /** When given, must equal the envelope's content type. */
  contentType?: string;
  logger?: Logger;
}

export type SignContractOptions = CreateEnvelopeOptions | AppendSignatureOptions;

/** Headers shared by every signature of an envelope. */
export interface ContractHeaders {
  contentType?: string | number;
  feed?: string;
  registrationInfo: RegistrationInfo;
}

/** Headers of one signature. */
export interface SignatureHeaders {
  /** COSE algorithm identifier as written. */
  algorithmId: number;
  /** The algorithm, when pactseal supports it. */
  algorithm?: Algorithm;
  keyId?: string;
  issuer?: string;
}

export interface ContractEnvelope {
  headers: ContractHeaders;
  payload: Uint8Array;
  signatures: SignatureHeaders[];
  /** The decoded message, with protected headers as signed. */
  message: CoseSign;
}

/** Maps a signature's headers to the key that should verify it. */
export type PublicKeyResolver = (signature: SignatureHeaders) => PublicJwk | undefined;

export interface SignatureVerification {
  headers: SignatureHeaders;
  valid: boolean;
  /** Why the signature was rejected. */
  reason?: string;
}

export interface ContractVerification {
  /** True only when every signature verifies. */
  valid: boolean;
  headers: ContractHeaders;
  payload: Uint8Array;
  signatures: SignatureVerification[];
}

// ─── Header codecs ────────────────────────────────────────────────────────────

const utf8 = new TextEncoder();

function bodyHeaders(options: CreateEnvelopeOptions): HeaderMap {
  const headers: HeaderMap = new Map();
  headers.set(HeaderLabel.CONTENT_TYPE, options.contentType);
  if (options.feed !== undefined) {
    headers.set(HeaderLabel.FEED, options.feed);
  }
  const info = foldRegistrationInfo(options.registrationInfo ?? []);
  if (info.size > 0) {
    // CBOR ints beyond 32 bits go through BigInt so they are not written as floats.
    const encoded = new Map<string, RegistrationInfoValue | bigint>();
    for (const [name, value] of info) {
      encoded.set(name, widenInteger(value));
    }
    headers.set(HeaderLabel.REGISTRATION_INFO, encoded);
  }
  return headers;
}

function widenInteger(value: RegistrationInfoValue): RegistrationInfoValue | bigint {
  if (typeof value === 'number' && (value > 0xffffffff || value < -0x100000000)) {
    return BigInt(value);
  }
  return value;
}

function signatureHeaders(signer: Signer): HeaderMap {
  const headers: HeaderMap = new Map();
  headers.set(HeaderLabel.ALG, coseAlgorithmId(signer.algorithm));
  if (signer.keyId !== undefined) {
    headers.set(HeaderLabel.KID, utf8.encode(signer.keyId));
  }
  if (signer.issuer !== undefined) {
    headers.set(HeaderLabel.ISSUER, signer.issuer);
  }
  return headers;
}

function decodeText(value: unknown, what: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Uint8Array) {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(value);
    } catch (err) {
      throw new EnvelopeDecodeError(`${what} is not valid UTF-8`, { cause: err });
    }
  }
  throw new EnvelopeDecodeError(`${what} must be a string`);
}

function decodeRegistrationInfo(value: unknown): RegistrationInfo {
  const info: RegistrationInfo = new Map();
  if (value === undefined) {
    return info;
  }
  if (!(value instanceof Map)) {
    throw new EnvelopeDecodeError('registration_info header must be a map');
  }
  for (const [name, entry] of value) {
    if (typeof name !== 'string') {
      throw new EnvelopeDecodeError('registration_info names must be strings');
    }
    if (typeof entry === 'string' || entry instanceof Uint8Array) {
      info.set(name, entry);
    } else if (typeof entry === 'number' && Number.isSafeInteger(entry)) {
      info.set(name, entry);
    } else if (typeof entry === 'bigint' && entry >= BigInt(Number.MIN_SAFE_INTEGER) && entry <= BigInt(Number.MAX_SAFE_INTEGER)) {
      info.set(name, Number(entry));
    } else {
      throw new EnvelopeDecodeError(`registration_info '${name}' has an unsupported value`);
    }
  }
  return info;
}

function decodeContractHeaders(bodyProtected: Uint8Array): ContractHeaders {
  const headers = decodeHeaderMap(bodyProtected);
  const result: ContractHeaders = {
    registrationInfo: decodeRegistrationInfo(headers.get(HeaderLabel.REGISTRATION_INFO)),
  };
  const contentType = headers.get(HeaderLabel.CONTENT_TYPE);
  if (typeof contentType === 'string' || typeof contentType === 'number') {
    result.contentType = contentType;
  } else if (contentType !== undefined) {
    throw new EnvelopeDecodeError('Content type header must be a string or an integer');
  }
  const feed = headers.get(HeaderLabel.FEED);
  if (feed !== undefined) {
    result.feed = decodeText(feed, 'feed header');
  }
  return result;
}

function decodeSignatureHeaders(signature: CoseSignature, index: number): SignatureHeaders {
  const headers = decodeHeaderMap(signature.protected);
  const algorithmId = headers.get(HeaderLabel.ALG);
  if (typeof algorithmId !== 'number') {
    throw new EnvelopeDecodeError(`Signature ${index} has no algorithm header`);
  }
  const result: SignatureHeaders = { algorithmId };
  try {
    result.algorithm = algorithmFromCoseId(algorithmId);
  } catch (err) {
    // Unknown identifiers are reported by verification, not by decoding.
    if (!(err instanceof UnsupportedAlgorithmError)) throw err;
  }
  const kid = headers.get(HeaderLabel.KID) ?? signature.unprotected.get(HeaderLabel.KID);
  if (kid !== undefined) {
    result.keyId = decodeText(kid, `Signature ${index} kid`);
  }
  const issuer = headers.get(HeaderLabel.ISSUER);
  if (issuer !== undefined) {
    result.issuer = decodeText(issuer, `Signature ${index} issuer`);
  }
  return result;
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Decode a signed contract without verifying it.
 *
 * @throws {EnvelopeDecodeError} When `bytes` is not a pactseal envelope.
 */
export function decodeContractEnvelope(bytes: Uint8Array): ContractEnvelope {
  const message = decodeCoseSign(bytes);
  return {
    headers: decodeContractHeaders(message.protected),
    payload: message.payload,
    signatures: message.signatures.map(decodeSignatureHeaders),
    message,
  };
}

// ─── Signing ──────────────────────────────────────────────────────────────────

async function createSignature(
  signer: Signer,
  bodyProtected: Uint8Array,
  payload: Uint8Array,
): Promise<CoseSignature> {
  const signProtected = encodeHeaderMap(signatureHeaders(signer));
  const toBeSigned = sigStructure(bodyProtected, signProtected, payload);
  return {
    protected: signProtected,
    unprotected: new Map(),
    signature: await signMessage(toBeSigned, signer.key, signer.algorithm),
  };
}

/**
 * Sign a contract.
 *
 * In `create` mode `contract` is the payload of a new envelope. In
 * `append` mode `contract` must already be an envelope; a signature over
 * its existing body header and payload is added after the others, which
 * are kept unchanged.
 *
 * @throws {UnsupportedAlgorithmError} When the signer's key cannot produce its algorithm.
 * @throws {EnvelopeDecodeError} In append mode, when `contract` is not an envelope.
 * @throws {ConfigurationConflictError} In append mode, when `contentType` differs from the envelope's.
 *
 * @example
 * ```typescript
 * const envelope = await signContract(signer, contractBytes, {
 *   mode: 'create',
 *   contentType: 'application/json',
 *   feed: 'contracts/2024',
 *   registrationInfo: [parseRegistrationInfo('int:ver=7')],
 * });
 * const countersigned = await signContract(otherSigner, envelope, { mode: 'append' });
 * ```
 */
export async function signContract(
  signer: Signer,
  contract: Uint8Array,
  options: SignContractOptions,
): Promise<Uint8Array> {
  const log = (options.logger ?? silentLogger).child('contract');

  if (options.mode === 'create') {
    const bodyProtected = encodeHeaderMap(bodyHeaders(options));
    const signature = await createSignature(signer, bodyProtected, contract);
    log.debug('Created envelope', {
      algorithm: signer.algorithm,
      issuer: signer.issuer,
      keyId: signer.keyId,
      payloadSha256: sha256Hex(contract),
    });
    return encodeCoseSign({
      protected: bodyProtected,
      unprotected: new Map(),
      payload: contract,
      signatures: [signature],
    });
  }

  const envelope = decodeContractEnvelope(contract);
  if (options.contentType !== undefined && options.contentType !== String(envelope.headers.contentType)) {
    throw new ConfigurationConflictError(
      `Content type '${options.contentType}' differs from the envelope's '${String(envelope.headers.contentType)}'`,
      { hint: 'The content type of a signed envelope cannot change; omit --content-type when adding a signature.' },
    );
  }
  const { message } = envelope;
  const signature = await createSignature(signer, message.protected, message.payload);
  log.debug('Appended signature', {
    algorithm: signer.algorithm,
    issuer: signer.issuer,
    keyId: signer.keyId,
    signatures: message.signatures.length + 1,
  });
  return encodeCoseSign({ ...message, signatures: [...message.signatures, signature] });
}

// ─── Verification ─────────────────────────────────────────────────────────────

/**
 * Verify every signature of a signed contract.
 *
 * @throws {EnvelopeDecodeError} When `bytes` is not an envelope. Bad
 * signatures do not throw; they are reported in the result.
 *
 * @example
 * ```typescript
 * const result = await verifyContract(envelope, publicKeyResolverFromKey(key.publicJwk));
 * if (result.valid) writeFileSync('contract.json', result.payload);
 * ```
 */
export async function verifyContract(bytes: Uint8Array, resolveKey: PublicKeyResolver): Promise<ContractVerification> {
  const envelope = decodeContractEnvelope(bytes);
  const { message } = envelope;
  const signatures: SignatureVerification[] = [];

  for (const [index, headers] of envelope.signatures.entries()) {
    const raw = message.signatures[index];
    if (raw === undefined) {
      continue;
    }
    if (headers.algorithm === undefined) {
      signatures.push({ headers, valid: false, reason: `Unsupported algorithm ${headers.algorithmId}` });
      continue;
    }
    const publicKey = resolveKey(headers);
    if (publicKey === undefined) {
      signatures.push({ headers, valid: false, reason: 'No public key for this signer' });
      continue;
    }
    const toBeSigned = sigStructure(message.protected, raw.protected, message.payload);
    const valid = await verifyMessage(toBeSigned, raw.signature, publicKey, headers.algorithm);
    signatures.push(valid ? { headers, valid } : { headers, valid, reason: 'Signature does not verify' });
  }

  return {
    valid: signatures.length > 0 && signatures.every((sig) => sig.valid),
    headers: envelope.headers,
    payload: envelope.payload,
    signatures,
  };
}

/** Resolve every signature to the same key. */
export function publicKeyResolverFromKey(publicKey: PublicJwk): PublicKeyResolver {
  return () => publicKey;
}

/**
 * Resolve signatures through a DID document: the issuer must be the
 * document's DID, and the key id names the verification method. A
 * signature without a key id uses the document's only assertion method.
 */
export function publicKeyResolverFromDid(doc: DidDocument): PublicKeyResolver {
  return (headers) => {
    if (headers.issuer !== undefined && headers.issuer !== doc.id) {
      return undefined;
    }
    try {
      if (headers.keyId !== undefined) {
        return publicKeyFromDid(doc, headers.keyId);
      }
      const methods = assertionMethods(doc);
      const [only] = methods;
      return methods.length === 1 && only !== undefined
        ? publicKeyFromDid(doc, relativeMethodId(only.id, doc.id))
        : undefined;
    } catch (err) {
      if (err instanceof DidResolutionError) {
        return undefined;
      }
      throw err;
    }
  };
}
