/**
 * CBOR codec for the `COSE_Sign` multi-signature structure (RFC 9052).
 *
 * Protected headers travel as the exact byte strings they were signed
 * over; they are only ever decoded for reading, never re-encoded, so an
 * envelope can be decoded and re-encoded with new signatures without
 * invalidating the existing ones.
 *
 * @packageDocumentation
 */

import { Encoder, Tag } from 'cbor-x';

import { EnvelopeDecodeError, errorMessage } from '@pactseal/types';

// ─── Constants ────────────────────────────────────────────────────────────────

/** CBOR tag of a `COSE_Sign` message. */
export const COSE_SIGN_TAG = 98;
/** CBOR tag of a `COSE_Sign1` message, which cannot carry further signatures. */
export const COSE_SIGN1_TAG = 18;

/** Header labels used by pactseal envelopes. */
export const HeaderLabel = {
  ALG: 1,
  CONTENT_TYPE: 3,
  KID: 4,
  ISSUER: 'issuer',
  FEED: 'feed',
  REGISTRATION_INFO: 'registration_info',
} as const;

// ─── Types ────────────────────────────────────────────────────────────────────

export type HeaderMap = Map<number | string, unknown>;

/** One entry of the `signatures` array. */
export interface CoseSignature {
  /** Serialized signer protected header. */
  protected: Uint8Array;
  unprotected: HeaderMap;
  signature: Uint8Array;
}

/** A decoded `COSE_Sign` message. */
export interface CoseSign {
  /** Serialized body protected header. */
  protected: Uint8Array;
  unprotected: HeaderMap;
  payload: Uint8Array;
  signatures: CoseSignature[];
}

// ─── Codec ────────────────────────────────────────────────────────────────────

const cbor = new Encoder({
  useRecords: false,
  mapsAsObjects: false,
  tagUint8Array: false,
});

const EMPTY = new Uint8Array(0);

/** CBOR-encode `value`, returning bytes that do not alias the encoder's buffer. */
export function encodeCbor(value: unknown): Uint8Array {
  return new Uint8Array(cbor.encode(value));
}

function decodeCbor(bytes: Uint8Array, what: string): unknown {
  try {
    return cbor.decode(bytes);
  } catch (err) {
    throw new EnvelopeDecodeError(`${what} is not valid CBOR: ${errorMessage(err)}`, { cause: err });
  }
}

/** Serialize a protected header. An empty header becomes the empty byte string. */
export function encodeHeaderMap(headers: HeaderMap): Uint8Array {
  return headers.size === 0 ? EMPTY : encodeCbor(headers);
}

/**
 * Decode a serialized protected header.
 *
 * @throws {EnvelopeDecodeError} When the bytes are not a CBOR map.
 */
export function decodeHeaderMap(bytes: Uint8Array): HeaderMap {
  if (bytes.length === 0) {
    return new Map();
  }
  const value = decodeCbor(bytes, 'Protected header');
  if (!isHeaderMap(value)) {
    throw new EnvelopeDecodeError('Protected header is not a CBOR map');
  }
  return value;
}

/**
 * The bytes a signer signs: `Sig_structure` for context `"Signature"`
 * with empty external AAD.
 */
export function sigStructure(bodyProtected: Uint8Array, signProtected: Uint8Array, payload: Uint8Array): Uint8Array {
  return encodeCbor(['Signature', bodyProtected, signProtected, EMPTY, payload]);
}

/** Encode a tagged `COSE_Sign` message. */
export function encodeCoseSign(message: CoseSign): Uint8Array {
  return encodeCbor(
    new Tag(
      [
        message.protected,
        message.unprotected,
        message.payload,
        message.signatures.map((sig) => [sig.protected, sig.unprotected, sig.signature]),
      ],
      COSE_SIGN_TAG,
    ),
  );
}

function isHeaderMap(value: unknown): value is HeaderMap {
  return value instanceof Map;
}

function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

function decodeSignature(value: unknown, index: number): CoseSignature {
  if (!Array.isArray(value) || value.length !== 3) {
    throw new EnvelopeDecodeError(`Signature ${index} is not a 3-element COSE_Signature array`);
  }
  const [protectedBytes, unprotected, signature]: unknown[] = value;
  if (!isBytes(protectedBytes) || !isHeaderMap(unprotected) || !isBytes(signature)) {
    throw new EnvelopeDecodeError(`Signature ${index} has malformed members`);
  }
  decodeHeaderMap(protectedBytes);
  return { protected: protectedBytes, unprotected, signature };
}

/**
 * Decode a `COSE_Sign` message, tagged (98) or untagged.
 *
 * @throws {EnvelopeDecodeError} When `bytes` is not a well-formed `COSE_Sign` with an attached payload.
 */
export function decodeCoseSign(bytes: Uint8Array): CoseSign {
  if (bytes.length === 0) {
    throw new EnvelopeDecodeError('Envelope is empty');
  }
  let value = decodeCbor(bytes, 'Envelope');

  if (value instanceof Tag) {
    if (value.tag === COSE_SIGN1_TAG) {
      throw new EnvelopeDecodeError('Envelope is a COSE_Sign1 message', {
        hint: 'Only COSE_Sign envelopes can hold more than one signature.',
      });
    }
    if (value.tag !== COSE_SIGN_TAG) {
      throw new EnvelopeDecodeError(`Unexpected CBOR tag ${value.tag}; expected ${COSE_SIGN_TAG} (COSE_Sign)`);
    }
    value = value.value;
  }

  if (!Array.isArray(value) || value.length !== 4) {
    throw new EnvelopeDecodeError('Envelope is not a 4-element COSE_Sign array');
  }
  const [protectedBytes, unprotected, payload, signatures]: unknown[] = value;
  if (!isBytes(protectedBytes)) {
    throw new EnvelopeDecodeError('Envelope protected header is not a byte string');
  }
  if (!isHeaderMap(unprotected)) {
    throw new EnvelopeDecodeError('Envelope unprotected header is not a map');
  }
  if (payload === null) {
    throw new EnvelopeDecodeError('Envelope payload is detached');
  }
  if (!isBytes(payload)) {
    throw new EnvelopeDecodeError('Envelope payload is not a byte string');
  }
  if (!Array.isArray(signatures) || signatures.length === 0) {
    throw new EnvelopeDecodeError('Envelope has no signatures');
  }
  decodeHeaderMap(protectedBytes);

  return {
    protected: protectedBytes,
    unprotected,
    payload,
    signatures: signatures.map((sig: unknown, index) => decodeSignature(sig, index)),
  };
}
