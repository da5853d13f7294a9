import type { Algorithm } from '@pactseal/crypto';

/** A verification method entry of a DID document. */
export interface VerificationMethod {
  /** Absolute (`did:web:example.com#key-1`) or relative (`#key-1`) id. */
  id: string;
  /** Method type, e.g. `JsonWebKey2020`. */
  type: string;
  controller: string;
  /** The public key. Checked with `parsePublicJwk` when the method is used. */
  publicKeyJwk?: unknown;
  [property: string]: unknown;
}

/**
 * The subset of a W3C DID document pactseal reads. Unknown members are
 * preserved but ignored.
 */
export interface DidDocument {
  '@context'?: unknown;
  id: string;
  controller?: unknown;
  verificationMethod?: VerificationMethod[];
  /** References into `verificationMethod`, or embedded methods. */
  assertionMethod?: Array<string | VerificationMethod>;
  [property: string]: unknown;
}

/** Options for {@link createDidDocument}. */
export interface CreateDidDocumentOptions {
  /** Fragment for the verification method id. Defaults to the key's JWK thumbprint. */
  keyId?: string;
  /** Written as the JWK's `alg` member so signers resolved from the document use it. */
  algorithm?: Algorithm;
}
