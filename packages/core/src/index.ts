/**
 * @pactseal/core: the contract signing core.
 *
 * Registration-info parsing, the signer factory, the `COSE_Sign` codec
 * and contract signing and verification.
 *
 * @packageDocumentation
 */

// ─── Registration info ───────────────────────────────────────────────────────

export {
  REGISTRATION_INFO_TYPES,
  coerceRegistrationInfoValue,
  foldRegistrationInfo,
  formatRegistrationInfoArgument,
  parseRegistrationInfo,
  parseRegistrationInfoArgument,
  resolveRegistrationInfoContent,
} from './registration-info';

export type {
  RegistrationInfo,
  RegistrationInfoArgument,
  RegistrationInfoEntry,
  RegistrationInfoType,
  RegistrationInfoValue,
  ResolveContentOptions,
} from './registration-info';

// ─── Signer factory ──────────────────────────────────────────────────────────

export {
  SIGNER_CONFLICT_MESSAGE,
  assertSignerOptionsCompatible,
  createSigner,
  createSignerFromOptions,
} from './signer';

export type {
  AdHocSignerConfig,
  DidSignerConfig,
  SignerConfig,
  SignerOptionPresence,
  SignerOptions,
} from './signer';

// ─── COSE codec ──────────────────────────────────────────────────────────────

export {
  COSE_SIGN1_TAG,
  COSE_SIGN_TAG,
  HeaderLabel,
  decodeCoseSign,
  decodeHeaderMap,
  encodeCbor,
  encodeCoseSign,
  encodeHeaderMap,
  sigStructure,
} from './cose';

export type { CoseSign, CoseSignature, HeaderMap } from './cose';

// ─── Contracts ───────────────────────────────────────────────────────────────

export {
  decodeContractEnvelope,
  publicKeyResolverFromDid,
  publicKeyResolverFromKey,
  signContract,
  verifyContract,
} from './contract';

export type {
  AppendSignatureOptions,
  ContractEnvelope,
  ContractHeaders,
  ContractVerification,
  CreateEnvelopeOptions,
  PublicKeyResolver,
  SignContractOptions,
  SignatureHeaders,
  SignatureVerification,
} from './contract';
