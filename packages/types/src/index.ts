/**
 * @pactseal/types: shared errors, logging and constants.
 *
 * @packageDocumentation
 */

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Current pactseal release. */
export const PACTSEAL_VERSION = '0.1.0';

/** Envelope format written by this release. */
export const ENVELOPE_FORMAT = 'COSE_Sign';

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  PactsealErrorCode,
  PactsealError,
  ArgumentFormatError,
  TypeCoercionError,
  UsageError,
  ConfigurationConflictError,
  FileAccessError,
  KeyFormatError,
  UnsupportedAlgorithmError,
  SignatureFailedError,
  EnvelopeDecodeError,
  DidResolutionError,
  DidDocumentInvalidError,
  formatError,
  isPactsealError,
  errorMessage,
} from './errors';
export type { PactsealErrorOptions } from './errors';

// ─── Logging ────────────────────────────────────────────────────────────────────

export {
  Logger,
  LogLevel,
  createLogger,
  parseLogLevel,
  silentLogger,
  REDACTED_FIELDS,
} from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';
