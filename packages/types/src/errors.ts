/**
 * Error code system for pactseal.
 *
 * Every failure surfaced by the signing core carries a stable code
 * (PACTSEAL_Exxx) so callers and the CLI can branch on the category
 * without parsing messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All pactseal error codes. */
export enum PactsealErrorCode {
  // Arguments (1xx)
  /** A registration-info argument did not match `[type:]name=content`. */
  ARGUMENT_FORMAT = 'PACTSEAL_E100',
  /** A value could not be converted to its declared type. */
  TYPE_COERCION = 'PACTSEAL_E101',
  /** A command-line option is missing, unknown or lacks its value. */
  USAGE = 'PACTSEAL_E102',

  // Configuration (2xx)
  /** Two options were combined that may not be used together. */
  CONFIGURATION_CONFLICT = 'PACTSEAL_E200',
  /** The configuration file exists but is malformed. */
  CONFIGURATION_INVALID = 'PACTSEAL_E201',

  // Files (3xx)
  /** A key, contract, DID document or content file could not be read or written. */
  FILE_ACCESS = 'PACTSEAL_E300',

  // Keys and signing (4xx)
  /** A private or public key could not be parsed. */
  KEY_FORMAT = 'PACTSEAL_E400',
  /** The algorithm is unknown or incompatible with the key type. */
  UNSUPPORTED_ALGORITHM = 'PACTSEAL_E401',
  /** The signing primitive failed. */
  SIGNATURE_FAILED = 'PACTSEAL_E402',

  // Envelopes (5xx)
  /** The bytes are not a valid contract envelope. */
  ENVELOPE_DECODE = 'PACTSEAL_E500',

  // DID (6xx)
  /** No usable verification method could be selected from the DID document. */
  DID_RESOLUTION = 'PACTSEAL_E600',
  /** The DID document does not have the expected shape. */
  DID_DOCUMENT_INVALID = 'PACTSEAL_E601',
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a PactsealError. */
export interface PactsealErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: unknown;
}

/**
 * Base error class for all pactseal errors.
 *
 * @example
 * ```typescript
 * throw new PactsealError(
 *   PactsealErrorCode.KEY_FORMAT,
 *   'Key file is not PEM',
 *   { hint: 'Generate a key with `pactseal keygen`' }
 * );
 * ```
 */
export class PactsealError extends Error {
  readonly code: PactsealErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: PactsealErrorCode, message: string, options?: PactsealErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PactsealError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Structured representation suitable for logging or `--json` output. */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/** A registration-info string is malformed or names an unknown type. */
export class ArgumentFormatError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.ARGUMENT_FORMAT, message, options);
    this.name = 'ArgumentFormatError';
  }
}

/** Content could not be converted to int or UTF-8 text. */
export class TypeCoercionError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.TYPE_COERCION, message, options);
    this.name = 'TypeCoercionError';
  }
}

/** The command line is incomplete or names an unknown command or option. */
export class UsageError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.USAGE, message, options);
    this.name = 'UsageError';
  }
}

/** Mutually exclusive options were supplied together. */
export class ConfigurationConflictError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.CONFIGURATION_CONFLICT, message, options);
    this.name = 'ConfigurationConflictError';
  }
}

/** A file could not be read or written. */
export class FileAccessError extends PactsealError {
  /** The path that failed. */
  readonly path: string;

  constructor(path: string, message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.FILE_ACCESS, message, {
      ...options,
      context: { ...options?.context, path },
    });
    this.name = 'FileAccessError';
    this.path = path;
  }
}

/** Key material could not be parsed. */
export class KeyFormatError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.KEY_FORMAT, message, options);
    this.name = 'KeyFormatError';
  }
}

/** The algorithm is unknown, or the key type cannot produce it. */
export class UnsupportedAlgorithmError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.UNSUPPORTED_ALGORITHM, message, options);
    this.name = 'UnsupportedAlgorithmError';
  }
}

/** The underlying signing primitive threw. */
export class SignatureFailedError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.SIGNATURE_FAILED, message, options);
    this.name = 'SignatureFailedError';
  }
}

/** Bytes that were expected to be an envelope could not be decoded. */
export class EnvelopeDecodeError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.ENVELOPE_DECODE, message, options);
    this.name = 'EnvelopeDecodeError';
  }
}

/** No signer could be derived from the DID document. */
export class DidResolutionError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.DID_RESOLUTION, message, options);
    this.name = 'DidResolutionError';
  }
}

/** The DID document failed schema validation. */
export class DidDocumentInvalidError extends PactsealError {
  constructor(message: string, options?: PactsealErrorOptions) {
    super(PactsealErrorCode.DID_DOCUMENT_INVALID, message, options);
    this.name = 'DidDocumentInvalidError';
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for terminal output.
 *
 * @example
 * ```typescript
 * formatError(new ConfigurationConflictError('issuer/alg and DID document are mutually exclusive'));
 * // [PACTSEAL_E200] issuer/alg and DID document are mutually exclusive
 * ```
 */
export function formatError(error: PactsealError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Type guard for any pactseal error. */
export function isPactsealError(value: unknown): value is PactsealError {
  return value instanceof PactsealError;
}

/** Best-effort message extraction for unknown thrown values. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
