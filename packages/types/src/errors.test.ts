import { describe, it, expect } from 'vitest';
import {
  PactsealErrorCode,
  PactsealError,
  ArgumentFormatError,
  TypeCoercionError,
  UsageError,
  ConfigurationConflictError,
  FileAccessError,
  UnsupportedAlgorithmError,
  EnvelopeDecodeError,
  DidResolutionError,
  formatError,
  isPactsealError,
  errorMessage,
} from './errors';

// ---------------------------------------------------------------------------
// PactsealErrorCode enum
// ---------------------------------------------------------------------------
describe('PactsealErrorCode', () => {
  it('every code value starts with PACTSEAL_E', () => {
    for (const value of Object.values(PactsealErrorCode)) {
      expect(value).toMatch(/^PACTSEAL_E\d{3}$/);
    }
  });

  it('all code values are unique', () => {
    const values = Object.values(PactsealErrorCode);
    expect(new Set(values).size).toBe(values.length);
  });
});

// ---------------------------------------------------------------------------
// PactsealError class
// ---------------------------------------------------------------------------
describe('PactsealError', () => {
  it('has code, message, and name', () => {
    const err = new PactsealError(PactsealErrorCode.KEY_FORMAT, 'bad key');
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('PACTSEAL_E400');
    expect(err.message).toBe('bad key');
    expect(err.name).toBe('PactsealError');
  });

  it('supports hint, context and cause', () => {
    const cause = new Error('underlying failure');
    const err = new PactsealError(PactsealErrorCode.SIGNATURE_FAILED, 'sign failed', {
      hint: 'check the key',
      context: { algorithm: 'ES256' },
      cause,
    });
    expect(err.hint).toBe('check the key');
    expect(err.context).toEqual({ algorithm: 'ES256' });
    expect(err.cause).toBe(cause);
  });

  it('toJSON omits hint and context when not provided', () => {
    const err = new PactsealError(PactsealErrorCode.ENVELOPE_DECODE, 'not an envelope');
    expect(err.toJSON()).toEqual({ code: 'PACTSEAL_E500', message: 'not an envelope' });
  });

  it('toJSON includes hint and context when provided', () => {
    const err = new PactsealError(PactsealErrorCode.TYPE_COERCION, 'bad int', {
      hint: 'use digits',
      context: { name: 'ver' },
    });
    expect(err.toJSON()).toEqual({
      code: 'PACTSEAL_E101',
      message: 'bad int',
      hint: 'use digits',
      context: { name: 'ver' },
    });
  });
});

// ---------------------------------------------------------------------------
// Subclasses
// ---------------------------------------------------------------------------
describe('error subclasses', () => {
  it('map to their codes and names', () => {
    const cases: Array<[PactsealError, PactsealErrorCode, string]> = [
      [new ArgumentFormatError('x'), PactsealErrorCode.ARGUMENT_FORMAT, 'ArgumentFormatError'],
      [new TypeCoercionError('x'), PactsealErrorCode.TYPE_COERCION, 'TypeCoercionError'],
      [new UsageError('x'), PactsealErrorCode.USAGE, 'UsageError'],
      [new ConfigurationConflictError('x'), PactsealErrorCode.CONFIGURATION_CONFLICT, 'ConfigurationConflictError'],
      [new UnsupportedAlgorithmError('x'), PactsealErrorCode.UNSUPPORTED_ALGORITHM, 'UnsupportedAlgorithmError'],
      [new EnvelopeDecodeError('x'), PactsealErrorCode.ENVELOPE_DECODE, 'EnvelopeDecodeError'],
      [new DidResolutionError('x'), PactsealErrorCode.DID_RESOLUTION, 'DidResolutionError'],
    ];
    for (const [err, code, name] of cases) {
      expect(err).toBeInstanceOf(PactsealError);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it('FileAccessError records the path in its context', () => {
    const err = new FileAccessError('/tmp/missing.pem', 'cannot read key', { context: { purpose: 'key' } });
    expect(err.path).toBe('/tmp/missing.pem');
    expect(err.code).toBe(PactsealErrorCode.FILE_ACCESS);
    expect(err.context).toEqual({ purpose: 'key', path: '/tmp/missing.pem' });
  });
});

// ---------------------------------------------------------------------------
// Utility functions
// ---------------------------------------------------------------------------
describe('formatError', () => {
  it('renders code and message', () => {
    const err = new ConfigurationConflictError('issuer/alg and DID document are mutually exclusive');
    expect(formatError(err)).toBe('[PACTSEAL_E200] issuer/alg and DID document are mutually exclusive');
  });

  it('adds a hint line when present', () => {
    const err = new EnvelopeDecodeError('not a COSE_Sign envelope', { hint: 'Sign the contract first' });
    expect(formatError(err)).toBe('[PACTSEAL_E500] not a COSE_Sign envelope\nHint: Sign the contract first');
  });
});

describe('isPactsealError / errorMessage', () => {
  it('distinguishes pactseal errors from plain errors', () => {
    expect(isPactsealError(new TypeCoercionError('x'))).toBe(true);
    expect(isPactsealError(new Error('x'))).toBe(false);
    expect(isPactsealError('x')).toBe(false);
  });

  it('extracts messages from unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
