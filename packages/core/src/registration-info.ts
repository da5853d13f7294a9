/**
 * Registration info: typed `name=value` metadata written into the
 * envelope's protected header.
 *
 * Arguments have the form `[type:]name=content`, where `type` is one of
 * `text`, `bytes` or `int` (default `text`) and `content` is either the
 * value itself or `@path` to take the value from a file. Names cannot
 * contain `=` or `:`; there is no escape syntax for them.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';

import { ArgumentFormatError, FileAccessError, TypeCoercionError, errorMessage } from '@pactseal/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Value types a registration-info entry can declare. */
export type RegistrationInfoType = 'text' | 'bytes' | 'int';

export const REGISTRATION_INFO_TYPES: readonly RegistrationInfoType[] = ['text', 'bytes', 'int'];

/** A parsed but unresolved `[type:]name=content` argument. */
export interface RegistrationInfoArgument {
  type: RegistrationInfoType;
  name: string;
  /** Inline value, or `@path`. */
  content: string;
}

export type RegistrationInfoEntry =
  | { type: 'text'; name: string; value: string }
  | { type: 'bytes'; name: string; value: Uint8Array }
  | { type: 'int'; name: string; value: number };

export type RegistrationInfoValue = RegistrationInfoEntry['value'];

/** Registration info as stored in the envelope: name to value, in insertion order. */
export type RegistrationInfo = Map<string, RegistrationInfoValue>;

export interface ResolveContentOptions {
  /** Directory `@path` content is resolved against. Defaults to `process.cwd()`. */
  cwd?: string;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

const ARGUMENT_PATTERN = /^(?:([^=:]+):)?([^=:]+)=(.*)$/;

function isRegistrationInfoType(value: string): value is RegistrationInfoType {
  return REGISTRATION_INFO_TYPES.some((type) => type === value);
}

/**
 * Split a `[type:]name=content` argument into its parts.
 *
 * @throws {ArgumentFormatError} When the string does not match the grammar or the type is unknown.
 *
 * @example
 * ```typescript
 * parseRegistrationInfoArgument('int:ver=7');
 * // { type: 'int', name: 'ver', content: '7' }
 * ```
 */
export function parseRegistrationInfoArgument(raw: string): RegistrationInfoArgument {
  const match = ARGUMENT_PATTERN.exec(raw);
  if (match === null) {
    throw new ArgumentFormatError(`Invalid registration info '${raw}'`, {
      hint: "Expected [type:]name=content, where name contains neither '=' nor ':'",
    });
  }
  const [, tag, name = '', content = ''] = match;
  const type = tag ?? 'text';
  if (!isRegistrationInfoType(type)) {
    throw new ArgumentFormatError(`Unknown registration info type '${type}' in '${raw}'`, {
      hint: `Use one of: ${REGISTRATION_INFO_TYPES.join(', ')}`,
    });
  }
  return { type, name, content };
}

/** Inverse of {@link parseRegistrationInfoArgument}; the type is always written out. */
export function formatRegistrationInfoArgument(arg: RegistrationInfoArgument): string {
  return `${arg.type}:${arg.name}=${arg.content}`;
}

// ─── Content resolution ───────────────────────────────────────────────────────

/**
 * Raw bytes behind an argument's content: the file's bytes for `@path`,
 * otherwise the content's ASCII encoding.
 *
 * @throws {FileAccessError} When the `@path` file cannot be read.
 * @throws {TypeCoercionError} When inline content is not ASCII.
 */
export function resolveRegistrationInfoContent(
  arg: RegistrationInfoArgument,
  options: ResolveContentOptions = {},
): Uint8Array {
  if (arg.content.startsWith('@')) {
    const path = resolve(options.cwd ?? process.cwd(), arg.content.slice(1));
    try {
      return new Uint8Array(readFileSync(path));
    } catch (err) {
      throw new FileAccessError(path, `Failed to read registration info '${arg.name}' from '${path}': ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  const bytes = new Uint8Array(arg.content.length);
  for (let i = 0; i < arg.content.length; i++) {
    const code = arg.content.charCodeAt(i);
    if (code > 0x7f) {
      throw new TypeCoercionError(`Registration info '${arg.name}' contains a non-ASCII character`, {
        hint: 'Put non-ASCII values in a file and pass it as @path',
      });
    }
    bytes[i] = code;
  }
  return bytes;
}

// ─── Coercion ─────────────────────────────────────────────────────────────────

const INTEGER_PATTERN = /^[+-]?\d+(?:_\d+)*$/;

function decodeUtf8(bytes: Uint8Array, name: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (err) {
    throw new TypeCoercionError(`Registration info '${name}' is not valid UTF-8`, { cause: err });
  }
}

function decodeInteger(bytes: Uint8Array, name: string): number {
  const text = decodeUtf8(bytes, name).trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new TypeCoercionError(`Registration info '${name}' is not an integer: '${text}'`);
  }
  // `+ 0` folds -0 into 0.
  const value = Number(text.replace(/_/g, '')) + 0;
  if (!Number.isSafeInteger(value)) {
    throw new TypeCoercionError(`Registration info '${name}' is out of range: ${text}`, {
      hint: `Integers must lie within ±${Number.MAX_SAFE_INTEGER}`,
    });
  }
  return value;
}

function coerceEntry(type: RegistrationInfoType, name: string, bytes: Uint8Array): RegistrationInfoEntry {
  switch (type) {
    case 'bytes':
      return { type, name, value: bytes };
    case 'text':
      return { type, name, value: decodeUtf8(bytes, name) };
    case 'int':
      return { type, name, value: decodeInteger(bytes, name) };
  }
}

/**
 * Convert resolved bytes to the value of the declared type.
 *
 * `int` accepts a base-10 integer with optional sign, surrounding
 * whitespace and `_` digit separators, within the safe-integer range.
 *
 * @throws {TypeCoercionError} When the bytes cannot represent the type.
 */
export function coerceRegistrationInfoValue(
  type: RegistrationInfoType,
  bytes: Uint8Array,
  name = 'value',
): RegistrationInfoValue {
  return coerceEntry(type, name, bytes).value;
}

/**
 * Parse, resolve and coerce one registration-info argument.
 *
 * @example
 * ```typescript
 * parseRegistrationInfo('text:org=Contoso'); // { type: 'text', name: 'org', value: 'Contoso' }
 * parseRegistrationInfo('bytes:blob=@data.bin', { cwd }); // { type: 'bytes', name: 'blob', value: Uint8Array [1, 2, 3] }
 * ```
 */
export function parseRegistrationInfo(raw: string, options: ResolveContentOptions = {}): RegistrationInfoEntry {
  const arg = parseRegistrationInfoArgument(raw);
  return coerceEntry(arg.type, arg.name, resolveRegistrationInfoContent(arg, options));
}

/**
 * Fold entries into the header map. A repeated name keeps its first
 * position but takes the last value.
 */
export function foldRegistrationInfo(entries: readonly RegistrationInfoEntry[]): RegistrationInfo {
  const info: RegistrationInfo = new Map();
  for (const entry of entries) {
    info.set(entry.name, entry.value);
  }
  return info;
}
