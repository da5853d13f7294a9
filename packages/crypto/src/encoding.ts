import { sha256 as nobleSha256 } from '@noble/hashes/sha256';

import { KeyFormatError } from '@pactseal/types';

import type { Base64Url } from './types';

/**
 * Base64url encode (RFC 4648 section 5, no padding).
 *
 * @example
 * ```typescript
 * base64urlEncode(new Uint8Array([251, 255])); // '-_8'
 * ```
 */
export function base64urlEncode(data: Uint8Array): Base64Url {
  let binary = '';
  for (let i = 0; i < data.length; i++) {
    binary += String.fromCharCode(data[i] ?? 0);
  }
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Decode a base64url string (padding optional) back to bytes.
 *
 * @throws {KeyFormatError} When the input contains characters outside the base64url alphabet.
 */
export function base64urlDecode(encoded: Base64Url): Uint8Array {
  if (!/^[A-Za-z0-9_-]*={0,2}$/.test(encoded)) {
    throw new KeyFormatError('Invalid base64url string', {
      hint: 'Base64url strings only contain A-Z, a-z, 0-9, - and _.',
    });
  }
  const base64 = encoded.replace(/=+$/, '').replace(/-/g, '+').replace(/_/g, '/');
  const padded = base64 + '='.repeat((4 - (base64.length % 4)) % 4);
  let binary: string;
  try {
    binary = atob(padded);
  } catch (err) {
    throw new KeyFormatError('Invalid base64url string', { cause: err });
  }
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/**
 * Encode a byte array to a lowercase hex string.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < data.length; i++) {
    hex += (data[i] ?? 0).toString(16).padStart(2, '0');
  }
  return hex;
}

/** SHA-256 digest of `data` as lowercase hex. */
export function sha256Hex(data: Uint8Array): string {
  return toHex(nobleSha256(data));
}

/** Concatenate byte arrays into a fresh buffer. */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
