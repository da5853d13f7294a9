/**
 * @pactseal/cli configuration file support.
 *
 * Reads `pactseal.config.json` from the working directory or the nearest
 * ancestor that has one. Command-line flags always win over config values.
 *
 * @packageDocumentation
 */

import { readFileSync, existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';

import { PactsealError, PactsealErrorCode, FileAccessError, errorMessage } from '@pactseal/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Shape of a `pactseal.config.json` configuration file. */
export interface PactsealConfig {
  /** Default private key for `sign` (relative to the config file). */
  keyFile?: string;
  /** Default DID document for `sign` and `verify` (relative to the config file). */
  didDoc?: string;
  /** Default `--content-type` for new envelopes. */
  contentType?: string;
  /** Default `--feed` for new envelopes. */
  feed?: string;
  /** Default output format for all commands. */
  outputFormat?: 'json' | 'text';
  /** Log level name, e.g. `"debug"`. */
  logLevel?: string;
}

/** A loaded configuration and the file it came from. */
export interface LoadedConfig {
  path: string;
  config: PactsealConfig;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'pactseal.config.json';

export const CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: {
    keyFile: { type: 'string', minLength: 1 },
    didDoc: { type: 'string', minLength: 1 },
    contentType: { type: 'string', minLength: 1 },
    feed: { type: 'string' },
    outputFormat: { enum: ['json', 'text'] },
    logLevel: { enum: ['debug', 'info', 'warn', 'error', 'silent'] },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<PactsealConfig>(CONFIG_SCHEMA);

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `pactseal.config.json` starting from `cwd` and walking up to
 * the filesystem root. Returns the absolute path if found, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  // eslint-disable-next-line no-constant-condition
  while (true) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return undefined;
}

/**
 * Validate an untrusted value as a configuration. Relative `keyFile` and
 * `didDoc` paths are resolved against `baseDir`.
 *
 * @throws {PactsealError} `CONFIGURATION_INVALID` when the value does not match {@link CONFIG_SCHEMA}.
 */
export function parseConfig(value: unknown, baseDir: string, source = CONFIG_FILE_NAME): PactsealConfig {
  if (!validateConfig(value)) {
    throw new PactsealError(
      PactsealErrorCode.CONFIGURATION_INVALID,
      `Invalid ${source}: ${ajv.errorsText(validateConfig.errors, { dataVar: 'config' })}`,
      { context: { path: source } },
    );
  }
  return {
    ...value,
    ...(value.keyFile !== undefined ? { keyFile: resolve(baseDir, value.keyFile) } : {}),
    ...(value.didDoc !== undefined ? { didDoc: resolve(baseDir, value.didDoc) } : {}),
  };
}

/**
 * Load the nearest `pactseal.config.json` above `cwd`.
 * Returns `undefined` if there is none.
 *
 * @throws {FileAccessError} When the file exists but cannot be read.
 * @throws {PactsealError} `CONFIGURATION_INVALID` when it is not JSON or fails validation.
 */
export function loadConfig(cwd?: string): LoadedConfig | undefined {
  const filePath = findConfigFile(cwd);
  if (!filePath) return undefined;

  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new FileAccessError(filePath, `Failed to read '${filePath}': ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PactsealError(PactsealErrorCode.CONFIGURATION_INVALID, `${filePath} is not valid JSON`, {
      cause: err,
      context: { path: filePath },
    });
  }
  return { path: filePath, config: parseConfig(json, dirname(filePath), filePath) };
}
