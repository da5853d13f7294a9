/**
 * @pactseal/cli: the `pactseal` command-line tool.
 *
 * {@link run} takes the argument vector and returns the captured output
 * and exit code instead of touching the process, so every command can be
 * exercised in tests. `main.ts` is the process entry point around it, run
 * through tsx by `npm run pactseal`.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { randomUUID } from 'crypto';

import {
  ConfigurationConflictError,
  ENVELOPE_FORMAT,
  FileAccessError,
  LogLevel,
  Logger,
  PACTSEAL_VERSION,
  UsageError,
  createLogger,
  errorMessage,
  formatError,
  isPactsealError,
  parseLogLevel,
  silentLogger,
} from '@pactseal/types';
import {
  base64urlEncode,
  generateKeyPem,
  jwkThumbprint,
  loadPrivateKey,
  loadPublicKey,
  parseAlgorithm,
  parsePrivateKey,
  defaultAlgorithm,
  sha256Hex,
} from '@pactseal/crypto';
import type { EcCurve, KeyGenerationOptions } from '@pactseal/crypto';
import { createDidDocument, loadDidDocument } from '@pactseal/did';
import type { DidDocument } from '@pactseal/did';
import {
  assertSignerOptionsCompatible,
  createSignerFromOptions,
  decodeContractEnvelope,
  parseRegistrationInfo,
  publicKeyResolverFromDid,
  publicKeyResolverFromKey,
  signContract,
  verifyContract,
} from '@pactseal/core';
import type {
  ContractHeaders,
  PublicKeyResolver,
  RegistrationInfo,
  SignContractOptions,
  SignatureHeaders,
} from '@pactseal/core';

import { loadConfig } from './config';
import type { PactsealConfig } from './config';
import {
  bold,
  box,
  bytesPreview,
  cyan,
  dim,
  error,
  getColorsEnabled,
  header,
  keyValue,
  setColorsEnabled,
  success,
  table,
  warning,
} from './format';

export { loadConfig, findConfigFile, parseConfig, CONFIG_FILE_NAME, CONFIG_SCHEMA } from './config';
export type { LoadedConfig, PactsealConfig } from './config';

// ─── Result type ──────────────────────────────────────────────────────────────

/** Captured outcome of one CLI invocation. */
export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// ─── Argument parser ──────────────────────────────────────────────────────────

/** Options that take no value. */
const SWITCHES = new Set(['json', 'no-color', 'verbose', 'help', 'version', 'add-signature']);

/** Options that take a value; repeating one collects every value. */
const VALUE_OPTIONS = new Set([
  'contract',
  'key',
  'out',
  'did-doc',
  'issuer',
  'alg',
  'content-type',
  'kid',
  'feed',
  'registration-info',
  'type',
  'curve',
  'did',
]);

const ALIASES: Record<string, string> = {
  'participant-info': 'registration-info',
};

interface ParsedArgs {
  command: string;
  subcommand?: string;
  positional: string[];
  switches: Set<string>;
  options: Map<string, string[]>;
}

function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: '', positional: [], switches: new Set(), options: new Map() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const rawName = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      const name = ALIASES[rawName] ?? rawName;

      if (SWITCHES.has(name)) {
        if (eq !== -1) throw new UsageError(`Option --${rawName} does not take a value`);
        parsed.switches.add(name);
        continue;
      }
      if (!VALUE_OPTIONS.has(name)) {
        throw new UsageError(`Unknown option '--${rawName}'`, { hint: "Run 'pactseal help' for usage." });
      }

      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = args[i + 1];
        i += 1;
      }
      if (value === undefined) {
        throw new UsageError(`Option --${rawName} requires a value`);
      }
      parsed.options.set(name, [...(parsed.options.get(name) ?? []), value]);
    } else if (parsed.command === '') {
      parsed.command = arg;
    } else if (parsed.command === 'did' && parsed.subcommand === undefined) {
      parsed.subcommand = arg;
    } else {
      parsed.positional.push(arg);
    }
  }

  return parsed;
}

/** Last value of a value option, so a later flag overrides an earlier one. */
function getOption(parsed: ParsedArgs, name: string): string | undefined {
  const values = parsed.options.get(name);
  return values?.[values.length - 1];
}

function requireOption(parsed: ParsedArgs, name: string, description: string, fallback?: string): string {
  const value = getOption(parsed, name) ?? fallback;
  if (value === undefined || value === '') {
    throw new UsageError(`Missing required option: --${name} <${description}>`, {
      hint: `Run 'pactseal ${commandName(parsed)} --help' for usage.`,
    });
  }
  return value;
}

function commandName(parsed: ParsedArgs): string {
  return parsed.subcommand !== undefined ? `${parsed.command} ${parsed.subcommand}` : parsed.command;
}

// ─── Invocation context ───────────────────────────────────────────────────────

interface Context {
  parsed: ParsedArgs;
  cwd: string;
  json: boolean;
  config: PactsealConfig;
  logger: Logger;
  out: string[];
  err: string[];
}

function print(ctx: Context, text = ''): void {
  ctx.out.push(text);
}

function printJson(ctx: Context, value: unknown): void {
  ctx.out.push(JSON.stringify(value, null, 2));
}

function resolvePath(ctx: Context, path: string): string {
  return resolve(ctx.cwd, path);
}

function createCliLogger(parsed: ParsedArgs, config: PactsealConfig, env: NodeJS.ProcessEnv, sink: string[]): Logger {
  let level = LogLevel.WARN;
  const named = env['PACTSEAL_LOG_LEVEL'] ?? config.logLevel;
  if (parsed.switches.has('verbose')) {
    level = LogLevel.DEBUG;
  } else if (named !== undefined) {
    level = parseLogLevel(named) ?? LogLevel.WARN;
  }
  return createLogger({
    level,
    component: 'cli',
    output: (entry) => sink.push(JSON.stringify(entry)),
  });
}

// ─── File I/O helpers ─────────────────────────────────────────────────────────

function readBytes(path: string, what: string): Uint8Array {
  try {
    return new Uint8Array(readFileSync(path));
  } catch (err) {
    throw new FileAccessError(path, `Failed to read ${what} '${path}': ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Write `data` to a temp file beside `path`, then rename it into place.
 * Readers never observe a partially written file, and nothing is left
 * behind when the write fails.
 */
function writeAtomic(path: string, data: Uint8Array | string, mode?: number): void {
  const temp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    writeFileSync(temp, data, mode !== undefined ? { mode } : undefined);
    renameSync(temp, path);
  } catch (err) {
    rmSync(temp, { force: true });
    throw new FileAccessError(path, `Failed to write '${path}': ${errorMessage(err)}`, { cause: err });
  }
}

// ─── Rendering helpers ────────────────────────────────────────────────────────

type RegistrationInfoJson = { name: string; type: 'bytes' | 'int' | 'text'; value: string | number };

function registrationInfoJson(info: RegistrationInfo): RegistrationInfoJson[] {
  return [...info].map(([name, value]): RegistrationInfoJson => {
    if (value instanceof Uint8Array) {
      return { name, type: 'bytes', value: base64urlEncode(value) };
    }
    return typeof value === 'number' ? { name, type: 'int', value } : { name, type: 'text', value };
  });
}

function headersJson(headers: ContractHeaders): Record<string, unknown> {
  return {
    contentType: headers.contentType,
    feed: headers.feed,
    registrationInfo: registrationInfoJson(headers.registrationInfo),
  };
}

function signatureJson(sig: SignatureHeaders): Record<string, unknown> {
  return {
    algorithm: sig.algorithm ?? sig.algorithmId,
    issuer: sig.issuer,
    keyId: sig.keyId,
  };
}

function headerPairs(headers: ContractHeaders, payload: Uint8Array): [string, string | undefined][] {
  return [
    ['Content type', headers.contentType !== undefined ? String(headers.contentType) : undefined],
    ['Feed', headers.feed],
    ['Payload', `${payload.length} bytes`],
    ['SHA-256', sha256Hex(payload)],
  ];
}

function registrationInfoTable(info: RegistrationInfo): string {
  const rows = [...info].map(([name, value]) => {
    if (value instanceof Uint8Array) return [name, 'bytes', bytesPreview(value)];
    return [name, typeof value === 'number' ? 'int' : 'text', String(value)];
  });
  return table(['Name', 'Type', 'Value'], rows);
}

// ─── Command: sign ────────────────────────────────────────────────────────────

/**
 * Conflicts between `sign` flags. `run` checks these before the config
 * file or any other file is read.
 */
function assertSignFlagsCompatible(parsed: ParsedArgs): void {
  assertSignerOptionsCompatible({
    didDocument: getOption(parsed, 'did-doc'),
    issuer: getOption(parsed, 'issuer'),
    algorithm: getOption(parsed, 'alg'),
  });
  if (parsed.switches.has('add-signature') && (parsed.options.has('feed') || parsed.options.has('registration-info'))) {
    throw new ConfigurationConflictError('--feed and --registration-info cannot be used with --add-signature', {
      hint: 'Envelope headers are fixed once the first signature is made.',
    });
  }
}

async function cmdSign(ctx: Context): Promise<number> {
  const { parsed, config } = ctx;

  const issuer = getOption(parsed, 'issuer');
  const alg = getOption(parsed, 'alg');
  const didDocFlag = getOption(parsed, 'did-doc');
  const append = parsed.switches.has('add-signature');

  const contractPath = resolvePath(ctx, requireOption(parsed, 'contract', 'file'));
  const keyPath = resolvePath(ctx, requireOption(parsed, 'key', 'pem', config.keyFile));
  const outPath = resolvePath(ctx, requireOption(parsed, 'out', 'file'));

  // A configured DID document only applies when no ad hoc identity is requested.
  const didDocPath = didDocFlag ?? (issuer === undefined && alg === undefined ? config.didDoc : undefined);

  let options: SignContractOptions;
  if (append) {
    const contentType = getOption(parsed, 'content-type');
    options = contentType !== undefined ? { mode: 'append', contentType } : { mode: 'append' };
  } else {
    const contentType = requireOption(parsed, 'content-type', 'type', config.contentType);
    const registrationInfo = (parsed.options.get('registration-info') ?? []).map((raw) =>
      parseRegistrationInfo(raw, { cwd: ctx.cwd }),
    );
    const feed = getOption(parsed, 'feed') ?? config.feed;
    options = {
      mode: 'create',
      contentType,
      registrationInfo,
      ...(feed !== undefined ? { feed } : {}),
    };
  }
  options = { ...options, logger: ctx.logger };

  const key = loadPrivateKey(keyPath);
  const didDocument: DidDocument | undefined =
    didDocPath !== undefined ? loadDidDocument(resolvePath(ctx, didDocPath)) : undefined;
  const contract = readBytes(contractPath, append ? 'envelope' : 'contract');

  const signer = createSignerFromOptions(
    key,
    { didDocument, keyId: getOption(parsed, 'kid'), issuer, algorithm: alg },
    ctx.logger,
  );
  const envelope = await signContract(signer, contract, options);
  writeAtomic(outPath, envelope);

  const signatures = decodeContractEnvelope(envelope).signatures.length;
  ctx.logger.info('Envelope written', { out: outPath, bytes: envelope.length, signatures });

  if (ctx.json) {
    printJson(ctx, {
      success: true,
      mode: options.mode,
      out: outPath,
      bytes: envelope.length,
      signatures,
      signer: { algorithm: signer.algorithm, issuer: signer.issuer, keyId: signer.keyId },
    });
    return 0;
  }

  print(ctx, success(append ? `Added signature ${signatures} to ${outPath}` : `Signed contract written to ${outPath}`));
  print(ctx);
  print(
    ctx,
    keyValue([
      ['Algorithm', signer.algorithm],
      ['Issuer', signer.issuer],
      ['Key ID', signer.keyId],
      ['Signatures', String(signatures)],
      ['Envelope', `${envelope.length} bytes`],
    ]),
  );
  return 0;
}

// ─── Command: verify ──────────────────────────────────────────────────────────

async function cmdVerify(ctx: Context): Promise<number> {
  const { parsed, config } = ctx;
  const file = parsed.positional[0];
  if (file === undefined) {
    throw new UsageError('Envelope file is required', { hint: 'Usage: pactseal verify <envelope> --key <pem>' });
  }

  const keyFlag = getOption(parsed, 'key');
  const didDocFlag = getOption(parsed, 'did-doc');
  if (keyFlag !== undefined && didDocFlag !== undefined) {
    throw new ConfigurationConflictError('--key and --did-doc are mutually exclusive');
  }
  const didDocPath = didDocFlag ?? (keyFlag === undefined ? config.didDoc : undefined);
  const keyPath = keyFlag ?? (didDocPath === undefined ? config.keyFile : undefined);

  let resolver: PublicKeyResolver;
  if (didDocPath !== undefined) {
    resolver = publicKeyResolverFromDid(loadDidDocument(resolvePath(ctx, didDocPath)));
  } else if (keyPath !== undefined) {
    resolver = publicKeyResolverFromKey(loadPublicKey(resolvePath(ctx, keyPath)));
  } else {
    throw new UsageError('Missing required option: --key <pem> or --did-doc <file>');
  }

  const envelopePath = resolvePath(ctx, file);
  const result = await verifyContract(readBytes(envelopePath, 'envelope'), resolver);
  ctx.logger.debug('Verified envelope', { envelope: envelopePath, valid: result.valid });

  const payloadOut = getOption(parsed, 'out');
  if (payloadOut !== undefined && result.valid) {
    writeAtomic(resolvePath(ctx, payloadOut), result.payload);
  }

  if (ctx.json) {
    printJson(ctx, {
      valid: result.valid,
      headers: headersJson(result.headers),
      signatures: result.signatures.map((sig) => ({ ...signatureJson(sig.headers), valid: sig.valid, reason: sig.reason })),
    });
    return result.valid ? 0 : 1;
  }

  print(ctx, header(`Verifying ${file}`));
  print(ctx);
  for (const [index, sig] of result.signatures.entries()) {
    const who = sig.headers.issuer ?? sig.headers.keyId ?? '(anonymous)';
    const label = `#${index + 1} ${who} ${dim(`(${sig.headers.algorithm ?? sig.headers.algorithmId})`)}`;
    print(ctx, sig.valid ? success(label) : error(`${label}: ${sig.reason ?? 'invalid'}`));
  }
  print(ctx);

  const passed = result.signatures.filter((sig) => sig.valid).length;
  const summary = result.valid
    ? success(`Valid: all ${passed} signature(s) verify`)
    : error(`Invalid: ${result.signatures.length - passed} of ${result.signatures.length} signature(s) failed`);
  print(ctx, box('Summary', [summary, keyValue(headerPairs(result.headers, result.payload))].join('\n')));
  if (payloadOut !== undefined && !result.valid) {
    print(ctx, warning(`Payload not written to ${payloadOut}`));
  }
  return result.valid ? 0 : 1;
}

// ─── Command: inspect ─────────────────────────────────────────────────────────

function cmdInspect(ctx: Context): number {
  const file = ctx.parsed.positional[0];
  if (file === undefined) {
    throw new UsageError('Envelope file is required', { hint: 'Usage: pactseal inspect <envelope>' });
  }
  const envelope = decodeContractEnvelope(readBytes(resolvePath(ctx, file), 'envelope'));

  if (ctx.json) {
    printJson(ctx, {
      format: ENVELOPE_FORMAT,
      headers: headersJson(envelope.headers),
      payload: { bytes: envelope.payload.length, sha256: sha256Hex(envelope.payload) },
      signatures: envelope.signatures.map(signatureJson),
    });
    return 0;
  }

  print(ctx, header(`${ENVELOPE_FORMAT} envelope`));
  print(ctx);
  print(ctx, keyValue(headerPairs(envelope.headers, envelope.payload)));

  if (envelope.headers.registrationInfo.size > 0) {
    print(ctx);
    print(ctx, bold('Registration info'));
    print(ctx, registrationInfoTable(envelope.headers.registrationInfo));
  }

  print(ctx);
  print(ctx, bold(`Signatures (${envelope.signatures.length})`));
  print(
    ctx,
    table(
      ['#', 'Algorithm', 'Issuer', 'Key ID'],
      envelope.signatures.map((sig, i) => [
        String(i + 1),
        sig.algorithm ?? String(sig.algorithmId),
        sig.issuer ?? '',
        sig.keyId ?? '',
      ]),
    ),
  );
  return 0;
}

// ─── Command: keygen ──────────────────────────────────────────────────────────

const CURVES: readonly EcCurve[] = ['P-256', 'P-384', 'P-521'];

function keyGenerationOptions(parsed: ParsedArgs): KeyGenerationOptions {
  const type = requireOption(parsed, 'type', 'ec|ed25519|rsa').toLowerCase();
  const curveName = getOption(parsed, 'curve');
  if (curveName !== undefined && type !== 'ec') {
    throw new ConfigurationConflictError('--curve only applies to --type ec');
  }
  switch (type) {
    case 'ec': {
      if (curveName === undefined) return { type: 'ec' };
      const curve = CURVES.find((c) => c === curveName.toUpperCase());
      if (curve === undefined) {
        throw new UsageError(`Unknown curve '${curveName}'`, { hint: `Use one of ${CURVES.join(', ')}.` });
      }
      return { type: 'ec', curve };
    }
    case 'ed25519':
      return { type: 'ed25519' };
    case 'rsa':
      return { type: 'rsa' };
    default:
      throw new UsageError(`Unknown key type '${type}'`, { hint: 'Use ec, ed25519 or rsa.' });
  }
}

function cmdKeygen(ctx: Context): number {
  const options = keyGenerationOptions(ctx.parsed);
  const outPath = resolvePath(ctx, requireOption(ctx.parsed, 'out', 'pem'));
  if (existsSync(outPath)) {
    throw new FileAccessError(outPath, `Refusing to overwrite '${outPath}'`, {
      hint: 'Choose another --out path or remove the existing key first.',
    });
  }

  const pem = generateKeyPem(options);
  const key = parsePrivateKey(pem);
  writeAtomic(outPath, pem, 0o600);

  const algorithm = defaultAlgorithm(key);
  const thumbprint = jwkThumbprint(key.publicJwk);
  ctx.logger.debug('Generated key', { type: key.kty, algorithm, thumbprint });

  if (ctx.json) {
    printJson(ctx, { success: true, out: outPath, keyType: key.kty, algorithm, thumbprint, publicKeyJwk: key.publicJwk });
    return 0;
  }
  print(ctx, success(`Generated ${options.type === 'ec' ? `EC ${options.curve ?? 'P-256'}` : options.type.toUpperCase()} key`));
  print(ctx);
  print(
    ctx,
    keyValue([
      ['Private key', outPath],
      ['Algorithm', algorithm],
      ['Thumbprint', cyan(thumbprint)],
    ]),
  );
  return 0;
}

// ─── Command: did create ──────────────────────────────────────────────────────

function cmdDidCreate(ctx: Context): number {
  const { parsed, config } = ctx;
  const did = requireOption(parsed, 'did', 'did');
  const keyPath = resolvePath(ctx, requireOption(parsed, 'key', 'pem', config.keyFile));
  const outPath = resolvePath(ctx, requireOption(parsed, 'out', 'file'));
  const alg = getOption(parsed, 'alg');
  const kid = getOption(parsed, 'kid');

  const publicJwk = loadPublicKey(keyPath);
  const doc = createDidDocument(did, publicJwk, {
    ...(kid !== undefined ? { keyId: kid } : {}),
    ...(alg !== undefined ? { algorithm: parseAlgorithm(alg) } : {}),
  });
  writeAtomic(outPath, JSON.stringify(doc, null, 2) + '\n');

  const methodId = doc.assertionMethod?.[0];
  if (ctx.json) {
    printJson(ctx, { success: true, out: outPath, id: doc.id, assertionMethod: methodId });
    return 0;
  }
  print(ctx, success(`DID document written to ${outPath}`));
  print(ctx);
  print(
    ctx,
    keyValue([
      ['DID', doc.id],
      ['Assertion method', typeof methodId === 'string' ? methodId : undefined],
    ]),
  );
  return 0;
}

// ─── Command: help ────────────────────────────────────────────────────────────

const COMMAND_HELP: Record<string, string[]> = {
  sign: [
    'pactseal sign --contract <file> --key <pem> --out <file> [options]',
    '',
    'Sign a contract into a COSE_Sign envelope, or countersign an envelope.',
    '',
    '  --content-type <type>       Payload media type (required for a new envelope)',
    '  --did-doc <file>            Take issuer, key id and algorithm from a DID document',
    '  --issuer <str>              Issuer written into the signature header',
    '  --alg <alg>                 ES256, ES384, ES512, EdDSA, PS256, PS384 or PS512',
    '  --kid <str>                 Key id written into the signature header',
    '  --feed <str>                Feed written into the envelope header',
    '  --registration-info <entry> [type:]name=content; type is text, int or bytes;',
    '                              content @path reads a file (repeatable)',
    '  --add-signature             Append a signature to the envelope in --contract',
  ],
  verify: [
    'pactseal verify <envelope> (--key <pem> | --did-doc <file>) [--out <file>]',
    '',
    'Verify every signature of an envelope; --out writes the contract when valid.',
  ],
  inspect: ['pactseal inspect <envelope>', '', 'Show the headers and signers of an envelope without verifying it.'],
  keygen: [
    'pactseal keygen --type ec|ed25519|rsa [--curve P-256|P-384|P-521] --out <pem>',
    '',
    'Generate a PKCS#8 private key.',
  ],
  did: [
    'pactseal did create --did <did> --key <pem> --out <file> [--kid <id>] [--alg <alg>]',
    '',
    'Write a DID document publishing the key as its assertion method.',
  ],
};

function cmdHelp(ctx: Context, command?: string): number {
  const specific = command !== undefined ? COMMAND_HELP[command] : undefined;
  if (specific !== undefined) {
    print(ctx, specific.join('\n'));
    return 0;
  }

  print(ctx, header('pactseal - contract signing CLI'));
  print(ctx);
  print(ctx, `Usage: ${bold('pactseal')} <command> [options]`);
  print(ctx);
  print(ctx, bold('Commands'));
  print(
    ctx,
    keyValue([
      ['sign', 'Sign a contract or add a signature to an envelope'],
      ['verify', 'Verify the signatures of an envelope'],
      ['inspect', 'Show envelope headers and signers'],
      ['keygen', 'Generate a signing key'],
      ['did create', 'Write a DID document for a key'],
      ['version', 'Show version information'],
      ['help', 'Show this help message'],
    ]),
  );
  print(ctx);
  print(ctx, bold('Global options'));
  print(
    ctx,
    keyValue([
      ['--json', 'Machine-readable output'],
      ['--no-color', 'Disable ANSI colors'],
      ['--verbose', 'Debug logging on stderr'],
    ]),
  );
  print(ctx);
  print(ctx, dim("Run 'pactseal <command> --help' for command options."));
  return 0;
}

// ─── Command: version ─────────────────────────────────────────────────────────

function cmdVersion(ctx: Context): number {
  if (ctx.json) {
    printJson(ctx, { version: PACTSEAL_VERSION, envelope: ENVELOPE_FORMAT });
  } else {
    print(ctx, PACTSEAL_VERSION);
  }
  return 0;
}

// ─── Dispatch ─────────────────────────────────────────────────────────────────

async function dispatch(ctx: Context): Promise<number> {
  const { parsed } = ctx;
  switch (parsed.command) {
    case 'sign':
      return cmdSign(ctx);
    case 'verify':
      return cmdVerify(ctx);
    case 'inspect':
      return cmdInspect(ctx);
    case 'keygen':
      return cmdKeygen(ctx);
    case 'did':
      if (parsed.subcommand === 'create') {
        return cmdDidCreate(ctx);
      }
      throw new UsageError(`Unknown did subcommand '${parsed.subcommand ?? '(none)'}'`, {
        hint: "Use 'pactseal did create'.",
      });
    default:
      throw new UsageError(`Unknown command '${parsed.command}'`, { hint: "Run 'pactseal help' for usage." });
  }
}

/**
 * Run the CLI with `args` (the arguments after the program name).
 *
 * Any error becomes exit code 1 with the formatted error on stderr, or a
 * `{ success: false, error }` object under `--json`. Log entries are
 * written to stderr as JSON lines.
 *
 * @example
 * ```typescript
 * const r = await run(['inspect', 'contract.cose', '--json']);
 * if (r.exitCode === 0) console.log(JSON.parse(r.stdout).signatures);
 * ```
 */
export async function run(args: string[], cwd?: string, env: NodeJS.ProcessEnv = process.env): Promise<RunResult> {
  const out: string[] = [];
  const err: string[] = [];
  const finish = (exitCode: number): RunResult => ({
    exitCode,
    stdout: out.join('\n'),
    stderr: err.join('\n'),
  });

  let json = args.includes('--json');
  const colorsWereEnabled = getColorsEnabled();
  try {
    const parsed = parseArgs(args);
    if (parsed.switches.has('no-color')) {
      setColorsEnabled(false);
    }

    const base = { parsed, cwd: resolve(cwd ?? process.cwd()), json, out, err };

    if (parsed.command === '' || parsed.command === 'help') {
      return finish(cmdHelp({ ...base, config: {}, logger: silentLogger }, parsed.positional[0] ?? parsed.subcommand));
    }
    if (parsed.switches.has('help')) {
      return finish(cmdHelp({ ...base, config: {}, logger: silentLogger }, parsed.command));
    }
    if (parsed.command === 'version' || parsed.switches.has('version')) {
      return finish(cmdVersion({ ...base, config: {}, logger: silentLogger }));
    }

    if (parsed.command === 'sign') {
      assertSignFlagsCompatible(parsed);
    }

    const config = loadConfig(base.cwd)?.config ?? {};
    json = json || config.outputFormat === 'json';
    const logger = createCliLogger(parsed, config, env, err);
    return finish(await dispatch({ ...base, json, config, logger }));
  } catch (caught) {
    if (json) {
      const detail = isPactsealError(caught) ? caught.toJSON() : { message: errorMessage(caught) };
      err.push(JSON.stringify({ success: false, error: detail }, null, 2));
    } else {
      err.push(isPactsealError(caught) ? formatError(caught) : `Error: ${errorMessage(caught)}`);
    }
    return finish(1);
  } finally {
    setColorsEnabled(colorsWereEnabled);
  }
}
