/**
 * @pactseal/cli terminal formatting.
 *
 * Plain ANSI escape codes; every helper degrades to bracketed text
 * markers when colors are disabled (`--no-color`, or a non-TTY stdout).
 *
 * @packageDocumentation
 */

// ─── ANSI color codes ─────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

// ─── Global color toggle ──────────────────────────────────────────────────────

let colorsEnabled = true;

/** Enable or disable ANSI color output globally. */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

// ─── Low-level colorizers ─────────────────────────────────────────────────────

function c(code: string, text: string): string {
  if (!colorsEnabled) return text;
  return `${code}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return c(colors.bold, text);
}

export function cyan(text: string): string {
  return c(colors.cyan, text);
}

// ─── Semantic formatters ──────────────────────────────────────────────────────

/** Green checkmark + message. */
export function success(msg: string): string {
  if (!colorsEnabled) return `[OK] ${msg}`;
  return `${colors.green}✔${colors.reset} ${msg}`;
}

/** Red X + message. */
export function error(msg: string): string {
  if (!colorsEnabled) return `[ERROR] ${msg}`;
  return `${colors.red}✘${colors.reset} ${msg}`;
}

/** Yellow exclamation + message. */
export function warning(msg: string): string {
  if (!colorsEnabled) return `[WARN] ${msg}`;
  return `${colors.yellow}!${colors.reset} ${msg}`;
}

/** Bold + underlined header text. */
export function header(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.bold}${colors.underline}${msg}${colors.reset}`;
}

export function dim(msg: string): string {
  return c(colors.gray, msg);
}

// ─── Strip ANSI codes ─────────────────────────────────────────────────────────

/** Strip all ANSI escape sequences from a string. */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Table formatting ─────────────────────────────────────────────────────────

/**
 * Render an aligned table with a bold header row and a rule beneath it.
 * Widths are measured on visible characters, so colored cells line up.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, col) =>
    rows.reduce((max, row) => Math.max(max, stripAnsi(row[col] ?? '').length), stripAnsi(h).length),
  );

  const padCell = (text: string, width: number): string => {
    const pad = width - stripAnsi(text).length;
    return pad > 0 ? text + ' '.repeat(pad) : text;
  };

  const gutter = '  ';
  const lines: string[] = [
    headers.map((h, i) => bold(padCell(h, widths[i] ?? 0))).join(gutter),
    dim(widths.map((w) => '─'.repeat(w)).join(gutter)),
  ];
  for (const row of rows) {
    lines.push(
      row
        .map((cell, i) => padCell(cell, widths[i] ?? 0))
        .join(gutter)
        .trimEnd(),
    );
  }
  return lines.join('\n');
}

// ─── Key-value display ────────────────────────────────────────────────────────

/**
 * Render key-value pairs with aligned values.
 * Pairs whose value is `undefined` are skipped.
 */
export function keyValue(pairs: [string, string | undefined][]): string {
  const present = pairs.filter((pair): pair is [string, string] => pair[1] !== undefined);
  if (present.length === 0) return '';

  const maxKeyLen = Math.max(...present.map(([k]) => k.length));
  return present.map(([key, value]) => `${bold(key.padEnd(maxKeyLen))}  ${value}`).join('\n');
}

// ─── Box drawing ──────────────────────────────────────────────────────────────

/** Frame `content` in a Unicode box with `title` set into the top edge. */
export function box(title: string, content: string): string {
  const contentLines = content.split('\n');

  const titleLen = stripAnsi(title).length;
  const maxContentLen = contentLines.reduce((max, line) => Math.max(max, stripAnsi(line).length), 0);
  const innerWidth = Math.max(titleLen + 2, maxContentLen + 2);

  const top = `┌─ ${bold(title)} ${'─'.repeat(Math.max(0, innerWidth - titleLen - 1))}┐`;
  const bottom = `└${'─'.repeat(innerWidth + 2)}┘`;

  const lines: string[] = [top];
  for (const line of contentLines) {
    const pad = innerWidth - stripAnsi(line).length;
    lines.push(`│ ${line}${' '.repeat(Math.max(0, pad))} │`);
  }
  lines.push(bottom);

  return lines.join('\n');
}

// ─── Byte previews ────────────────────────────────────────────────────────────

/**
 * Short human-readable rendering of a binary value: the hex of the first
 * `max` bytes and the total length.
 *
 * @example
 * ```typescript
 * bytesPreview(new Uint8Array([1, 2, 3])); // "010203 (3 bytes)"
 * ```
 */
export function bytesPreview(bytes: Uint8Array, max = 16): string {
  const hex = Array.from(bytes.subarray(0, max), (b) => b.toString(16).padStart(2, '0')).join('');
  const suffix = bytes.length > max ? '…' : '';
  return `${hex}${suffix} (${bytes.length} ${bytes.length === 1 ? 'byte' : 'bytes'})`;
}
