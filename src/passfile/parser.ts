/**
 * Line parser for the pass file format:
 *
 * ```
 * hostname:port:database:username:password
 * ```
 *
 * - `*` in any of the first four fields matches anything.
 * - `\\` is a literal backslash, `\:` a literal colon.
 * - Lines starting with `#` (after trimming) are comments; blank lines are ignored.
 */

import { type DiagnosticSink, defaultDiagnostics } from './diagnostics.js';
import { parsePort } from './port.js';
import { type CredentialEntry, makeEntry } from './types.js';

export const WILDCARD = '*';
export const FIELD_COUNT = 5;

export type SkipReason = 'malformed_line' | 'invalid_port';

export type ParsedLine =
  | { type: 'blank' }
  | { type: 'comment' }
  | { type: 'skip'; reason: SkipReason }
  | { type: 'entry'; entry: CredentialEntry };

/**
 * Split a line on every `:` that is not directly preceded by a backslash.
 *
 * At most `maxSplits` splits happen; everything after the last one,
 * unescaped colons included, ends up in the final field.
 */
export function splitFields(line: string, maxSplits = FIELD_COUNT - 1): string[] {
  const fields: string[] = [];
  const separator = /(?<!\\):/g;
  let start = 0;
  let match: RegExpExecArray | null;

  while (fields.length < maxSplits && (match = separator.exec(line)) !== null) {
    fields.push(line.slice(start, match.index));
    start = match.index + 1;
  }
  fields.push(line.slice(start));

  return fields;
}

/**
 * Undo field escaping. Backslash pairs are collapsed before colon escapes.
 */
export function unescapeField(raw: string): string {
  return raw.replaceAll('\\\\', '\\').replaceAll('\\:', ':');
}

function resolveField(raw: string): string | null {
  return raw === WILDCARD ? null : unescapeField(raw);
}

/**
 * Parse a single raw line.
 *
 * Malformed lines and lines with an invalid port come back as `skip` and
 * are reported to `diagnostics`; they never throw.
 */
export function parsePassFileLine(
  rawLine: string,
  lineNumber: number,
  diagnostics: DiagnosticSink = defaultDiagnostics,
): ParsedLine {
  const line = rawLine.trim();
  if (line === '') {
    return { type: 'blank' };
  }
  if (line.startsWith('#')) {
    return { type: 'comment' };
  }

  const fields = splitFields(line);
  if (fields.length !== FIELD_COUNT) {
    diagnostics({
      level: 'warn',
      code: 'malformed_line',
      line: lineNumber,
      message: `Invalid entry on line ${lineNumber}: found ${fields.length} fields instead of ${FIELD_COUNT}`,
    });
    return { type: 'skip', reason: 'malformed_line' };
  }

  const [rawHost, rawPort, rawDatabase, rawUser, rawPassword] = fields;

  let port: number | null = null;
  if (rawPort !== WILDCARD) {
    port = parsePort(rawPort);
    if (port === null) {
      diagnostics({
        level: 'warn',
        code: 'invalid_port',
        line: lineNumber,
        message: `Invalid port '${rawPort}' on line ${lineNumber}`,
      });
      return { type: 'skip', reason: 'invalid_port' };
    }
  }

  return {
    type: 'entry',
    entry: makeEntry({
      hostname: resolveField(rawHost),
      port,
      database: resolveField(rawDatabase),
      username: resolveField(rawUser),
      password: unescapeField(rawPassword),
    }),
  };
}

/**
 * Parse a whole pass file body, keeping entries in file order.
 *
 * Lines are numbered from 1 and split on `\n`, `\r\n` or `\r`.
 */
export function parsePassFileContent(
  content: string,
  diagnostics: DiagnosticSink = defaultDiagnostics,
): CredentialEntry[] {
  const entries: CredentialEntry[] = [];
  const lines = content.split(/\r\n|\r|\n/);

  for (let i = 0; i < lines.length; i++) {
    const parsed = parsePassFileLine(lines[i], i + 1, diagnostics);
    if (parsed.type === 'entry') {
      entries.push(parsed.entry);
    }
  }

  return entries;
}
