import * as fs from 'node:fs';

import { type DiagnosticSink, defaultDiagnostics } from './diagnostics.js';
import { parsePassFileContent } from './parser.js';
import { checkPassFile, gateOutcomeForError } from './permissions.js';
import { type CredentialEntry, type PassFile, type Result, fail, ok } from './types.js';

export interface ReadOptions {
  /** Read the file even if group or others have permissions on it. */
  force?: boolean;
  diagnostics?: DiagnosticSink;
}

/**
 * Read the raw content of a pass file.
 *
 * Returns an empty string when the permissions are too open and `force` is
 * not set. Nothing is cached: each call goes back to disk.
 */
export function readPassFile(file: PassFile, opts: ReadOptions = {}): Result<string> {
  const diagnostics = opts.diagnostics ?? defaultDiagnostics;
  const outcome = checkPassFile(file.path, opts.force ?? false, diagnostics);

  switch (outcome.type) {
    case 'not_exists':
    case 'not_readable':
      return fail(outcome.type, file.path);
    case 'too_open':
      return ok('');
    case 'readable':
      break;
  }

  try {
    return ok(fs.readFileSync(file.path, 'utf-8'));
  } catch (err) {
    // The file may have changed between the gate and the read.
    const late = gateOutcomeForError(err);
    if (late.type === 'not_exists' || late.type === 'not_readable') {
      return fail(late.type, file.path);
    }
    throw err;
  }
}

/**
 * All valid entries of a pass file, in file order.
 *
 * Duplicates are kept; position decides precedence during lookup.
 */
export function passFileEntries(
  file: PassFile,
  opts: ReadOptions = {},
): Result<CredentialEntry[]> {
  const diagnostics = opts.diagnostics ?? defaultDiagnostics;
  const content = readPassFile(file, { ...opts, diagnostics });
  if (!content.ok) {
    return content;
  }

  if (content.value === '') {
    diagnostics({
      level: 'debug',
      code: 'no_content',
      message: `No valid content in '${file.path}' found`,
    });
    return ok([]);
  }

  return ok(parsePassFileContent(content.value, diagnostics));
}
