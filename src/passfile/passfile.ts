import * as fs from 'node:fs';
import * as path from 'node:path';

import { type DiagnosticSink, defaultDiagnostics } from './diagnostics.js';
import { findPassword } from './matcher.js';
import { gateOutcomeForError } from './permissions.js';
import { type ReadOptions, passFileEntries } from './store.js';
import { type CredentialQuery, type PassFile, type Result, fail, ok } from './types.js';

export const PASS_FILE_NAME = '.pgpass';

/**
 * Default pass file location: `$HOME/.pgpass`.
 *
 * Falls back to the relative name `.pgpass` (with a warning) when `HOME`
 * is not set. An empty `HOME` resolves against the working directory.
 */
export function defaultPassFilePath(
  env: NodeJS.ProcessEnv = process.env,
  diagnostics: DiagnosticSink = defaultDiagnostics,
): string {
  const home = env.HOME;
  if (home === undefined) {
    diagnostics({
      level: 'warn',
      code: 'home_unset',
      message: 'Environment variable HOME not set',
    });
    return PASS_FILE_NAME;
  }
  return path.resolve(home, PASS_FILE_NAME);
}

export interface OpenOptions {
  env?: NodeJS.ProcessEnv;
  diagnostics?: DiagnosticSink;
}

/**
 * Open a handle on a pass file.
 *
 * Only existence is checked here; every later read checks again.
 */
export function openPassFile(filePath?: string, opts: OpenOptions = {}): Result<PassFile> {
  const target = filePath ?? defaultPassFilePath(opts.env, opts.diagnostics);

  if (!fs.existsSync(target)) {
    return fail('not_exists', target);
  }

  try {
    return ok(Object.freeze({ path: fs.realpathSync(target) }));
  } catch (err) {
    const outcome = gateOutcomeForError(err);
    if (outcome.type === 'not_exists' || outcome.type === 'not_readable') {
      return fail(outcome.type, target);
    }
    throw err;
  }
}

/**
 * Look up the password for a connection.
 *
 * `null` when no entry matches. The file is re-read on every call.
 */
export function lookupPassword(
  file: PassFile,
  query: CredentialQuery,
  opts: ReadOptions = {},
): Result<string | null> {
  const diagnostics = opts.diagnostics ?? defaultDiagnostics;
  const entries = passFileEntries(file, { ...opts, diagnostics });
  if (!entries.ok) {
    return entries;
  }

  const password = findPassword(entries.value, query);
  const target = `host '${query.host}', port ${query.port}, database '${query.database}' and user '${query.user}'`;
  diagnostics({
    level: 'debug',
    code: 'lookup_result',
    message:
      password !== null ? `Password found for ${target}` : `No password found for ${target}`,
  });

  return ok(password);
}
