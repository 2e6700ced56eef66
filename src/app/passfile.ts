/**
 * Pass file commands for the CLI.
 *
 * Each function takes the pass file path and flags and returns plain
 * objects that can be JSON.stringify'd. Warnings raised while reading are
 * returned in the output rather than printed.
 */

import {
  type CredentialEntry,
  type CredentialQuery,
  type Diagnostic,
  type DiagnosticSink,
  checkPassFile,
  collectDiagnostics,
  lookupPassword,
  openPassFile,
  passFileEntries,
  permissionHolder,
} from '../passfile/index.js';
import type { ConnectionDefaults } from '../config.js';
import { resolveConnectionPassword } from '../connection.js';
import type {
  CheckOutput,
  EntriesOutput,
  EntryOutput,
  LookupOutput,
  ResolveOutput,
} from './types.js';

export const PASSWORD_MASK = '*********';

export interface PassFileCommandOptions {
  /** Pass file to read. */
  passfile: string;
  force: boolean;
  /** Receives every diagnostic, including debug output. */
  diagnostics?: DiagnosticSink;
}

function warningsOf(diagnostics: Diagnostic[]): string[] {
  return diagnostics.filter((d) => d.level === 'warn').map((d) => d.message);
}

export interface QueryOptions {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
}

/**
 * Combine command-line options with the configured connection defaults.
 *
 * @throws Error if neither source provides a database or a user.
 */
export function connectionQuery(opts: QueryOptions, defaults: ConnectionDefaults): CredentialQuery {
  const database = opts.database ?? defaults.database;
  if (database === undefined) {
    throw new Error('No database given; use --database or set connection.database in the config');
  }
  const user = opts.user ?? defaults.user;
  if (user === undefined) {
    throw new Error('No user given; use --user or set connection.user in the config');
  }
  return {
    host: opts.host ?? defaults.host,
    port: opts.port ?? defaults.port,
    database,
    user,
  };
}

export function entryOutput(entry: CredentialEntry): EntryOutput {
  return {
    hostname: entry.hostname,
    port: entry.port,
    database: entry.database,
    username: entry.username,
    password: PASSWORD_MASK,
  };
}

/**
 * Look up the password for a connection.
 *
 * @throws PassFileError if the pass file does not exist or cannot be read.
 */
export function lookupCommand(query: CredentialQuery, opts: PassFileCommandOptions): LookupOutput {
  const { sink, diagnostics } = collectDiagnostics(opts.diagnostics);

  const file = openPassFile(opts.passfile, { diagnostics: sink });
  if (!file.ok) throw file.error;

  const result = lookupPassword(file.value, query, { force: opts.force, diagnostics: sink });
  if (!result.ok) throw result.error;

  return {
    success: true,
    passfile: file.value.path,
    found: result.value !== null,
    password: result.value,
    warnings: warningsOf(diagnostics),
  };
}

/**
 * List all valid entries, passwords masked.
 *
 * @throws PassFileError if the pass file does not exist or cannot be read.
 */
export function entriesCommand(opts: PassFileCommandOptions): EntriesOutput {
  const { sink, diagnostics } = collectDiagnostics(opts.diagnostics);

  const file = openPassFile(opts.passfile, { diagnostics: sink });
  if (!file.ok) throw file.error;

  const entries = passFileEntries(file.value, { force: opts.force, diagnostics: sink });
  if (!entries.ok) throw entries.error;

  return {
    success: true,
    passfile: file.value.path,
    entries: entries.value.map(entryOutput),
    warnings: warningsOf(diagnostics),
  };
}

/**
 * Report whether the pass file would be trusted. Never throws for a
 * missing or unreadable file; that is part of the report.
 */
export function checkCommand(opts: PassFileCommandOptions): CheckOutput {
  const { sink, diagnostics } = collectDiagnostics(opts.diagnostics);
  const outcome = checkPassFile(opts.passfile, opts.force, sink);

  const mode = outcome.type === 'readable' || outcome.type === 'too_open' ? outcome.mode : null;

  return {
    success: true,
    passfile: opts.passfile,
    status: outcome.type,
    mode: mode === null ? null : `0${mode.toString(8).padStart(3, '0')}`,
    open_to: mode === null ? null : permissionHolder(mode),
    force: opts.force,
    warnings: warningsOf(diagnostics),
  };
}

/**
 * Resolve the password to connect with, the way a connecting client would:
 * an explicit password wins and a missing pass file means the empty password.
 */
export function resolveCommand(
  query: CredentialQuery,
  password: string | undefined,
  opts: PassFileCommandOptions,
): ResolveOutput {
  const { sink, diagnostics } = collectDiagnostics(opts.diagnostics);
  const resolved = resolveConnectionPassword(
    { ...query, password, passfile: opts.passfile },
    { force: opts.force, diagnostics: sink },
  );
  return { success: true, password: resolved, warnings: warningsOf(diagnostics) };
}
