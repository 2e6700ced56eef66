/**
 * Password resolution for code that is about to open a database connection.
 */

import {
  type DiagnosticSink,
  defaultDiagnostics,
  lookupPassword,
  openPassFile,
} from './passfile/index.js';

export interface ConnectionParams {
  host: string;
  port: number;
  database: string;
  user: string;
  /** Explicit password. When set the pass file is not consulted. */
  password?: string;
  /** Pass file to search instead of `$HOME/.pgpass`. */
  passfile?: string;
}

export interface ResolveOptions {
  force?: boolean;
  env?: NodeJS.ProcessEnv;
  diagnostics?: DiagnosticSink;
}

/**
 * Work out which password to connect with.
 *
 * 1. An explicit password wins.
 * 2. A missing or unreadable pass file resolves to the empty password,
 *    with a warning.
 * 3. Otherwise the first matching pass file entry, or `null` if none matches.
 */
export function resolveConnectionPassword(
  params: ConnectionParams,
  opts: ResolveOptions = {},
): string | null {
  if (params.password !== undefined) {
    return params.password;
  }

  const diagnostics = opts.diagnostics ?? defaultDiagnostics;
  const file = openPassFile(params.passfile, { env: opts.env, diagnostics });
  const result = file.ok
    ? lookupPassword(
        file.value,
        { host: params.host, port: params.port, database: params.database, user: params.user },
        { force: opts.force, diagnostics },
      )
    : file;

  if (!result.ok) {
    diagnostics({
      level: 'warn',
      code: 'passfile_error',
      message: `Error reading pass file, using empty password: ${result.error.message}`,
    });
    return '';
  }
  return result.value;
}
