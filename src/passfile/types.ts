/**
 * Value types shared by the pass file reader, parser and matcher.
 */

/**
 * One parsed line of a pass file.
 *
 * `null` in `hostname`, `port`, `database` or `username` is the `*` wildcard.
 * The password is never a wildcard and may be the empty string.
 */
export interface CredentialEntry {
  readonly hostname: string | null;
  readonly port: number | null;
  readonly database: string | null;
  readonly username: string | null;
  readonly password: string;
}

/** A connection attempt about to be made. */
export interface CredentialQuery {
  host: string;
  port: number;
  database: string;
  user: string;
}

/** Handle on a pass file. Holds nothing but the resolved path. */
export interface PassFile {
  readonly path: string;
}

export type PassFileErrorKind = 'not_exists' | 'not_readable';

export class PassFileError extends Error {
  readonly kind: PassFileErrorKind;
  readonly path: string;

  constructor(kind: PassFileErrorKind, path: string) {
    super(
      kind === 'not_exists'
        ? `Pass file ${path} does not exist`
        : `Pass file ${path} is not readable`,
    );
    this.name = 'PassFileError';
    this.kind = kind;
    this.path = path;
  }
}

export type Failure = { ok: false; error: PassFileError };

/** Outcome of a pass file operation; only fatal conditions are failures. */
export type Result<T> = { ok: true; value: T } | Failure;

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(kind: PassFileErrorKind, path: string): Failure {
  return { ok: false, error: new PassFileError(kind, path) };
}

export function makeEntry(fields: Partial<CredentialEntry> = {}): CredentialEntry {
  return Object.freeze({
    hostname: fields.hostname ?? null,
    port: fields.port ?? null,
    database: fields.database ?? null,
    username: fields.username ?? null,
    password: fields.password ?? '',
  });
}
