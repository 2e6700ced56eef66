/**
 * Output types for the CLI.
 *
 * All field names use snake_case. Wildcard fields and absent values
 * serialize as `null`.
 */

export interface LookupOutput {
  success: true;
  passfile: string;
  found: boolean;
  password: string | null;
  warnings: string[];
}

export interface EntryOutput {
  hostname: string | null;
  port: number | null;
  database: string | null;
  username: string | null;
  /** Always masked. */
  password: string;
}

export interface EntriesOutput {
  success: true;
  passfile: string;
  entries: EntryOutput[];
  warnings: string[];
}

export type CheckStatus = 'readable' | 'too_open' | 'not_exists' | 'not_readable';

export interface CheckOutput {
  success: true;
  passfile: string;
  status: CheckStatus;
  /** Permission bits in octal, e.g. "0600"; null when the file could not be inspected. */
  mode: string | null;
  /** Who besides the owner has permissions; null when nobody does or the mode is unknown. */
  open_to: 'group' | 'other' | 'group_and_other' | null;
  force: boolean;
  warnings: string[];
}

export interface ResolveOutput {
  success: true;
  /** Empty string when the pass file could not be read, null when nothing matched. */
  password: string | null;
  warnings: string[];
}
