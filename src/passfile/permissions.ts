import * as fs from 'node:fs';

import { type DiagnosticSink, defaultDiagnostics } from './diagnostics.js';

export type PermissionHolder = 'group' | 'other' | 'group_and_other';

export type GateOutcome =
  | { type: 'not_exists' }
  | { type: 'not_readable' }
  | { type: 'readable'; mode: number }
  | { type: 'too_open'; mode: number; who: PermissionHolder };

const GROUP_BITS = 0o070;
const OTHER_BITS = 0o007;

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Map a filesystem error to the gate outcome it stands for.
 *
 * Anything other than a missing path or an access failure is rethrown.
 */
export function gateOutcomeForError(err: unknown): GateOutcome {
  const code = errorCode(err);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return { type: 'not_exists' };
  }
  if (code === 'EACCES' || code === 'EPERM' || code === 'EISDIR') {
    return { type: 'not_readable' };
  }
  throw err;
}

export function permissionHolder(mode: number): PermissionHolder | null {
  const group = (mode & GROUP_BITS) !== 0;
  const other = (mode & OTHER_BITS) !== 0;
  if (group && other) return 'group_and_other';
  if (group) return 'group';
  if (other) return 'other';
  return null;
}

function describeHolder(who: PermissionHolder, filePath: string): string {
  switch (who) {
    case 'group':
      return `Group has permissions on '${filePath}'`;
    case 'other':
      return `Others have permissions on '${filePath}'`;
    case 'group_and_other':
      return `Group and others have permissions on '${filePath}'`;
  }
}

/**
 * Decide whether a pass file may be trusted.
 *
 * - `not_exists` / `not_readable` are fatal for the caller.
 * - `too_open` means group or other have any permission bit and `force` is
 *   off. The caller must treat the file as empty; a warning is emitted.
 * - `readable` otherwise. With `force`, lax permissions only produce a debug
 *   diagnostic.
 *
 * The file mode is never modified.
 */
export function checkPassFile(
  filePath: string,
  force: boolean,
  diagnostics: DiagnosticSink = defaultDiagnostics,
): GateOutcome {
  if (!fs.existsSync(filePath)) {
    return { type: 'not_exists' };
  }

  let stat: fs.Stats;
  try {
    fs.accessSync(filePath, fs.constants.R_OK);
    stat = fs.statSync(filePath);
  } catch (err) {
    return gateOutcomeForError(err);
  }

  if (!stat.isFile()) {
    return { type: 'not_readable' };
  }

  const mode = stat.mode & 0o777;
  const who = permissionHolder(mode);
  if (who === null) {
    return { type: 'readable', mode };
  }

  const message = describeHolder(who, filePath);
  if (force) {
    diagnostics({ level: 'debug', code: 'force_override', message });
    return { type: 'readable', mode };
  }

  diagnostics({ level: 'warn', code: 'too_open', message });
  return { type: 'too_open', mode, who };
}
