import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { collectDiagnostics } from './diagnostics.js';
import { checkPassFile, gateOutcomeForError, permissionHolder } from './permissions.js';

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  const mocked = {
    ...actual,
    accessSync: vi.fn(actual.accessSync),
    readFileSync: vi.fn(actual.readFileSync),
  };
  return { ...mocked, default: mocked };
});

function fsError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('permissionHolder', () => {
  it('is null for owner-only modes', () => {
    expect(permissionHolder(0o600)).toBeNull();
    expect(permissionHolder(0o700)).toBeNull();
  });

  it('names group, other or both', () => {
    expect(permissionHolder(0o640)).toBe('group');
    expect(permissionHolder(0o604)).toBe('other');
    expect(permissionHolder(0o644)).toBe('group_and_other');
  });
});

describe('gateOutcomeForError', () => {
  it('maps ENOENT to not_exists', () => {
    expect(gateOutcomeForError(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toEqual({
      type: 'not_exists',
    });
  });

  it('maps EACCES to not_readable', () => {
    expect(gateOutcomeForError(Object.assign(new Error('denied'), { code: 'EACCES' }))).toEqual({
      type: 'not_readable',
    });
  });

  it('rethrows anything else', () => {
    const err = Object.assign(new Error('boom'), { code: 'EIO' });
    expect(() => gateOutcomeForError(err)).toThrow('boom');
  });
});

describe('checkPassFile', () => {
  let tmpDir: string;
  let file: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pgpassfile-gate-test-'));
    file = path.join(tmpDir, '.pgpass');
    fs.writeFileSync(file, 'h:5432:d:u:pw\n');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reports a missing file', () => {
    expect(checkPassFile(path.join(tmpDir, 'missing'), false)).toEqual({ type: 'not_exists' });
  });

  it('accepts an owner-only file', () => {
    fs.chmodSync(file, 0o600);
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkPassFile(file, false, sink)).toEqual({ type: 'readable', mode: 0o600 });
    expect(diagnostics).toEqual([]);
  });

  it('refuses a group-readable file with a warning', () => {
    fs.chmodSync(file, 0o640);
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkPassFile(file, false, sink)).toEqual({
      type: 'too_open',
      mode: 0o640,
      who: 'group',
    });
    expect(diagnostics).toEqual([
      { level: 'warn', code: 'too_open', message: `Group has permissions on '${file}'` },
    ]);
  });

  it('refuses a world-readable file', () => {
    fs.chmodSync(file, 0o604);
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkPassFile(file, false, sink)).toMatchObject({ type: 'too_open', who: 'other' });
    expect(diagnostics[0].message).toBe(`Others have permissions on '${file}'`);
  });

  it('accepts lax permissions with force and only logs at debug level', () => {
    fs.chmodSync(file, 0o644);
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkPassFile(file, true, sink)).toEqual({ type: 'readable', mode: 0o644 });
    expect(diagnostics).toEqual([
      {
        level: 'debug',
        code: 'force_override',
        message: `Group and others have permissions on '${file}'`,
      },
    ]);
  });

  it('does not change the file mode', () => {
    fs.chmodSync(file, 0o644);
    checkPassFile(file, false, collectDiagnostics().sink);
    expect(fs.statSync(file).mode & 0o777).toBe(0o644);
  });

  it('reports a directory as not readable', () => {
    expect(checkPassFile(tmpDir, false)).toEqual({ type: 'not_readable' });
  });

  it('reports a file without read access as not readable', () => {
    fs.chmodSync(file, 0o600);
    vi.mocked(fs.accessSync).mockImplementationOnce(() => {
      throw fsError('denied', 'EACCES');
    });
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkPassFile(file, false, sink)).toEqual({ type: 'not_readable' });
    expect(fs.accessSync).toHaveBeenCalledWith(file, fs.constants.R_OK);
    expect(diagnostics).toEqual([]);
  });

  it('rethrows unexpected access errors', () => {
    vi.mocked(fs.accessSync).mockImplementationOnce(() => {
      throw fsError('io failure', 'EIO');
    });
    expect(() => checkPassFile(file, false)).toThrow('io failure');
  });
});
