import { describe, it, expect } from 'vitest';

import { entryMatches, findPassword } from './matcher.js';
import { parsePassFileContent } from './parser.js';
import { makeEntry } from './types.js';

const PRECEDENCE_FILE = [
  'app:5432:vdc:glassfish:passwd1',
  'app:5432:*:glassfish:passwd2',
  'app:5432:*:uhu:passwd3',
  'app:5432:*:*:passwd4',
  'app:5434:*:glassfish:passwd5',
  'localhost:5432:*:glassfish:passwd6',
].join('\n');

describe('entryMatches', () => {
  const query = { host: 'app', port: 5432, database: 'vdc', user: 'glassfish' };

  it('matches a fully wildcarded entry', () => {
    expect(entryMatches(makeEntry({ password: 'x' }), query)).toBe(true);
  });

  it('compares host, database and user case-insensitively', () => {
    const entry = makeEntry({ hostname: 'APP', database: 'Vdc', username: 'GlassFish' });
    expect(entryMatches(entry, query)).toBe(true);
  });

  it('compares ports exactly', () => {
    expect(entryMatches(makeEntry({ port: 5432 }), query)).toBe(true);
    expect(entryMatches(makeEntry({ port: 5433 }), query)).toBe(false);
  });

  it('fails on any mismatching concrete field', () => {
    expect(entryMatches(makeEntry({ hostname: 'other' }), query)).toBe(false);
    expect(entryMatches(makeEntry({ database: 'other' }), query)).toBe(false);
    expect(entryMatches(makeEntry({ username: 'other' }), query)).toBe(false);
  });
});

describe('findPassword', () => {
  const entries = parsePassFileContent(PRECEDENCE_FILE);

  it.each<[string, number, string, string, string | null]>([
    ['app', 5432, 'vdc', 'glassfish', 'passwd1'],
    ['app', 5432, 'bla', 'glassfish', 'passwd2'],
    ['app', 5432, 'vdc', 'uhu', 'passwd3'],
    ['app', 5432, 'bla', 'uhu', 'passwd3'],
    ['app', 5432, 'bla', 'itsme', 'passwd4'],
    ['app', 5434, 'bla', 'glassfish', 'passwd5'],
    ['app', 5434, 'bla', 'itsme', null],
    ['localhost', 5432, 'bla', 'glassfish', 'passwd6'],
    ['localhost', 5432, 'bla', 'itsme', null],
    ['somewhere', 5432, 'bla', 'glassfish', null],
  ])('host=%s port=%d db=%s user=%s -> %s', (host, port, database, user, expected) => {
    expect(findPassword(entries, { host, port, database, user })).toBe(expected);
  });

  it('lets an earlier wildcard entry shadow a later specific one', () => {
    const shadowed = [
      makeEntry({ hostname: 'app', password: 'generic' }),
      makeEntry({ hostname: 'app', port: 5432, database: 'vdc', username: 'u', password: 'specific' }),
    ];
    expect(findPassword(shadowed, { host: 'app', port: 5432, database: 'vdc', user: 'u' })).toBe(
      'generic',
    );
  });

  it('returns the password without changing its case', () => {
    const entries = [makeEntry({ hostname: 'App', password: 'MiXeD' })];
    expect(findPassword(entries, { host: 'APP', port: 1, database: 'd', user: 'u' })).toBe('MiXeD');
  });

  it('returns an empty password rather than null', () => {
    const entries = [makeEntry({ password: '' })];
    expect(findPassword(entries, { host: 'h', port: 1, database: 'd', user: 'u' })).toBe('');
  });

  it('returns null for no entries', () => {
    expect(findPassword([], { host: 'h', port: 1, database: 'd', user: 'u' })).toBeNull();
  });
});
