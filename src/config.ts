/**
 * Configuration module for pgpassfile.
 *
 * Parses TOML configuration and provides sensible defaults. Connection
 * defaults in the [connection] section are used by the CLI when the matching
 * option is not given on the command line.
 */

import os from 'node:os';
import path from 'node:path';
import toml from 'toml';

import { DEFAULT_PORT, isValidPort } from './passfile/port.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface ConnectionDefaults {
  /** Database host used when none is given. */
  host: string;
  /** TCP port used when none is given. */
  port: number;
  /** Database name used when none is given. */
  database?: string;
  /** User name used when none is given. */
  user?: string;
}

export interface Config {
  /** Optional path to the pass file. Relative paths resolve against the config dir. */
  passfile?: string;
  /** Read the pass file even if group or others have permissions on it. */
  force: boolean;
  /** Print debug diagnostics. */
  verbose: boolean;
  /** Connection defaults. */
  connection: ConnectionDefaults;
}

export interface ResolvedConfig {
  /** Resolved path to the pass file. */
  passfile: string;
  force: boolean;
  verbose: boolean;
  connection: ConnectionDefaults;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONNECTION: ConnectionDefaults = {
  host: 'localhost',
  port: DEFAULT_PORT,
};

export const DEFAULT_CONFIG: Config = {
  passfile: undefined,
  force: false,
  verbose: false,
  connection: { ...DEFAULT_CONNECTION },
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function asTable(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing or mistyped fields are filled with defaults. A port outside
 * 1..65535 falls back to the default port.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const raw: Record<string, unknown> =
    tomlStr.trim().length === 0 ? {} : asTable(toml.parse(tomlStr));
  const connectionRaw = asTable(raw.connection);

  const connection: ConnectionDefaults = {
    host: nonEmptyString(connectionRaw.host) ?? DEFAULT_CONNECTION.host,
    port:
      typeof connectionRaw.port === 'number' && isValidPort(connectionRaw.port)
        ? connectionRaw.port
        : DEFAULT_CONNECTION.port,
  };

  const database = nonEmptyString(connectionRaw.database);
  if (database !== undefined) {
    connection.database = database;
  }
  const user = nonEmptyString(connectionRaw.user);
  if (user !== undefined) {
    connection.user = user;
  }

  const config: Config = {
    force: typeof raw.force === 'boolean' ? raw.force : DEFAULT_CONFIG.force,
    verbose: typeof raw.verbose === 'boolean' ? raw.verbose : DEFAULT_CONFIG.verbose,
    connection,
  };

  const passfile = nonEmptyString(raw.passfile);
  if (passfile !== undefined) {
    config.passfile = passfile;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the configured pass file path.
 *
 * - `~/...` expands to the home directory.
 * - An absolute path is returned unchanged.
 * - A relative path is joined with `configDir`.
 * - Returns `undefined` when no pass file is configured, so the caller falls
 *   back to the default location.
 */
export function resolvePassFilePath(
  config: Config,
  configDir: string,
  homeDir: string = os.homedir(),
): string | undefined {
  if (config.passfile === undefined) {
    return undefined;
  }

  if (config.passfile === '~' || config.passfile.startsWith('~/')) {
    return path.join(homeDir, config.passfile.slice(1));
  }

  if (path.isAbsolute(config.passfile)) {
    return config.passfile;
  }

  return path.join(configDir, config.passfile);
}
