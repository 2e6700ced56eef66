/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, resolving paths, and
 * producing the JSON output shape expected by the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import {
  type Config,
  type ResolvedConfig,
  parseConfig,
  resolvePassFilePath,
  DEFAULT_CONFIG,
  DEFAULT_CONNECTION,
} from '../config.js';
import { type DiagnosticSink, defaultPassFilePath } from '../passfile/index.js';

export const CONFIG_FILE_NAME = 'pgpassfile.toml';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./pgpassfile.toml` if it exists in the current working directory.
 * 2. `$XDG_CONFIG_HOME/pgpassfile/pgpassfile.toml` (or
 *    `~/.config/pgpassfile/pgpassfile.toml` when `XDG_CONFIG_HOME` is not set),
 *    whether or not it exists.
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const localConfig = path.resolve(CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'pgpassfile', CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  diagnostics?: DiagnosticSink;
}

/**
 * Load and resolve the configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used. A missing file means defaults.
 * @returns The resolved path that was used and the fully-resolved config.
 */
export function loadConfig(
  configPath?: string,
  opts: LoadConfigOptions = {},
): { configPath: string; config: ResolvedConfig } {
  const resolvedPath = configPath ? path.resolve(configPath) : defaultConfigPath(opts.env);
  const configDir = path.dirname(resolvedPath);

  const parsed: Config = fs.existsSync(resolvedPath)
    ? parseConfig(fs.readFileSync(resolvedPath, 'utf-8'))
    : { ...DEFAULT_CONFIG, connection: { ...DEFAULT_CONNECTION } };

  const passfile =
    resolvePassFilePath(parsed, configDir) ?? defaultPassFilePath(opts.env, opts.diagnostics);

  const config: ResolvedConfig = {
    passfile,
    force: parsed.force,
    verbose: parsed.verbose,
    connection: parsed.connection,
  };

  return { configPath: resolvedPath, config };
}

// ---------------------------------------------------------------------------
// CLI output
// ---------------------------------------------------------------------------

/**
 * Build the JSON-serialisable output object for the `config` CLI command.
 */
export function configOutput(configPath: string, config: ResolvedConfig): object {
  return {
    config_file: configPath,
    passfile: config.passfile,
    force: config.force,
    verbose: config.verbose,
    connection: {
      host: config.connection.host,
      port: config.connection.port,
      database: config.connection.database ?? null,
      user: config.connection.user ?? null,
    },
  };
}
