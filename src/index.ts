/**
 * pgpassfile: password lookup in `.pgpass` credential files.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Pass file
// ---------------------------------------------------------------------------

export * from './passfile/index.js';

// ---------------------------------------------------------------------------
// Connection password resolution
// ---------------------------------------------------------------------------

export {
  type ConnectionParams,
  type ResolveOptions,
  resolveConnectionPassword,
} from './connection.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export {
  type Config,
  type ConnectionDefaults,
  type ResolvedConfig,
  parseConfig,
  resolvePassFilePath,
  DEFAULT_CONFIG,
  DEFAULT_CONNECTION,
} from './config.js';
