#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';

import { loadConfig, configOutput } from '../app/config.js';
import {
  checkCommand,
  connectionQuery,
  entriesCommand,
  lookupCommand,
  resolveCommand,
  type PassFileCommandOptions,
  type QueryOptions,
} from '../app/passfile.js';
import type { ResolvedConfig } from '../config.js';
import { consoleDiagnostics, parsePort } from '../passfile/index.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

type GlobalOptions = {
  config?: string;
  passfile?: string;
  force?: boolean;
  verbose?: boolean;
};

function run(fn: () => unknown): void {
  try {
    const result = fn();
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
    process.exit(1);
  }
}

function runWithConfig(
  fn: (cfg: { configPath: string; config: ResolvedConfig }, opts: PassFileCommandOptions) => unknown,
): void {
  run(() => {
    const globals = program.opts<GlobalOptions>();
    const cfg = loadConfig(globals.config);
    const verbose = globals.verbose ?? cfg.config.verbose;

    return fn(cfg, {
      passfile: globals.passfile ?? cfg.config.passfile,
      force: globals.force ?? cfg.config.force,
      diagnostics: consoleDiagnostics({ verbose }),
    });
  });
}

function portArg(value: string): number {
  const port = parsePort(value);
  if (port === null) {
    throw new InvalidArgumentError('The port number must be an integer between 1 and 65535.');
  }
  return port;
}

function withConnectionOptions(cmd: Command): Command {
  return cmd
    .option('-H, --host <host>', 'database host (default: connection.host or localhost)')
    .option('-P, --port <port>', 'database port (default: connection.port or 5432)', portArg)
    .option('-S, --database <name>', 'database name (default: connection.database)')
    .option('-U, --user <name>', 'database user (default: connection.user)');
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('pgpassfile')
  .description('Resolve database passwords from a .pgpass file')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file')
  .option('--passfile <path>', 'pass file to read (default: $HOME/.pgpass)')
  .option('--force', 'read the pass file even if group or others have permissions on it')
  .option('-v, --verbose', 'print debug diagnostics to stderr');

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(() => {
    runWithConfig((cfg) => configOutput(cfg.configPath, cfg.config));
  });

// ---------------------------------------------------------------------------
// lookup / resolve
// ---------------------------------------------------------------------------

withConnectionOptions(
  program.command('lookup').description('Find the password for a connection in the pass file'),
).action((opts: QueryOptions) => {
  runWithConfig((cfg, passOpts) =>
    lookupCommand(connectionQuery(opts, cfg.config.connection), passOpts),
  );
});

withConnectionOptions(
  program
    .command('resolve')
    .description('Resolve the password a client would connect with')
    .option('-W, --password <password>', 'explicit password; skips the pass file'),
).action((opts: QueryOptions & { password?: string }) => {
  runWithConfig((cfg, passOpts) =>
    resolveCommand(connectionQuery(opts, cfg.config.connection), opts.password, passOpts),
  );
});

// ---------------------------------------------------------------------------
// entries / check
// ---------------------------------------------------------------------------

program
  .command('entries')
  .description('List the entries of the pass file with masked passwords')
  .action(() => {
    runWithConfig((_cfg, passOpts) => entriesCommand(passOpts));
  });

program
  .command('check')
  .description('Check existence and permissions of the pass file')
  .action(() => {
    runWithConfig((_cfg, passOpts) => checkCommand(passOpts));
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

program.parse(process.argv);
