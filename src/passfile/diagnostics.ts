/**
 * Side channel for soft anomalies (lax permissions, malformed lines, bad
 * ports). These never abort a read; they are handed to a sink instead.
 */

export type DiagnosticLevel = 'warn' | 'debug';

export type DiagnosticCode =
  | 'too_open'
  | 'force_override'
  | 'malformed_line'
  | 'invalid_port'
  | 'home_unset'
  | 'no_content'
  | 'lookup_result'
  | 'passfile_error';

export interface Diagnostic {
  level: DiagnosticLevel;
  code: DiagnosticCode;
  message: string;
  /** 1-based line number, for line-level anomalies. */
  line?: number;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export interface ConsoleDiagnosticsOptions {
  /** Also print debug-level diagnostics. */
  verbose?: boolean;
}

export function consoleDiagnostics(opts: ConsoleDiagnosticsOptions = {}): DiagnosticSink {
  const verbose = opts.verbose ?? false;
  return (d) => {
    if (d.level === 'warn') {
      console.warn(d.message);
    } else if (verbose) {
      console.debug(d.message);
    }
  };
}

/** Default sink: warnings to stderr, debug output dropped. */
export const defaultDiagnostics: DiagnosticSink = consoleDiagnostics();

/**
 * Sink that keeps every diagnostic in memory and passes it on to `forward`,
 * if given.
 *
 * Used by the CLI to return warnings as part of its JSON output.
 */
export function collectDiagnostics(forward?: DiagnosticSink): {
  sink: DiagnosticSink;
  diagnostics: Diagnostic[];
} {
  const diagnostics: Diagnostic[] = [];
  return {
    sink: (d) => {
      diagnostics.push(d);
      forward?.(d);
    },
    diagnostics,
  };
}
