export {
  type CredentialEntry,
  type CredentialQuery,
  type PassFile,
  type PassFileErrorKind,
  type Failure,
  type Result,
  PassFileError,
  makeEntry,
} from './types.js';
export {
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticLevel,
  type DiagnosticSink,
  consoleDiagnostics,
  collectDiagnostics,
  defaultDiagnostics,
} from './diagnostics.js';
export {
  type GateOutcome,
  type PermissionHolder,
  checkPassFile,
  permissionHolder,
} from './permissions.js';
export {
  type ParsedLine,
  type SkipReason,
  parsePassFileLine,
  parsePassFileContent,
  splitFields,
  unescapeField,
} from './parser.js';
export { type ReadOptions, readPassFile, passFileEntries } from './store.js';
export { entryMatches, findPassword } from './matcher.js';
export {
  type OpenOptions,
  PASS_FILE_NAME,
  defaultPassFilePath,
  openPassFile,
  lookupPassword,
} from './passfile.js';
export { DEFAULT_PORT, MAX_PORT, MIN_PORT, isValidPort, parsePort } from './port.js';
