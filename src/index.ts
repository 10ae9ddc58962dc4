export { parse_document } from './parser';
export {
  validate_document,
  DiagnosticStore,
  DeserializationError,
  FIELD_VALIDATORS,
  find_validator,
  check_distro_pkg_duplicates,
  check_duplicate_values,
} from './validator';
export { Linter, render_config, CheckError } from './linter';
export { run_all, Semaphore, LogChannel, LogManager, Logger, consume_logs } from './runner';
export { resolve_config, ConfigError } from './config';
export { run_lint } from './cli/run';
export type * from './types';
export type { LintConfig } from './schema';
