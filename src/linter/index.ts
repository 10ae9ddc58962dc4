export { Linter, render_config } from './linter';
export { default_checks, has_shellcheck } from './checks';
export { create_reporter, format_excerpt } from './reporter';
export { CheckError } from './errors';
