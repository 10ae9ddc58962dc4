import { LintConfigSchema, type LintConfig } from './schema';

/** Parallel jobs when `--parallel` is given without a count. */
export const DEFAULT_PARALLEL = 4;

export const DEFAULT_TIMEOUT_S = 30;

/** Raw commander options. */
export interface CliOptions {
  pkgver?: boolean;
  shellcheck?: boolean;
  /** `true` when the flag is given without a value. */
  parallel?: string | boolean;
  inplace?: boolean;
  success?: string;
  fail?: string;
  timeout?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Merges CLI options over environment defaults and validates the result.
 *
 * Priority (highest to lowest):
 * 1. CLI flags
 * 2. SBUILD_LINT_PARALLEL / SBUILD_LINT_TIMEOUT
 * 3. built-in defaults
 */
export function resolve_config(
  files: string[],
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): LintConfig {
  const result = LintConfigSchema.safeParse({
    files,
    pkgver: opts.pkgver ?? false,
    shellcheck: opts.shellcheck ?? true,
    inplace: opts.inplace ?? false,
    parallel: resolve_parallel(opts.parallel, env.SBUILD_LINT_PARALLEL),
    success_path: opts.success,
    fail_path: opts.fail,
    timeout_s: to_number(opts.timeout) ?? to_number(env.SBUILD_LINT_TIMEOUT) ?? DEFAULT_TIMEOUT_S,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}

function resolve_parallel(flag: string | boolean | undefined, env_value: string | undefined): number | undefined {
  if (flag === true) return DEFAULT_PARALLEL;
  if (typeof flag === 'string') return to_number(flag);
  return to_number(env_value);
}

/** Blank → undefined; anything else goes through Number() and is left to the schema. */
function to_number(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}
