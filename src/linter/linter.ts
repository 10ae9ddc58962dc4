import chalk from 'chalk';
import { readFile, writeFile } from 'node:fs/promises';
import { stringify } from 'yaml';
import { SBUILD_MARKER } from '../constants';
import { parse_document } from '../parser';
import { XExecSchema } from '../schema';
import type { Logger } from '../runner/logger';
import { message_of } from '../utils/error.util';
import type { ExternalChecks, LintOptions, ValidatedConfig } from '../types';
import { validate_document } from '../validator';
import { default_checks } from './checks';
import { CheckError } from './errors';
import { create_reporter } from './reporter';

/**
 * Lints one descriptor end to end:
 * read → marker check → parse → validate → shell check → version check → write.
 *
 * Every failure is logged and turns into a null result; only a validated
 * configuration comes back.
 */
export class Linter {
  constructor(
    private readonly logger: Logger,
    private readonly options: LintOptions,
    private readonly checks: ExternalChecks = default_checks,
    private readonly colors: chalk.Chalk = chalk
  ) {}

  async lint(file: string, signal: AbortSignal = new AbortController().signal): Promise<ValidatedConfig | null> {
    const { logger } = this;
    logger.info(`Linting ${this.colors.bold(file)}`);

    let source: string;
    try {
      source = await readFile(file, 'utf8');
    } catch (err) {
      logger.error(`Failed to read ${file}: ${message_of(err)}`);
      return null;
    }

    if (!source.trimStart().startsWith(SBUILD_MARKER)) {
      logger.error(`${file}: file must start with '${SBUILD_MARKER}'`);
      return null;
    }

    const parsed = parse_document(source);
    if (!parsed.ok) {
      const at = parsed.line > 0 ? ` at line ${parsed.line}` : '';
      logger.error(`${file}: invalid YAML${at}: ${parsed.message}`);
      return null;
    }

    const result = validate_document({
      document: parsed.document,
      reporter: create_reporter(logger, this.colors),
    });
    if (!result.ok || !result.config) {
      logger.error(`${file}: ${result.error?.message ?? 'validation failed'}`);
      return null;
    }
    const config = result.config;

    // x_exec is required, so it is present once validation passed
    const exec = XExecSchema.safeParse(config.get('x_exec'));
    if (!exec.success) {
      logger.error(`${file}: 'x_exec' is missing or malformed`);
      return null;
    }

    try {
      if (this.options.shellcheck) {
        const outcome = await this.checks.shellcheck(exec.data.run, exec.data.shell, signal);
        if (!outcome.ok) {
          throw new CheckError('shellcheck reported issues in x_exec.run', outcome.output);
        }
      }

      if (this.options.pkgver) {
        if (!exec.data.pkgver) {
          throw new CheckError("pkgver mode needs an 'x_exec.pkgver' script");
        }
        const version = (await this.checks.pkgver(exec.data.pkgver, exec.data.shell, signal)).trim();
        if (!version) {
          throw new CheckError('pkgver script printed nothing');
        }
        await writeFile(`${file}.pkgver`, `${version}\n`, 'utf8');
        logger.info(`${file}: pkgver ${version}`);
      }

      const target = this.options.inplace ? file : `${file}.validated`;
      await writeFile(target, render_config(config), 'utf8');
    } catch (err) {
      logger.error(`${file}: ${message_of(err)}`);
      if (err instanceof CheckError && err.output) logger.custom_error(err.output);
      return null;
    }

    logger.success(`${file}: SBUILD validation successful`);
    return config;
  }
}

/** Marker line followed by the accepted fields, in source order. */
export function render_config(config: ValidatedConfig): string {
  return `${SBUILD_MARKER}\n${stringify(Object.fromEntries(config))}`;
}
