#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { ConfigError, resolve_config, type CliOptions } from '../config';
import { VERSION } from '../constants';
import { has_shellcheck } from '../linter';
import { message_of } from '../utils/error.util';
import { run_lint } from './run';

const program = new Command();

program
  .name('sbuild-lint')
  .description('A linter for SBUILD package files')
  .version(VERSION)
  .argument('<files...>', 'one or more package files (or directories) to validate')
  .option('-p, --pkgver', 'run x_exec.pkgver and write <file>.pkgver')
  .option('--no-shellcheck', 'skip shellcheck on x_exec.run')
  .option('--parallel [n]', 'run n jobs in parallel (default: 4)')
  .option('-i, --inplace', 'replace the original file on success')
  .option('--success <path>', 'file to append successful package paths to')
  .option('--fail <path>', 'file to append failed package paths to')
  .option('--timeout <seconds>', 'time budget for each pkgver check (default: 30)')
  .action(async (files: string[], opts: CliOptions) => {
    try {
      const config = resolve_config(files, opts);

      if (config.shellcheck && !(await has_shellcheck())) {
        console.error(`[${chalk.redBright.bold('〤')}] shellcheck not found. Please install it or pass --no-shellcheck.`);
        process.exitCode = 1;
        return;
      }

      console.log(`sbuild-lint v${VERSION}`);
      const summary = await run_lint(config);
      if (summary.fail > 0) process.exitCode = 1;
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(err.message);
      } else {
        console.error(`Unexpected error: ${message_of(err)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(message_of(err));
  process.exitCode = 1;
});
