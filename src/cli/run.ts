import chalk from 'chalk';
import { glob } from 'glob';
import { stat } from 'node:fs/promises';
import { Linter, default_checks } from '../linter';
import { LogChannel, LogManager, consume_logs, open_result_sink, run_all } from '../runner';
import type { LintConfig } from '../schema';
import type { ExternalChecks, RunSummary } from '../types';
import { render_log_message, render_summary, write_line, type RenderedLine } from './render';

const DESCRIPTOR_GLOB = '**/*.{SBUILD,yaml,yml}';

export interface RunDeps {
  checks?: ExternalChecks;
  colors?: chalk.Chalk;
  write?: (line: RenderedLine) => void;
}

/**
 * Lints every input under the configured parallelism and prints the tallies.
 *
 * The log consumer starts before the first job and is awaited after the
 * `done` sentinel, so all job output is flushed before the summary.
 */
export async function run_lint(config: LintConfig, deps: RunDeps = {}): Promise<RunSummary> {
  const { checks = default_checks, colors = chalk, write = write_line } = deps;

  const files = await expand_inputs(config.files);
  const success_store = config.success_path ? await open_result_sink(config.success_path) : undefined;
  const fail_store = config.fail_path ? await open_result_sink(config.fail_path) : undefined;

  const channel = new LogChannel();
  const log = new LogManager(channel);
  const show_log = config.parallel === undefined;
  const consumer = consume_logs(channel, (message) => write(render_log_message(message, colors)), show_log);

  const options = { inplace: config.inplace, shellcheck: config.shellcheck, pkgver: config.pkgver };
  let summary: RunSummary;
  try {
    summary = await run_all({
      files,
      log,
      parallelism: config.parallel ?? 1,
      timeout_ms: config.pkgver ? config.timeout_s * 1000 : undefined,
      success_store,
      fail_store,
      job: async (file, { logger, signal }) => {
        const linter = new Linter(logger, options, checks, colors);
        return (await linter.lint(file, signal)) !== null;
      },
    });
  } finally {
    log.done();
    await consumer;
  }

  for (const text of render_summary(summary, colors)) {
    write({ stream: 'out', text });
  }
  return summary;
}

/**
 * Files are kept as given; directories expand to the descriptors beneath
 * them. Paths that do not exist are kept so that the linter reports them.
 */
export async function expand_inputs(paths: readonly string[]): Promise<string[]> {
  const out: string[] = [];
  for (const p of paths) {
    const info = await stat(p).catch(() => null);
    if (info?.isDirectory()) {
      const found = await glob(DESCRIPTOR_GLOB, {
        cwd: p,
        absolute: true,
        nodir: true,
        ignore: ['**/node_modules/**'],
      });
      out.push(...found.sort());
    } else {
      out.push(p);
    }
  }
  return [...new Set(out)];
}
