import type { LintJob, ResultSink, RunSummary } from '../types';
import { message_of } from '../utils/error.util';
import type { LogManager, Logger } from './logger';
import { Semaphore } from './semaphore';

export interface RunOptions {
  files: readonly string[];
  job: LintJob;
  log: LogManager;
  /** Jobs allowed to run at once (default 1). */
  parallelism?: number;
  /** Budget per job; an expired job is aborted and counted as failed. */
  timeout_ms?: number;
  success_store?: ResultSink;
  fail_store?: ResultSink;
}

/**
 * Runs `job` once per distinct file under a counting semaphore and tallies
 * the outcomes. One job failing (false, throw or timeout) never affects the
 * others, and nothing is retried.
 */
export async function run_all(opts: RunOptions): Promise<RunSummary> {
  const { files, job, log, parallelism = 1, timeout_ms, success_store, fail_store } = opts;
  const started = Date.now();
  const unique = [...new Set(files)];
  const semaphore = new Semaphore(parallelism);
  const tally = { success: 0, fail: 0 };

  await Promise.all(
    unique.map((file) =>
      semaphore.run(async () => {
        const logger = log.create_logger();
        const ok = await run_job(job, file, logger, timeout_ms);
        if (ok) tally.success++;
        else tally.fail++;

        const store = ok ? success_store : fail_store;
        if (store) {
          try {
            await store.append(file);
          } catch (err) {
            logger.error(`Could not record ${file}: ${message_of(err)}`);
          }
        }
      })
    )
  );

  return { ...tally, total: unique.length, elapsed_ms: Date.now() - started };
}

async function run_job(job: LintJob, file: string, logger: Logger, timeout_ms?: number): Promise<boolean> {
  const controller = new AbortController();
  const attempt = job(file, { logger, signal: controller.signal }).catch((err: unknown) => {
    logger.error(`${file}: ${message_of(err)}`);
    return false;
  });
  if (timeout_ms === undefined) return attempt;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new Error(`timed out after ${timeout_ms}ms`));
      logger.error(`${file}: timed out after ${format_ms(timeout_ms)}`);
      resolve(false);
    }, timeout_ms);
  });

  try {
    return await Promise.race([attempt, expired]);
  } finally {
    clearTimeout(timer);
  }
}

function format_ms(ms: number): string {
  return ms % 1000 === 0 ? `${ms / 1000}s` : `${ms}ms`;
}
