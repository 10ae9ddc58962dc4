import type { Logger } from '../runner/logger';

/** Messages carried by the log channel; `done` terminates the consumer. */
export type LogMessage =
  | { kind: 'info' | 'warn' | 'error' | 'success' | 'custom_error'; message: string }
  | { kind: 'done' };

export type LogKind = Exclude<LogMessage['kind'], 'done'>;

/** Per-file linter switches. */
export interface LintOptions {
  /** Overwrite the source file instead of writing `<file>.validated`. */
  inplace: boolean;
  /** Run the shell script check over `x_exec.run`. */
  shellcheck: boolean;
  /** Run `x_exec.pkgver` and write `<file>.pkgver`. */
  pkgver: boolean;
}

export interface CheckOutcome {
  ok: boolean;
  output: string;
}

/** Tools the linter shells out to; tests swap in fakes. */
export interface ExternalChecks {
  shellcheck(script: string, shell: string, signal: AbortSignal): Promise<CheckOutcome>;
  pkgver(script: string, shell: string, signal: AbortSignal): Promise<string>;
}

export interface JobContext {
  logger: Logger;
  /** Aborted when the job exceeds its time budget. */
  signal: AbortSignal;
}

/** One unit of orchestrated work; resolves true on success. */
export type LintJob = (file: string, ctx: JobContext) => Promise<boolean>;

/** Line-oriented append-only destination for file paths. */
export interface ResultSink {
  append(line: string): Promise<void>;
}

export interface RunSummary {
  success: number;
  fail: number;
  /** Number of distinct input files. */
  total: number;
  elapsed_ms: number;
}
