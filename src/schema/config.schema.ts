import { z } from 'zod';

/** Resolved driver configuration (CLI flags merged over environment defaults). */
export const LintConfigSchema = z.object({
  /** Descriptor files or directories to lint. */
  files: z.array(z.string().min(1)).min(1, 'at least one file is required'),
  pkgver: z.boolean(),
  shellcheck: z.boolean(),
  inplace: z.boolean(),
  /** Concurrent jobs; absent means sequential with streamed output. */
  parallel: z.number().int('parallel must be an integer').positive('parallel must be at least 1').optional(),
  success_path: z.string().min(1).optional(),
  fail_path: z.string().min(1).optional(),
  /** Per-job budget for the version check, in seconds. */
  timeout_s: z.number().int('timeout must be an integer').positive('timeout must be at least 1'),
});

export type LintConfig = z.infer<typeof LintConfigSchema>;
