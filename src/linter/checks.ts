import { basename } from 'node:path';
import type { CheckOutcome, ExternalChecks } from '../types';
import { run_process } from '../utils/process.util';
import { CheckError } from './errors';

/** Dialects shellcheck accepts for --shell. */
const SHELLCHECK_DIALECTS = new Set(['sh', 'bash', 'dash', 'ksh', 'busybox']);

async function shellcheck(script: string, shell: string, signal: AbortSignal): Promise<CheckOutcome> {
  const dialect = basename(shell);
  const args = SHELLCHECK_DIALECTS.has(dialect) ? [`--shell=${dialect}`, '-'] : ['-'];
  const { code, stdout, stderr } = await run_process('shellcheck', args, { input: script, signal });
  return { ok: code === 0, output: (stdout || stderr).trimEnd() };
}

async function pkgver(script: string, shell: string, signal: AbortSignal): Promise<string> {
  const { code, stdout, stderr } = await run_process(shell, ['-c', script], { signal });
  if (code !== 0) {
    throw new CheckError(`pkgver script exited with code ${code}`, stderr.trimEnd());
  }
  return stdout;
}

export const default_checks: ExternalChecks = { shellcheck, pkgver };

/** True when a shellcheck binary can be started. */
export async function has_shellcheck(): Promise<boolean> {
  try {
    const { code } = await run_process('shellcheck', ['--version']);
    return code === 0;
  } catch {
    return false;
  }
}
