import { spawn } from 'node:child_process';

export interface ProcessOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  /** Written to stdin, which is then closed. */
  input?: string;
  signal?: AbortSignal;
}

/** Runs a command to completion and collects its output. Rejects on spawn failure or abort. */
export function run_process(command: string, args: readonly string[], opts: RunProcessOptions = {}): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal: opts.signal });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8').on('data', (chunk: string) => (stdout += chunk));
    child.stderr.setEncoding('utf8').on('data', (chunk: string) => (stderr += chunk));
    child.once('error', reject);
    child.once('close', (code) => resolve({ code, stdout, stderr }));
    // a child that exits before reading its input closes the pipe under us
    child.stdin.on('error', (err: Error) => {
      if ('code' in err && err.code === 'EPIPE') return;
      reject(err);
    });
    child.stdin.end(opts.input ?? '');
  });
}
