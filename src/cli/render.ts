import type chalk from 'chalk';
import type { LogMessage, RunSummary } from '../types';

export interface RenderedLine {
  stream: 'out' | 'err';
  text: string;
}

/** Console form of one log message: glyph prefix and target stream. */
export function render_log_message(
  message: Exclude<LogMessage, { kind: 'done' }>,
  colors: chalk.Chalk
): RenderedLine {
  switch (message.kind) {
    case 'info':
      return { stream: 'out', text: message.message };
    case 'success':
      return { stream: 'out', text: `[${colors.greenBright.bold('✔')}] ${message.message}` };
    case 'error':
      return { stream: 'err', text: `[${colors.redBright.bold('〤')}] ${message.message}` };
    case 'warn':
      return { stream: 'err', text: `[${colors.yellowBright.bold('⚠️')}] ${message.message}` };
    case 'custom_error':
      return { stream: 'err', text: message.message };
  }
}

export function render_summary(summary: RunSummary, colors: chalk.Chalk): string[] {
  const plus = `[${colors.blueBright.bold('+')}]`;
  return [
    '',
    `${plus} ${summary.success} files validated successfully`,
    `${plus} ${summary.fail} files failed to pass validation`,
    `${plus} Evaluated ${summary.success + summary.fail}/${summary.total} file(s) in ${format_elapsed(summary.elapsed_ms)}`,
  ];
}

export function format_elapsed(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

export function write_line(line: RenderedLine): void {
  if (line.stream === 'out') console.log(line.text);
  else console.error(line.text);
}
