import type chalk from 'chalk';
import type { DiagnosticReporter } from '../types';
import type { Logger } from '../runner/logger';
import { source_excerpt } from '../utils/source.util';

/** Renders diagnostics into a job's logger, with a source excerpt when the line is known. */
export function create_reporter(logger: Logger, colors: chalk.Chalk): DiagnosticReporter {
  return {
    diagnostic(d, source) {
      const fatal = d.severity === 'error';
      const text = `${colors.bold(d.field)} -> ${fatal ? colors.red(d.message) : colors.yellow(d.message)}`;
      if (fatal) logger.error(text);
      else logger.warn(text);
      if (d.line !== 0) {
        const excerpt = format_excerpt(source, d.line, fatal, colors);
        if (excerpt) logger.custom_error(excerpt);
      }
    },
    summary(message) {
      logger.custom_error(colors.yellow(message));
    },
  };
}

/**
 *    4 | pkg: demo
 *  > 5 | pkg: other
 *    6 | pkg_id: demo
 */
export function format_excerpt(source: string, line: number, fatal: boolean, colors: chalk.Chalk): string {
  const lines = source_excerpt(source, line);
  if (lines.length === 0) return '';
  const width = String(lines[lines.length - 1].line).length;
  const mark = fatal ? colors.red : colors.yellow;
  return lines
    .map((l) => {
      const body = `${String(l.line).padStart(width)} | ${l.text}`;
      return l.focus ? mark(`  > ${body}`) : `    ${body}`;
    })
    .join('\n');
}
