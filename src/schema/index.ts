import type { Diagnostic, Severity } from '../types';

export * from './sbuild.schema';
export * from './config.schema';

/** Builds a diagnostic record (shared by the store and tests). */
export function diagnostic(
  field: string,
  message: string,
  line: number,
  severity: Severity
): Diagnostic {
  return { field, message, line, severity };
}
