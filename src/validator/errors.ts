/** Aggregate failure of one document validation. */
export class DeserializationError extends Error {
  /** Every recorded diagnostic, warnings included. */
  readonly errors: number;
  readonly warnings: number;

  constructor(errors: number, warnings: number) {
    super(summarize(errors, warnings));
    this.name = 'DeserializationError';
    this.errors = errors;
    this.warnings = warnings;
  }
}

/** "3 error(s) & 1 warning(s) found during deserialization." */
export function summarize(errors: number, warnings: number): string {
  const tail = warnings > 0 ? ` & ${warnings} warning(s)` : '';
  return `${errors} error(s)${tail} found during deserialization.`;
}
