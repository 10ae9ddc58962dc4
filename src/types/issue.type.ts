/** Diagnostic severity: `error` blocks acceptance, `warn` is reported only. */
export type Severity = 'error' | 'warn';

/** A field-keyed problem found while validating one descriptor. */
export interface Diagnostic {
  /** Field name or dotted path (e.g. "pkg", "distro_pkg.debian"). */
  field: string;
  /** Human-readable message. */
  message: string;
  /** 1-based source line of the field's key; 0 when the location is unknown. */
  line: number;
  severity: Severity;
}

/** Write side of a diagnostic collection, handed to field validators. */
export interface DiagnosticSink {
  record(field: string, message: string, line: number, severity: Severity): void;
}
