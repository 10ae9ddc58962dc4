import type { DeserializationError } from '../validator/errors';
import type { Diagnostic, DiagnosticSink } from './issue.type';
import type { PlainValue, RawDocument, RawValue } from './document.type';

/** Accepted fields in source order. Built once per document, never mutated. */
export type ValidatedConfig = ReadonlyMap<string, PlainValue>;

/** One entry of the field registry. */
export interface ValidatorSpec {
  name: string;
  required: boolean;
  /** Shape check; returns the accepted value or records diagnostics and returns undefined. */
  validate(raw: RawValue, sink: DiagnosticSink, line: number, required: boolean): PlainValue | undefined;
}

/** Receives diagnostics once the walk has decided to report them. */
export interface DiagnosticReporter {
  diagnostic(diagnostic: Diagnostic, source: string): void;
  summary(message: string): void;
}

export interface ValidateInput {
  document: RawDocument;
  reporter?: DiagnosticReporter;
}

/** Result of validate_document() (success and failure branches). */
export interface ValidateOutput {
  /** True when no error-severity diagnostic was found. */
  ok: boolean;
  /** Accepted fields; null on failure. */
  config: ValidatedConfig | null;
  /** Every diagnostic in discovery order, after the per-field merge. */
  diagnostics: Diagnostic[];
  /** Aggregate failure; null on success. */
  error: DeserializationError | null;
}
