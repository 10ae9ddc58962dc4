import { diagnostic } from '../schema';
import type { Diagnostic, DiagnosticSink, Severity } from '../types';

/**
 * Field-keyed diagnostic collection.
 *
 * One entry per field: recording a field again only moves its line, the first
 * message stays. Entries keep the order in which their field first showed up.
 */
export class DiagnosticStore implements DiagnosticSink {
  private readonly entries: Diagnostic[] = [];
  private readonly by_field = new Map<string, Diagnostic>();

  record(field: string, message: string, line: number, severity: Severity): void {
    const existing = this.by_field.get(field);
    if (existing) {
      existing.line = line;
      return;
    }
    const entry = diagnostic(field, message, line, severity);
    this.by_field.set(field, entry);
    this.entries.push(entry);
  }

  has_fatal(): boolean {
    return this.entries.some((d) => d.severity === 'error');
  }

  /** Snapshot in first-occurrence order. */
  list(): Diagnostic[] {
    return this.entries.map((d) => ({ ...d }));
  }

  count(severity: Severity): number {
    return this.entries.filter((d) => d.severity === severity).length;
  }

  get size(): number {
    return this.entries.length;
  }
}
