import { VALID_PKG_TYPES } from '../constants';
import type {
  DiagnosticReporter,
  DiagnosticSink,
  PlainValue,
  RawValue,
  ValidateInput,
  ValidateOutput,
  ValidatorSpec,
} from '../types';
import { to_distro_pkg } from '../utils/raw.util';
import { get_line_number_for_key } from '../utils/source.util';
import { DiagnosticStore } from './diagnostic_store';
import { check_distro_pkg_duplicates } from './duplicates';
import { DeserializationError } from './errors';
import { is_valid_alpha, is_valid_category, is_valid_pkg_type, is_valid_url } from './predicates';
import { FIELD_VALIDATORS, find_validator } from './registry';

const SILENT: DiagnosticReporter = {
  diagnostic() {},
  summary() {},
};

/**
 * validate_document()
 *
 * Walks the top-level entries in source order, validating each known field
 * once. Every problem lands in a per-call DiagnosticStore; nothing is thrown.
 * The pass/fail decision is taken from the full diagnostic set at the end:
 *  - any error  → report everything, fail with a DeserializationError;
 *  - only warns → report everything plus a summary, succeed;
 *  - clean      → succeed silently.
 */
export function validate_document(
  input: ValidateInput,
  validators: readonly ValidatorSpec[] = FIELD_VALIDATORS
): ValidateOutput {
  const { document, reporter = SILENT } = input;
  const store = new DiagnosticStore();
  const visited = new Set<string>();
  const occurrences = new Map<string, number>();
  const values = new Map<string, PlainValue>();

  for (const [key, raw] of document.entries) {
    const occurrence = occurrences.get(key) ?? 0;
    occurrences.set(key, occurrence + 1);
    const line = get_line_number_for_key(document.source, key, occurrence);

    if (visited.has(key)) {
      store.record(key, `'${key}' field is duplicated`, line, 'error');
      continue;
    }

    const validator = find_validator(key, validators);
    if (!validator) {
      store.record(key, `'${key}' is not a valid field.`, line, 'warn');
      continue;
    }

    const value = validator.validate(raw, store, line, validator.required);
    if (value !== undefined) {
      check_semantics(key, value, raw, line, store);
      values.set(key, value);
    }
    visited.add(key);
  }

  for (const validator of validators) {
    if (validator.required && !visited.has(validator.name)) {
      store.record(validator.name, `Missing required field: ${validator.name}`, 0, 'error');
    }
  }

  const diagnostics = store.list();
  const errors = store.count('error');
  const warnings = store.count('warn');

  if (errors > 0) {
    for (const d of diagnostics) reporter.diagnostic(d, document.source);
    return { ok: false, config: null, diagnostics, error: new DeserializationError(store.size, warnings) };
  }

  if (warnings > 0) {
    for (const d of diagnostics) reporter.diagnostic(d, document.source);
    reporter.summary(`${warnings} warning(s) found during deserialization`);
  }

  return { ok: true, config: new Map(values), diagnostics, error: null };
}

/** Field-specific rules that only run once the shape check has passed. */
function check_semantics(
  key: string,
  value: PlainValue,
  raw: RawValue,
  line: number,
  sink: DiagnosticSink
): void {
  switch (key) {
    case 'distro_pkg': {
      const tree = to_distro_pkg(raw);
      // rooted at the field name so nested paths read distro_pkg.<distro>...
      if (tree) check_distro_pkg_duplicates(tree, 'distro_pkg', line, sink);
      break;
    }
    case 'pkg':
    case 'pkg_id':
    case 'app_id': {
      if (typeof value === 'string' && !is_valid_alpha(value)) {
        sink.record(
          key,
          `Invalid '${key}': '${value}'. Value should only contain alphanumeric, +, -, _, .`,
          line,
          'error'
        );
      }
      break;
    }
    case 'category': {
      for (const item of strings(value)) {
        if (!is_valid_category(item)) {
          sink.record(key, `Invalid '${key}': '${item}' is not a valid category.`, line, 'error');
        }
      }
      break;
    }
    case 'pkg_type': {
      if (typeof value === 'string' && !is_valid_pkg_type(value)) {
        const valid = VALID_PKG_TYPES.map((t) => `"${t}"`).join(', ');
        sink.record(key, `Invalid '${key}': '${value}'. Valid values are: [${valid}]`, line, 'error');
      }
      break;
    }
    case 'homepage':
    case 'src_url': {
      for (const item of strings(value)) {
        if (!is_valid_url(item)) {
          sink.record(key, `Invalid '${key}': '${item}' is not a valid URL.`, line, 'error');
        }
      }
      break;
    }
  }
}

function strings(value: PlainValue): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
