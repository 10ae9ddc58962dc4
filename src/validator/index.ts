export { validate_document } from './document';
export { DiagnosticStore } from './diagnostic_store';
export { check_distro_pkg_duplicates, check_duplicate_values } from './duplicates';
export { DeserializationError, summarize } from './errors';
export { FIELD_VALIDATORS, find_validator } from './registry';
export { is_valid_alpha, is_valid_category, is_valid_pkg_type, is_valid_url } from './predicates';
