import { FIELD_SHAPES, type FieldName, type FieldShape } from '../schema';
import type { PlainValue, RawValue, ValidatorSpec } from '../types';
import { to_plain } from '../utils/raw.util';

/**
 * Shape-checking validator for one registry field.
 * Required fields fail with an error, optional ones with a warning.
 */
function field(name: FieldName, required: boolean): ValidatorSpec {
  const { schema, expect }: FieldShape = FIELD_SHAPES[name];
  return {
    name,
    required,
    validate(raw: RawValue, sink, line, is_required): PlainValue | undefined {
      const value = to_plain(raw);
      if (schema.safeParse(value).success) return value;
      sink.record(name, `'${name}' should be ${expect}.`, line, is_required ? 'error' : 'warn');
      return undefined;
    },
  };
}

/** Every field an SBUILD descriptor may carry, in canonical order. */
export const FIELD_VALIDATORS: readonly ValidatorSpec[] = [
  field('_disabled', true),
  field('_disabled_reason', false),
  field('pkg', true),
  field('pkg_id', true),
  field('pkg_type', false),
  field('app_id', false),
  field('pkgver', false),
  field('build_util', false),
  field('build_asset', false),
  field('category', true),
  field('description', true),
  field('distro_pkg', false),
  field('homepage', true),
  field('maintainer', false),
  field('icon', false),
  field('desktop', false),
  field('license', false),
  field('note', false),
  field('provides', false),
  field('repology', false),
  field('src_url', true),
  field('tag', false),
  field('x_exec', true),
];

export function find_validator(
  name: string,
  validators: readonly ValidatorSpec[] = FIELD_VALIDATORS
): ValidatorSpec | undefined {
  return validators.find((v) => v.name === name);
}
