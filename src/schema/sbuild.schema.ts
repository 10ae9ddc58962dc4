import { z } from 'zod';

/**
 * Shape schemas for SBUILD descriptor fields.
 * Only structure is checked here; charset, vocabulary and URL rules run after.
 */

const NonEmptyString = z.string().min(1);

const StringList = z.array(z.string()).min(1);

const StringMap = z.record(z.string(), z.string());

/** Free text, or text keyed by flavour (e.g. { default: ..., nightly: ... }). */
const TextOrMap = z.union([NonEmptyString, StringMap]);

/** Icon / desktop file: a bare URL, or an object pointing at a URL or a local file. */
const Resource = z.union([
  NonEmptyString,
  z
    .object({
      url: z.string().optional(),
      file: z.string().optional(),
    })
    .strict(),
]);

const BuildAsset = z
  .object({
    /** Where to fetch the asset from. */
    url: NonEmptyString,
    /** File name inside the build directory. */
    out: NonEmptyString,
  })
  .strict();

const License = z.union([
  NonEmptyString,
  z
    .object({
      /** SPDX identifier. */
      id: NonEmptyString,
      file: z.string().optional(),
      url: z.string().optional(),
    })
    .strict(),
]);

export type DistroPkgShape = string[] | { [key: string]: DistroPkgShape };

/** distro → (release →)* package list, any depth. */
export const DistroPkgSchema: z.ZodType<DistroPkgShape> = z.lazy(() =>
  z.union([z.array(z.string()), z.record(z.string(), DistroPkgSchema)]),
);

export const XExecSchema = z
  .object({
    /** Interpreter used for both scripts (e.g. "sh", "bash"). */
    shell: NonEmptyString,
    /** Prints the upstream version on stdout. */
    pkgver: z.string().optional(),
    /** Build script. */
    run: NonEmptyString,
  })
  .strict();

export type XExec = z.infer<typeof XExecSchema>;

export interface FieldShape {
  schema: z.ZodTypeAny;
  /** Completes "'<field>' should be ..." in shape diagnostics. */
  expect: string;
}

export const FIELD_SHAPES = {
  _disabled: { schema: z.boolean(), expect: 'a boolean' },
  _disabled_reason: { schema: TextOrMap, expect: 'a non-empty string or a mapping of strings' },
  pkg: { schema: NonEmptyString, expect: 'a non-empty string' },
  pkg_id: { schema: NonEmptyString, expect: 'a non-empty string' },
  pkg_type: { schema: NonEmptyString, expect: 'a non-empty string' },
  app_id: { schema: NonEmptyString, expect: 'a non-empty string' },
  pkgver: { schema: NonEmptyString, expect: 'a non-empty string' },
  build_util: { schema: StringList, expect: 'a non-empty list of strings' },
  build_asset: { schema: z.array(BuildAsset).min(1), expect: 'a non-empty list of { url, out } entries' },
  category: { schema: StringList, expect: 'a non-empty list of strings' },
  description: { schema: TextOrMap, expect: 'a non-empty string or a mapping of strings' },
  distro_pkg: { schema: DistroPkgSchema, expect: 'a mapping whose leaves are lists of strings' },
  homepage: { schema: StringList, expect: 'a non-empty list of strings' },
  maintainer: { schema: StringList, expect: 'a non-empty list of strings' },
  icon: { schema: Resource, expect: 'a string or a { url, file } mapping' },
  desktop: { schema: Resource, expect: 'a string or a { url, file } mapping' },
  license: { schema: z.array(License).min(1), expect: 'a non-empty list of licenses' },
  note: { schema: StringList, expect: 'a non-empty list of strings' },
  provides: { schema: StringList, expect: 'a non-empty list of strings' },
  repology: { schema: StringList, expect: 'a non-empty list of strings' },
  src_url: { schema: StringList, expect: 'a non-empty list of strings' },
  tag: { schema: StringList, expect: 'a non-empty list of strings' },
  x_exec: { schema: XExecSchema, expect: 'a mapping with shell, run and optional pkgver' },
} satisfies Record<string, FieldShape>;

export type FieldName = keyof typeof FIELD_SHAPES;
