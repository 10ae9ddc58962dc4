/** Scalar leaf as produced by the YAML parser. */
export type ScalarValue = string | number | boolean | null;

/**
 * Untyped value of a raw descriptor.
 * Mappings keep every entry in source order, repeated keys included.
 */
export type RawValue =
  | { kind: 'scalar'; value: ScalarValue }
  | { kind: 'seq'; items: RawValue[] }
  | { kind: 'map'; entries: RawEntry[] };

export type RawEntry = [key: string, value: RawValue];

/** A parsed descriptor together with the text it came from. */
export interface RawDocument {
  /** Top-level entries in source order. */
  entries: RawEntry[];
  /** Original text, used for key line lookup and excerpts. */
  source: string;
}

/** JSON-like projection of a RawValue (later keys replace earlier ones). */
export type PlainValue = ScalarValue | PlainValue[] | { [key: string]: PlainValue };

/** Nested per-distribution package overrides (distro → release → packages). */
export type DistroPkg =
  | { kind: 'list'; items: string[] }
  | { kind: 'node'; entries: Array<[key: string, child: DistroPkg]> };
