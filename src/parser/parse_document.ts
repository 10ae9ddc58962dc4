import { isAlias, isMap, isScalar, isSeq, parseDocument, type Document, type Node } from 'yaml';
import type { RawDocument, RawEntry, RawValue, ScalarValue } from '../types';

export type ParseResult =
  | { ok: true; document: RawDocument }
  | { ok: false; message: string; line: number };

/**
 * YAML text → RawDocument.
 * Duplicate keys are allowed through (every entry is kept) so that the
 * validator can report them with their own line.
 */
export function parse_document(source: string): ParseResult {
  const doc = parseDocument(source, { uniqueKeys: false });

  const [first] = doc.errors;
  if (first) {
    const line = first.linePos?.[0]?.line ?? 0;
    return { ok: false, message: first.message.split('\n')[0], line };
  }

  const root = doc.contents;
  if (!isMap(root)) {
    return { ok: false, message: 'expected a mapping at the document root', line: 0 };
  }

  return { ok: true, document: { entries: map_entries(root.items, doc), source } };
}

function map_entries(items: ReadonlyArray<{ key: unknown; value: unknown }>, doc: Document): RawEntry[] {
  return items.map((pair) => [key_text(pair.key), to_raw(pair.value, doc)]);
}

function key_text(key: unknown): string {
  if (isScalar(key)) return String(key.value);
  if (key === null || key === undefined) return '';
  return String(key);
}

function to_raw(node: unknown, doc: Document): RawValue {
  if (isAlias(node)) {
    const target: Node | undefined = node.resolve(doc);
    return target ? to_raw(target, doc) : { kind: 'scalar', value: null };
  }
  if (isMap(node)) return { kind: 'map', entries: map_entries(node.items, doc) };
  if (isSeq(node)) return { kind: 'seq', items: node.items.map((item) => to_raw(item, doc)) };
  if (isScalar(node)) return { kind: 'scalar', value: scalar(node.value) };
  return { kind: 'scalar', value: null };
}

function scalar(value: unknown): ScalarValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}
