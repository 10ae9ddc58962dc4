import { parse_document } from '../parser';
import type { RawDocument } from '../types';

/**
 * Lines of a descriptor carrying every required field. With the marker on
 * line 1 these occupy lines 2–15; anything appended starts at line 16.
 */
export const REQUIRED_LINES: readonly string[] = [
  '_disabled: false',
  'pkg: "demo"',
  'pkg_id: "github.com.example.demo"',
  'category:',
  '  - "Utility"',
  'description: "A demo package"',
  'homepage:',
  '  - "https://example.com/demo"',
  'src_url:',
  '  - "https://github.com/example/demo"',
  'x_exec:',
  '  shell: "sh"',
  '  pkgver: "echo 1.0.0"',
  '  run: "echo building"',
];

/** Descriptor text: marker line followed by `lines`. */
export function sbuild(...lines: string[]): string {
  return ['#!/SBUILD', ...lines].join('\n') + '\n';
}

/** Swaps the top-level block of `key` (its line and indented lines below) for `block`. */
export function replace_field(lines: readonly string[], key: string, block: string[]): string[] {
  const start = lines.findIndex((l) => l.startsWith(`${key}:`));
  if (start === -1) throw new Error(`no field ${key}`);
  let end = start + 1;
  while (end < lines.length && lines[end].startsWith(' ')) end++;
  return [...lines.slice(0, start), ...block, ...lines.slice(end)];
}

export function parse(source: string): RawDocument {
  const result = parse_document(source);
  if (!result.ok) throw new Error(result.message);
  return result.document;
}
