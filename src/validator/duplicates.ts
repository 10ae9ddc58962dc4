import type { DiagnosticSink, DistroPkg } from '../types';

/** Reports every repeat of an already-seen element. */
export function check_duplicate_values(
  list: readonly string[],
  field_path: string,
  line: number,
  sink: DiagnosticSink
): void {
  const seen = new Set<string>();
  for (const item of list) {
    if (seen.has(item)) {
      sink.record(field_path, `Duplicate value '${item}' found in ${field_path}`, line, 'error');
      continue;
    }
    seen.add(item);
  }
}

/**
 * Structural duplicate check over the package-override tree.
 *
 * Paths are dotted (`distro_pkg.fedora.rawhide`); a path seen twice in the
 * same traversal is reported once per repeat and its subtree is skipped.
 */
export function check_distro_pkg_duplicates(
  node: DistroPkg,
  field_path: string,
  line: number,
  sink: DiagnosticSink,
  visited: Set<string> = new Set()
): void {
  if (node.kind === 'list') {
    check_duplicate_values(node.items, field_path, line, sink);
    return;
  }

  for (const [key, child] of node.entries) {
    const path = field_path ? `${field_path}.${key}` : key;

    if (visited.has(path)) {
      sink.record(path, `'${path}' field is duplicated`, line, 'error');
      continue;
    }
    visited.add(path);

    if (child.kind === 'node') {
      check_distro_pkg_duplicates(child, path, line, sink, visited);
    } else {
      check_duplicate_values(child.items, path, line, sink);
    }
  }
}
