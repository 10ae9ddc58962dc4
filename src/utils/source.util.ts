/**
 * Textual key lookup over the original descriptor.
 *
 * Returns the 1-based line of the `occurrence`-th (0-based) top-level
 * `key:` line, or 0 when there is no such line.
 */
export function get_line_number_for_key(source: string, key: string, occurrence = 0): number {
  const lines = source.split(/\r?\n/);
  let seen = 0;
  for (let i = 0; i < lines.length; i++) {
    if (!is_key_line(lines[i], key)) continue;
    if (seen === occurrence) return i + 1;
    seen++;
  }
  return 0;
}

function is_key_line(line: string, key: string): boolean {
  for (const form of [key, `"${key}"`, `'${key}'`]) {
    if (line.startsWith(form)) {
      return /^\s*:/.test(line.slice(form.length));
    }
  }
  return false;
}

export interface ExcerptLine {
  /** 1-based line number. */
  line: number;
  text: string;
  /** True for the line the diagnostic points at. */
  focus: boolean;
}

/** `context` lines either side of `line`, clipped to the document. */
export function source_excerpt(source: string, line: number, context = 1): ExcerptLine[] {
  const lines = source.split(/\r?\n/);
  if (line < 1 || line > lines.length) return [];
  const from = Math.max(1, line - context);
  const to = Math.min(lines.length, line + context);
  const out: ExcerptLine[] = [];
  for (let n = from; n <= to; n++) {
    out.push({ line: n, text: lines[n - 1], focus: n === line });
  }
  return out;
}
