import type { DistroPkg, PlainValue, RawValue } from '../types';

/** Drops entry order and duplicates: for repeated keys the last one wins. */
export function to_plain(raw: RawValue): PlainValue {
  switch (raw.kind) {
    case 'scalar':
      return raw.value;
    case 'seq':
      return raw.items.map(to_plain);
    case 'map': {
      const out: { [key: string]: PlainValue } = {};
      for (const [key, value] of raw.entries) {
        // own data property even for `__proto__`
        Object.defineProperty(out, key, {
          value: to_plain(value),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}

/**
 * Reads the package-override tree straight from the raw value so that repeated
 * keys survive. Returns null when the value is not a mapping/list of strings.
 */
export function to_distro_pkg(raw: RawValue): DistroPkg | null {
  if (raw.kind === 'seq') {
    const items: string[] = [];
    for (const item of raw.items) {
      if (item.kind !== 'scalar' || typeof item.value !== 'string') return null;
      items.push(item.value);
    }
    return { kind: 'list', items };
  }
  if (raw.kind === 'map') {
    const entries: Array<[string, DistroPkg]> = [];
    for (const [key, value] of raw.entries) {
      const child = to_distro_pkg(value);
      if (!child) return null;
      entries.push([key, child]);
    }
    return { kind: 'node', entries };
  }
  return null;
}
