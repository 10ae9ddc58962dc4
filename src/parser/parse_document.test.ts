import { describe, it, expect } from 'vitest';

import { parse_document } from './parse_document';
import { to_distro_pkg, to_plain } from '../utils/raw.util';

describe('parse_document', () => {
  it('should keep repeated top-level keys in source order', () => {
    const result = parse_document('pkg: a\nname: b\npkg: c\n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.entries).toEqual([
      ['pkg', { kind: 'scalar', value: 'a' }],
      ['name', { kind: 'scalar', value: 'b' }],
      ['pkg', { kind: 'scalar', value: 'c' }],
    ]);
  });

  it('should keep repeated nested keys', () => {
    const result = parse_document('distro_pkg:\n  arch:\n    - a\n  arch:\n    - b\n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [[, raw]] = result.document.entries;
    expect(to_distro_pkg(raw)).toEqual({
      kind: 'node',
      entries: [
        ['arch', { kind: 'list', items: ['a'] }],
        ['arch', { kind: 'list', items: ['b'] }],
      ],
    });
    expect(to_plain(raw)).toEqual({ arch: ['b'] });
  });

  it('should treat the marker line as a comment', () => {
    const source = '#!/SBUILD\npkg: demo\n';
    const result = parse_document(source);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.source).toBe(source);
    expect(result.document.entries).toHaveLength(1);
  });

  it('should resolve aliases', () => {
    const result = parse_document('a: &x 1\nb: *x\n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.entries[1]).toEqual(['b', { kind: 'scalar', value: 1 }]);
  });

  it('should fail on malformed YAML', () => {
    const result = parse_document('pkg: "unterminated\n');
    expect(result.ok).toBe(false);
  });

  it('should require a mapping at the root', () => {
    const result = parse_document('- a\n- b\n');
    expect(result).toEqual({ ok: false, message: 'expected a mapping at the document root', line: 0 });
  });
});

describe('to_distro_pkg', () => {
  it('should return null for non-string leaves', () => {
    expect(to_distro_pkg({ kind: 'seq', items: [{ kind: 'scalar', value: 1 }] })).toBeNull();
    expect(to_distro_pkg({ kind: 'scalar', value: 'x' })).toBeNull();
  });
});
