import { describe, it, expect } from 'vitest';

import { DiagnosticStore } from './diagnostic_store';

describe('DiagnosticStore', () => {
  it('should keep one entry per field and only refresh its line', () => {
    const store = new DiagnosticStore();
    store.record('pkg', 'first', 3, 'error');
    store.record('pkg', 'second', 9, 'warn');

    expect(store.list()).toEqual([{ field: 'pkg', message: 'first', line: 9, severity: 'error' }]);
    expect(store.size).toBe(1);
  });

  it('should list fields in first-occurrence order', () => {
    const store = new DiagnosticStore();
    store.record('b', 'b', 1, 'warn');
    store.record('a', 'a', 2, 'error');
    store.record('b', 'b', 3, 'warn');

    expect(store.list().map((d) => d.field)).toEqual(['b', 'a']);
  });

  it('should only be fatal with an error entry', () => {
    const store = new DiagnosticStore();
    store.record('x', 'x', 1, 'warn');
    expect(store.has_fatal()).toBe(false);

    store.record('y', 'y', 2, 'error');
    expect(store.has_fatal()).toBe(true);
    expect(store.count('warn')).toBe(1);
    expect(store.count('error')).toBe(1);
  });

  it('should hand out copies', () => {
    const store = new DiagnosticStore();
    store.record('pkg', 'msg', 1, 'error');
    store.list()[0].line = 42;

    expect(store.list()[0].line).toBe(1);
  });
});
