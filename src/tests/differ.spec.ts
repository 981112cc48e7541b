import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { branchSummary, diff, fieldDiff, humanReadable, similarity } from '../services/differ';
import { sectioned } from './ledgerFixture';

const before = sectioned({ a: 'hello', b: 'bye' });
const after = sectioned({ a: 'hello world', c: 'new' }, { variables: { x: '1' } });

describe('section diff', () => {
  it('reports modified and removed sections in old order, then added, then variables', () => {
    const result = diff(before, after);
    expect(result.changes).toEqual([
      { sectionId: 'a', type: 'modified', before: 'hello', after: 'hello world', similarity: 0.63 },
      { sectionId: 'b', type: 'removed', content: 'bye' },
      { sectionId: 'c', type: 'added', content: 'new' },
      { sectionId: '_variables', type: 'modified', before: {}, after: { x: '1' } },
    ]);
    expect(result.summary).toBe('1 section(s) added, 1 section(s) removed, 2 section(s) modified');
  });

  it('reports no changes for identical content', () => {
    expect(diff(before, structuredClone(before))).toEqual({ changes: [], summary: 'No changes' });
  });

  it('scores similarity between 0 and 1', () => {
    expect(similarity('', '')).toBe(1);
    expect(similarity('abc', 'xyz')).toBe(0);
    expect(similarity('abc', 'abc')).toBe(1);
  });

  it('renders a text report', () => {
    const lines = humanReadable(diff(before, after)).split('\n');
    expect(lines.slice(0, 7)).toEqual([
      'Summary: 1 section(s) added, 1 section(s) removed, 2 section(s) modified',
      '',
      '~ [a] Modified (similarity: 0.63)',
      '  Before: hello...',
      '  After:  hello world...',
      '- [b] Removed: bye...',
      '+ [c] Added: new...',
    ]);
    expect(lines[8]).toBe('  Before: {}...');
  });
});

describe('field diff', () => {
  it('lists removed, added, then modified keys with serialized lengths', () => {
    const result = fieldDiff({ a: 1, b: 'x', c: [1] }, { a: 1, b: 'xyz', d: true }, 1, 2);
    expect(result.changes).toEqual([
      { field: 'c', action: 'removed' },
      { field: 'd', action: 'added' },
      { field: 'b', action: 'modified', fromLength: 3, toLength: 5 },
    ]);
    expect(result.summary).toEqual({ added: 1, removed: 1, modified: 1, unchanged: 1, contentChangePct: 13 });
    expect([result.fromVersion, result.toVersion]).toEqual([1, 2]);
  });

  it('is empty for a document compared with itself', () => {
    const keys = fc.string({ minLength: 1 }).filter(k => k !== '__proto__');
    fc.assert(fc.property(fc.dictionary(keys, fc.jsonValue()), doc => {
      const result = fieldDiff(doc, doc, 1, 1);
      expect(result.changes).toEqual([]);
      expect(result.summary.unchanged).toBe(Object.keys(doc).length);
      expect(result.summary.contentChangePct).toBe(0);
    }));
  });
});

describe('field diff properties', () => {
  const keys = fc.constantFrom('a', 'b', 'c', 'd', 'e');
  const doc = fc.dictionary(keys, fc.oneof(fc.integer({ min: 0, max: 3 }), fc.constantFrom('x', 'y')));

  it('accounts for every key of either document exactly once', () => {
    fc.assert(fc.property(doc, doc, (a, b) => {
      const { summary } = fieldDiff(a, b, 1, 2);
      const union = new Set([...Object.keys(a), ...Object.keys(b)]);
      expect(summary.added + summary.removed + summary.modified + summary.unchanged).toBe(union.size);
    }));
  });

  it('reports opposite actions in the reverse direction', () => {
    fc.assert(fc.property(doc, doc, (a, b) => {
      const forward = fieldDiff(a, b, 1, 2).changes;
      const backward = fieldDiff(b, a, 2, 1).changes;
      const flip = (action: string) => (action === 'added' ? 'removed' : action === 'removed' ? 'added' : action);
      const key = (field: string, action: string) => `${field}:${action}`;
      expect(forward.map(c => key(c.field, flip(c.action))).sort()).toEqual(backward.map(c => key(c.field, c.action)).sort());
    }));
  });
});

describe('branch summary', () => {
  it('describes section, variable and metadata changes', () => {
    const current = sectioned({ a: '1', b: '2' }, { variables: { x: '1', y: '2' }, metadata: { v: 1 } });
    const proposed = sectioned({ a: 'changed', c: '3' }, { variables: { x: '9', z: '3' }, metadata: { v: 1 } });
    expect(branchSummary(current, proposed)).toBe(
      'Added 1 new section(s): c; Removed 1 section(s): b; Modified 1 section(s): a; ' +
      'Added 1 variable(s); Removed 1 variable(s); Modified 1 variable(s)'
    );
  });

  it('reports metadata-only edits and identical content', () => {
    const current = sectioned({ a: '1' }, { metadata: { v: 1 } });
    expect(branchSummary(current, sectioned({ a: '1' }, { metadata: { v: 2 } }))).toBe('Modified metadata');
    expect(branchSummary(current, current)).toBe('No changes detected');
  });
});
