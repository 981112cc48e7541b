import { describe, it, expect } from 'vitest';
import { isValidSlug, scanForSecrets, validateContentSize, validateSlug } from '../services/contentSafety';
import { ValidationError } from '../services/errors';

describe('slugs', () => {
  it('accepts lowercase kebab-case of 2-100 chars', () => {
    expect(isValidSlug('code-reviewer')).toBe(true);
    expect(isValidSlug('ab')).toBe(true);
    expect(isValidSlug('a')).toBe(false);
    expect(isValidSlug('-abc')).toBe(false);
    expect(isValidSlug('Abc')).toBe(false);
    expect(isValidSlug('a'.repeat(101))).toBe(false);
  });

  it('throws a validation error for bad slugs', () => {
    expect(() => validateSlug('Bad Slug')).toThrow(ValidationError);
  });
});

describe('secret detection', () => {
  it('names each kind of secret found', () => {
    expect(scanForSecrets({ sections: [{ id: 'a', content: `token ghp_${'x'.repeat(36)}` }] })).toEqual(['GitHub PAT']);
    expect(scanForSecrets({ key: `sk-ant-${'test'.repeat(6)}` })).toEqual(['Anthropic API key']);
  });

  it('returns nothing for ordinary text', () => {
    expect(scanForSecrets({ text: 'use the test-secret placeholder' })).toEqual([]);
  });
});

describe('content size limit', () => {
  it('rejects serialized content over the limit', () => {
    expect(() => validateContentSize({ a: 'x'.repeat(2000) }, 1024))
      .toThrow('Content is 2008 bytes, over the 1024 byte limit');
    expect(() => validateContentSize({ a: 'small' }, 1024)).not.toThrow();
  });
});
