import { describe, it, expect } from 'vitest';
import { applyFilters, createFieldFilter, parseFilterDeclaration, parseFilterList } from './field-filters.js';
import { ConfigurationError } from '../types/index.js';

describe('parseFilterDeclaration', () => {
  it('should read a bare expr map as an exclude filter', () => {
    expect(parseFilterDeclaration({ expr: 'Advertisement', stop: true }, 'body')).toEqual({
      kind: 'exclude',
      expr: 'Advertisement',
      stop: true,
    });
  });

  it('should read single-key maps with defaults applied', () => {
    expect(parseFilterDeclaration({ replace: { expr: '\\s+' } }, 'title')).toEqual({
      kind: 'replace',
      expr: '\\s+',
      with: '',
    });
    expect(parseFilterDeclaration({ truncate: { length: 10 } }, 'title')).toEqual({
      kind: 'truncate',
      length: 10,
      ellipsis: '',
    });
  });

  it('should read a bare kind name', () => {
    expect(parseFilterDeclaration('trim', 'title')).toEqual({ kind: 'trim' });
    expect(parseFilterDeclaration({ trim: null }, 'title')).toEqual({ kind: 'trim' });
  });

  it('should reject unknown kinds', () => {
    expect(() => parseFilterDeclaration({ shout: {} }, 'title')).toThrow(
      'Invalid filter on field title: unknown filter kind "shout"'
    );
    expect(() => parseFilterDeclaration('shout', 'title')).toThrow(ConfigurationError);
  });

  it('should reject maps naming more than one kind', () => {
    expect(() => parseFilterDeclaration({ trim: {}, case: { to: 'upper' } }, 'title')).toThrow(
      'Invalid filter on field title: expected a single filter kind, got [trim, case]'
    );
  });

  it('should reject invalid configuration', () => {
    expect(() => parseFilterDeclaration({ case: { to: 'title' } }, 'title')).toThrow(ConfigurationError);
    expect(() => parseFilterDeclaration({ truncate: { length: 0 } }, 'title')).toThrow(ConfigurationError);
  });

  it('should reject malformed expressions', () => {
    expect(() => parseFilterDeclaration({ exclude: { expr: '[' } }, 'body')).toThrow(ConfigurationError);
  });
});

describe('parseFilterList', () => {
  it('should treat a missing list as empty', () => {
    expect(parseFilterList(undefined, 'body')).toEqual([]);
  });

  it('should keep declaration order', () => {
    const specs = parseFilterList(['trim', { case: { to: 'lower' } }], 'body');

    expect(specs.map((spec) => spec.kind)).toEqual(['trim', 'case']);
  });

  it('should reject a non-list', () => {
    expect(() => parseFilterList({ trim: {} }, 'body')).toThrow('Invalid filter on field body: filters must be a list');
  });
});

describe('createFieldFilter', () => {
  describe('exclude', () => {
    it('should drop fully matching lines of a text value', () => {
      const filter = createFieldFilter({ kind: 'exclude', expr: 'Ad:.*', stop: false });

      expect(filter.apply('keep\nAd: buy now\nalso keep')).toBe('keep\nalso keep');
    });

    it('should keep lines that only partially match', () => {
      const filter = createFieldFilter({ kind: 'exclude', expr: 'Ad', stop: false });

      expect(filter.apply('Ad\nAdvert')).toBe('Advert');
    });

    it('should drop everything after the first match when stop is set', () => {
      const filter = createFieldFilter({ kind: 'exclude', expr: 'Footer', stop: true });

      expect(filter.apply(['one', 'two', 'Footer', 'three'])).toEqual(['one', 'two']);
    });
  });

  it('should replace every match', () => {
    const filter = createFieldFilter({ kind: 'replace', expr: '\\s+', with: ' ' });

    expect(filter.apply('a  b\n\nc')).toBe('a b c');
    expect(filter.apply(['x  y', 'z'])).toEqual(['x y', 'z']);
  });

  it('should truncate long values with an ellipsis', () => {
    const filter = createFieldFilter({ kind: 'truncate', length: 5, ellipsis: '...' });

    expect(filter.apply('abcdefgh')).toBe('abcde...');
    expect(filter.apply('abc')).toBe('abc');
  });

  it('should count characters outside the basic plane as one', () => {
    const filter = createFieldFilter({ kind: 'truncate', length: 3, ellipsis: '' });

    expect(filter.apply('a\u{1F600}b\u{1F600}c')).toBe('a\u{1F600}b');
    expect(filter.apply('\u{1F600}\u{1F600}\u{1F600}')).toBe('\u{1F600}\u{1F600}\u{1F600}');
  });

  it('should trim text and drop empty list items', () => {
    const filter = createFieldFilter({ kind: 'trim' });

    expect(filter.apply('  padded  ')).toBe('padded');
    expect(filter.apply([' a ', '   ', 'b'])).toEqual(['a', 'b']);
  });

  it('should change case', () => {
    expect(createFieldFilter({ kind: 'case', to: 'upper' }).apply('Mixed')).toBe('MIXED');
    expect(createFieldFilter({ kind: 'case', to: 'lower' }).apply(['A', 'B'])).toEqual(['a', 'b']);
  });
});

describe('applyFilters', () => {
  it('should feed each filter the output of the previous one', () => {
    const filters = parseFilterList(
      [{ replace: { expr: 'draft', with: 'final' } }, 'trim', { case: { to: 'upper' } }],
      'title'
    ).map(createFieldFilter);

    expect(applyFilters(filters, '  draft copy ')).toBe('FINAL COPY');
  });

  it('should return the value unchanged for an empty chain', () => {
    expect(applyFilters([], ['a'])).toEqual(['a']);
  });
});
