import { describe, it, expect } from 'vitest';
import { FieldExtractor, applyFormat, parseMatchMode, validateExtractor } from './field-extractor.js';
import { ConfigurationError } from '../types/index.js';

describe('FieldExtractor', () => {
  describe('match modes', () => {
    it('should return the first formatted match in FIRST mode', () => {
      const extractor = new FieldExtractor('value', { expr: 'A=(\\d)' });

      expect(extractor.extract('A=1 A=2')).toBe('1');
    });

    it('should return every match in ALL mode', () => {
      const extractor = new FieldExtractor('value', { expr: 'A=(\\d)', match: 'ALL' });

      expect(extractor.extract('A=1 A=2')).toEqual(['1', '2']);
    });

    it('should return an empty string when nothing matches', () => {
      const extractor = new FieldExtractor('value', { expr: 'B=(\\d)' });

      expect(extractor.extract('A=1 A=2')).toBe('');
    });

    it('should let dots span line breaks', () => {
      const extractor = new FieldExtractor('body', { expr: '<p>(.*?)</p>' });

      expect(extractor.extract('<p>first\nsecond</p>')).toBe('first\nsecond');
    });
  });

  describe('inert extractor', () => {
    it('should yield nothing for any input when the expression is empty', () => {
      const first = new FieldExtractor('title');
      const all = new FieldExtractor('items', { match: 'ALL' });

      expect(first.isInert).toBe(true);
      expect(first.extract('anything at all')).toBe('');
      expect(all.extract('anything at all')).toEqual([]);
      expect(all.extractJoined('anything')).toBe('');
    });
  });

  describe('formatting', () => {
    it('should default the format to the first group', () => {
      const extractor = new FieldExtractor('title', { expr: '<h1>(.+?)</h1>' });

      expect(extractor.format).toBe('$1');
      expect(extractor.extract('<h1>Hello</h1>')).toBe('Hello');
    });

    it('should substitute numbered and named groups', () => {
      const extractor = new FieldExtractor('link', {
        expr: '<a href="(?<href>[^"]+)">([^<]+)</a>',
        format: '$2 -> ${href} ($$)',
        match: 'ALL',
      });

      expect(extractor.extract('<a href="/a">One</a><a href="/b">Two</a>')).toEqual([
        'One -> /a ($)',
        'Two -> /b ($)',
      ]);
    });

    it('should substitute empty text for groups that did not participate', () => {
      const extractor = new FieldExtractor('pair', { expr: '(x)?(y)', format: '[$1][$2]' });

      expect(extractor.extract('y')).toBe('[][y]');
    });

    it('should join all matches with a separator', () => {
      const extractor = new FieldExtractor('value', { expr: 'A=(\\d)' });

      expect(extractor.extractAll('A=1 A=2 A=3')).toEqual(['1', '2', '3']);
      expect(extractor.extractJoined('A=1 A=2 A=3', ', ')).toBe('1, 2, 3');
    });
  });

  describe('determinism', () => {
    it('should produce identical output for repeated calls on the same input', () => {
      const extractor = new FieldExtractor('items', { expr: '<li>(.*?)</li>', match: 'ALL' });
      const html = '<ul><li>a</li><li>b</li><li>c</li></ul>';

      const first = extractor.extract(html);
      const second = extractor.extract(html);

      expect(second).toEqual(first);
      expect(first).toEqual(['a', 'b', 'c']);
    });

    it('should not carry match state between FIRST extractions', () => {
      const extractor = new FieldExtractor('value', { expr: 'v(\\d)' });

      expect(extractor.extract('v1')).toBe('1');
      expect(extractor.extract('v2')).toBe('2');
    });
  });

  describe('validation', () => {
    it('should reject a malformed expression at construction', () => {
      expect(() => new FieldExtractor('broken', { expr: '(unclosed' })).toThrow(ConfigurationError);
    });

    it('should reject a format referencing a missing group', () => {
      expect(() => new FieldExtractor('title', { expr: '<h1>.+</h1>' })).toThrow(
        'Format of field title references group 1 but the expression defines 0'
      );
    });

    it('should reject a format referencing an unknown named group', () => {
      expect(() => validateExtractor('link', { expr: '(?<url>.+)', format: '${href}', match: 'FIRST' })).toThrow(
        'Format of field link references unknown group "href"'
      );
    });

    it('should accept group zero without capture groups', () => {
      const extractor = new FieldExtractor('whole', { expr: '\\d+', format: '#$0' });

      expect(extractor.extract('abc 42')).toBe('#42');
    });
  });
});

describe('parseMatchMode', () => {
  it('should accept match modes in any case', () => {
    expect(parseMatchMode('all')).toBe('ALL');
    expect(parseMatchMode('First')).toBe('FIRST');
  });

  it('should reject unknown match modes', () => {
    expect(() => parseMatchMode('some', 'title')).toThrow('Unknown match mode "some" for field title');
  });
});

describe('applyFormat', () => {
  it('should leave text without tokens untouched', () => {
    const match = 'abc'.match(/(b)/);

    expect(match).not.toBeNull();
    if (match) {
      expect(applyFormat('plain', match)).toBe('plain');
      expect(applyFormat('<$1>', match)).toBe('<b>');
    }
  });
});
