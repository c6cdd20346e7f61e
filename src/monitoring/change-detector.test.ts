import { describe, it, expect } from 'vitest';
import {
  assertNoAbnormalDecrease,
  compareSnapshots,
  diffSnapshots,
  fieldDistance,
  fieldRatioScoring,
  lcsLength,
  serializeDiff,
} from './change-detector.js';
import { ExtractionFailure } from '../types/index.js';

function words(count: number, prefix = 'w'): string {
  return Array.from({ length: count }, (_, index) => `${prefix}${index}`).join(' ');
}

describe('diffSnapshots', () => {
  it('should classify every field and sort them by name', () => {
    const diff = diffSnapshots(
      { title: 'Old', body: 'same', gone: 'x' },
      { title: 'New', body: 'same', fresh: 'y' }
    );

    expect(diff.fields).toEqual([
      { field: 'body', kind: 'unchanged' },
      { field: 'fresh', kind: 'added', after: 'y' },
      { field: 'gone', kind: 'removed', before: 'x' },
      { field: 'title', kind: 'changed', before: 'Old', after: 'New' },
    ]);
  });

  it('should list added and removed items of list fields', () => {
    const diff = diffSnapshots({ items: ['a', 'b', 'c'] }, { items: ['b', 'c', 'd'] });

    expect(diff.fields).toEqual([
      {
        field: 'items',
        kind: 'changed',
        before: ['a', 'b', 'c'],
        after: ['b', 'c', 'd'],
        itemsAdded: ['d'],
        itemsRemoved: ['a'],
      },
    ]);
  });
});

describe('lcsLength', () => {
  it('should find the longest common subsequence', () => {
    expect(lcsLength(['a', 'b', 'c', 'd'], ['a', 'c', 'd', 'e'])).toBe(3);
    expect(lcsLength([], ['a'])).toBe(0);
  });
});

describe('fieldDistance', () => {
  it('should compare word tokens of text values', () => {
    expect(fieldDistance('one two three four', 'one two three five')).toBe(0.25);
    expect(fieldDistance('same  words', 'same words')).toBe(0);
  });

  it('should compare items of list values', () => {
    expect(fieldDistance(['a', 'b'], ['c', 'd'])).toBe(1);
  });
});

describe('compareSnapshots', () => {
  it('should score identical snapshots as zero', () => {
    const snapshot = { title: 'Hello', items: ['a', 'b'] };

    expect(compareSnapshots(snapshot, { ...snapshot }).differencePercent).toBe(0);
  });

  it('should average the field distances over the earlier fields', () => {
    const result = compareSnapshots(
      { title: 'one two three four', body: 'alpha' },
      { title: 'one two three five', body: 'alpha' }
    );

    expect(result.differencePercent).toBe(13);
  });

  it('should score exact token proportions', () => {
    const before = { body: words(100) };
    const fourChanged = { body: `${words(96)} ${words(4, 'x')}` };
    const sixChanged = { body: `${words(94)} ${words(6, 'x')}` };

    expect(compareSnapshots(before, fourChanged).differencePercent).toBe(4);
    expect(compareSnapshots(before, sixChanged).differencePercent).toBe(6);
  });

  it('should never score a real change as zero', () => {
    expect(compareSnapshots({ body: 'a b' }, { body: 'a  b ' }).differencePercent).toBe(1);
    expect(compareSnapshots({ body: words(1000) }, { body: `${words(999)} x` }).differencePercent).toBe(1);
  });

  it('should not decrease as more fields differ', () => {
    const before = { a: 'one two three', b: 'four five six', c: 'seven eight nine' };
    const one = compareSnapshots(before, { ...before, a: 'one two changed' }).differencePercent;
    const two = compareSnapshots(before, { ...before, a: 'one two changed', b: 'four five changed' }).differencePercent;
    const three = compareSnapshots(before, { a: 'x', b: 'y', c: 'z' }).differencePercent;

    expect(one).toBeGreaterThan(0);
    expect(two).toBeGreaterThanOrEqual(one);
    expect(three).toBeGreaterThanOrEqual(two);
    expect(three).toBe(100);
  });

  it('should be deterministic', () => {
    const before = { items: ['a', 'b', 'c'], title: 'x' };
    const after = { items: ['c', 'a'], title: 'y' };

    const first = compareSnapshots(before, after);
    const second = compareSnapshots(before, after);

    expect(second.differencePercent).toBe(first.differencePercent);
    expect(serializeDiff(second.diff)).toBe(serializeDiff(first.diff));
  });

  it('should clamp scores to 100', () => {
    expect(compareSnapshots({ a: 'x' }, { a: 'y', b: 'z', c: 'w' }).differencePercent).toBe(100);
  });

  it('should accept another scoring policy', () => {
    const result = compareSnapshots(
      { title: 'one two three four', body: 'alpha' },
      { title: 'one two three five', body: 'alpha' },
      fieldRatioScoring
    );

    expect(result.differencePercent).toBe(50);
  });
});

describe('assertNoAbnormalDecrease', () => {
  const before = { items: ['a', 'b', 'c', 'd'] };

  it('should allow a decrease up to the limit', () => {
    expect(() => assertNoAbnormalDecrease(before, { items: ['a', 'b'] }, 50)).not.toThrow();
  });

  it('should fail when a list loses more than the limit', () => {
    expect(() => assertNoAbnormalDecrease(before, { items: ['a'] }, 50, 'monitor-1')).toThrow(
      new ExtractionFailure('Abnormal decrease in items: 4 items down to 1')
    );
  });

  it('should be disabled by a zero limit', () => {
    expect(() => assertNoAbnormalDecrease(before, { items: [] }, 0)).not.toThrow();
  });
});
