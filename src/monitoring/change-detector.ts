import { ExtractionFailure } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { stableStringify } from '../utils/hash.js';
import type { FieldValue, Snapshot } from '../extraction/types.js';

const logger = createChildLogger('change-detector');

/**
 * Difference of one field between two snapshots
 */
export type FieldDiff =
  | { field: string; kind: 'unchanged' }
  | { field: string; kind: 'added'; after: FieldValue }
  | { field: string; kind: 'removed'; before: FieldValue }
  | {
      field: string;
      kind: 'changed';
      before: FieldValue;
      after: FieldValue;
      /** List items only present after */
      itemsAdded?: string[];
      /** List items only present before */
      itemsRemoved?: string[];
    };

export interface SnapshotDiff {
  fields: FieldDiff[];
}

export interface ChangeComparison {
  diff: SnapshotDiff;
  /** 0-100, 0 meaning no change */
  differencePercent: number;
}

/**
 * Scores a structural diff. Must be deterministic and never decrease when
 * more fields differ.
 */
export type ScoringPolicy = (before: Snapshot, after: Snapshot, diff: SnapshotDiff) => number;

export type ScoringPolicyName = 'similarity' | 'field-ratio';

function valuesEqual(a: FieldValue, b: FieldValue): boolean {
  return stableStringify(a) === stableStringify(b);
}

function tokens(value: FieldValue): string[] {
  return Array.isArray(value) ? value : value.split(/\s+/).filter((token) => token !== '');
}

/**
 * Length of the longest common subsequence of two token lists
 */
export function lcsLength(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      const left = current[j - 1] ?? 0;
      const up = previous[j] ?? 0;
      current[j] = a[i - 1] === b[j - 1] ? (previous[j - 1] ?? 0) + 1 : Math.max(left, up);
    }
    [previous, current] = [current, previous];
  }
  return previous[b.length] ?? 0;
}

/**
 * Distance between two values in [0, 1]: 1 - LCS / longest
 */
export function fieldDistance(before: FieldValue, after: FieldValue): number {
  const a = tokens(before);
  const b = tokens(after);
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 0;
  }
  return 1 - lcsLength(a, b) / longest;
}

function toPercent(ratio: number, hasChanges: boolean): number {
  const percent = Math.min(100, Math.max(0, Math.ceil(ratio * 100 - 1e-9)));
  return hasChanges && percent === 0 ? 1 : percent;
}

function changedFields(diff: SnapshotDiff): FieldDiff[] {
  return diff.fields.filter((field) => field.kind !== 'unchanged');
}

/**
 * Mean per-field distance over the fields of the earlier snapshot
 */
export const similarityScoring: ScoringPolicy = (before, _after, diff) => {
  const changed = changedFields(diff);
  const total = changed.reduce(
    (sum, field) => sum + (field.kind === 'changed' ? fieldDistance(field.before, field.after) : 1),
    0
  );
  return toPercent(total / Math.max(1, Object.keys(before).length), changed.length > 0);
};

/**
 * Share of fields that differ
 */
export const fieldRatioScoring: ScoringPolicy = (before, _after, diff) => {
  const changed = changedFields(diff).length;
  return toPercent(changed / Math.max(1, Object.keys(before).length), changed > 0);
};

export const SCORING_POLICIES: Record<ScoringPolicyName, ScoringPolicy> = {
  similarity: similarityScoring,
  'field-ratio': fieldRatioScoring,
};

/**
 * Structural diff of two snapshots, one entry per field sorted by name
 */
export function diffSnapshots(before: Snapshot, after: Snapshot): SnapshotDiff {
  const names = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();

  const fields = names.map((field): FieldDiff => {
    const previous = before[field];
    const next = after[field];

    if (previous === undefined && next !== undefined) {
      return { field, kind: 'added', after: next };
    }
    if (next === undefined && previous !== undefined) {
      return { field, kind: 'removed', before: previous };
    }
    if (previous === undefined || next === undefined || valuesEqual(previous, next)) {
      return { field, kind: 'unchanged' };
    }
    if (Array.isArray(previous) && Array.isArray(next)) {
      const earlier = new Set(previous);
      const later = new Set(next);
      return {
        field,
        kind: 'changed',
        before: previous,
        after: next,
        itemsAdded: next.filter((item) => !earlier.has(item)),
        itemsRemoved: previous.filter((item) => !later.has(item)),
      };
    }
    return { field, kind: 'changed', before: previous, after: next };
  });

  return { fields };
}

/**
 * Compare two snapshots and score the difference
 */
export function compareSnapshots(
  before: Snapshot,
  after: Snapshot,
  scoring: ScoringPolicy = similarityScoring
): ChangeComparison {
  const diff = diffSnapshots(before, after);
  const differencePercent = changedFields(diff).length === 0 ? 0 : scoring(before, after, diff);

  logger.debug(
    { fields: diff.fields.length, changed: changedFields(diff).length, differencePercent },
    'Compared snapshots'
  );

  return { diff, differencePercent };
}

/**
 * Fail when a list field lost more than `percent` of its items.
 * A percent of 0 turns the check off.
 */
export function assertNoAbnormalDecrease(before: Snapshot, after: Snapshot, percent: number, monitorId?: string): void {
  if (percent <= 0) {
    return;
  }

  for (const [field, previous] of Object.entries(before)) {
    const next = after[field];
    if (!Array.isArray(previous) || !Array.isArray(next) || previous.length === 0) {
      continue;
    }
    const decrease = ((previous.length - next.length) / previous.length) * 100;
    if (decrease > percent) {
      throw new ExtractionFailure(
        `Abnormal decrease in ${field}: ${previous.length} items down to ${next.length}`,
        monitorId,
        { field, before: previous.length, after: next.length }
      );
    }
  }
}

export function serializeDiff(diff: SnapshotDiff): string {
  return stableStringify(diff);
}
