import { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { stableStringify } from '../utils/hash.js';
import { ExtractionFailure, errorMessage } from '../types/index.js';
import { applyFilters } from './field-filters.js';
import type { ResolvedConfiguration } from '../templates/types.js';
import type { FieldValue, Snapshot, SortOrder } from './types.js';

const logger = createChildLogger('snapshot-extractor');

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({});

export interface CaptureOptions {
  /** Cap on list-valued fields, 0 for no cap */
  maxResults?: number;
  sort?: SortOrder;
}

const SnapshotSchema = z.record(z.union([z.string(), z.array(z.string())]));

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order list results, then cap them
 */
export function orderResults(values: readonly string[], sort: SortOrder = 'document', maxResults = 0): string[] {
  let ordered: string[];
  switch (sort) {
    case 'reverse':
      ordered = [...values].reverse();
      break;
    case 'asc':
      ordered = [...values].sort(compareText);
      break;
    case 'desc':
      ordered = [...values].sort((a, b) => compareText(b, a));
      break;
    default:
      ordered = [...values];
  }
  return maxResults > 0 ? ordered.slice(0, maxResults) : ordered;
}

/**
 * Run every field of a resolved configuration against raw content
 */
export function captureSnapshot(
  configuration: ResolvedConfiguration,
  rawContent: string,
  options: CaptureOptions = {}
): Snapshot {
  const snapshot: Record<string, FieldValue> = {};

  for (const field of configuration.fields) {
    if (field.extractor.isInert) {
      continue;
    }

    let value: FieldValue;
    try {
      value = applyFilters(field.filters, field.extractor.extract(rawContent));
    } catch (error) {
      throw new ExtractionFailure(`Field ${field.name} of ${configuration.name} failed: ${errorMessage(error)}`, undefined, {
        field: field.name,
      });
    }

    snapshot[field.name] = Array.isArray(value) ? orderResults(value, options.sort, options.maxResults) : value;
  }

  logger.debug(
    { configuration: configuration.name, fields: Object.keys(snapshot).length },
    'Captured snapshot'
  );

  return snapshot;
}

/**
 * Serialize with sorted keys so equal snapshots serialize identically
 */
export function serializeSnapshot(snapshot: Snapshot): string {
  return stableStringify(snapshot);
}

/**
 * Parse stored snapshot text. Empty text is the empty snapshot.
 */
export function parseSnapshot(text: string | null | undefined): Snapshot {
  if (!text) {
    return EMPTY_SNAPSHOT;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ExtractionFailure(`Stored snapshot is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExtractionFailure('Stored snapshot has an unexpected shape', undefined, parsed.error.issues);
  }
  return parsed.data;
}

export function isEmptySnapshot(snapshot: Snapshot): boolean {
  return Object.keys(snapshot).length === 0;
}

/**
 * Whether two snapshots carry the same fields and values
 */
export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  return serializeSnapshot(a) === serializeSnapshot(b);
}
