/**
 * Types for regex-driven field extraction
 */

/**
 * How many matches an extractor keeps
 */
export type FieldMatch = 'FIRST' | 'ALL';

/**
 * A single extracted value: FIRST extractors yield a string, ALL extractors a list
 */
export type FieldValue = string | string[];

/**
 * Structured field-value result of extracting a source at one point in time.
 * Keyed by field name; position carries no meaning.
 */
export type Snapshot = Readonly<Record<string, FieldValue>>;

/**
 * Order applied to list-valued fields before the result cap
 */
export type SortOrder = 'document' | 'reverse' | 'asc' | 'desc';

export const SORT_ORDERS: readonly SortOrder[] = ['document', 'reverse', 'asc', 'desc'];

/**
 * Extractor attributes as declared in a template
 */
export interface ExtractorSpec {
  expr: string;
  format: string;
  match: FieldMatch;
}

/**
 * Filter declarations, one variant per supported kind
 */
export type FilterSpec =
  | { kind: 'exclude'; expr: string; stop: boolean }
  | { kind: 'replace'; expr: string; with: string }
  | { kind: 'truncate'; length: number; ellipsis: string }
  | { kind: 'trim' }
  | { kind: 'case'; to: 'upper' | 'lower' };

export type FilterKind = FilterSpec['kind'];

/**
 * A compiled filter ready to transform field values
 */
export interface FieldFilter {
  readonly spec: FilterSpec;
  apply(value: FieldValue): FieldValue;
}
