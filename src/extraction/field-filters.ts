import { z } from 'zod';
import { ConfigurationError } from '../types/index.js';
import { compileExpression } from './field-extractor.js';
import { FieldFilter, FieldValue, FilterKind, FilterSpec } from './types.js';

const filterConfigSchemas = {
  exclude: z.object({
    expr: z.string().min(1),
    stop: z.boolean().default(false),
  }),
  replace: z.object({
    expr: z.string().min(1),
    with: z.string().default(''),
  }),
  truncate: z.object({
    length: z.number().int().min(1),
    ellipsis: z.string().default(''),
  }),
  trim: z.object({}),
  case: z.object({
    to: z.enum(['upper', 'lower']),
  }),
} satisfies Record<FilterKind, z.ZodTypeAny>;

function isFilterKind(value: string): value is FilterKind {
  return Object.prototype.hasOwnProperty.call(filterConfigSchemas, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configError(field: string, message: string, details?: unknown): ConfigurationError {
  return new ConfigurationError(`Invalid filter on field ${field}: ${message}`, undefined, details);
}

function parseConfig(kind: FilterKind, config: unknown, field: string): FilterSpec {
  const input = config ?? {};
  const describeIssues = (error: z.ZodError): string =>
    error.issues.map((issue) => `${issue.path.join('.') || kind}: ${issue.message}`).join('; ');

  switch (kind) {
    case 'exclude': {
      const parsed = filterConfigSchemas.exclude.safeParse(input);
      if (!parsed.success) throw configError(field, describeIssues(parsed.error), { kind });
      compileExpression(parsed.data.expr, field);
      return { kind, ...parsed.data };
    }
    case 'replace': {
      const parsed = filterConfigSchemas.replace.safeParse(input);
      if (!parsed.success) throw configError(field, describeIssues(parsed.error), { kind });
      compileExpression(parsed.data.expr, field);
      return { kind, ...parsed.data };
    }
    case 'truncate': {
      const parsed = filterConfigSchemas.truncate.safeParse(input);
      if (!parsed.success) throw configError(field, describeIssues(parsed.error), { kind });
      return { kind, ...parsed.data };
    }
    case 'trim': {
      const parsed = filterConfigSchemas.trim.safeParse(input);
      if (!parsed.success) throw configError(field, describeIssues(parsed.error), { kind });
      return { kind };
    }
    case 'case': {
      const parsed = filterConfigSchemas.case.safeParse(input);
      if (!parsed.success) throw configError(field, describeIssues(parsed.error), { kind });
      return { kind, to: parsed.data.to };
    }
  }
}

/**
 * Parse one filter declaration.
 *
 * Accepted shapes: a bare kind name (`- trim`), a single-key map
 * (`- replace: { expr: ..., with: ... }`) or a bare `{ expr, stop }` map,
 * which is read as an exclude filter.
 */
export function parseFilterDeclaration(declaration: unknown, field: string): FilterSpec {
  if (typeof declaration === 'string') {
    if (!isFilterKind(declaration)) {
      throw configError(field, `unknown filter kind "${declaration}"`);
    }
    return parseConfig(declaration, {}, field);
  }

  if (!isRecord(declaration)) {
    throw configError(field, 'a filter must be a kind name or a map');
  }

  const keys = Object.keys(declaration);
  if ('expr' in declaration && !keys.some(isFilterKind)) {
    return parseConfig('exclude', declaration, field);
  }

  const [kind, ...rest] = keys;
  if (kind === undefined || rest.length > 0) {
    throw configError(field, `expected a single filter kind, got [${keys.join(', ')}]`);
  }
  if (!isFilterKind(kind)) {
    throw configError(field, `unknown filter kind "${kind}"`);
  }
  return parseConfig(kind, declaration[kind], field);
}

/**
 * Parse an ordered list of filter declarations
 */
export function parseFilterList(declarations: unknown, field: string): FilterSpec[] {
  if (declarations === undefined || declarations === null) {
    return [];
  }
  if (!Array.isArray(declarations)) {
    throw configError(field, 'filters must be a list');
  }
  return declarations.map((declaration) => parseFilterDeclaration(declaration, field));
}

function excludeEntries(entries: string[], pattern: RegExp, stop: boolean): string[] {
  const kept: string[] = [];
  for (const entry of entries) {
    if (pattern.test(entry)) {
      if (stop) break;
      continue;
    }
    kept.push(entry);
  }
  return kept;
}

function mapValue(value: FieldValue, transform: (text: string) => string): FieldValue {
  return Array.isArray(value) ? value.map(transform) : transform(value);
}

/**
 * Build a filter from its declaration
 */
export function createFieldFilter(spec: FilterSpec): FieldFilter {
  switch (spec.kind) {
    case 'exclude': {
      const pattern = new RegExp(`^(?:${spec.expr})$`, 's');
      return {
        spec,
        apply: (value) =>
          Array.isArray(value)
            ? excludeEntries(value, pattern, spec.stop)
            : excludeEntries(value.split('\n'), pattern, spec.stop).join('\n'),
      };
    }
    case 'replace': {
      const pattern = new RegExp(spec.expr, 'gs');
      return { spec, apply: (value) => mapValue(value, (text) => text.replace(pattern, spec.with)) };
    }
    case 'truncate':
      return {
        spec,
        apply: (value) =>
          mapValue(value, (text) => {
            // Code points, so a surrogate pair is never split
            const characters = Array.from(text);
            return characters.length > spec.length
              ? `${characters.slice(0, spec.length).join('')}${spec.ellipsis}`
              : text;
          }),
      };
    case 'trim':
      return {
        spec,
        apply: (value) =>
          Array.isArray(value)
            ? value.map((item) => item.trim()).filter((item) => item !== '')
            : value.trim(),
      };
    case 'case':
      return {
        spec,
        apply: (value) =>
          mapValue(value, (text) => (spec.to === 'upper' ? text.toUpperCase() : text.toLowerCase())),
      };
  }
}

/**
 * Run a value through an ordered filter chain
 */
export function applyFilters(filters: readonly FieldFilter[], value: FieldValue): FieldValue {
  return filters.reduce<FieldValue>((current, filter) => filter.apply(current), value);
}
