import { ConfigurationError, errorMessage } from '../types/index.js';
import { ExtractorSpec, FieldMatch, FieldValue } from './types.js';

export const DEFAULT_FORMAT = '$1';

const FORMAT_TOKEN = /\$(?:(\$)|(\d)|\{([A-Za-z_][A-Za-z0-9_]*)\})/g;

interface GroupLayout {
  count: number;
  names: Set<string>;
}

/**
 * Parse a declared match mode (case-insensitive)
 */
export function parseMatchMode(value: string, field?: string): FieldMatch {
  const normalized = value.trim().toUpperCase();
  if (normalized === 'FIRST' || normalized === 'ALL') {
    return normalized;
  }
  throw new ConfigurationError(
    `Unknown match mode "${value}"${field ? ` for field ${field}` : ''}`,
    undefined,
    { field, match: value }
  );
}

/**
 * Compile an expression with dot-all semantics, raising a configuration error
 * for malformed patterns
 */
export function compileExpression(expr: string, field: string, flags = 's'): RegExp {
  try {
    return new RegExp(expr, flags);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid expression for field ${field}: ${errorMessage(error)}`,
      undefined,
      { field, expr }
    );
  }
}

/**
 * Count capture groups by matching the expression alternated with the empty
 * pattern against the empty string
 */
function groupLayout(expr: string, field: string): GroupLayout {
  compileExpression(expr, field);
  const probe = compileExpression(`(?:${expr})|`, field).exec('');
  if (!probe) {
    return { count: 0, names: new Set() };
  }
  return {
    count: probe.length - 1,
    names: new Set(Object.keys(probe.groups ?? {})),
  };
}

/**
 * Check that an expression compiles and that the format only references
 * groups the expression defines
 */
export function validateExtractor(field: string, spec: ExtractorSpec): void {
  if (spec.expr === '') {
    return;
  }

  const layout = groupLayout(spec.expr, field);
  const format = spec.format === '' ? DEFAULT_FORMAT : spec.format;

  for (const token of format.matchAll(FORMAT_TOKEN)) {
    const [, , index, name] = token;
    if (index !== undefined && Number(index) > layout.count) {
      throw new ConfigurationError(
        `Format of field ${field} references group ${index} but the expression defines ${layout.count}`,
        undefined,
        { field, format }
      );
    }
    if (name !== undefined && !layout.names.has(name)) {
      throw new ConfigurationError(
        `Format of field ${field} references unknown group "${name}"`,
        undefined,
        { field, format }
      );
    }
  }
}

/**
 * Substitute the groups of a match into a format string
 */
export function applyFormat(format: string, match: RegExpMatchArray): string {
  return format.replace(FORMAT_TOKEN, (_token, dollar?: string, index?: string, name?: string) => {
    if (dollar !== undefined) {
      return '$';
    }
    if (index !== undefined) {
      return match[Number(index)] ?? '';
    }
    return (name !== undefined ? match.groups?.[name] : undefined) ?? '';
  });
}

/**
 * Regex-plus-format rule pulling one named value out of raw text.
 *
 * An extractor without an expression is inert: it yields "" (FIRST) or []
 * (ALL) for any input. The expression is compiled on first use.
 */
export class FieldExtractor {
  readonly name: string;
  readonly expression: string;
  readonly format: string;
  readonly matchMode: FieldMatch;
  private compiled?: RegExp;

  constructor(name: string, spec: Partial<ExtractorSpec> = {}) {
    const resolved: ExtractorSpec = {
      expr: spec.expr ?? '',
      format: spec.format || DEFAULT_FORMAT,
      match: spec.match ?? 'FIRST',
    };
    validateExtractor(name, resolved);

    this.name = name;
    this.expression = resolved.expr;
    this.format = resolved.format;
    this.matchMode = resolved.match;
  }

  get isInert(): boolean {
    return this.expression === '';
  }

  /**
   * Extract according to the match mode
   */
  extract(rawText: string): FieldValue {
    if (this.matchMode === 'ALL') {
      return this.extractAll(rawText);
    }
    return this.extractFirst(rawText);
  }

  /**
   * Formatted first match, or "" when nothing matches
   */
  extractFirst(rawText: string): string {
    if (this.isInert) {
      return '';
    }
    const first = rawText.matchAll(this.pattern()).next();
    return first.done ? '' : applyFormat(this.format, first.value);
  }

  /**
   * Every non-overlapping match in document order, each formatted
   */
  extractAll(rawText: string): string[] {
    if (this.isInert) {
      return [];
    }
    return Array.from(rawText.matchAll(this.pattern()), (match) => applyFormat(this.format, match));
  }

  /**
   * All matches joined with a separator
   */
  extractJoined(rawText: string, separator = '\n'): string {
    return this.extractAll(rawText).join(separator);
  }

  toSpec(): ExtractorSpec {
    return { expr: this.expression, format: this.format, match: this.matchMode };
  }

  private pattern(): RegExp {
    if (!this.compiled) {
      this.compiled = compileExpression(this.expression, this.name, 'gs');
    }
    return this.compiled;
  }
}
