import { z } from 'zod';
import { ConfigurationError } from '../types/index.js';
import { fingerprint } from '../utils/hash.js';
import { compileExpression, parseMatchMode } from '../extraction/field-extractor.js';
import { parseFilterList } from '../extraction/field-filters.js';
import type { FieldDraft, TemplateDocument, TemplateDraft } from './types.js';

const FieldDocumentSchema = z.union([
  z.string(),
  z.object({
    expr: z.string().optional(),
    format: z.string().optional(),
    match: z.string().optional(),
    filters: z.array(z.unknown()).optional(),
  }),
]);

const TemplateBodySchema = z.object({
  provider: z.string().min(1).optional(),
  url: z.string().optional(),
  sites: z.string().optional(),
  'channel-id': z.union([z.string(), z.number()]).transform(String).optional(),
  primary: z.string().min(1).optional(),
  fields: z.record(z.union([FieldDocumentSchema, z.null()])).optional(),
  filters: z.array(z.unknown()).optional(),
});

type FieldDocument = z.infer<typeof FieldDocumentSchema>;

function parseField(name: string, document: FieldDocument | null): FieldDraft {
  if (document === null) {
    return {};
  }
  if (typeof document === 'string') {
    compileExpression(document, name);
    return { expr: document };
  }

  const draft: {
    expr?: string;
    format?: string;
    match?: FieldDraft['match'];
    filters?: FieldDraft['filters'];
  } = {};

  if (document.expr !== undefined) {
    compileExpression(document.expr, name);
    draft.expr = document.expr;
  }
  if (document.format !== undefined) {
    draft.format = document.format;
  }
  if (document.match !== undefined) {
    draft.match = parseMatchMode(document.match, name);
  }
  if (document.filters !== undefined) {
    draft.filters = parseFilterList(document.filters, name);
  }

  return draft;
}

/**
 * Parse one template document on its own, keeping only what it declares.
 * Provider references are not followed here.
 */
export function parseTemplateDocument(document: TemplateDocument): TemplateDraft {
  const parsed = TemplateBodySchema.safeParse(document.body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new ConfigurationError(
      `Template ${document.name} is invalid: ${issues.join('; ')}`,
      document.name,
      parsed.error.issues
    );
  }

  const body = parsed.data;
  if (document.kind === 'provider' && body.provider !== undefined) {
    throw new ConfigurationError(
      `Provider ${document.name} cannot reference another provider (${body.provider})`,
      document.name
    );
  }

  try {
    const fields = new Map<string, FieldDraft>();
    for (const [name, field] of Object.entries(body.fields ?? {})) {
      fields.set(name, parseField(name, field));
    }

    return {
      name: document.name,
      kind: document.kind,
      providerRef: body.provider,
      attributes: {
        url: body.url,
        sites: body.sites,
        channelId: body['channel-id'],
        primary: body.primary,
      },
      fields,
      filters: parseFilterList(body.filters, body.primary ?? 'primary'),
      fingerprint: fingerprint({ kind: document.kind, body: document.body ?? {} }),
    };
  } catch (error) {
    if (error instanceof ConfigurationError && error.template === undefined) {
      throw new ConfigurationError(`Template ${document.name}: ${error.message}`, document.name, error.details);
    }
    throw error;
  }
}
