import { ConfigurationError, errorMessage } from '../types/index.js';
import { FieldExtractor } from '../extraction/field-extractor.js';
import { createFieldFilter } from '../extraction/field-filters.js';
import type { FilterSpec } from '../extraction/types.js';
import type {
  ChannelAttributes,
  FieldDraft,
  ResolvedConfiguration,
  ResolvedField,
  TemplateDraft,
} from './types.js';

export const DEFAULT_PRIMARY_FIELD = 'body';

/**
 * Provider and channel declarations merged into one set of drafts
 */
export interface MergedTemplate {
  readonly name: string;
  readonly providerRef?: string;
  readonly attributes: ChannelAttributes;
  readonly fields: ReadonlyMap<string, FieldDraft>;
}

function overlayAttributes(base: ChannelAttributes, own: ChannelAttributes): ChannelAttributes {
  return {
    url: own.url ?? base.url,
    sites: own.sites ?? base.sites,
    channelId: own.channelId ?? base.channelId,
    primary: own.primary ?? base.primary,
  };
}

function primaryOf(attributes: ChannelAttributes): string {
  return attributes.primary ?? DEFAULT_PRIMARY_FIELD;
}

/**
 * Append template-level filters to the primary field's chain
 */
function appendToPrimary(
  fields: Map<string, FieldDraft>,
  primary: string,
  filters: readonly FilterSpec[],
  template: string
): void {
  if (filters.length === 0) {
    return;
  }
  const field = fields.get(primary);
  if (!field) {
    throw new ConfigurationError(
      `Template ${template} declares filters but has no primary field "${primary}"`,
      template
    );
  }
  fields.set(primary, { ...field, filters: [...(field.filters ?? []), ...filters] });
}

/**
 * Overlay one field declaration on an inherited one.
 *
 * A declared expression brings its own format and match mode; without one the
 * inherited extractor is kept and only the declared keys change. A declared
 * filter list replaces the inherited list.
 */
export function mergeField(base: FieldDraft | undefined, own: FieldDraft | undefined): FieldDraft {
  if (!base) return own ?? {};
  if (!own) return base;

  const extractor =
    own.expr !== undefined
      ? { expr: own.expr, format: own.format, match: own.match }
      : { expr: base.expr, format: own.format ?? base.format, match: own.match ?? base.match };

  return { ...extractor, filters: own.filters ?? base.filters };
}

/**
 * A draft with its own template-level filters folded into its primary field
 */
function flatten(draft: TemplateDraft): MergedTemplate {
  const fields = new Map(draft.fields);
  appendToPrimary(fields, primaryOf(draft.attributes), draft.filters, draft.name);
  return {
    name: draft.name,
    providerRef: draft.providerRef,
    attributes: draft.attributes,
    fields,
  };
}

/**
 * Merge a channel over its provider. Neither input is modified.
 */
export function mergeDrafts(provider: TemplateDraft | undefined, channel: TemplateDraft): MergedTemplate {
  if (!provider) {
    return flatten(channel);
  }

  const baseline = flatten(provider);
  const attributes = overlayAttributes(baseline.attributes, channel.attributes);

  const fields = new Map<string, FieldDraft>();
  for (const [name, field] of baseline.fields) {
    fields.set(name, mergeField(field, channel.fields.get(name)));
  }
  for (const [name, field] of channel.fields) {
    if (!fields.has(name)) {
      fields.set(name, field);
    }
  }

  appendToPrimary(fields, primaryOf(attributes), channel.filters, channel.name);

  return {
    name: channel.name,
    providerRef: channel.providerRef,
    attributes,
    fields,
  };
}

/**
 * Build extractors and filter chains for merged drafts
 */
export function buildConfiguration(merged: MergedTemplate): ResolvedConfiguration {
  const fields: ResolvedField[] = [];

  for (const [name, draft] of merged.fields) {
    try {
      fields.push({
        name,
        extractor: new FieldExtractor(name, { expr: draft.expr, format: draft.format, match: draft.match }),
        filters: (draft.filters ?? []).map(createFieldFilter),
      });
    } catch (error) {
      throw new ConfigurationError(`Template ${merged.name}: ${errorMessage(error)}`, merged.name, { field: name });
    }
  }

  return {
    name: merged.name,
    providerRef: merged.providerRef,
    url: merged.attributes.url,
    sites: merged.attributes.sites ?? '',
    channelId: merged.attributes.channelId,
    primaryField: primaryOf(merged.attributes),
    fields,
  };
}

/**
 * Resolve a channel template against its provider into a flattened
 * configuration. Pure: equal inputs always give equal results.
 */
export function resolveTemplate(provider: TemplateDraft | undefined, channel: TemplateDraft): ResolvedConfiguration {
  return buildConfiguration(mergeDrafts(provider, channel));
}

/**
 * Look up a resolved field by name
 */
export function findField(configuration: ResolvedConfiguration, name: string): ResolvedField | undefined {
  return configuration.fields.find((field) => field.name === name);
}
