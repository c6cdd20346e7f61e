import type { FieldExtractor } from '../extraction/field-extractor.js';
import type { FieldFilter, FieldMatch, FilterSpec } from '../extraction/types.js';

export type TemplateKind = 'provider' | 'channel';

/**
 * Raw template document as read from a configuration store
 */
export interface TemplateDocument {
  name: string;
  kind: TemplateKind;
  body: unknown;
  /** File or location the document was read from */
  source?: string;
}

export interface TemplateLoadError {
  template: string;
  kind?: TemplateKind;
  source?: string;
  message: string;
}

export interface TemplateSourceResult {
  documents: TemplateDocument[];
  errors: TemplateLoadError[];
}

/**
 * Anything able to enumerate template documents
 */
export interface TemplateDocumentSource {
  load(): Promise<TemplateSourceResult>;
}

/**
 * Field as declared by one document. Only the keys the document
 * declares are present.
 */
export interface FieldDraft {
  readonly expr?: string;
  readonly format?: string;
  readonly match?: FieldMatch;
  readonly filters?: readonly FilterSpec[];
}

export interface ChannelAttributes {
  readonly url?: string;
  readonly sites?: string;
  readonly channelId?: string;
  readonly primary?: string;
}

/**
 * A parsed, unresolved template
 */
export interface TemplateDraft {
  readonly name: string;
  readonly kind: TemplateKind;
  readonly providerRef?: string;
  readonly attributes: ChannelAttributes;
  /** Field declarations in document order */
  readonly fields: ReadonlyMap<string, FieldDraft>;
  /** Channel-level filters destined for the primary field */
  readonly filters: readonly FilterSpec[];
  /** Fingerprint of the source document */
  readonly fingerprint: string;
}

export interface ResolvedField {
  readonly name: string;
  readonly extractor: FieldExtractor;
  readonly filters: readonly FieldFilter[];
}

/**
 * Flattened, provider-merged configuration for one channel
 */
export interface ResolvedConfiguration {
  readonly name: string;
  readonly providerRef?: string;
  readonly url?: string;
  readonly sites: string;
  readonly channelId?: string;
  readonly primaryField: string;
  readonly fields: readonly ResolvedField[];
}

export interface TemplateLoadReport {
  providers: string[];
  channels: string[];
  errors: TemplateLoadError[];
}
