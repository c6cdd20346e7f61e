import { createChildLogger } from '../utils/logger.js';
import { ConfigurationError, errorMessage } from '../types/index.js';
import { parseTemplateDocument } from './template-parser.js';
import { resolveTemplate } from './template-resolver.js';
import type {
  ResolvedConfiguration,
  TemplateDocument,
  TemplateDraft,
  TemplateLoadError,
  TemplateLoadReport,
  TemplateSourceResult,
} from './types.js';

const logger = createChildLogger('template-registry');

interface CachedResolution {
  channelFingerprint: string;
  providerFingerprint?: string;
  configuration: ResolvedConfiguration;
}

/**
 * Holds parsed provider and channel templates and their resolutions.
 *
 * Loading isolates failures per template: a broken document is reported
 * in `errors()` and every other template keeps loading. Resolutions are
 * cached per channel and reused only while neither the channel nor its
 * provider document has changed.
 */
export class TemplateRegistry {
  private providers = new Map<string, TemplateDraft>();
  private channels = new Map<string, TemplateDraft>();
  private failedProviders = new Set<string>();
  private cache = new Map<string, CachedResolution>();
  private loadErrors: TemplateLoadError[] = [];

  /**
   * Replace all templates, dropping cached resolutions
   */
  load(source: TemplateSourceResult): TemplateLoadReport {
    this.cache.clear();
    return this.ingest(source);
  }

  /**
   * Replace all templates, keeping cached resolutions whose documents are unchanged
   */
  reload(source: TemplateSourceResult): TemplateLoadReport {
    return this.ingest(source);
  }

  /**
   * Resolved configuration of a channel
   */
  resolve(name: string): ResolvedConfiguration {
    const channel = this.channels.get(name);
    if (!channel) {
      throw new ConfigurationError(`Unknown channel template: ${name}`, name);
    }

    const provider = this.providerFor(channel);
    const cached = this.cache.get(name);
    if (
      cached &&
      cached.channelFingerprint === channel.fingerprint &&
      cached.providerFingerprint === provider?.fingerprint
    ) {
      return cached.configuration;
    }

    const configuration = resolveTemplate(provider, channel);
    this.cache.set(name, {
      channelFingerprint: channel.fingerprint,
      providerFingerprint: provider?.fingerprint,
      configuration,
    });

    logger.debug({ channel: name, provider: provider?.name }, 'Resolved channel template');
    return configuration;
  }

  has(name: string): boolean {
    return this.channels.has(name);
  }

  listChannels(): string[] {
    return [...this.channels.keys()].sort();
  }

  listProviders(): string[] {
    return [...this.providers.keys()].sort();
  }

  errors(): TemplateLoadError[] {
    return [...this.loadErrors];
  }

  private providerFor(channel: TemplateDraft): TemplateDraft | undefined {
    if (channel.providerRef === undefined) {
      return undefined;
    }
    if (this.failedProviders.has(channel.providerRef)) {
      throw new ConfigurationError(
        `Channel ${channel.name} references provider ${channel.providerRef}, which failed to load`,
        channel.name
      );
    }
    return this.providers.get(channel.providerRef);
  }

  private ingest(source: TemplateSourceResult): TemplateLoadReport {
    const providers = new Map<string, TemplateDraft>();
    const channels = new Map<string, TemplateDraft>();
    const failedProviders = new Set<string>();
    const errors: TemplateLoadError[] = [...source.errors];

    const record = (document: TemplateDocument, error: unknown): void => {
      errors.push({
        template: document.name,
        kind: document.kind,
        source: document.source,
        message: errorMessage(error),
      });
      logger.error(
        { template: document.name, kind: document.kind, source: document.source, error: errorMessage(error) },
        'Failed to load template'
      );
    };

    const seen = { provider: new Set<string>(), channel: new Set<string>() };

    for (const document of source.documents) {
      const target = document.kind === 'provider' ? providers : channels;
      if (seen[document.kind].has(document.name)) {
        record(
          document,
          new ConfigurationError(`Duplicate ${document.kind} template: ${document.name}`, document.name)
        );
        continue;
      }
      seen[document.kind].add(document.name);

      try {
        const draft = parseTemplateDocument(document);
        if (draft.kind === 'provider') {
          resolveTemplate(undefined, draft);
        }
        target.set(document.name, draft);
      } catch (error) {
        if (document.kind === 'provider') {
          failedProviders.add(document.name);
        }
        record(document, error);
      }
    }

    this.providers = providers;
    this.channels = channels;
    this.failedProviders = failedProviders;
    this.loadErrors = errors;

    for (const name of [...this.cache.keys()]) {
      if (!channels.has(name)) {
        this.cache.delete(name);
      }
    }

    const documents = new Map<string, TemplateDocument>();
    for (const document of source.documents) {
      if (document.kind === 'channel' && !documents.has(document.name)) {
        documents.set(document.name, document);
      }
    }
    for (const channel of [...channels.values()]) {
      if (channel.providerRef !== undefined && !providers.has(channel.providerRef) && !failedProviders.has(channel.providerRef)) {
        logger.warn(
          { channel: channel.name, provider: channel.providerRef },
          'Unknown provider, using channel template as declared'
        );
      }
      try {
        this.resolve(channel.name);
      } catch (error) {
        channels.delete(channel.name);
        this.cache.delete(channel.name);
        const document = documents.get(channel.name);
        if (document) {
          record(document, error);
        }
      }
    }

    logger.info(
      { providers: providers.size, channels: channels.size, errors: errors.length },
      'Loaded templates'
    );

    return {
      providers: this.listProviders(),
      channels: this.listChannels(),
      errors: [...errors],
    };
  }
}
