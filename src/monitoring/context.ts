import { createChildLogger } from '../utils/logger.js';
import type { Config } from '../types/index.js';
import { TemplateRegistry, YamlConfigurationStore } from '../templates/index.js';
import type { TemplateDocumentSource, TemplateLoadReport } from '../templates/index.js';
import { SCORING_POLICIES } from './change-detector.js';
import { ContentMonitorService } from './content-monitor.js';
import { createHttpFetcher } from './fetchers/http-fetcher.js';
import { MonitorRegistry } from './monitor-registry.js';
import { PostgresMonitorRepository, createMonitorRepository } from './monitor-repository.js';
import type { ChangeStore, Clock, ContentFetcher, MonitorStore } from './types.js';

const logger = createChildLogger('monitoring-context');

export type MonitoringStore = MonitorStore & ChangeStore;

export interface MonitoringContextOverrides {
  store?: MonitoringStore;
  fetcher?: ContentFetcher;
  templateSource?: TemplateDocumentSource;
  clock?: Clock;
}

export interface MonitoringContext {
  config: Config;
  templates: TemplateRegistry;
  registry: MonitorRegistry;
  store: MonitoringStore;
  service: ContentMonitorService;
  /** Re-read template documents, keeping resolutions that did not change */
  reloadTemplates(): Promise<TemplateLoadReport>;
  close(): Promise<void>;
}

/**
 * Wire registries, storage, fetcher and service from configuration.
 * Templates are loaded; monitors are not.
 */
export async function createMonitoringContext(
  config: Config,
  overrides: MonitoringContextOverrides = {}
): Promise<MonitoringContext> {
  const templateSource = overrides.templateSource ?? new YamlConfigurationStore(config.templates.dir);
  const templates = new TemplateRegistry();
  const report = templates.load(await templateSource.load());

  if (report.errors.length > 0) {
    logger.warn({ errors: report.errors.length }, 'Some templates failed to load');
  }

  let repository: PostgresMonitorRepository | null = null;
  let store: MonitoringStore;
  if (overrides.store) {
    store = overrides.store;
  } else {
    repository = createMonitorRepository(config.postgres);
    store = repository;
  }
  const registry = new MonitorRegistry();

  const service = new ContentMonitorService({
    monitors: store,
    changes: store,
    templates,
    registry,
    fetcher: overrides.fetcher ?? createHttpFetcher(config.fetcher),
    clock: overrides.clock,
    scoring: SCORING_POLICIES[config.monitoring.scoringPolicy],
    recencyDays: config.monitoring.recencyDays,
    abnormalDecreasePercent: config.monitoring.abnormalDecreasePercent,
    createdBy: config.monitoring.createdBy,
    tickSeconds: config.monitoring.tickSeconds,
    staleClaimMinutes: config.monitoring.staleClaimMinutes,
  });

  return {
    config,
    templates,
    registry,
    store,
    service,
    reloadTemplates: async () => templates.reload(await templateSource.load()),
    close: async () => {
      await service.stop();
      await repository?.close();
    },
  };
}
