import { v4 as uuid } from 'uuid';
import { createChildLogger } from '../utils/logger.js';
import {
  ConflictOnWriteError,
  ExtractionFailure,
  MonitoringError,
  NotFoundError,
  errorMessage,
} from '../types/index.js';
import {
  captureSnapshot,
  isEmptySnapshot,
  parseSnapshot,
  serializeSnapshot,
} from '../extraction/index.js';
import type { TemplateRegistry } from '../templates/template-registry.js';
import {
  ScoringPolicy,
  assertNoAbnormalDecrease,
  compareSnapshots,
  serializeDiff,
  similarityScoring,
} from './change-detector.js';
import { createMonitor, guidFor } from './content-types.js';
import type { MonitorDefinition } from './monitor-config.js';
import type { MonitorRegistry } from './monitor-registry.js';
import {
  DEFAULT_RECENCY_DAYS,
  assertTransition,
  isDue,
  isListed,
  isTerminal,
  monitorState,
  recencyCutoff,
  shouldRecordChange,
} from './scheduler-policy.js';
import {
  ChangeStatus,
  ChangeStore,
  Clock,
  ContentChange,
  ContentFetcher,
  ContentMonitor,
  MonitorCheckResult,
  MonitorRunOptions,
  MonitorRunResult,
  MonitorState,
  MonitorStore,
} from './types.js';

const logger = createChildLogger('content-monitor');

const systemClock: Clock = { now: () => new Date() };

export interface ContentMonitorServiceOptions {
  monitors: MonitorStore;
  changes: ChangeStore;
  templates: TemplateRegistry;
  registry: MonitorRegistry;
  fetcher: ContentFetcher;
  clock?: Clock;
  scoring?: ScoringPolicy;
  /** Days a reviewed change stays listed */
  recencyDays?: number;
  /** Largest allowed drop (percent) in a list field, 0 to disable */
  abnormalDecreasePercent?: number;
  createdBy?: string;
  /** Seconds between scheduler ticks */
  tickSeconds?: number;
  /** Minutes after which a check claim left by a dead process is taken over */
  staleClaimMinutes?: number;
  generateId?: () => string;
}

export interface CheckOptions {
  /** Check even if inactive or not due */
  force?: boolean;
  signal?: AbortSignal;
}

export interface SyncResult {
  created: number;
  updated: number;
}

export interface ChangeQuery {
  status?: ChangeStatus;
  monitorId?: string;
}

/**
 * Schedules monitor checks, records detected changes and drives their review
 */
export class ContentMonitorService {
  private readonly monitors: MonitorStore;
  private readonly changes: ChangeStore;
  private readonly templates: TemplateRegistry;
  private readonly registry: MonitorRegistry;
  private readonly fetcher: ContentFetcher;
  private readonly clock: Clock;
  private readonly scoring: ScoringPolicy;
  private readonly recencyDays: number;
  private readonly abnormalDecreasePercent: number;
  private readonly createdBy: string;
  private readonly tickSeconds: number;
  private readonly staleClaimMinutes: number;
  private readonly generateId: () => string;

  private readonly running = new Set<string>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private loopController: AbortController | null = null;
  private currentTick: Promise<void> | null = null;

  constructor(options: ContentMonitorServiceOptions) {
    this.monitors = options.monitors;
    this.changes = options.changes;
    this.templates = options.templates;
    this.registry = options.registry;
    this.fetcher = options.fetcher;
    this.clock = options.clock ?? systemClock;
    this.scoring = options.scoring ?? similarityScoring;
    this.recencyDays = options.recencyDays ?? DEFAULT_RECENCY_DAYS;
    this.abnormalDecreasePercent = options.abnormalDecreasePercent ?? 50;
    this.createdBy = options.createdBy ?? 'monitor';
    this.tickSeconds = options.tickSeconds ?? 60;
    this.staleClaimMinutes = options.staleClaimMinutes ?? 30;
    this.generateId = options.generateId ?? uuid;
  }

  /**
   * Load every stored monitor into the registry
   */
  async loadMonitors(): Promise<number> {
    const monitors = await this.monitors.listMonitors();
    this.registry.load(monitors);
    logger.info({ monitors: monitors.length }, 'Loaded monitors');
    return monitors.length;
  }

  /**
   * Create or update monitors from their definitions
   */
  async syncDefinitions(definitions: readonly MonitorDefinition[]): Promise<SyncResult> {
    const result: SyncResult = { created: 0, updated: 0 };

    for (const definition of definitions) {
      const guid = guidFor(definition.contentType, definition.code, definition.name);
      const existing =
        this.registry.getByGuid(definition.contentType, guid) ??
        (await this.monitors.getMonitorByGuid(definition.contentType, guid));

      if (existing) {
        await this.saveMonitor(this.applyDefinition(existing, definition));
        result.updated++;
        continue;
      }

      const now = this.clock.now();
      const monitor = createMonitor(
        definition.contentType,
        {
          id: this.generateId(),
          code: definition.code,
          name: definition.name,
          template: definition.template,
          url: definition.url,
          sites: definition.sites,
          ...definition.settings,
          createdAt: now,
        },
        definition.channelId
      );

      try {
        this.registry.set(await this.monitors.insertMonitor(monitor));
        result.created++;
      } catch (error) {
        if (!(error instanceof ConflictOnWriteError)) {
          throw error;
        }
        const stored = await this.monitors.getMonitorByGuid(definition.contentType, guid);
        if (!stored) {
          throw error;
        }
        await this.saveMonitor(this.applyDefinition(stored, definition));
        result.updated++;
      }
    }

    logger.info({ ...result, definitions: definitions.length }, 'Synchronized monitor definitions');
    return result;
  }

  listMonitors(): ContentMonitor[] {
    return this.registry.list();
  }

  getMonitor(idOrGuid: string): ContentMonitor {
    const monitor = this.registry.find(idOrGuid);
    if (!monitor) {
      throw new NotFoundError(`Monitor not found: ${idOrGuid}`);
    }
    return monitor;
  }

  state(monitor: ContentMonitor): MonitorState {
    return monitorState(monitor, this.clock.now(), this.running.has(monitor.id));
  }

  /**
   * Check one monitor. Failures are reported in the result, never thrown.
   */
  async checkMonitor(idOrGuid: string, options: CheckOptions = {}): Promise<MonitorCheckResult> {
    const monitor = this.getMonitor(idOrGuid);
    const skipped = (outcome: MonitorCheckResult['outcome']): MonitorCheckResult => ({
      monitorId: monitor.id,
      guid: monitor.guid,
      outcome,
    });

    if (!options.force) {
      if (!monitor.active) return skipped('inactive');
      if (!isDue(monitor, this.clock.now())) return skipped('not_due');
    }
    if (this.running.has(monitor.id)) {
      logger.debug({ guid: monitor.guid }, 'Skipping - check already in flight');
      return skipped('in_flight');
    }

    this.running.add(monitor.id);
    const executedAt = this.clock.now();
    const startTime = Date.now();
    let claimed = false;
    let current = monitor;

    try {
      claimed = await this.monitors.claimMonitor(monitor.id, executedAt, this.staleClaimBefore(executedAt));
      if (!claimed) {
        logger.debug({ guid: monitor.guid }, 'Skipping - monitor claimed elsewhere');
        return skipped('in_flight');
      }

      // Another process may have checked or reviewed since the registry was loaded
      current = (await this.monitors.getMonitor(monitor.id)) ?? monitor;
      this.registry.set(current);
      if (!options.force && !isDue(current, this.clock.now())) {
        return skipped('not_due');
      }

      return await this.runCheck(current, executedAt, startTime, options.signal);
    } catch (error) {
      const executionTime = Date.now() - startTime;

      if (options.signal?.aborted) {
        logger.info({ guid: monitor.guid }, 'Check cancelled');
        return { ...skipped('cancelled'), executionTime };
      }

      return await this.recordFailure(current, error, executedAt, executionTime);
    } finally {
      this.running.delete(monitor.id);
      if (claimed) {
        await this.releaseClaim(monitor.id);
      }
    }
  }

  /**
   * Check every due monitor in parallel
   */
  async runDue(options: MonitorRunOptions = {}): Promise<MonitorRunResult> {
    const startedAt = this.clock.now();
    const candidates = options.monitor
      ? [this.getMonitor(options.monitor)]
      : this.registry.list().filter((monitor) => options.force || isDue(monitor, startedAt));

    logger.info({ monitorCount: candidates.length, force: options.force ?? false }, 'Starting monitor run');

    const settled = await Promise.allSettled(
      candidates.map((monitor) => this.checkMonitor(monitor.id, { force: options.force, signal: options.signal }))
    );

    const details = settled.map((outcome, index): MonitorCheckResult => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const monitor = candidates[index];
      return {
        monitorId: monitor?.id ?? '',
        guid: monitor?.guid ?? '',
        outcome: 'failed',
        error: errorMessage(outcome.reason),
      };
    });

    const result: MonitorRunResult = {
      monitorsChecked: details.filter((detail) =>
        ['baseline', 'unchanged', 'below_threshold', 'change_created', 'change_updated'].includes(detail.outcome)
      ).length,
      changesDetected: details.filter(
        (detail) => detail.outcome === 'change_created' || detail.outcome === 'change_updated'
      ).length,
      failures: details.filter((detail) => detail.outcome === 'failed').length,
      details,
      startedAt,
      completedAt: this.clock.now(),
    };

    logger.info(
      {
        monitorsChecked: result.monitorsChecked,
        changesDetected: result.changesDetected,
        failures: result.failures,
      },
      'Monitor run complete'
    );

    return result;
  }

  /**
   * Run due checks on a fixed tick until stopped
   */
  start(): void {
    if (this.timer) {
      return;
    }
    this.loopController = new AbortController();
    this.timer = setInterval(() => this.tick(), this.tickSeconds * 1000);
    this.tick();
    logger.info({ tickSeconds: this.tickSeconds }, 'Monitor scheduler started');
  }

  /**
   * Stop the tick, cancel in-flight checks and wait for them to settle
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.loopController?.abort();
    this.loopController = null;
    if (this.currentTick) {
      await this.currentTick;
    }
    logger.info('Monitor scheduler stopped');
  }

  /**
   * NEW changes, plus other changes created within the recency window
   */
  async listChanges(query: ChangeQuery = {}): Promise<ContentChange[]> {
    const now = this.clock.now();
    const changes = await this.changes.listChanges({
      ...query,
      createdSince: recencyCutoff(now, this.recencyDays),
    });
    return changes
      .filter((change) => isListed(change, now, this.recencyDays))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Move a change through review. A decided change becomes its monitor's
   * new baseline. Holds the monitor's check lock while writing, so no
   * check runs against the baseline being replaced.
   */
  async reviewChange(id: string, status: ChangeStatus, user?: string): Promise<ContentChange> {
    const found = await this.changes.getChange(id);
    if (!found) {
      throw new NotFoundError(`Change not found: ${id}`);
    }
    assertTransition(found, status);

    const { monitorId } = found;
    const busy = () =>
      new ConflictOnWriteError(`Monitor ${monitorId} is being checked, retry the review`, { changeId: id });

    if (this.running.has(monitorId)) {
      throw busy();
    }
    this.running.add(monitorId);
    let claimed = false;

    try {
      const now = this.clock.now();
      claimed = await this.monitors.claimMonitor(monitorId, now, this.staleClaimBefore(now));
      if (!claimed) {
        throw busy();
      }

      const change = (await this.changes.getChange(id)) ?? found;
      assertTransition(change, status);

      const updated = await this.changes.updateChange({
        ...change,
        status,
        reviewedBy: user ?? change.reviewedBy,
        updatedAt: now,
      });

      if (isTerminal(status)) {
        const monitor = (await this.monitors.getMonitor(monitorId)) ?? this.registry.get(monitorId);
        if (monitor && monitor.pendingChangeId === change.id) {
          await this.saveMonitor({
            ...monitor,
            snapshot: change.snapshotAfter,
            pendingChangeId: undefined,
            updatedAt: now,
          });
        }
      }

      logger.info({ changeId: id, from: change.status, to: status, user }, 'Change reviewed');
      return updated;
    } finally {
      this.running.delete(monitorId);
      if (claimed) {
        await this.releaseClaim(monitorId);
      }
    }
  }

  private tick(): void {
    if (this.currentTick || !this.loopController) {
      return;
    }
    const signal = this.loopController.signal;
    this.currentTick = this.runDue({ signal })
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error({ error: errorMessage(error) }, 'Monitor run failed');
        }
      )
      .finally(() => {
        this.currentTick = null;
      });
  }

  private async runCheck(
    monitor: ContentMonitor,
    executedAt: Date,
    startTime: number,
    signal?: AbortSignal
  ): Promise<MonitorCheckResult> {
    const configuration = this.templates.resolve(monitor.template);
    const url = monitor.url ?? configuration.url;
    if (!url) {
      throw new ExtractionFailure(`Monitor ${monitor.guid} has no source URL`, monitor.id);
    }

    logger.info({ guid: monitor.guid, url }, 'Checking monitor');

    const raw = await this.fetcher.fetch(
      { monitorId: monitor.id, guid: monitor.guid, url, channelId: monitor.channelId },
      signal
    );
    signal?.throwIfAborted();

    const after = captureSnapshot(configuration, raw, { sort: monitor.sort, maxResults: monitor.maxResults });
    const serialized = serializeSnapshot(after);
    const baseline = parseSnapshot(monitor.snapshot);
    const now = this.clock.now();
    const executionTime = Date.now() - startTime;

    const checked: ContentMonitor = {
      ...monitor,
      lastCheckedAt: now,
      executedAt,
      executionTime,
      errorMessage: undefined,
      retry: 0,
      updatedAt: now,
    };
    const result: MonitorCheckResult = {
      monitorId: monitor.id,
      guid: monitor.guid,
      outcome: 'unchanged',
      executionTime,
    };

    if (isEmptySnapshot(baseline) && !monitor.pendingChangeId) {
      signal?.throwIfAborted();
      await this.saveMonitor({ ...checked, snapshot: serialized });
      logger.info({ guid: monitor.guid }, 'Baseline snapshot captured');
      return { ...result, outcome: 'baseline' };
    }

    assertNoAbnormalDecrease(baseline, after, this.abnormalDecreasePercent, monitor.id);
    const { diff, differencePercent } = compareSnapshots(baseline, after, this.scoring);
    const record = shouldRecordChange(differencePercent, monitor.minDifference);
    const pending = await this.openChange(monitor);

    signal?.throwIfAborted();

    if (pending) {
      const linked: ContentMonitor = { ...checked, pendingChangeId: pending.id };

      if (pending.snapshotAfter === serialized) {
        await this.saveMonitor(linked);
        if (pending.id !== monitor.pendingChangeId) {
          logger.info({ guid: monitor.guid, changeId: pending.id }, 'Linked change stored by an interrupted check');
          return { ...result, outcome: 'change_created', difference: pending.difference, changeId: pending.id };
        }
        return { ...result, outcome: 'unchanged', difference: differencePercent };
      }

      if (!record) {
        await this.saveMonitor(linked);
        return { ...result, outcome: 'below_threshold', difference: differencePercent };
      }

      const change = await this.changes.updateChange({
        ...pending,
        snapshotAfter: serialized,
        snapshotDiff: serializeDiff(diff),
        difference: differencePercent,
        executionTime,
        status: 'NEW',
        updatedAt: now,
      });
      await this.saveMonitor(linked);
      logger.info({ guid: monitor.guid, changeId: change.id, difference: differencePercent }, 'Open change re-evaluated');
      return { ...result, outcome: 'change_updated', difference: differencePercent, changeId: change.id };
    }

    if (!record) {
      await this.saveMonitor({ ...checked, pendingChangeId: undefined });
      if (differencePercent > 0) {
        logger.debug(
          { guid: monitor.guid, difference: differencePercent, minDifference: monitor.minDifference },
          'Difference below threshold'
        );
      }
      return {
        ...result,
        outcome: differencePercent === 0 ? 'unchanged' : 'below_threshold',
        difference: differencePercent,
      };
    }

    const change = await this.changes.insertChange({
      id: this.generateId(),
      code: monitor.code,
      monitorId: monitor.id,
      snapshotBefore: monitor.snapshot,
      snapshotAfter: serialized,
      snapshotDiff: serializeDiff(diff),
      executionTime,
      difference: differencePercent,
      status: 'NEW',
      sites: monitor.sites || configuration.sites,
      createdBy: this.createdBy,
      createdAt: now,
      updatedAt: now,
    });
    await this.saveMonitor({ ...checked, pendingChangeId: change.id });

    logger.info({ guid: monitor.guid, changeId: change.id, difference: differencePercent }, 'Change detected');
    return { ...result, outcome: 'change_created', difference: differencePercent, changeId: change.id };
  }

  /**
   * The monitor's pending change while it is still awaiting a decision.
   * Without a pending id, an open change against the current baseline is
   * one whose check failed before the monitor was updated.
   */
  private async openChange(monitor: ContentMonitor): Promise<ContentChange | null> {
    if (monitor.pendingChangeId) {
      const change = await this.changes.getChange(monitor.pendingChangeId);
      return change && !isTerminal(change.status) ? change : null;
    }
    const orphan = await this.changes.findOpenChange(monitor.id);
    return orphan && orphan.snapshotBefore === monitor.snapshot ? orphan : null;
  }

  private staleClaimBefore(now: Date): Date {
    return new Date(now.getTime() - this.staleClaimMinutes * 60 * 1000);
  }

  private async releaseClaim(monitorId: string): Promise<void> {
    try {
      await this.monitors.releaseMonitor(monitorId);
    } catch (error) {
      logger.error({ monitorId, error: errorMessage(error) }, 'Failed to release check claim');
    }
  }

  private async recordFailure(
    monitor: ContentMonitor,
    error: unknown,
    executedAt: Date,
    executionTime: number
  ): Promise<MonitorCheckResult> {
    const message = errorMessage(error);
    const retry = monitor.retry + 1;

    logger.warn(
      {
        guid: monitor.guid,
        code: error instanceof MonitoringError ? error.code : undefined,
        retry,
        error: message,
      },
      'Monitor check failed'
    );

    try {
      await this.saveMonitor({
        ...monitor,
        executedAt,
        executionTime,
        errorMessage: message,
        retry,
        updatedAt: this.clock.now(),
      });
    } catch (saveError) {
      logger.error({ guid: monitor.guid, error: errorMessage(saveError) }, 'Failed to record check failure');
    }

    return { monitorId: monitor.id, guid: monitor.guid, outcome: 'failed', error: message, executionTime };
  }

  private applyDefinition(monitor: ContentMonitor, definition: MonitorDefinition): ContentMonitor {
    const common = {
      template: definition.template,
      url: definition.url,
      sites: definition.sites,
      ...definition.settings,
      updatedAt: this.clock.now(),
    };
    if (monitor.contentType === 'video') {
      return { ...monitor, ...common, channelId: definition.channelId ?? monitor.channelId };
    }
    return { ...monitor, ...common };
  }

  private async saveMonitor(monitor: ContentMonitor): Promise<ContentMonitor> {
    const saved = await this.monitors.updateMonitor(monitor);
    this.registry.set(saved);
    return saved;
  }
}
