import pg from 'pg';
import { Config, ConflictOnWriteError, PostgresError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { SORT_ORDERS } from '../extraction/types.js';
import { isContentTypeName } from './content-types.js';
import {
  CHANGE_STATUSES,
  ChangeListFilter,
  ChangeStore,
  ContentChange,
  ContentMonitor,
  ContentTypeName,
  MonitorStore,
} from './types.js';

const { Pool } = pg;
const logger = createChildLogger('monitor-repository');

type MonitorRow = {
  id: string;
  content_type: string;
  guid: string;
  code: string;
  name: string;
  template: string;
  url: string | null;
  sites: string;
  channel_id: string | null;
  active: boolean;
  interval_minutes: number;
  min_difference: number;
  sort: string;
  max_results: number;
  snapshot: string;
  pending_change_id: string | null;
  last_checked_at: Date | null;
  executed_at: Date | null;
  execution_time: number | null;
  error_message: string | null;
  retry: number;
  created_at: Date;
  updated_at: Date;
};

type ChangeRow = {
  id: string;
  code: string;
  monitor_id: string;
  snapshot_before: string;
  snapshot_after: string;
  snapshot_diff: string;
  execution_time: number;
  difference: number;
  status: string;
  sites: string;
  created_by: string;
  reviewed_by: string | null;
  created_at: Date;
  updated_at: Date;
};

const MONITOR_COLUMNS = `
  id, content_type, guid, code, name, template, url, sites, channel_id, active,
  interval_minutes, min_difference, sort, max_results, snapshot, pending_change_id,
  last_checked_at, executed_at, execution_time, error_message, retry, created_at, updated_at`;

const CHANGE_COLUMNS = `
  id, code, monitor_id, snapshot_before, snapshot_after, snapshot_diff, execution_time,
  difference, status, sites, created_by, reviewed_by, created_at, updated_at`;

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

function rowToMonitor(row: MonitorRow): ContentMonitor {
  const contentType = row.content_type;
  if (!isContentTypeName(contentType)) {
    throw new PostgresError(`Monitor ${row.id} has unknown content type ${contentType}`);
  }

  const base = {
    id: row.id,
    guid: row.guid,
    code: row.code,
    name: row.name,
    template: row.template,
    url: row.url ?? undefined,
    sites: row.sites,
    active: row.active,
    interval: row.interval_minutes,
    minDifference: row.min_difference,
    sort: SORT_ORDERS.find((order) => order === row.sort) ?? 'document',
    maxResults: row.max_results,
    snapshot: row.snapshot,
    pendingChangeId: row.pending_change_id ?? undefined,
    lastCheckedAt: row.last_checked_at ?? undefined,
    executedAt: row.executed_at ?? undefined,
    executionTime: row.execution_time ?? undefined,
    errorMessage: row.error_message ?? undefined,
    retry: row.retry,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };

  if (contentType === 'video') {
    if (!row.channel_id) {
      throw new PostgresError(`Video monitor ${row.id} has no channel id`);
    }
    return { ...base, contentType, channelId: row.channel_id };
  }
  return { ...base, contentType };
}

function rowToChange(row: ChangeRow): ContentChange {
  const status = CHANGE_STATUSES.find((value) => value === row.status);
  if (!status) {
    throw new PostgresError(`Change ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    code: row.code,
    monitorId: row.monitor_id,
    snapshotBefore: row.snapshot_before,
    snapshotAfter: row.snapshot_after,
    snapshotDiff: row.snapshot_diff,
    executionTime: row.execution_time,
    difference: row.difference,
    status,
    sites: row.sites,
    createdBy: row.created_by,
    reviewedBy: row.reviewed_by ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function monitorParams(monitor: ContentMonitor): unknown[] {
  return [
    monitor.id,
    monitor.contentType,
    monitor.guid,
    monitor.code,
    monitor.name,
    monitor.template,
    monitor.url ?? null,
    monitor.sites,
    monitor.channelId ?? null,
    monitor.active,
    monitor.interval,
    monitor.minDifference,
    monitor.sort,
    monitor.maxResults,
    monitor.snapshot,
    monitor.pendingChangeId ?? null,
    monitor.lastCheckedAt ?? null,
    monitor.executedAt ?? null,
    monitor.executionTime ?? null,
    monitor.errorMessage ?? null,
    monitor.retry,
    monitor.createdAt,
    monitor.updatedAt,
  ];
}

function changeParams(change: ContentChange): unknown[] {
  return [
    change.id,
    change.code,
    change.monitorId,
    change.snapshotBefore,
    change.snapshotAfter,
    change.snapshotDiff,
    change.executionTime,
    change.difference,
    change.status,
    change.sites,
    change.createdBy,
    change.reviewedBy ?? null,
    change.createdAt,
    change.updatedAt,
  ];
}

/**
 * PostgreSQL storage for monitors and their detected changes
 */
export class PostgresMonitorRepository implements MonitorStore, ChangeStore {
  constructor(private pool: pg.Pool) {}

  // ============================================================
  // Monitor Operations
  // ============================================================

  async listMonitors(): Promise<ContentMonitor[]> {
    try {
      const result = await this.pool.query<MonitorRow>(
        `SELECT ${MONITOR_COLUMNS} FROM content_monitors ORDER BY content_type, guid`
      );
      return result.rows.map(rowToMonitor);
    } catch (error) {
      logger.error({ error }, 'Failed to list monitors');
      throw new PostgresError('Failed to list monitors', error);
    }
  }

  async getMonitor(id: string): Promise<ContentMonitor | null> {
    try {
      const result = await this.pool.query<MonitorRow>(
        `SELECT ${MONITOR_COLUMNS} FROM content_monitors WHERE id = $1`,
        [id]
      );
      const row = result.rows[0];
      return row ? rowToMonitor(row) : null;
    } catch (error) {
      logger.error({ error, id }, 'Failed to get monitor');
      throw new PostgresError('Failed to get monitor', error);
    }
  }

  async getMonitorByGuid(contentType: ContentTypeName, guid: string): Promise<ContentMonitor | null> {
    try {
      const result = await this.pool.query<MonitorRow>(
        `SELECT ${MONITOR_COLUMNS} FROM content_monitors WHERE content_type = $1 AND guid = $2`,
        [contentType, guid]
      );
      const row = result.rows[0];
      return row ? rowToMonitor(row) : null;
    } catch (error) {
      logger.error({ error, guid }, 'Failed to get monitor by guid');
      throw new PostgresError('Failed to get monitor by guid', error);
    }
  }

  async insertMonitor(monitor: ContentMonitor): Promise<ContentMonitor> {
    try {
      const result = await this.pool.query<MonitorRow>(
        `INSERT INTO content_monitors (${MONITOR_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22, $23)
         RETURNING ${MONITOR_COLUMNS}`,
        monitorParams(monitor)
      );
      logger.info({ guid: monitor.guid }, 'Monitor inserted');
      const row = result.rows[0];
      return row ? rowToMonitor(row) : monitor;
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictOnWriteError(`Monitor ${monitor.contentType}/${monitor.guid} already exists`, error);
      }
      logger.error({ error, guid: monitor.guid }, 'Failed to insert monitor');
      throw new PostgresError('Failed to insert monitor', error);
    }
  }

  async updateMonitor(monitor: ContentMonitor): Promise<ContentMonitor> {
    try {
      const result = await this.pool.query<MonitorRow>(
        `UPDATE content_monitors SET
           content_type = $2, guid = $3, code = $4, name = $5, template = $6, url = $7, sites = $8,
           channel_id = $9, active = $10, interval_minutes = $11, min_difference = $12, sort = $13,
           max_results = $14, snapshot = $15, pending_change_id = $16, last_checked_at = $17,
           executed_at = $18, execution_time = $19, error_message = $20, retry = $21,
           created_at = $22, updated_at = $23
         WHERE id = $1
         RETURNING ${MONITOR_COLUMNS}`,
        monitorParams(monitor)
      );
      const row = result.rows[0];
      if (!row) {
        throw new PostgresError(`Monitor ${monitor.id} does not exist`);
      }
      return rowToMonitor(row);
    } catch (error: unknown) {
      if (error instanceof PostgresError) {
        throw error;
      }
      if (isUniqueViolation(error)) {
        throw new ConflictOnWriteError(`Monitor ${monitor.contentType}/${monitor.guid} already exists`, error);
      }
      logger.error({ error, id: monitor.id }, 'Failed to update monitor');
      throw new PostgresError('Failed to update monitor', error);
    }
  }

  /**
   * Mark a monitor as being checked. Fails while another claim newer than
   * `staleBefore` is held, whichever process holds it.
   */
  async claimMonitor(id: string, claimedAt: Date, staleBefore: Date): Promise<boolean> {
    try {
      const result = await this.pool.query(
        `UPDATE content_monitors SET checking_since = $2
         WHERE id = $1 AND (checking_since IS NULL OR checking_since < $3)
         RETURNING id`,
        [id, claimedAt, staleBefore]
      );
      return result.rows.length > 0;
    } catch (error) {
      logger.error({ error, id }, 'Failed to claim monitor');
      throw new PostgresError('Failed to claim monitor', error);
    }
  }

  async releaseMonitor(id: string): Promise<void> {
    try {
      await this.pool.query('UPDATE content_monitors SET checking_since = NULL WHERE id = $1', [id]);
    } catch (error) {
      logger.error({ error, id }, 'Failed to release monitor');
      throw new PostgresError('Failed to release monitor', error);
    }
  }

  // ============================================================
  // Change Operations
  // ============================================================

  async getChange(id: string): Promise<ContentChange | null> {
    try {
      const result = await this.pool.query<ChangeRow>(
        `SELECT ${CHANGE_COLUMNS} FROM content_changes WHERE id = $1`,
        [id]
      );
      const row = result.rows[0];
      return row ? rowToChange(row) : null;
    } catch (error) {
      logger.error({ error, id }, 'Failed to get change');
      throw new PostgresError('Failed to get change', error);
    }
  }

  async insertChange(change: ContentChange): Promise<ContentChange> {
    try {
      const result = await this.pool.query<ChangeRow>(
        `INSERT INTO content_changes (${CHANGE_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
         RETURNING ${CHANGE_COLUMNS}`,
        changeParams(change)
      );
      logger.info({ id: change.id, monitorId: change.monitorId, difference: change.difference }, 'Change inserted');
      const row = result.rows[0];
      return row ? rowToChange(row) : change;
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictOnWriteError(`Change ${change.id} already exists`, error);
      }
      logger.error({ error, id: change.id }, 'Failed to insert change');
      throw new PostgresError('Failed to insert change', error);
    }
  }

  async updateChange(change: ContentChange): Promise<ContentChange> {
    try {
      const result = await this.pool.query<ChangeRow>(
        `UPDATE content_changes SET
           code = $2, monitor_id = $3, snapshot_before = $4, snapshot_after = $5, snapshot_diff = $6,
           execution_time = $7, difference = $8, status = $9, sites = $10, created_by = $11,
           reviewed_by = $12, created_at = $13, updated_at = $14
         WHERE id = $1
         RETURNING ${CHANGE_COLUMNS}`,
        changeParams(change)
      );
      const row = result.rows[0];
      if (!row) {
        throw new PostgresError(`Change ${change.id} does not exist`);
      }
      return rowToChange(row);
    } catch (error) {
      if (error instanceof PostgresError) {
        throw error;
      }
      logger.error({ error, id: change.id }, 'Failed to update change');
      throw new PostgresError('Failed to update change', error);
    }
  }

  async findOpenChange(monitorId: string): Promise<ContentChange | null> {
    try {
      const result = await this.pool.query<ChangeRow>(
        `SELECT ${CHANGE_COLUMNS} FROM content_changes
         WHERE monitor_id = $1 AND status IN ('NEW', 'UNDER_REVIEW')
         ORDER BY created_at DESC
         LIMIT 1`,
        [monitorId]
      );
      const row = result.rows[0];
      return row ? rowToChange(row) : null;
    } catch (error) {
      logger.error({ error, monitorId }, 'Failed to find open change');
      throw new PostgresError('Failed to find open change', error);
    }
  }

  /**
   * NEW changes, and any change created since the cutoff
   */
  async listChanges(filter: ChangeListFilter): Promise<ContentChange[]> {
    const conditions = [`(status = 'NEW' OR created_at >= $1)`];
    const params: unknown[] = [filter.createdSince];

    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.monitorId) {
      params.push(filter.monitorId);
      conditions.push(`monitor_id = $${params.length}`);
    }

    try {
      const result = await this.pool.query<ChangeRow>(
        `SELECT ${CHANGE_COLUMNS} FROM content_changes
         WHERE ${conditions.join(' AND ')}
         ORDER BY created_at DESC`,
        params
      );
      return result.rows.map(rowToChange);
    } catch (error) {
      logger.error({ error, filter }, 'Failed to list changes');
      throw new PostgresError('Failed to list changes', error);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Postgres connection pool closed');
  }
}

/**
 * Create a repository on a new connection pool
 */
export function createMonitorRepository(config: Config['postgres']): PostgresMonitorRepository {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle client');
  });

  return new PostgresMonitorRepository(pool);
}
