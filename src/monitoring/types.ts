/**
 * Types for content monitoring infrastructure
 */
import type { SortOrder } from '../extraction/types.js';

/**
 * Kinds of monitored content
 */
export type ContentTypeName = 'roundup' | 'video' | 'event' | 'publication';

/**
 * Review status of a detected change
 */
export type ChangeStatus = 'NEW' | 'UNDER_REVIEW' | 'APPROVED' | 'REJECTED';

export const CHANGE_STATUSES: readonly ChangeStatus[] = ['NEW', 'UNDER_REVIEW', 'APPROVED', 'REJECTED'];

/**
 * Scheduling state of a monitor
 */
export type MonitorState = 'INACTIVE' | 'ACTIVE' | 'DUE' | 'CHECKING';

/**
 * Per-monitor settings
 */
export interface MonitorSettings {
  active: boolean;
  /** Minutes between checks */
  interval: number;
  /** Smallest difference (percent) that creates a change */
  minDifference: number;
  sort: SortOrder;
  /** Cap on list results, 0 for no cap */
  maxResults: number;
}

interface ContentMonitorBase extends MonitorSettings {
  id: string;
  /** `<type-code>-<code>-<name>` */
  guid: string;
  code: string;
  name: string;
  /** Channel template used to capture snapshots */
  template: string;
  /** Source URL; falls back to the template's URL */
  url?: string;
  sites: string;
  /** Serialized baseline snapshot, empty before the first capture */
  snapshot: string;
  pendingChangeId?: string;
  /** Last successful check */
  lastCheckedAt?: Date;
  executedAt?: Date;
  /** Duration of the last check in ms */
  executionTime?: number;
  errorMessage?: string;
  /** Consecutive failed checks */
  retry: number;
  createdAt: Date;
  updatedAt: Date;
}

export type VideoMonitor = ContentMonitorBase & {
  contentType: 'video';
  channelId: string;
};

export type PageMonitor = ContentMonitorBase & {
  contentType: Exclude<ContentTypeName, 'video'>;
  channelId?: undefined;
};

/**
 * Monitor of one source. Video monitors are bound to a channel.
 */
export type ContentMonitor = VideoMonitor | PageMonitor;

/**
 * Detected difference awaiting or past review
 */
export interface ContentChange {
  id: string;
  code: string;
  monitorId: string;
  snapshotBefore: string;
  snapshotAfter: string;
  /** Serialized structural diff */
  snapshotDiff: string;
  executionTime: number;
  /** Integer 0-100 */
  difference: number;
  status: ChangeStatus;
  sites: string;
  createdBy: string;
  /** Last user to move the change through review */
  reviewedBy?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChangeListFilter {
  status?: ChangeStatus;
  monitorId?: string;
  /** Non-NEW changes created before this are left out */
  createdSince: Date;
}

/**
 * Persistence for monitors
 */
export interface MonitorStore {
  listMonitors(): Promise<ContentMonitor[]>;
  getMonitor(id: string): Promise<ContentMonitor | null>;
  getMonitorByGuid(contentType: ContentTypeName, guid: string): Promise<ContentMonitor | null>;
  /** Throws ConflictOnWriteError when (contentType, guid) exists */
  insertMonitor(monitor: ContentMonitor): Promise<ContentMonitor>;
  updateMonitor(monitor: ContentMonitor): Promise<ContentMonitor>;
  /**
   * Take the monitor's check lock, shared by every process on the store.
   * False while a claim newer than `staleBefore` is held.
   */
  claimMonitor(id: string, claimedAt: Date, staleBefore: Date): Promise<boolean>;
  releaseMonitor(id: string): Promise<void>;
}

/**
 * Persistence for detected changes
 */
export interface ChangeStore {
  getChange(id: string): Promise<ContentChange | null>;
  insertChange(change: ContentChange): Promise<ContentChange>;
  updateChange(change: ContentChange): Promise<ContentChange>;
  /** Latest NEW or UNDER_REVIEW change of a monitor */
  findOpenChange(monitorId: string): Promise<ContentChange | null>;
  listChanges(filter: ChangeListFilter): Promise<ContentChange[]>;
}

export interface Clock {
  now(): Date;
}

/**
 * Where a check reads its content from
 */
export interface SourceRef {
  monitorId: string;
  guid: string;
  url: string;
  channelId?: string;
}

/**
 * Reads raw content for a source
 */
export interface ContentFetcher {
  fetch(source: SourceRef, signal?: AbortSignal): Promise<string>;
}

/**
 * How a single monitor check ended
 */
export type CheckOutcome =
  | 'baseline'
  | 'unchanged'
  | 'below_threshold'
  | 'change_created'
  | 'change_updated'
  | 'failed'
  | 'cancelled'
  | 'in_flight'
  | 'not_due'
  | 'inactive';

export interface MonitorCheckResult {
  monitorId: string;
  guid: string;
  outcome: CheckOutcome;
  difference?: number;
  changeId?: string;
  error?: string;
  executionTime?: number;
}

/**
 * Options for running the monitor
 */
export interface MonitorRunOptions {
  /** Check even if not due */
  force?: boolean;
  /** Only check this monitor (id or guid) */
  monitor?: string;
  signal?: AbortSignal;
}

/**
 * Result of a monitor run
 */
export interface MonitorRunResult {
  monitorsChecked: number;
  changesDetected: number;
  failures: number;
  details: MonitorCheckResult[];
  startedAt: Date;
  completedAt: Date;
}
