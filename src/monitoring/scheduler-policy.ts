import { InvalidTransitionError } from '../types/index.js';
import type { ChangeStatus, ContentChange, ContentMonitor, MonitorState } from './types.js';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export const DEFAULT_RECENCY_DAYS = 7;

/**
 * Allowed review transitions. NEW may be decided directly.
 */
export const CHANGE_TRANSITIONS: Record<ChangeStatus, readonly ChangeStatus[]> = {
  NEW: ['UNDER_REVIEW', 'APPROVED', 'REJECTED'],
  UNDER_REVIEW: ['APPROVED', 'REJECTED'],
  APPROVED: [],
  REJECTED: [],
};

/**
 * When the monitor next becomes due, or undefined if it is due now or inactive
 */
export function nextCheckAt(monitor: ContentMonitor): Date | undefined {
  if (!monitor.active || !monitor.lastCheckedAt) {
    return undefined;
  }
  return new Date(monitor.lastCheckedAt.getTime() + monitor.interval * MINUTE_MS);
}

/**
 * Active and never checked, or its interval has elapsed since the last successful check
 */
export function isDue(monitor: ContentMonitor, now: Date): boolean {
  if (!monitor.active) {
    return false;
  }
  const next = nextCheckAt(monitor);
  return next === undefined || now.getTime() >= next.getTime();
}

export function monitorState(monitor: ContentMonitor, now: Date, checking = false): MonitorState {
  if (!monitor.active) {
    return 'INACTIVE';
  }
  if (checking) {
    return 'CHECKING';
  }
  return isDue(monitor, now) ? 'DUE' : 'ACTIVE';
}

/**
 * A change is recorded only for a non-zero difference at or above the threshold
 */
export function shouldRecordChange(difference: number, minDifference: number): boolean {
  return difference > 0 && difference >= minDifference;
}

export function isTerminal(status: ChangeStatus): boolean {
  return CHANGE_TRANSITIONS[status].length === 0;
}

export function canTransition(from: ChangeStatus, to: ChangeStatus): boolean {
  return CHANGE_TRANSITIONS[from].includes(to);
}

export function assertTransition(change: Pick<ContentChange, 'id' | 'status'>, to: ChangeStatus): void {
  if (!canTransition(change.status, to)) {
    throw new InvalidTransitionError(`Change ${change.id} cannot move from ${change.status} to ${to}`, {
      changeId: change.id,
      from: change.status,
      to,
    });
  }
}

/**
 * Oldest creation time a reviewed change may have and still be listed
 */
export function recencyCutoff(now: Date, recencyDays = DEFAULT_RECENCY_DAYS): Date {
  return new Date(now.getTime() - recencyDays * DAY_MS);
}

/**
 * NEW changes are always listed; others only while recent
 */
export function isListed(
  change: Pick<ContentChange, 'status' | 'createdAt'>,
  now: Date,
  recencyDays = DEFAULT_RECENCY_DAYS
): boolean {
  return change.status === 'NEW' || change.createdAt.getTime() >= recencyCutoff(now, recencyDays).getTime();
}
