/**
 * Content Monitoring Module
 *
 * Checks monitored sources on a schedule, compares captured snapshots
 * against their reviewed baseline and records changes for review.
 */

// Types
export * from './types.js';

// Content types and definitions
export * from './content-types.js';
export * from './monitor-config.js';
export { MonitorRegistry } from './monitor-registry.js';

// Detection and scheduling
export * from './change-detector.js';
export * from './scheduler-policy.js';

// Infrastructure
export { HttpContentFetcher, type HttpFetcherOptions, createHttpFetcher } from './fetchers/http-fetcher.js';
export { PostgresMonitorRepository, createMonitorRepository } from './monitor-repository.js';

// Service
export * from './content-monitor.js';
export * from './context.js';
