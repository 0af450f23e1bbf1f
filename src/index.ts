/**
 * visit-analytics-exporter
 *
 * Session reconstruction, visitor statistics and Prometheus exposition
 * for page-view analytics.
 */

// Configuration
export {
  configureAnalytics,
  getAnalyticsConfig,
  resetAnalyticsConfig,
} from './config.js';
export type {
  AnalyticsConfig,
  AnalyticsLogger,
  ResolvedAnalyticsConfig,
} from './config.js';

// Types
export type {
  AnalyticsEvent,
  AnalyticsStats,
  DeviceKind,
  MetricDescriptor,
  MetricSample,
  MetricType,
  Session,
} from './types.js';

export {
  CURRENT_VISITOR_WINDOW_MS,
  DIRECT_SOURCE,
  PAGEVIEW_EVENT_TYPE,
  SESSION_TIMEOUT_MS,
  UNKNOWN_BUCKET,
} from './constants.js';

// Errors
export {
  AnalyticsError,
  InvalidEventError,
  MalformedUrlError,
  StoreReadError,
  StoreUnavailableError,
  StoreWriteError,
} from './errors.js';
export type { AnalyticsErrorCode } from './errors.js';

// Aggregation
export {
  extractDomainAndPath,
  normalizePagePath,
  pageKey,
  referrerSourceLabel,
} from './url.js';
export type { HostAndPath } from './url.js';
export { SessionReconstructor, reconstructSessions } from './sessions.js';
export { aggregateStats, classifySource, deviceLabel } from './aggregator.js';

// Store and snapshots
export { InMemoryEventStore } from './event-store.js';
export type { EventStore } from './event-store.js';
export { SnapshotProvider } from './snapshot.js';

// Metrics
export { AnalyticsCollector } from './analytics-collector.js';
export {
  MetricsExporter,
  createMetricsHandler,
  renderMetrics,
} from './exposition.js';
export type { MetricsRequest, MetricsResponse } from './exposition.js';

// Ingestion
export {
  EventRecorder,
  computeFingerprint,
  eventInputSchema,
  getDailySalt,
  resetDailySalt,
} from './ingestion.js';
export type { ClientInfo, EventInput } from './ingestion.js';
export { parseUserAgent } from './user-agent.js';
export type { ParsedUserAgent } from './user-agent.js';
