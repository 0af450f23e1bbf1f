/**
 * Dependency-injection configuration for visit-analytics-exporter.
 *
 * Consumers call `configureAnalytics()` once at startup to provide
 * environment-specific values (logger, snapshot cache, salt rotation).
 * Internal code reads values via `getAnalyticsConfig()` which fills in
 * defaults for anything not explicitly set.
 */

/** Logger interface accepted by the analytics package. */
export interface AnalyticsLogger {
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
  debug: (msg: string, meta?: Record<string, unknown>) => void;
}

/** Configuration options for the analytics package. */
export interface AnalyticsConfig {
  /** Whether running in development mode. Defaults to false. */
  isDevelopment?: boolean;
  /** Logger factory. Defaults to noop logger. */
  getLogger?: () => AnalyticsLogger;
  /**
   * How long a computed snapshot may be served again, in ms.
   * Defaults to 0 (every scrape recomputes).
   */
  snapshotCacheTtlMs?: number;
  /** Lifetime of the fingerprint salt in ms. Defaults to 86400000 (24 hours). */
  saltLifetimeMs?: number;
}

const noopLogger: AnalyticsLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/** The resolved config type where every field has a value. */
export type ResolvedAnalyticsConfig = Required<AnalyticsConfig>;

let config: AnalyticsConfig = {};

/**
 * Set (or merge) analytics configuration.
 * Typically called once at application startup.
 */
export function configureAnalytics(c: AnalyticsConfig): void {
  config = { ...config, ...c };
}

/**
 * Retrieve the fully-resolved configuration with defaults applied.
 */
export function getAnalyticsConfig(): ResolvedAnalyticsConfig {
  return {
    isDevelopment: config.isDevelopment ?? false,
    getLogger: config.getLogger ?? (() => noopLogger),
    snapshotCacheTtlMs: config.snapshotCacheTtlMs ?? 0,
    saltLifetimeMs: config.saltLifetimeMs ?? 86400000,
  };
}

/**
 * Reset configuration to empty (defaults will be used).
 * Primarily useful in tests.
 */
export function resetAnalyticsConfig(): void {
  config = {};
}
