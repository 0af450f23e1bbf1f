/**
 * Snapshot provider: store retrieval plus aggregation, one immutable
 * `AnalyticsStats` per call.
 *
 * With `snapshotCacheTtlMs` configured, a snapshot is reused for at most
 * that long. Failed computations are never cached.
 */

import { aggregateStats } from './aggregator.js';
import { getAnalyticsConfig } from './config.js';
import { StoreUnavailableError } from './errors.js';
import type { EventStore } from './event-store.js';
import type { AnalyticsStats } from './types.js';

interface CachedSnapshot {
  stats: AnalyticsStats;
  computedAt: number;
}

export class SnapshotProvider {
  private cache = new Map<string, CachedSnapshot>();

  constructor(private readonly store: EventStore | undefined) {}

  /**
   * Compute the statistics for a domain.
   *
   * @throws {StoreUnavailableError} when no store is configured
   * @throws {MalformedUrlError} when an event URL or referrer has no host
   *
   * Errors from the store are rethrown unchanged.
   */
  async snapshot(domain: string): Promise<AnalyticsStats> {
    if (!this.store) {
      throw new StoreUnavailableError();
    }

    const cfg = getAnalyticsConfig();

    if (cfg.snapshotCacheTtlMs > 0) {
      const cached = this.cache.get(domain);
      if (cached && Date.now() - cached.computedAt < cfg.snapshotCacheTtlMs) {
        return cached.stats;
      }
    }

    const events = await this.store.list(domain);
    const now = Date.now();
    const stats = aggregateStats(events, now);

    cfg.getLogger().debug(`[SnapshotProvider] Computed snapshot for ${domain}`, {
      events: events.length,
      visits: stats.totalVisits,
    });

    if (cfg.snapshotCacheTtlMs > 0) {
      this.cache.set(domain, { stats, computedAt: now });
    }
    return stats;
  }

  /** Drop the cached snapshot of one domain, or of all domains. */
  invalidate(domain?: string): void {
    if (domain === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(domain);
    }
  }
}
