/**
 * Event store contract and an in-memory implementation.
 *
 * Events are indexed by their unique id and by domain. Inserting an event
 * whose id already exists replaces the stored record, moving it to the new
 * domain if that changed.
 */

import { getAnalyticsConfig } from './config.js';
import { StoreWriteError } from './errors.js';
import type { AnalyticsEvent } from './types.js';

export interface EventStore {
  /** All events recorded for a domain. Callers must not rely on order. */
  list(domain: string): Promise<AnalyticsEvent[]>;
  /** Insert a new event or replace the one with the same id. */
  insert(event: AnalyticsEvent): Promise<void>;
}

export class InMemoryEventStore implements EventStore {
  private byId = new Map<string, AnalyticsEvent>();
  private byDomain = new Map<string, Set<string>>();

  async list(domain: string): Promise<AnalyticsEvent[]> {
    const ids = this.byDomain.get(domain);
    if (!ids) {
      return [];
    }
    const events: AnalyticsEvent[] = [];
    for (const id of ids) {
      const event = this.byId.get(id);
      if (event) {
        events.push(event);
      }
    }
    return events;
  }

  async insert(event: AnalyticsEvent): Promise<void> {
    const logger = getAnalyticsConfig().getLogger();

    if (event.id === '' || event.domain === '') {
      logger.debug(`[EventStore] insert ${event.id}`, { success: false });
      throw new StoreWriteError('event id and domain are required');
    }

    const previous = this.byId.get(event.id);
    if (previous && previous.domain !== event.domain) {
      this.byDomain.get(previous.domain)?.delete(event.id);
    }

    this.byId.set(event.id, event);
    let ids = this.byDomain.get(event.domain);
    if (!ids) {
      ids = new Set<string>();
      this.byDomain.set(event.domain, ids);
    }
    ids.add(event.id);

    logger.debug(`[EventStore] insert ${event.id}`, { success: true });
  }

  /** Number of stored events across all domains. */
  size(): number {
    return this.byId.size;
  }
}
