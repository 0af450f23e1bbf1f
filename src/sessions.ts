/**
 * Session reconstruction: folds a time-ordered event sequence into
 * per-fingerprint visits.
 */

import { PAGEVIEW_EVENT_TYPE, SESSION_TIMEOUT_MS } from './constants.js';
import type { AnalyticsEvent, Session } from './types.js';
import { pageKey } from './url.js';

export class SessionReconstructor {
  private visits = new Map<string, Session[]>();

  /**
   * Fold one page view into the fingerprint's sessions. Input must arrive
   * in ascending timestamp order; only the latest session is ever extended.
   */
  add(fingerprint: string, page: string, timestamp: Date): void {
    const sessions = this.visits.get(fingerprint);
    if (!sessions) {
      this.visits.set(fingerprint, [openSession(page, timestamp)]);
      return;
    }

    const last = sessions[sessions.length - 1];
    if (timestamp.getTime() - last.lastPageViewAt.getTime() > SESSION_TIMEOUT_MS) {
      sessions.push(openSession(page, timestamp));
      return;
    }

    last.exitPage = page;
    last.pageCount++;
    last.lastPageViewAt = timestamp;
  }

  /** Sessions by fingerprint, each list in chronological order. */
  sessions(): ReadonlyMap<string, readonly Session[]> {
    return this.visits;
  }
}

function openSession(page: string, timestamp: Date): Session {
  return {
    entryPage: page,
    exitPage: page,
    pageCount: 1,
    lastPageViewAt: timestamp,
  };
}

/** Sort events by timestamp without touching the caller's array. */
export function sortByTimestamp(events: readonly AnalyticsEvent[]): AnalyticsEvent[] {
  return [...events].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Rebuild sessions for an unordered event list. Only page views are folded.
 *
 * @throws {MalformedUrlError} if any page view URL has no host.
 */
export function reconstructSessions(
  events: readonly AnalyticsEvent[],
): ReadonlyMap<string, readonly Session[]> {
  const reconstructor = new SessionReconstructor();
  for (const event of sortByTimestamp(events)) {
    if (event.type !== PAGEVIEW_EVENT_TYPE) {
      continue;
    }
    reconstructor.add(event.fingerprint, pageKey(event.url), event.timestamp);
  }
  return reconstructor.sessions();
}
