/**
 * Statistics aggregation over one property's events.
 *
 * Only page views are counted. Page, source, device, OS and browser
 * counters are accumulated per page view; visit-level figures (bounces, current visitors, entry and exit pages)
 * come from a post-pass over the reconstructed sessions.
 */

import {
  CURRENT_VISITOR_WINDOW_MS,
  DIRECT_SOURCE,
  PAGEVIEW_EVENT_TYPE,
  UNKNOWN_BUCKET,
} from './constants.js';
import { SessionReconstructor, sortByTimestamp } from './sessions.js';
import type { AnalyticsEvent, AnalyticsStats, DeviceKind } from './types.js';
import {
  extractDomainAndPath,
  normalizePagePath,
  referrerSourceLabel,
} from './url.js';

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

/** Bucket label for a device classification. */
export function deviceLabel(device: DeviceKind | undefined): string {
  switch (device) {
    case 'desktop':
      return 'Desktop';
    case 'mobile':
      return 'Mobile';
    case 'tablet':
      return 'Tablet';
    case 'bot':
      return 'Bot';
    case 'unknown':
    case undefined:
      return UNKNOWN_BUCKET;
    default: {
      const unreachable: never = device;
      return unreachable;
    }
  }
}

/**
 * Source bucket for an event, or null for internal navigation
 * (referrer on the same host as the page).
 */
export function classifySource(urlHost: string, referrer: string): string | null {
  if (referrer === '') {
    return DIRECT_SOURCE;
  }
  const referrerHost = extractDomainAndPath(referrer).host;
  if (referrerHost === urlHost) {
    return null;
  }
  return referrerSourceLabel(referrerHost);
}

/**
 * Compute the statistics snapshot for a set of events.
 *
 * @param events - events of one property, in any order
 * @param now - wall-clock reference for the current-visitor window
 * @throws {MalformedUrlError} if any page view URL or referrer has no host;
 *   no partial result is produced
 */
export function aggregateStats(
  events: readonly AnalyticsEvent[],
  now: number = Date.now(),
): AnalyticsStats {
  let pageViews = 0;

  const pages = new Map<string, number>();
  const sources = new Map<string, number>();
  const devices = new Map<string, number>();
  const os = new Map<string, number>();
  const browsers = new Map<string, number>();
  const reconstructor = new SessionReconstructor();

  for (const event of sortByTimestamp(events)) {
    // Other event kinds are stored but never counted.
    if (event.type !== PAGEVIEW_EVENT_TYPE) {
      continue;
    }
    pageViews++;

    const { host, path } = extractDomainAndPath(event.url);
    const page = normalizePagePath(path);
    increment(pages, page);
    reconstructor.add(event.fingerprint, page, event.timestamp);

    const source = classifySource(host, event.referrer);
    if (source !== null) {
      increment(sources, source);
    }

    increment(devices, deviceLabel(event.device));
    increment(os, event.os !== '' ? event.os : UNKNOWN_BUCKET);
    increment(browsers, event.browser !== '' ? event.browser : UNKNOWN_BUCKET);
  }

  const entryPages = new Map<string, number>();
  const exitPages = new Map<string, number>();
  let totalVisits = 0;
  let onePageVisits = 0;
  let currentVisitors = 0;

  const visits = reconstructor.sessions();
  for (const sessions of visits.values()) {
    for (const session of sessions) {
      if (session.pageCount === 1) {
        onePageVisits++;
      }
      if (Math.abs(now - session.lastPageViewAt.getTime()) < CURRENT_VISITOR_WINDOW_MS) {
        currentVisitors++;
      }
      increment(entryPages, session.entryPage);
      increment(exitPages, session.exitPage);
      totalVisits++;
    }
  }

  return {
    uniqueVisitors: visits.size,
    totalVisits,
    totalPageViews: pageViews,
    currentVisitors,
    // Denominator is page views, not visits.
    bounceRate: pageViews > 0 ? onePageVisits / pageViews : null,
    pages,
    sources,
    devices,
    os,
    browsers,
    entryPages,
    exitPages,
  };
}
