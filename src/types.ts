/**
 * Types for the visit-analytics-exporter package.
 *
 * Events come from the ingestion side and are stored as-is; sessions and
 * stats are derived from them on every snapshot and never persisted.
 */

/** Device classification of the client that produced an event. */
export type DeviceKind = 'desktop' | 'mobile' | 'tablet' | 'bot' | 'unknown';

/** A single recorded browsing event for one web property. */
export interface AnalyticsEvent {
  id: string;
  /** Event kind. Only `'pageview'` counts towards page views. */
  type: string;
  url: string;
  /** The web property the event belongs to. */
  domain: string;
  /** Referrer URL, empty when the visit was direct. */
  referrer: string;
  browser: string;
  os: string;
  device?: DeviceKind;
  /** Anonymized visitor fingerprint, stable within one salt rotation. */
  fingerprint: string;
  meta: Record<string, string>;
  props: Record<string, string>;
  timestamp: Date;
}

/** One visit: a run of page views with no gap over the session timeout. */
export interface Session {
  entryPage: string;
  exitPage: string;
  pageCount: number;
  lastPageViewAt: Date;
}

/** Immutable statistics snapshot for one web property. */
export interface AnalyticsStats {
  /** Number of distinct fingerprints, not sessions. */
  readonly uniqueVisitors: number;
  readonly totalVisits: number;
  readonly totalPageViews: number;
  readonly currentVisitors: number;
  /** One-page visits divided by page views; null when there were no page views. */
  readonly bounceRate: number | null;

  readonly pages: ReadonlyMap<string, number>;
  readonly sources: ReadonlyMap<string, number>;
  readonly devices: ReadonlyMap<string, number>;
  readonly os: ReadonlyMap<string, number>;
  readonly browsers: ReadonlyMap<string, number>;
  readonly entryPages: ReadonlyMap<string, number>;
  readonly exitPages: ReadonlyMap<string, number>;
}

/** Prometheus metric type of a descriptor. */
export type MetricType = 'counter' | 'gauge';

/** Static shape of one exported metric. */
export interface MetricDescriptor {
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  /** Names of the labels whose values are only known at scrape time. */
  readonly labelNames: readonly string[];
  /** Labels attached to every sample of this metric. */
  readonly constLabels: Readonly<Record<string, string>>;
}

/** A single value emitted for a descriptor during a scrape. */
export interface MetricSample {
  readonly descriptor: MetricDescriptor;
  readonly value: number;
  /** Values for `descriptor.labelNames`, in the same order. */
  readonly labelValues: readonly string[];
}
