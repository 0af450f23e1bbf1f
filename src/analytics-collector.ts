/**
 * Bridges statistics snapshots to a pull-based metrics protocol.
 *
 * `describe()` advertises a fixed set of descriptors; `collect()` computes
 * a fresh snapshot and turns it into samples. Scrapes of the same collector
 * are serialized by a mutex held for retrieval, aggregation and emission.
 */

import { Mutex } from 'async-mutex';
import { getAnalyticsConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { SnapshotProvider } from './snapshot.js';
import type {
  AnalyticsStats,
  MetricDescriptor,
  MetricSample,
  MetricType,
} from './types.js';

type SimpleMetric =
  | 'unique_visitors_total'
  | 'visits_total'
  | 'page_views'
  | 'current_visitors'
  | 'bounce_rate';

type RateMetric =
  | 'page_rate'
  | 'source_rate'
  | 'device_rate'
  | 'os_rate'
  | 'browser_rate'
  | 'entry_pages_rate'
  | 'exit_pages_rate';

interface MetricShape {
  help: string;
  type: MetricType;
}

const SIMPLE_METRICS: Record<SimpleMetric, MetricShape> = {
  unique_visitors_total: { help: 'Total number of unique visitors', type: 'counter' },
  visits_total: { help: 'Total number of visits', type: 'counter' },
  page_views: { help: 'Total number of page views', type: 'counter' },
  current_visitors: { help: 'Current visitors', type: 'gauge' },
  bounce_rate: { help: 'Bounce rate (one-page visits per page view)', type: 'gauge' },
};

interface RateShape {
  help: string;
  label: string;
  select: (stats: AnalyticsStats) => ReadonlyMap<string, number>;
}

const RATE_METRIC_NAMES: readonly RateMetric[] = [
  'page_rate',
  'source_rate',
  'device_rate',
  'os_rate',
  'browser_rate',
  'entry_pages_rate',
  'exit_pages_rate',
];

const RATE_METRICS: Record<RateMetric, RateShape> = {
  page_rate: { help: 'Rating of page', label: 'page', select: (s) => s.pages },
  source_rate: { help: 'Rating of source', label: 'source', select: (s) => s.sources },
  device_rate: { help: 'Rating of device', label: 'device', select: (s) => s.devices },
  os_rate: { help: 'Rating of OS', label: 'os', select: (s) => s.os },
  browser_rate: { help: 'Rating of browser', label: 'browser', select: (s) => s.browsers },
  entry_pages_rate: { help: 'Rating of entry pages', label: 'page', select: (s) => s.entryPages },
  exit_pages_rate: { help: 'Rating of exit pages', label: 'page', select: (s) => s.exitPages },
};

export class AnalyticsCollector {
  private readonly mutex = new Mutex();
  private readonly simple: Record<SimpleMetric, MetricDescriptor>;
  private readonly rates: Record<RateMetric, MetricDescriptor>;
  private readonly descriptors: readonly MetricDescriptor[];

  constructor(
    private readonly provider: SnapshotProvider,
    readonly domain: string,
    constLabels: Readonly<Record<string, string>> = { domain },
  ) {
    const labels = { ...constLabels };

    this.simple = {
      unique_visitors_total: simpleDescriptor('unique_visitors_total', labels),
      visits_total: simpleDescriptor('visits_total', labels),
      page_views: simpleDescriptor('page_views', labels),
      current_visitors: simpleDescriptor('current_visitors', labels),
      bounce_rate: simpleDescriptor('bounce_rate', labels),
    };
    this.rates = {
      page_rate: rateDescriptor('page_rate', labels),
      source_rate: rateDescriptor('source_rate', labels),
      device_rate: rateDescriptor('device_rate', labels),
      os_rate: rateDescriptor('os_rate', labels),
      browser_rate: rateDescriptor('browser_rate', labels),
      entry_pages_rate: rateDescriptor('entry_pages_rate', labels),
      exit_pages_rate: rateDescriptor('exit_pages_rate', labels),
    };
    this.descriptors = Object.freeze([
      ...Object.values(this.simple),
      ...RATE_METRIC_NAMES.map((name) => this.rates[name]),
    ]);
  }

  /** The fixed descriptor set. Independent of snapshot content. */
  describe(): readonly MetricDescriptor[] {
    return this.descriptors;
  }

  /**
   * Compute a snapshot and emit its samples. A snapshot failure rejects
   * the whole collect; no samples are produced for that scrape.
   */
  async collect(): Promise<MetricSample[]> {
    return this.mutex.runExclusive(async () => {
      const logger = getAnalyticsConfig().getLogger();

      let stats: AnalyticsStats;
      try {
        stats = await this.provider.snapshot(this.domain);
      } catch (error) {
        logger.error(`[AnalyticsCollector] Error getting stats for ${this.domain}`, {
          error: errorMessage(error),
        });
        throw error;
      }

      const samples = this.toSamples(stats);
      logger.debug(`[AnalyticsCollector] Collected ${samples.length} samples`, {
        domain: this.domain,
      });
      return samples;
    });
  }

  private toSamples(stats: AnalyticsStats): MetricSample[] {
    const samples: MetricSample[] = [
      { descriptor: this.simple.unique_visitors_total, value: stats.uniqueVisitors, labelValues: [] },
      { descriptor: this.simple.visits_total, value: stats.totalVisits, labelValues: [] },
      { descriptor: this.simple.page_views, value: stats.totalPageViews, labelValues: [] },
      { descriptor: this.simple.current_visitors, value: stats.currentVisitors, labelValues: [] },
    ];

    // No page views means no bounce rate; skip the sample rather than emit NaN.
    if (stats.bounceRate !== null) {
      samples.push({ descriptor: this.simple.bounce_rate, value: stats.bounceRate, labelValues: [] });
    }

    for (const name of RATE_METRIC_NAMES) {
      const descriptor = this.rates[name];
      for (const [key, count] of RATE_METRICS[name].select(stats)) {
        samples.push({ descriptor, value: count, labelValues: [key] });
      }
    }

    return samples;
  }
}

function simpleDescriptor(
  name: SimpleMetric,
  constLabels: Readonly<Record<string, string>>,
): MetricDescriptor {
  const { help, type } = SIMPLE_METRICS[name];
  const descriptor: MetricDescriptor = { name, help, type, labelNames: [], constLabels };
  return Object.freeze(descriptor);
}

function rateDescriptor(
  name: RateMetric,
  constLabels: Readonly<Record<string, string>>,
): MetricDescriptor {
  const { help, label } = RATE_METRICS[name];
  const descriptor: MetricDescriptor = {
    name,
    help,
    type: 'gauge',
    labelNames: [label],
    constLabels,
  };
  return Object.freeze(descriptor);
}
