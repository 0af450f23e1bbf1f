/**
 * Prometheus text exposition for analytics collectors.
 *
 * Every scrape renders into a fresh prom-client `Registry`, so nothing
 * computed for one scrape is visible to the next.
 */

import { Counter, Gauge, Registry } from 'prom-client';
import { AnalyticsCollector } from './analytics-collector.js';
import { getAnalyticsConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { EventStore } from './event-store.js';
import { SnapshotProvider } from './snapshot.js';
import type { MetricDescriptor, MetricSample } from './types.js';

type RegisteredMetric =
  | { type: 'counter'; metric: Counter<string> }
  | { type: 'gauge'; metric: Gauge<string> };

/** Encode samples in the Prometheus text format. */
export async function renderMetrics(
  descriptors: readonly MetricDescriptor[],
  samples: readonly MetricSample[],
): Promise<string> {
  const registry = new Registry();
  const metrics = new Map<string, RegisteredMetric>();

  for (const descriptor of descriptors) {
    if (metrics.has(descriptor.name)) {
      continue;
    }
    const config = {
      name: descriptor.name,
      help: descriptor.help,
      labelNames: [...Object.keys(descriptor.constLabels), ...descriptor.labelNames],
      registers: [registry],
    };
    metrics.set(
      descriptor.name,
      descriptor.type === 'counter'
        ? { type: 'counter', metric: new Counter(config) }
        : { type: 'gauge', metric: new Gauge(config) },
    );
  }

  for (const sample of samples) {
    const registered = metrics.get(sample.descriptor.name);
    if (!registered) {
      throw new Error(`sample for undescribed metric ${sample.descriptor.name}`);
    }
    const labels: Record<string, string> = { ...sample.descriptor.constLabels };
    sample.descriptor.labelNames.forEach((name, i) => {
      labels[name] = sample.labelValues[i] ?? '';
    });

    if (registered.type === 'counter') {
      registered.metric.inc(labels, sample.value);
    } else {
      registered.metric.set(labels, sample.value);
    }
  }

  return registry.metrics();
}

/** One collector per domain, scraped together. */
export class MetricsExporter {
  private readonly collectors: AnalyticsCollector[];

  constructor(store: EventStore | undefined, domains: readonly string[]) {
    if (domains.length === 0) {
      throw new Error('the domain list is empty');
    }
    const provider = new SnapshotProvider(store);
    this.collectors = [...new Set(domains)].map(
      (domain) => new AnalyticsCollector(provider, domain),
    );
  }

  get contentType(): string {
    return Registry.PROMETHEUS_CONTENT_TYPE;
  }

  /** Domains this exporter publishes. */
  get domains(): string[] {
    return this.collectors.map((c) => c.domain);
  }

  describe(): MetricDescriptor[] {
    return this.collectors.flatMap((c) => c.describe());
  }

  /**
   * Scrape every domain and render the exposition. Any collector failure
   * fails the whole scrape.
   */
  async metrics(): Promise<string> {
    const samples = await Promise.all(this.collectors.map((c) => c.collect()));
    return renderMetrics(this.describe(), samples.flat());
  }
}

/** The request fields the metrics handler reads. */
export interface MetricsRequest {
  method?: string;
  url?: string;
}

/** The response calls the metrics handler makes. */
export interface MetricsResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

/**
 * Request handler serving the exposition at `path`, compatible with
 * `http.createServer`. The returned promise never rejects.
 */
export function createMetricsHandler(
  exporter: MetricsExporter,
  path = '/metrics',
): (req: MetricsRequest, res: MetricsResponse) => Promise<void> {
  return async (req, res) => {
    const requestPath = (req.url ?? '/').split('?')[0];
    if (req.method !== 'GET' || requestPath !== path) {
      res.statusCode = 404;
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.end('Not Found');
      return;
    }

    try {
      const body = await exporter.metrics();
      res.statusCode = 200;
      res.setHeader('Content-Type', exporter.contentType);
      res.end(body);
    } catch (error) {
      getAnalyticsConfig().getLogger().error('[MetricsExporter] Scrape failed', {
        error: errorMessage(error),
      });
      res.statusCode = 500;
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.end('An error has occurred while serving metrics');
    }
  };
}
