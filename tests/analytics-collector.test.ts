import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AnalyticsCollector } from '../src/analytics-collector.js';
import { configureAnalytics, resetAnalyticsConfig } from '../src/config.js';
import { StoreReadError, StoreUnavailableError } from '../src/errors.js';
import { InMemoryEventStore } from '../src/event-store.js';
import type { EventStore } from '../src/event-store.js';
import { SnapshotProvider } from '../src/snapshot.js';
import type { AnalyticsEvent, MetricSample } from '../src/types.js';
import { createMockLogger, makeEvent, splitVisitEvents } from './fixtures.js';

const DESCRIPTOR_NAMES = [
	'unique_visitors_total',
	'visits_total',
	'page_views',
	'current_visitors',
	'bounce_rate',
	'page_rate',
	'source_rate',
	'device_rate',
	'os_rate',
	'browser_rate',
	'entry_pages_rate',
	'exit_pages_rate',
];

function valueOf(samples: MetricSample[], name: string): number | undefined {
	return samples.find((s) => s.descriptor.name === name)?.value;
}

function labelled(samples: MetricSample[], name: string): Record<string, number> {
	return Object.fromEntries(
		samples
			.filter((s) => s.descriptor.name === name)
			.map((s): [string, number] => [s.labelValues[0], s.value]),
	);
}

async function seededCollector(events: AnalyticsEvent[]): Promise<AnalyticsCollector> {
	const store = new InMemoryEventStore();
	for (const event of events) {
		await store.insert(event);
	}
	return new AnalyticsCollector(new SnapshotProvider(store), 'example.com');
}

/** A store whose list calls stay pending until released, in call order. */
function createGatedStore() {
	const pending: Array<() => void> = [];
	const store = {
		list: vi.fn(
			(_domain: string) =>
				new Promise<AnalyticsEvent[]>((resolve) => {
					pending.push(() => resolve([]));
				}),
		),
		insert: vi.fn(async (_event: AnalyticsEvent) => {}),
	} satisfies EventStore;
	const releaseNext = (): void => {
		pending.shift()?.();
	};
	return { store, releaseNext };
}

describe('AnalyticsCollector', () => {
	beforeEach(() => {
		resetAnalyticsConfig();
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe('describe', () => {
		it('advertises the twelve fixed metrics', () => {
			const collector = new AnalyticsCollector(new SnapshotProvider(undefined), 'example.com');
			expect(collector.describe().map((d) => d.name)).toEqual(DESCRIPTOR_NAMES);
		});

		it('attaches the domain as a constant label', () => {
			const collector = new AnalyticsCollector(new SnapshotProvider(undefined), 'example.com');
			for (const descriptor of collector.describe()) {
				expect(descriptor.constLabels).toEqual({ domain: 'example.com' });
			}
		});

		it('accepts custom constant labels', () => {
			const collector = new AnalyticsCollector(new SnapshotProvider(undefined), 'example.com', {
				site: 'main',
			});
			expect(collector.describe()[0].constLabels).toEqual({ site: 'main' });
		});

		it('labels the rate metrics by category', () => {
			const collector = new AnalyticsCollector(new SnapshotProvider(undefined), 'example.com');
			const labels = Object.fromEntries(
				collector.describe().map((d) => [d.name, d.labelNames.join(',')]),
			);
			expect(labels).toMatchObject({
				unique_visitors_total: '',
				page_rate: 'page',
				source_rate: 'source',
				device_rate: 'device',
				os_rate: 'os',
				browser_rate: 'browser',
				entry_pages_rate: 'page',
				exit_pages_rate: 'page',
			});
		});

		it('types the simple metrics', () => {
			const collector = new AnalyticsCollector(new SnapshotProvider(undefined), 'example.com');
			const types = Object.fromEntries(collector.describe().map((d) => [d.name, d.type]));
			expect(types).toMatchObject({
				unique_visitors_total: 'counter',
				visits_total: 'counter',
				page_views: 'counter',
				current_visitors: 'gauge',
				bounce_rate: 'gauge',
			});
		});

		it('returns the same descriptors on every call without touching the store', () => {
			const { store } = createGatedStore();
			const collector = new AnalyticsCollector(new SnapshotProvider(store), 'example.com');
			expect(collector.describe()).toBe(collector.describe());
			expect(store.list).not.toHaveBeenCalled();
		});
	});

	describe('collect', () => {
		it('emits the simple metrics', async () => {
			const collector = await seededCollector(splitVisitEvents());
			const samples = await collector.collect();
			expect(valueOf(samples, 'unique_visitors_total')).toBe(1);
			expect(valueOf(samples, 'visits_total')).toBe(2);
			expect(valueOf(samples, 'page_views')).toBe(3);
			expect(valueOf(samples, 'bounce_rate')).toBe(1 / 3);
		});

		it('emits one sample per categorical entry', async () => {
			const collector = await seededCollector(splitVisitEvents());
			const samples = await collector.collect();
			expect(labelled(samples, 'entry_pages_rate')).toEqual({ '/': 1, '/bar': 1 });
			expect(labelled(samples, 'exit_pages_rate')).toEqual({ '/foo': 1, '/bar': 1 });
			expect(labelled(samples, 'source_rate')).toEqual({ 'Direct/None': 3 });
			expect(labelled(samples, 'device_rate')).toEqual({ Desktop: 3 });
			expect(labelled(samples, 'os_rate')).toEqual({ Linux: 3 });
			expect(labelled(samples, 'browser_rate')).toEqual({ Firefox: 3 });
		});

		it('skips the bounce rate when there are no page views', async () => {
			const collector = await seededCollector([]);
			const samples = await collector.collect();
			expect(samples.map((s) => s.descriptor.name)).toEqual([
				'unique_visitors_total',
				'visits_total',
				'page_views',
				'current_visitors',
			]);
			expect(samples.every((s) => s.value === 0)).toBe(true);
		});

		it('skips the bounce rate when only non-pageview events exist', async () => {
			const collector = await seededCollector([makeEvent({ type: 'download' })]);
			const samples = await collector.collect();
			expect(valueOf(samples, 'bounce_rate')).toBeUndefined();
			expect(valueOf(samples, 'visits_total')).toBe(0);
			expect(labelled(samples, 'page_rate')).toEqual({});
		});

		it('attaches descriptors from describe to the samples', async () => {
			const collector = await seededCollector(splitVisitEvents());
			const samples = await collector.collect();
			const described = new Set(collector.describe());
			expect(samples.every((s) => described.has(s.descriptor))).toBe(true);
		});

		it('fails the whole collect when the store is missing', async () => {
			const collector = new AnalyticsCollector(new SnapshotProvider(undefined), 'example.com');
			await expect(collector.collect()).rejects.toBeInstanceOf(StoreUnavailableError);
		});

		it('logs the failure', async () => {
			const logger = createMockLogger();
			configureAnalytics({ getLogger: () => logger });
			const store = new InMemoryEventStore();
			vi.spyOn(store, 'list').mockRejectedValue(new StoreReadError('example.com'));
			const collector = new AnalyticsCollector(new SnapshotProvider(store), 'example.com');

			await expect(collector.collect()).rejects.toBeInstanceOf(StoreReadError);
			expect(logger.error).toHaveBeenCalledWith(
				'[AnalyticsCollector] Error getting stats for example.com',
				{ error: 'cannot list events for example.com' },
			);
		});

		it('releases the lock after a failure', async () => {
			const store = new InMemoryEventStore();
			vi.spyOn(store, 'list').mockRejectedValueOnce(new StoreReadError('example.com'));
			const collector = new AnalyticsCollector(new SnapshotProvider(store), 'example.com');

			await expect(collector.collect()).rejects.toBeInstanceOf(StoreReadError);
			await expect(collector.collect()).resolves.toHaveLength(4);
		});
	});

	describe('concurrency', () => {
		it('serializes scrapes of the same collector', async () => {
			const { store, releaseNext } = createGatedStore();
			const collector = new AnalyticsCollector(new SnapshotProvider(store), 'example.com');

			const first = collector.collect();
			const second = collector.collect();

			await vi.waitFor(() => expect(store.list).toHaveBeenCalledTimes(1));
			await new Promise((resolve) => setTimeout(resolve, 20));
			expect(store.list).toHaveBeenCalledTimes(1);

			releaseNext();
			await first;
			await vi.waitFor(() => expect(store.list).toHaveBeenCalledTimes(2));

			releaseNext();
			await expect(second).resolves.toHaveLength(4);
		});

		it('does not block scrapes of other collectors', async () => {
			const { store, releaseNext } = createGatedStore();
			const provider = new SnapshotProvider(store);
			const a = new AnalyticsCollector(provider, 'a.test');
			const b = new AnalyticsCollector(provider, 'b.test');

			const pending = Promise.all([a.collect(), b.collect()]);
			await vi.waitFor(() => expect(store.list).toHaveBeenCalledTimes(2));
			expect(store.list).toHaveBeenCalledWith('a.test');
			expect(store.list).toHaveBeenCalledWith('b.test');

			releaseNext();
			releaseNext();
			await expect(pending).resolves.toHaveLength(2);
		});
	});
});
