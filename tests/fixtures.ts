import { vi } from 'vitest';
import type { AnalyticsEvent } from '../src/types.js';

export const T0 = new Date('2026-01-01T12:00:00Z');

export const MINUTE = 60 * 1000;

/** Date `minutes` after T0. */
export function at(minutes: number): Date {
	return new Date(T0.getTime() + minutes * MINUTE);
}

let nextId = 0;

/** Build a page view on example.com with overridable fields. */
export function makeEvent(overrides: Partial<AnalyticsEvent> = {}): AnalyticsEvent {
	nextId++;
	return {
		id: `evt-${nextId}`,
		type: 'pageview',
		url: 'https://example.com/',
		domain: 'example.com',
		referrer: '',
		browser: 'Firefox',
		os: 'Linux',
		device: 'desktop',
		fingerprint: 'F1',
		meta: {},
		props: {},
		timestamp: T0,
		...overrides,
	};
}

/** Three page views for F1: `/`, `/foo` five minutes later, `/bar` at forty minutes. */
export function splitVisitEvents(): AnalyticsEvent[] {
	return [
		makeEvent({ url: 'https://example.com/', timestamp: at(0) }),
		makeEvent({ url: 'https://example.com/foo', timestamp: at(5) }),
		makeEvent({ url: 'https://example.com/bar', timestamp: at(40) }),
	];
}

export function createMockLogger() {
	return {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	};
}
