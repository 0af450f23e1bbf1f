/**
 * Event ingestion: validation, visitor fingerprinting and User-Agent
 * classification before events reach the store.
 *
 * The fingerprint is sha256(salt + domain + ip + user agent). The salt is
 * process-wide, created on first use and replaced once it is older than
 * `saltLifetimeMs`, so a visitor cannot be linked across rotations.
 */

import { createHash, randomBytes } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { getAnalyticsConfig } from './config.js';
import { InvalidEventError, MalformedUrlError } from './errors.js';
import type { EventStore } from './event-store.js';
import type { AnalyticsEvent } from './types.js';
import { extractDomainAndPath } from './url.js';
import { parseUserAgent } from './user-agent.js';

const SALT_BYTES = 32;

let dailySalt: Buffer | null = null;
let dailySaltCreatedAt = 0;

/** Current fingerprint salt, rotating it when it has expired. */
export function getDailySalt(now: number = Date.now()): Buffer {
  const cfg = getAnalyticsConfig();
  if (dailySalt === null || now - dailySaltCreatedAt > cfg.saltLifetimeMs) {
    dailySalt = randomBytes(SALT_BYTES);
    dailySaltCreatedAt = now;
    if (cfg.isDevelopment) {
      cfg.getLogger().info('[EventRecorder] Generated a new daily salt');
    }
  }
  return dailySalt;
}

/** Forget the current salt (for testing purposes). */
export function resetDailySalt(): void {
  dailySalt = null;
  dailySaltCreatedAt = 0;
}

export function computeFingerprint(
  salt: Buffer,
  domain: string,
  ip: string,
  userAgent: string,
): string {
  return createHash('sha256')
    .update(salt)
    .update(domain)
    .update(ip)
    .update(userAgent)
    .digest('hex');
}

function hasHost(link: string): boolean {
  try {
    extractDomainAndPath(link);
    return true;
  } catch (error) {
    if (error instanceof MalformedUrlError) {
      return false;
    }
    throw error;
  }
}

export const eventInputSchema = z.object({
  type: z.string().min(1),
  url: z.string().refine(hasHost, 'url must contain a host'),
  domain: z.string().min(1, 'domain is missing'),
  referrer: z
    .string()
    .refine((r) => r === '' || hasHost(r), 'referrer must contain a host')
    .default(''),
  meta: z.record(z.string()).default({}),
  props: z.record(z.string()).default({}),
});

/** Event fields supplied by the tracking client. */
export type EventInput = z.input<typeof eventInputSchema>;

/** Connection details of the tracking client. */
export interface ClientInfo {
  ip: string;
  userAgent: string;
}

export class EventRecorder {
  constructor(private readonly store: EventStore) {}

  /**
   * Validate, enrich and store a tracking event.
   *
   * @throws {InvalidEventError} when the input fails validation
   */
  async record(input: unknown, client: ClientInfo): Promise<AnalyticsEvent> {
    const parsed = eventInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidEventError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    const { type, url, domain, referrer, meta, props } = parsed.data;
    const { browser, os, device } = parseUserAgent(client.userAgent);

    const event: AnalyticsEvent = {
      id: uuidv4(),
      type,
      url,
      domain,
      referrer,
      browser,
      os,
      device,
      fingerprint: computeFingerprint(getDailySalt(), domain, client.ip, client.userAgent),
      meta,
      props,
      timestamp: new Date(),
    };

    await this.store.insert(event);
    return event;
  }
}
