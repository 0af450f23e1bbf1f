/**
 * Lightweight User-Agent classification into browser, OS and device class.
 */

import type { DeviceKind } from './types.js';

export interface ParsedUserAgent {
  /** Empty when the browser is not recognised. */
  browser: string;
  /** Empty when the OS is not recognised. */
  os: string;
  device: DeviceKind;
}

// Order matters: Chromium derivatives before Chrome, Chrome before Safari.
const BROWSERS: ReadonlyArray<readonly [RegExp, string]> = [
  [/headlesschrome/i, 'Headless Chrome'],
  [/edg(e|a|ios)?\//i, 'Edge'],
  [/opr\/|opera/i, 'Opera'],
  [/vivaldi/i, 'Vivaldi'],
  [/samsungbrowser/i, 'Samsung Internet'],
  [/yabrowser/i, 'Yandex'],
  [/firefox|fxios/i, 'Firefox'],
  [/chrome|chromium|crios/i, 'Chrome'],
  [/safari/i, 'Safari'],
  [/trident|msie/i, 'Internet Explorer'],
];

const OPERATING_SYSTEMS: ReadonlyArray<readonly [RegExp, string]> = [
  [/windows phone/i, 'Windows Phone'],
  [/windows/i, 'Windows'],
  [/iphone|ipad|ipod/i, 'iOS'],
  [/mac os x|macintosh/i, 'macOS'],
  [/android/i, 'Android'],
  [/\bcros\b/i, 'ChromeOS'],
  [/freebsd/i, 'FreeBSD'],
  [/linux/i, 'Linux'],
];

const BOT_PATTERN = /bot|crawl|spider|slurp|bingpreview/i;
const TABLET_PATTERN = /ipad|tablet|playbook|silk/i;
const MOBILE_PATTERN = /mobile|iphone|ipod|android|blackberry|iemobile|opera mini/i;
const DESKTOP_PATTERN = /windows|macintosh|mac os x|x11|linux|\bcros\b/i;

function firstMatch(ua: string, table: ReadonlyArray<readonly [RegExp, string]>): string {
  for (const [pattern, name] of table) {
    if (pattern.test(ua)) {
      return name;
    }
  }
  return '';
}

// Crawlers and iPads also report Mobile, so bot and tablet are checked first.
function classifyDevice(ua: string): DeviceKind {
  if (BOT_PATTERN.test(ua)) return 'bot';
  if (TABLET_PATTERN.test(ua)) return 'tablet';
  if (MOBILE_PATTERN.test(ua)) return 'mobile';
  if (DESKTOP_PATTERN.test(ua)) return 'desktop';
  return 'unknown';
}

export function parseUserAgent(ua: string): ParsedUserAgent {
  if (!ua) {
    return { browser: '', os: '', device: 'unknown' };
  }
  return {
    browser: firstMatch(ua, BROWSERS),
    os: firstMatch(ua, OPERATING_SYSTEMS),
    device: classifyDevice(ua),
  };
}
