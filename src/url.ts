/**
 * URL decomposition used for page identity and same-site referrer checks.
 */

import { MalformedUrlError } from './errors.js';

const SCHEME_PATTERN = /^https?:\/\//;
const HTML_SUFFIX_PATTERN = /\.html$/;

export interface HostAndPath {
  host: string;
  path: string;
}

/**
 * Split a URL into host and path. The scheme is optional; a URL without a
 * path gets `/`.
 *
 * @throws {MalformedUrlError} when no host can be found.
 */
export function extractDomainAndPath(link: string): HostAndPath {
  const rest = link.replace(SCHEME_PATTERN, '');
  const slash = rest.indexOf('/');
  const host = slash === -1 ? rest : rest.slice(0, slash);
  const path = slash === -1 ? '' : rest.slice(slash);

  if (host === '') {
    throw new MalformedUrlError(link);
  }

  return { host, path: path === '' ? '/' : path };
}

/** Page identity key: the path without a trailing `.html`. */
export function normalizePagePath(path: string): string {
  return path.replace(HTML_SUFFIX_PATTERN, '');
}

/** Resolve the normalized page key of a URL. */
export function pageKey(link: string): string {
  return normalizePagePath(extractDomainAndPath(link).path);
}

/**
 * Short source label for a referrer host: its last two labels
 * (`news.ycombinator.com` becomes `ycombinator.com`).
 */
export function referrerSourceLabel(host: string): string {
  const labels = host.split('.');
  if (labels.length < 2) {
    return host;
  }
  return labels.slice(-2).join('.');
}
