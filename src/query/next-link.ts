import { parseFeed } from '../xml/feed.js';

/**
 * Variants of the service URL a continuation link may be prefixed with.
 *
 * Known server quirk: continuation links do not always come back on the
 * scheme the service was opened with (an `http://` service may answer
 * with `https://` next links and vice versa). Both forms are stripped.
 */
export function serviceUrlVariants(serviceUrl: string): [string, string] {
  return [serviceUrl.replace('https://', 'http://'), serviceUrl.replace('http://', 'https://')];
}

/**
 * Strips a leading service URL, on either scheme, leaving the relative
 * part. The prefix only counts when a path segment or query follows it.
 */
export function normalizeNextLink(href: string, serviceUrl: string): string {
  for (const prefix of serviceUrlVariants(serviceUrl)) {
    if (!href.startsWith(prefix)) continue;
    const rest = href.slice(prefix.length);
    if (rest === '' || rest.startsWith('/') || rest.startsWith('?')) return rest;
  }
  return href;
}

/**
 * Continuation link of a page body (`<feed><link rel="next">`), relative
 * to the service where possible.
 */
export function readNextLink(body: string, serviceUrl: string): string | undefined {
  const href = parseFeed(body).links.find((link) => link.rel === 'next')?.href;
  return href === undefined ? undefined : normalizeNextLink(href, serviceUrl);
}
