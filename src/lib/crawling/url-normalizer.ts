/**
 * URL Normalization Utilities
 * Canonicalize and filter candidate links found on a page
 */

const NON_NAVIGATIONAL_PREFIXES = ['mailto:', 'tel:', 'javascript:', '#'];

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Resolve a raw href against the page it was found on.
 * Returns null for anything that is not a navigable http(s) page.
 */
export function normalizeLink(base: URL, candidate: unknown): URL | null {
  if (typeof candidate !== 'string') {
    return null;
  }

  const href = candidate.trim();
  if (!href) {
    return null;
  }

  const lowerHref = href.toLowerCase();
  if (NON_NAVIGATIONAL_PREFIXES.some((prefix) => lowerHref.startsWith(prefix))) {
    return null;
  }

  let resolved: URL;
  try {
    resolved = new URL(href, base);
  } catch {
    return null;
  }

  // Two URLs differing only by fragment are the same page
  resolved.hash = '';

  if (!ALLOWED_PROTOCOLS.has(resolved.protocol)) {
    return null;
  }

  return resolved;
}

/**
 * Exact host match (host includes the port; no subdomain folding)
 */
export function isSameDomain(url: URL, domain: string): boolean {
  return url.host === domain;
}

