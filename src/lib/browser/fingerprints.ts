/**
 * Client identity
 * Realistic browser fingerprints so requests look like regular traffic
 */

import { ClientIdentity } from './browser.types';

export interface BrowserFingerprint {
  userAgent: string;
  acceptLanguage: string;
  accept: string;
  secChUa?: string;
  secChUaPlatform?: string;
  secChUaMobile?: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

const BROWSER_FINGERPRINTS: BrowserFingerprint[] = [
  // Chrome on Windows
  {
    userAgent: DEFAULT_USER_AGENT,
    acceptLanguage: 'en-US,en;q=0.9',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    secChUa: '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
    secChUaPlatform: '"Windows"',
    secChUaMobile: '?0',
  },
  // Chrome on Mac
  {
    userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    acceptLanguage: 'en-US,en;q=0.9',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    secChUa: '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
    secChUaPlatform: '"macOS"',
    secChUaMobile: '?0',
  },
  // Firefox on Windows
  {
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
    acceptLanguage: 'en-US,en;q=0.5',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  },
];

/**
 * Fingerprint for a user agent; unknown agents borrow the default headers
 */
export function findFingerprint(userAgent: string): BrowserFingerprint {
  const known = BROWSER_FINGERPRINTS.find((fingerprint) => fingerprint.userAgent === userAgent);
  if (known) {
    return known;
  }

  // Sec-Ch-Ua hints would contradict an unknown agent
  return {
    userAgent,
    acceptLanguage: BROWSER_FINGERPRINTS[0].acceptLanguage,
    accept: BROWSER_FINGERPRINTS[0].accept,
  };
}

/**
 * Build headers object from fingerprint (User-Agent is carried separately)
 */
export function buildHeaders(fingerprint: BrowserFingerprint): Record<string, string> {
  const headers: Record<string, string> = {
    'Accept-Language': fingerprint.acceptLanguage,
    Accept: fingerprint.accept,
  };

  if (fingerprint.secChUa) headers['Sec-Ch-Ua'] = fingerprint.secChUa;
  if (fingerprint.secChUaPlatform) headers['Sec-Ch-Ua-Platform'] = fingerprint.secChUaPlatform;
  if (fingerprint.secChUaMobile) headers['Sec-Ch-Ua-Mobile'] = fingerprint.secChUaMobile;

  return headers;
}

export function createClientIdentity(userAgent: string = DEFAULT_USER_AGENT): ClientIdentity {
  return {
    userAgent,
    headers: buildHeaders(findFingerprint(userAgent)),
    viewport: { ...DEFAULT_VIEWPORT },
  };
}
