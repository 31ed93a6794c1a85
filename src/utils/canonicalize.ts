/**
 * URL Canonicalization Utility
 * Normalizes URLs so the link-following frontier enqueues each page once
 */

const TRACKING_PARAMS = [
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'gclid',
  'fbclid',
  'msclkid',
  '_ga',
  'mc_cid',
  'mc_eid',
];

/**
 * Canonicalizes a URL by:
 * 1. Lowercasing the host and removing a 'www.' prefix
 * 2. Dropping the fragment
 * 3. Removing a trailing slash (except on the root path)
 * 4. Removing tracking parameters and sorting the rest
 *
 * Returns null when the value is not an absolute URL.
 */
export function canonicalizeUrl(url: string): string | null {
  let urlObj: URL;
  try {
    urlObj = new URL(url);
  } catch {
    return null;
  }

  const host = stripWww(urlObj.hostname.toLowerCase());

  let pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }

  const filteredParams = new URLSearchParams();
  for (const [key, value] of urlObj.searchParams.entries()) {
    if (!TRACKING_PARAMS.includes(key.toLowerCase())) {
      filteredParams.append(key, value);
    }
  }
  filteredParams.sort();

  const port = urlObj.port ? `:${urlObj.port}` : '';
  const query = filteredParams.toString();

  return `${urlObj.protocol}//${host}${port}${pathname}${query ? `?${query}` : ''}`;
}

/**
 * Extracts the host of a URL without a 'www.' prefix
 */
export function extractDomain(url: string): string {
  try {
    return stripWww(new URL(url).hostname.toLowerCase());
  } catch {
    return '';
  }
}

/**
 * Checks if URL belongs to a domain, treating 'www.' and bare hosts as equal
 * @param domain - Domain name, with or without 'www.'
 */
export function isDomainMatch(url: string, domain: string): boolean {
  const urlDomain = extractDomain(url);
  return urlDomain !== '' && urlDomain === stripWww(domain.toLowerCase());
}

function stripWww(host: string): string {
  return host.startsWith('www.') ? host.substring(4) : host;
}
