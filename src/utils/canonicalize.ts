/**
 * URL Canonicalization Utility
 * Normalizes source URLs so cosmetic variants map to one item identity
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
 * 1. Converting to lowercase host
 * 2. Removing 'www.' prefix
 * 3. Normalizing trailing slashes
 * 4. Removing tracking parameters and the fragment
 * 5. Sorting remaining query parameters
 *
 * Strings that do not parse as URLs are returned trimmed.
 */
export function canonicalizeUrl(url: string): string {
  const trimmed = url.trim();
  if (!URL.canParse(trimmed)) {
    return trimmed;
  }

  const urlObj = new URL(trimmed);

  let host = urlObj.hostname.toLowerCase();
  if (host.startsWith('www.')) {
    host = host.substring(4);
  }
  if (urlObj.port) {
    host = `${host}:${urlObj.port}`;
  }

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

  const canonicalUrl = new URL(pathname, `${urlObj.protocol}//${host}`);
  canonicalUrl.search = filteredParams.toString();

  return canonicalUrl.toString();
}
