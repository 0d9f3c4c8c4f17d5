/**
 * Normalize a listing URL into its identity:
 * - Mobile host rewritten to www
 * - Query string and hash dropped (tracking and search-position params)
 * - Trailing slashes stripped
 * - Lowercase scheme + host
 */
export function normalizeListingUrl(raw: string, base?: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim(), base);
  } catch {
    return raw.trim();
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();

  if (url.hostname.startsWith('m.')) {
    url.hostname = `www.${url.hostname.slice(2)}`;
  }

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }

  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}`;
}

/**
 * Registrable part of a host: `www.olx.pl` and `m.olx.pl` both give `olx.pl`.
 */
export function siteDomain(raw: string): string | null {
  try {
    return new URL(raw).hostname.toLowerCase().replace(/^(www|m)\./, '');
  } catch {
    return null;
  }
}

/**
 * Listing identity: a stable id from the page when present, else the normalized URL.
 */
export function listingKey(item: { url: string; externalId?: string | null }): string {
  if (item.externalId) {
    return `id:${item.externalId}`;
  }
  return `url:${normalizeListingUrl(item.url)}`;
}
