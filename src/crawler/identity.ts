import type { ServiceRecord } from './types';

const TRACKING_PARAM = /^utm_/i;

/**
 * Canonical form of a page URL. Resolves against `base`, drops the fragment
 * and `utm_*` params, sorts the rest by name and strips a trailing slash from
 * non-root paths. Other query params stay: the directory addresses records by them.
 * Returns null for anything that is not http(s).
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim(), base);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  url.hash = '';
  url.username = '';
  url.password = '';

  const params = [...url.searchParams.entries()].filter(([k]) => !TRACKING_PARAM.test(k));
  // Array#sort is stable, so repeated names keep their relative order.
  params.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  url.search = new URLSearchParams(params).toString();

  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }

  return url.toString();
}

export function identityKey(record: ServiceRecord, url: string, idField?: string): string {
  if (idField) {
    const id = record[idField];
    const value = Array.isArray(id) ? id.join(',') : id;
    if (value) return `id:${value}`;
  }
  return `url:${normalizeUrl(url) ?? url}`;
}
