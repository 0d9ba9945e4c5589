// pattern: Functional Core

import { createHash } from 'node:crypto';
import { normalizeQuery, tokenize } from './similarity.ts';

const TRACKING_PARAM = /^(utm_.*|fbclid|gclid|dclid|msclkid|mc_cid|mc_eid|igshid|ref_src|ref_url)$/;

export function queryFingerprint(scope: string, query: string): string {
  const digest = createHash('sha1').update(normalizeQuery(query)).digest('hex');
  return `${scope}:${digest.slice(0, 16)}`;
}

/**
 * Canonical form of an http(s) URL: scheme and host lower-cased, default port
 * and fragment removed, tracking parameters dropped, the rest sorted, trailing
 * slash trimmed. Returns null for anything that does not parse.
 */
export function canonicalUrl(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  const params = [...url.searchParams.entries()]
    .filter(([name]) => !TRACKING_PARAM.test(name.toLowerCase()))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  const search = new URLSearchParams(params).toString();

  const path = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${path}${search ? `?${search}` : ''}`;
}

export function urlHost(raw: string): string | null {
  const canonical = canonicalUrl(raw);
  return canonical ? new URL(canonical).hostname : null;
}

/** Path and query words of a URL, used as its similarity key text. */
export function urlKeyText(canonical: string): string {
  const url = new URL(canonical);
  return tokenize(`${url.pathname} ${url.search}`).join(' ');
}
