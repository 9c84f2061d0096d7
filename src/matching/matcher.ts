import { parseCookieHeader } from '../cookies/codec';
import type { HeaderPair, RequestSnapshot } from '../replay/types';
import { compareKeyed, isSameKeyedSet, type KeyedComparison } from './compare';

export type MatchDiagnostic = {
  baseline: 'ok' | 'method' | 'url';
  strict: boolean;
  /** Set when the ordered header names differ. */
  headerOrder?: { live: string[]; cached: string[] };
  headers?: KeyedComparison;
  cookies?: KeyedComparison;
  body?: { live: string; cached: string };
};

export type MatchResult = {
  matched: boolean;
  diagnostic: MatchDiagnostic;
};

const COOKIE_HEADER = 'cookie';

const normalizeHeaderKey = (key: string): string => key.toLowerCase();

const isCookieHeader = ([name]: HeaderPair): boolean => normalizeHeaderKey(name) === COOKIE_HEADER;

const headerNames = (headers: HeaderPair[]): string[] => headers.map(([name]) => name);

const sameOrder = (live: string[], cached: string[]): boolean => {
  return live.length === cached.length && live.every((name, index) => name === cached[index]);
};

const cookieHeaderValue = (headers: HeaderPair[]): string => {
  return headers
    .filter(isCookieHeader)
    .map(([, value]) => value)
    .join('; ');
};

const sameBytes = (a: Uint8Array, b: Uint8Array): boolean => {
  return Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(b);
};

const decodeBody = (body: Uint8Array): string => Buffer.from(body).toString('utf-8');

export const matchRequest = (
  live: RequestSnapshot,
  cached: RequestSnapshot,
  strict: boolean
): MatchResult => {
  if (live.method !== cached.method) {
    return { matched: false, diagnostic: { baseline: 'method', strict } };
  }

  if (live.url !== cached.url) {
    return { matched: false, diagnostic: { baseline: 'url', strict } };
  }

  const diagnostic: MatchDiagnostic = { baseline: 'ok', strict };
  if (!strict) {
    return { matched: true, diagnostic };
  }

  let matched = true;

  const liveNames = headerNames(live.headers);
  const cachedNames = headerNames(cached.headers);
  const orderMatches = sameOrder(liveNames, cachedNames);
  if (!orderMatches) {
    diagnostic.headerOrder = { live: liveNames, cached: cachedNames };
    matched = false;
  }

  const hasCookies = live.headers.some(isCookieHeader) || cached.headers.some(isCookieHeader);

  // Cookie header values are compared as a set below, not as a raw string.
  const withoutCookies = (headers: HeaderPair[]) =>
    hasCookies ? headers.filter((header) => !isCookieHeader(header)) : headers;

  const headers = compareKeyed(
    withoutCookies(live.headers),
    withoutCookies(cached.headers),
    normalizeHeaderKey
  );
  if (!isSameKeyedSet(headers)) {
    diagnostic.headers = headers;
    matched = false;
  }

  if (!orderMatches) {
    return { matched, diagnostic };
  }

  if (hasCookies) {
    const cookies = compareKeyed(
      parseCookieHeader(cookieHeaderValue(live.headers)),
      parseCookieHeader(cookieHeaderValue(cached.headers))
    );
    if (!isSameKeyedSet(cookies)) {
      diagnostic.cookies = cookies;
      matched = false;
    }
  }

  if (cached.body.byteLength > 0 && !sameBytes(live.body, cached.body)) {
    diagnostic.body = { live: decodeBody(live.body), cached: decodeBody(cached.body) };
    matched = false;
  }

  return { matched, diagnostic };
};

const formatComparison = (
  comparison: KeyedComparison,
  label: 'headers' | 'cookies',
  indent: string
): string[] => {
  const singular = label.slice(0, -1);
  const lines: string[] = [];

  if (comparison.missing.length > 0) {
    lines.push(`${indent}Request ${label} are missing the following entries:`);
    for (const { key, cached } of comparison.missing) {
      lines.push(`${indent}  '${key}': '${cached}'`);
    }
  }

  if (comparison.redundant.length > 0) {
    lines.push(`${indent}Request ${label} have the following redundant entries:`);
    for (const { key, live } of comparison.redundant) {
      lines.push(`${indent}  '${key}': '${live}'`);
    }
  }

  if (comparison.mismatching.length > 0) {
    lines.push(`${indent}Request ${label} have the following mismatching entries:`);
    for (const { key, live, cached } of comparison.mismatching) {
      const pad = ' '.repeat(key.length + 4);
      lines.push(`${indent}  '${key}': '${live}'`);
      lines.push(`${indent}  ${pad}does not equal cached ${singular}:`);
      lines.push(`${indent}  ${pad}'${cached}'`);
    }
  }

  return lines;
};

/**
 * Renders a diagnostic as indented trace lines for the debug log.
 */
export const formatDiagnostic = (diagnostic: MatchDiagnostic, indent = ''): string[] => {
  if (diagnostic.baseline === 'method') return [`${indent}Method mismatch`];
  if (diagnostic.baseline === 'url') return [`${indent}URL mismatch`];

  const lines: string[] = [];

  if (diagnostic.headerOrder) {
    lines.push(`${indent}Request header order does not match:`);
    lines.push(`${indent}  [${diagnostic.headerOrder.live.join(', ')}]`);
    lines.push(`${indent}  does not equal cached:`);
    lines.push(`${indent}  [${diagnostic.headerOrder.cached.join(', ')}]`);
  }

  if (diagnostic.headers) {
    lines.push(...formatComparison(diagnostic.headers, 'headers', indent));
  }

  if (diagnostic.cookies) {
    lines.push(...formatComparison(diagnostic.cookies, 'cookies', indent));
  }

  if (diagnostic.body) {
    lines.push(`${indent}Post data mismatch:`);
    lines.push(`${indent}  ${diagnostic.body.live}`);
    lines.push(`${indent}  !=`);
    lines.push(`${indent}  ${diagnostic.body.cached}`);
  }

  return lines;
};
