import type { Entry, RedirectRewriter, RequestSnapshot, ResolvedResponse } from './types';

/**
 * Path-absolute targets are replayed against the live request's origin, so a
 * capture taken on one host can serve another host or port with the same paths.
 */
export const resolveRedirectUrl = (liveUrl: string, target: string): string => {
  if (!target.startsWith('/')) {
    return target;
  }
  const { protocol, host } = new URL(liveUrl);
  return `${protocol}//${host}${target}`;
};

export const resolveResponse = (
  live: RequestSnapshot,
  entry: Entry,
  rewriteRedirect?: RedirectRewriter
): ResolvedResponse => {
  if (entry.redirectTarget === '') {
    return { response: entry.response };
  }

  const redirectUrl = resolveRedirectUrl(live.url, entry.redirectTarget);
  const response = rewriteRedirect
    ? rewriteRedirect({ live, entry, response: entry.response, redirectUrl })
    : entry.response;

  return { response, redirectUrl };
};
