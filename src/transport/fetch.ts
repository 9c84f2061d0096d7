import type { ReplayAdapter } from '../replay/adapter';
import type { HeaderPair, RequestSnapshot, ResponseSnapshot } from '../replay/types';

export type ReplayFetch = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * Keeps the caller's header order. A `Headers` instance has already sorted
 * its names, so pass an array of pairs or a plain object when order matters.
 */
const toHeaderPairs = (headers: NonNullable<RequestInit['headers']>): HeaderPair[] => {
  if (headers instanceof Headers) {
    return Array.from(headers, ([name, value]): HeaderPair => [name, value]);
  }

  if (Array.isArray(headers)) {
    return headers.map((pair): HeaderPair => {
      if (pair.length !== 2) {
        throw new TypeError('Header pairs must contain exactly a name and a value');
      }
      return [pair[0], pair[1]];
    });
  }

  return Object.entries(headers).map(([name, value]): HeaderPair => [
    name,
    typeof value === 'string' ? value : value.join(', '),
  ]);
};

/**
 * Appends headers the platform adds on its own (such as the `content-type`
 * of a string body) after the caller's, since they are sent either way.
 */
const withPlatformHeaders = (pairs: HeaderPair[], sent: Headers): HeaderPair[] => {
  const given = new Set(pairs.map(([name]) => name.toLowerCase()));
  const added = Array.from(sent, ([name, value]): HeaderPair => [name, value]).filter(
    ([name]) => !given.has(name)
  );
  return [...pairs, ...added];
};

const urlOf = (input: string | URL | Request): string => {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
};

export const toRequestSnapshot = async (
  input: string | URL | Request,
  init?: RequestInit
): Promise<RequestSnapshot> => {
  const request = new Request(input, init);
  const body = new Uint8Array(await request.arrayBuffer());
  const headers = init?.headers
    ? withPlatformHeaders(toHeaderPairs(init.headers), request.headers)
    : toHeaderPairs(request.headers);

  return {
    method: request.method,
    url: urlOf(input),
    headers,
    body,
  };
};

export const toResponse = (snapshot: ResponseSnapshot): Response => {
  const headers = new Headers();
  for (const [name, value] of snapshot.headers) {
    headers.append(name, value);
  }
  const body = NULL_BODY_STATUSES.has(snapshot.status) ? null : snapshot.body;
  return new Response(body, { status: snapshot.status, headers });
};

/**
 * Builds a `fetch` replacement answered by the adapter. Redirect responses are
 * returned as recorded; they are not followed.
 */
export const createReplayFetch = (adapter: ReplayAdapter): ReplayFetch => {
  return async (input, init) => {
    const snapshot = await toRequestSnapshot(input, init);
    const { response } = adapter.send(snapshot);
    return toResponse(response);
  };
};
