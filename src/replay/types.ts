/**
 * Header lists are ordered. Position is part of what strict matching
 * compares, so they are never stored as a name-keyed record.
 */
export type HeaderPair = readonly [name: string, value: string];

export type RequestSnapshot = {
  method: string;
  url: string;
  headers: HeaderPair[];
  body: Uint8Array;
};

export type ResponseSnapshot = {
  status: number;
  headers: HeaderPair[];
  body: Uint8Array;
};

export type Entry = {
  readonly request: RequestSnapshot;
  readonly response: ResponseSnapshot;
  /** Empty when the recorded response is not a redirect. */
  readonly redirectTarget: string;
};

export type ResolvedResponse = {
  response: ResponseSnapshot;
  redirectUrl?: string;
};

export type RedirectContext = {
  live: RequestSnapshot;
  entry: Entry;
  response: ResponseSnapshot;
  redirectUrl: string;
};

/**
 * Post-processing for redirect entries. Receives the recorded response and
 * returns the one to hand back to the caller.
 */
export type RedirectRewriter = (context: RedirectContext) => ResponseSnapshot;
