import { describeCapture, toEntries } from '../capture/convert';
import type { Capture } from '../capture/types';
import { createNullEventLogger, type EventLogger, type MatchFailure } from '../logging/event-logger';
import { formatDiagnostic, matchRequest, type MatchDiagnostic } from '../matching/matcher';
import { EntryStore } from '../store/entry-store';
import { createLogger, type Logger } from '../utils/logger';
import { NoMatchFoundError } from './errors';
import { resolveResponse } from './resolver';
import type { Entry, RedirectRewriter, RequestSnapshot, ResolvedResponse } from './types';

export type ReplayAdapterOptions = {
  /** Compare header order, header values, cookies and body. Defaults to true. */
  strictMatching?: boolean;
  /** Consume an entry once it has answered a request. Defaults to true. */
  deleteAfterMatch?: boolean;
  logger?: Logger;
  eventLogger?: EventLogger;
  rewriteRedirect?: RedirectRewriter;
};

const failuresOf = (diagnostic: MatchDiagnostic): MatchFailure[] => {
  const failures: MatchFailure[] = [];
  if (diagnostic.headerOrder) failures.push('header-order');
  if (diagnostic.headers) failures.push('headers');
  if (diagnostic.cookies) failures.push('cookies');
  if (diagnostic.body) failures.push('body');
  return failures;
};

/**
 * Answers outgoing requests from a recorded capture. The first entry in
 * capture order that matches wins.
 *
 * `send` is synchronous: the scan and the removal of the consumed entry run
 * without yielding to the event loop, so concurrent callers sharing one
 * adapter can never consume the same entry twice. Callers that read request
 * bodies asynchronously must finish reading before calling `send`.
 */
export class ReplayAdapter {
  public strictMatching: boolean;
  public deleteAfterMatch: boolean;

  private readonly store: EntryStore;
  private readonly logger: Logger;
  private readonly eventLogger: EventLogger;
  private readonly rewriteRedirect?: RedirectRewriter;

  constructor(store: EntryStore, options: ReplayAdapterOptions = {}) {
    this.store = store;
    this.strictMatching = options.strictMatching ?? true;
    this.deleteAfterMatch = options.deleteAfterMatch ?? true;
    this.logger = options.logger ?? createLogger('har-replay:adapter');
    this.eventLogger = options.eventLogger ?? createNullEventLogger();
    this.rewriteRedirect = options.rewriteRedirect;
  }

  public static fromCapture(capture: Capture, options: ReplayAdapterOptions = {}): ReplayAdapter {
    const adapter = new ReplayAdapter(new EntryStore(toEntries(capture)), options);
    adapter.logger.debug(`Using capture from ${describeCapture(capture)}`);
    return adapter;
  }

  public remaining(): number {
    return this.store.count();
  }

  public send(live: RequestSnapshot): ResolvedResponse {
    const indent = ' '.repeat(live.method.length);
    this.logger.debug(`${live.method} ${live.url}`);

    const index = this.findMatch(live, indent);

    if (index === -1) {
      this.eventLogger.emitEvent({
        event: 'no-match',
        method: live.method,
        url: live.url,
        remaining: this.store.count(),
      });
      throw new NoMatchFoundError(live.method, live.url, this.store.count());
    }

    const entry = this.take(index, indent);
    const resolved = resolveResponse(live, entry, this.rewriteRedirect);

    if (resolved.redirectUrl !== undefined) {
      this.logger.debug(`${indent}Handling redirection to ${resolved.redirectUrl}`);
      this.eventLogger.emitEvent({
        event: 'redirect-resolved',
        target: entry.redirectTarget,
        redirectUrl: resolved.redirectUrl,
      });
    }

    return resolved;
  }

  private findMatch(live: RequestSnapshot, indent: string): number {
    const entries = this.store.entries();
    const strict = this.strictMatching;

    for (const [index, entry] of entries.entries()) {
      const { matched, diagnostic } = matchRequest(live, entry.request, strict);

      if (diagnostic.baseline !== 'ok') {
        continue;
      }

      if (strict) {
        this.logger.debug(`${indent}Testing possible match strictly`);
        this.logger.debugLines(formatDiagnostic(diagnostic, indent));
      }

      this.eventLogger.emitEvent({
        event: 'candidate-evaluated',
        entryIndex: index,
        method: live.method,
        url: live.url,
        strict,
        result: matched ? 'matched' : 'not-matched',
        failures: matched ? undefined : failuresOf(diagnostic),
      });

      if (matched) {
        return index;
      }
    }

    return -1;
  }

  private take(index: number, indent: string): Entry {
    this.logger.debug(`${indent}Request matched`);
    const entry = this.store.entries()[index];

    this.eventLogger.emitEvent({
      event: 'entry-matched',
      entryIndex: index,
      method: entry.request.method,
      url: entry.request.url,
    });

    if (!this.deleteAfterMatch) {
      return entry;
    }

    this.store.removeAt(index);
    this.logger.debug(`${indent}Deleted matched entry from list`);
    this.eventLogger.emitEvent({
      event: 'entry-consumed',
      entryIndex: index,
      remaining: this.store.count(),
    });
    return entry;
  }
}
