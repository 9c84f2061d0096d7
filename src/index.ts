export { loadCapture } from './capture/loader';
export { parseCapture, validateCaptureFile, formatValidationErrors } from './capture/validation';
export { toEntry, toEntries, describeCapture } from './capture/convert';
export { parseCookieHeader, formatCookieHeader } from './cookies/codec';
export { EntryStore } from './store/entry-store';
export { compareKeyed } from './matching/compare';
export { matchRequest, formatDiagnostic } from './matching/matcher';
export { resolveResponse, resolveRedirectUrl } from './replay/resolver';
export { ReplayAdapter } from './replay/adapter';
export { NoMatchFoundError, IndexOutOfRangeError, MalformedCaptureError } from './replay/errors';
export { createReplayFetch, toRequestSnapshot, toResponse } from './transport/fetch';
export { createServer, startServer } from './server/server';
export { createEventLogger, createNullEventLogger } from './logging/event-logger';
export { createLogger } from './utils/logger';
export type { Capture, HarEntry, HarHeader, LoadedCapture } from './capture/types';
export type { ValidationError, ValidationResult } from './capture/validation';
export type { KeyedComparison } from './matching/compare';
export type { MatchDiagnostic, MatchResult } from './matching/matcher';
export type { ReplayAdapterOptions } from './replay/adapter';
export type {
  Entry,
  HeaderPair,
  RedirectContext,
  RedirectRewriter,
  RequestSnapshot,
  ResolvedResponse,
  ResponseSnapshot,
} from './replay/types';
export type { ReplayFetch } from './transport/fetch';
export type { ServerOptions } from './server/server';
export type { EventLogger, LogEvent } from './logging/event-logger';
export type { Logger } from './utils/logger';
