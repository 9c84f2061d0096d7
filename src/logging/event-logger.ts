import { EventEmitter } from 'node:events';

export type LogMode = 'ci' | 'cli';

export type MatchFailure = 'header-order' | 'headers' | 'cookies' | 'body';

export type LogEvent =
  | {
      event: 'startup';
      mode: LogMode;
      capture: string;
      origin?: string;
      port: number;
      strictMatching: boolean;
      deleteAfterMatch: boolean;
    }
  | {
      event: 'startup-failed';
      message: string;
    }
  | {
      event: 'capture-validated';
      file: string;
      result: 'ok' | 'failed';
      errors?: Array<{
        path: string;
        message: string;
        severity: 'error' | 'warning';
        line?: number;
        column?: number;
      }>;
    }
  | {
      event: 'capture-loaded';
      file: string;
      summary: string;
      entries: number;
    }
  | {
      event: 'candidate-evaluated';
      entryIndex: number;
      method: string;
      url: string;
      strict: boolean;
      result: 'matched' | 'not-matched';
      failures?: MatchFailure[];
    }
  | {
      event: 'entry-matched';
      entryIndex: number;
      method: string;
      url: string;
    }
  | {
      event: 'entry-consumed';
      entryIndex: number;
      remaining: number;
    }
  | {
      event: 'redirect-resolved';
      target: string;
      redirectUrl: string;
    }
  | {
      event: 'no-match';
      method: string;
      url: string;
      remaining: number;
    }
  | {
      event: 'execution-complete';
      source: 'capture' | 'no-match';
      status: number;
    }
  | {
      event: 'server-ready';
      port: number;
    };

export type EventLogger = {
  emitEvent: (event: LogEvent) => void;
  onEvent: (handler: (event: LogEvent) => void) => void;
};

export type EventLoggerOptions = {
  mode: LogMode;
  format?: 'jsonl' | 'pretty';
  stream?: NodeJS.WritableStream;
};

const stableStringify = (value: unknown): string => {
  if (value === undefined) {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));

  const body = entries
    .map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`)
    .join(',');
  return `{${body}}`;
};

export const createEventLogger = ({ mode, stream, format }: EventLoggerOptions): EventLogger => {
  const emitter = new EventEmitter();
  const output = stream ?? process.stdout;
  const activeFormat = format ?? (mode === 'ci' ? 'jsonl' : stream ? 'jsonl' : 'pretty');

  const colors = {
    reset: '\u001b[0m',
    green: '\u001b[32m',
    red: '\u001b[31m',
    lightBlue: '\u001b[94m',
  };

  const colorizeLine = (line: string): string => {
    if (activeFormat !== 'pretty' || mode === 'ci') {
      return line;
    }

    if (line.startsWith('✔')) {
      return `${colors.green}${line}${colors.reset}`;
    }

    if (line.startsWith('✖')) {
      return `${colors.red}${line}${colors.reset}`;
    }

    if (line.startsWith('▶') || line.startsWith('○')) {
      return `${colors.lightBlue}${line}${colors.reset}`;
    }

    return line;
  };

  const formatPretty = (event: LogEvent): string => {
    switch (event.event) {
      case 'startup':
        return [
          '▶ Startup',
          ` ○ mode=${event.mode}`,
          ` ○ capture=${event.capture}`,
          ` ○ origin=${event.origin ?? 'host-header'}`,
          ` ○ port=${event.port}`,
          ` ○ strict=${event.strictMatching}`,
          ` ○ deleteAfterMatch=${event.deleteAfterMatch}`,
        ].map(colorizeLine).join('\n');
      case 'startup-failed':
        return [
          '✖ Startup failed',
          ` ○ message=${event.message}`,
        ].map(colorizeLine).join('\n');
      case 'capture-validated':
        return [
          `${event.result === 'ok' ? '✔' : '✖'} Capture validated`,
          ` ○ file=${event.file}`,
          ` ○ result=${event.result}`,
          ` ○ errors=${event.errors?.length ?? 0}`,
        ].map(colorizeLine).join('\n');
      case 'capture-loaded':
        return [
          '▶ Capture loaded',
          ` ○ file=${event.file}`,
          ` ○ summary=${event.summary}`,
        ].map(colorizeLine).join('\n');
      case 'candidate-evaluated':
        return [
          `${event.result === 'matched' ? '✔' : '✖'} Candidate evaluated`,
          ` ○ entryIndex=${event.entryIndex}`,
          ` ○ method=${event.method}`,
          ` ○ url=${event.url}`,
          ` ○ strict=${event.strict}`,
          ` ○ failures=${event.failures?.join(',') || 'none'}`,
        ].map(colorizeLine).join('\n');
      case 'entry-matched':
        return [
          '✔ Matched entry',
          ` ○ entryIndex=${event.entryIndex}`,
          ` ○ method=${event.method}`,
          ` ○ url=${event.url}`,
        ].map(colorizeLine).join('\n');
      case 'entry-consumed':
        return [
          '▶ Entry consumed',
          ` ○ entryIndex=${event.entryIndex}`,
          ` ○ remaining=${event.remaining}`,
        ].map(colorizeLine).join('\n');
      case 'redirect-resolved':
        return [
          '▶ Redirect resolved',
          ` ○ target=${event.target}`,
          ` ○ url=${event.redirectUrl}`,
        ].map(colorizeLine).join('\n');
      case 'no-match':
        return [
          '✖ No entry matched',
          ` ○ method=${event.method}`,
          ` ○ url=${event.url}`,
          ` ○ remaining=${event.remaining}`,
        ].map(colorizeLine).join('\n');
      case 'execution-complete':
        return [
          '▶ Execution complete',
          ` ○ source=${event.source}`,
          ` ○ status=${event.status}`,
        ].map(colorizeLine).join('\n');
      case 'server-ready':
        return [
          '▶ Server ready',
          ` ○ port=${event.port}`,
        ].map(colorizeLine).join('\n');
      default:
        return stableStringify(event);
    }
  };

  const emitEvent = (event: LogEvent) => {
    emitter.emit('event', event);
    const line = activeFormat === 'jsonl' ? stableStringify(event) : formatPretty(event);
    output.write(`${line}\n`);
  };

  const onEvent = (handler: (event: LogEvent) => void) => {
    emitter.on('event', handler);
  };

  return { emitEvent, onEvent };
};

export const createNullEventLogger = (): EventLogger => {
  return {
    emitEvent: () => undefined,
    onEvent: () => undefined,
  };
};
