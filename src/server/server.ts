import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { EventLogger } from '../logging/event-logger';
import type { ReplayAdapter } from '../replay/adapter';
import { NoMatchFoundError } from '../replay/errors';
import type { HeaderPair, RequestSnapshot, ResponseSnapshot } from '../replay/types';

export type ServerOptions = {
  adapter: ReplayAdapter;
  port: number;
  eventLogger: EventLogger;
  /** Scheme and host the live URL is built on. Falls back to the Host header. */
  origin?: string;
};

const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'content-length',
  // Captured bodies are stored decoded.
  'content-encoding',
]);

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

const isHopByHopHeader = (key: string): boolean => {
  return HOP_BY_HOP_HEADERS.has(key.toLowerCase());
};

const rawHeaderPairs = (rawHeaders: string[]): HeaderPair[] => {
  const pairs: HeaderPair[] = [];
  for (let index = 0; index + 1 < rawHeaders.length; index += 2) {
    pairs.push([rawHeaders[index], rawHeaders[index + 1]]);
  }
  return pairs;
};

const buildLiveUrl = (request: FastifyRequest, origin?: string): string => {
  if (origin) {
    return `${origin.replace(/\/+$/, '')}${request.url}`;
  }
  return `${request.protocol}://${request.headers.host ?? 'localhost'}${request.url}`;
};

const toSnapshot = (request: FastifyRequest, origin?: string): RequestSnapshot => {
  const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
  return {
    method: request.method,
    url: buildLiveUrl(request, origin),
    headers: rawHeaderPairs(request.raw.rawHeaders),
    body,
  };
};

const collectReplyHeaders = (headers: HeaderPair[]): Map<string, string[]> => {
  const grouped = new Map<string, string[]>();
  for (const [name, value] of headers) {
    const normalized = name.toLowerCase();
    if (isHopByHopHeader(normalized)) continue;
    const values = grouped.get(normalized) ?? [];
    values.push(value);
    grouped.set(normalized, values);
  }
  return grouped;
};

const sendRecorded = (reply: FastifyReply, response: ResponseSnapshot): void => {
  for (const [name, values] of collectReplyHeaders(response.headers)) {
    reply.header(name, values.length === 1 ? values[0] : values);
  }

  reply.code(response.status);
  if (NULL_BODY_STATUSES.has(response.status)) {
    reply.send();
    return;
  }
  reply.send(Buffer.from(response.body));
};

export const createServer = (options: ServerOptions): FastifyInstance => {
  const server = Fastify({ logger: false });

  // Bodies are compared byte for byte, so nothing may parse them first.
  server.removeAllContentTypeParsers();
  server.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  const handleRequest = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const live = toSnapshot(request, options.origin);

    try {
      const { response } = options.adapter.send(live);
      sendRecorded(reply, response);
      options.eventLogger.emitEvent({
        event: 'execution-complete',
        source: 'capture',
        status: response.status,
      });
    } catch (error) {
      if (!(error instanceof NoMatchFoundError)) {
        throw error;
      }
      reply.code(404).send({
        message: 'No recorded entry matched',
        method: error.method,
        url: error.url,
      });
      options.eventLogger.emitEvent({
        event: 'execution-complete',
        source: 'no-match',
        status: 404,
      });
    }
  };

  server.setNotFoundHandler((request, reply) => handleRequest(request, reply));

  return server;
};

export const startServer = async (options: ServerOptions): Promise<FastifyInstance> => {
  const server = createServer(options);
  await server.listen({ port: options.port, host: '0.0.0.0' });
  options.eventLogger.emitEvent({
    event: 'server-ready',
    port: options.port,
  });
  return server;
};
