import type { Entry, HeaderPair } from '../replay/types';
import type { Capture, HarEntry, HarHeader } from './types';

// HTTP/2 pseudo-headers (:authority, :path, ...) are recorded by browsers but
// never appear in a client's header list.
const isPseudoHeader = (header: HarHeader): boolean => header.name.startsWith(':');

const toHeaderPairs = (headers: HarHeader[]): HeaderPair[] => {
  return headers.filter((header) => !isPseudoHeader(header)).map(({ name, value }): HeaderPair => [name, value]);
};

const decodeContent = (text: string | undefined, encoding?: string): Uint8Array => {
  if (!text) return new Uint8Array();
  return encoding === 'base64' ? Buffer.from(text, 'base64') : Buffer.from(text, 'utf-8');
};

export const toEntry = ({ request, response }: HarEntry): Entry => ({
  request: {
    method: request.method,
    url: request.url,
    headers: toHeaderPairs(request.headers),
    body: decodeContent(request.postData?.text),
  },
  response: {
    status: response.status,
    headers: toHeaderPairs(response.headers),
    body: decodeContent(response.content?.text, response.content?.encoding),
  },
  redirectTarget: response.redirectURL ?? '',
});

export const toEntries = (capture: Capture): Entry[] => capture.log.entries.map(toEntry);

export const describeCapture = (capture: Capture): string => {
  const creator = capture.log.creator?.name ?? 'unknown';
  const version = capture.log.creator?.version ?? '';
  const count = capture.log.entries.length;
  if (version !== '') {
    return `${creator} ${version}, ${count} Requests`;
  }
  return `${creator}, ${count} Requests`;
};
