/**
 * HAR Converter Utility
 *
 * Converts a captured event log to HAR (HTTP Archive) format so it can be
 * opened in browser devtools or replayed by HAR tooling. Events carry no
 * timings or response bodies, so those fields hold placeholders.
 */

import type { NetworkEvent } from '../types/index.js';
import type {
  Har,
  HarEntry,
  HarHeader,
  HarPostData,
  HarQueryParam,
  HarRequest,
  HarResponse,
} from '../types/har.js';

export const HAR_CREATOR = { name: 'session-capture', version: '0.1.0' };

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  202: 'Accepted',
  204: 'No Content',
  301: 'Moved Permanently',
  302: 'Found',
  304: 'Not Modified',
};

export interface HarExportOptions {
  /** Timestamp stamped on every entry; defaults to now */
  startedAt?: Date;
}

/**
 * Parse query string from URL
 */
function parseQueryString(url: string): HarQueryParam[] {
  try {
    const params: HarQueryParam[] = [];
    new URL(url).searchParams.forEach((value, name) => {
      params.push({ name, value });
    });
    return params;
  } catch {
    return [];
  }
}

function convertHeaders(headers: Record<string, string>): HarHeader[] {
  return Object.entries(headers).map(([name, value]) => ({ name, value }));
}

/**
 * Approximate size of headers as sent: "Name: Value\r\n" per header
 */
function calculateHeadersSize(headers: Record<string, string>): number {
  let size = 0;
  for (const [name, value] of Object.entries(headers)) {
    size += name.length + 2 + value.length + 2;
  }
  return size;
}

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
  return key === undefined ? undefined : headers[key];
}

function convertPostData(event: NetworkEvent): { postData?: HarPostData; bodySize: number } {
  const mimeType = headerValue(event.request_headers, 'content-type') ?? 'application/octet-stream';

  if (event.post_data_base64 !== undefined) {
    return {
      postData: { mimeType, text: event.post_data_base64, encoding: 'base64' },
      bodySize: Buffer.from(event.post_data_base64, 'base64').length,
    };
  }
  if (event.post_data !== undefined) {
    return {
      postData: { mimeType, text: event.post_data },
      bodySize: Buffer.byteLength(event.post_data, 'utf-8'),
    };
  }
  return { bodySize: 0 };
}

export function convertEventToHarEntry(event: NetworkEvent, startedDateTime: string): HarEntry {
  const { postData, bodySize } = convertPostData(event);

  const request: HarRequest = {
    method: event.method,
    url: event.url,
    httpVersion: 'HTTP/1.1',
    cookies: [],
    headers: convertHeaders(event.request_headers),
    queryString: parseQueryString(event.url),
    headersSize: calculateHeadersSize(event.request_headers),
    bodySize,
  };
  if (postData) {
    request.postData = postData;
  }

  const response: HarResponse = {
    status: event.status,
    statusText: STATUS_TEXT[event.status] ?? '',
    httpVersion: 'HTTP/1.1',
    cookies: [],
    headers: [],
    content: { size: 0, mimeType: 'application/octet-stream' },
    redirectURL: '',
    headersSize: -1,
    bodySize: -1,
  };

  const entry: HarEntry = {
    startedDateTime,
    time: 0,
    request,
    response,
    cache: {},
    timings: { send: 0, wait: 0, receive: 0 },
  };
  if (event.ai_context) {
    entry.comment = `${event.ai_context.category}: ${event.ai_context.purpose}`;
  }
  return entry;
}

/**
 * Convert an event log to HAR. Entry order follows the log.
 */
export function convertToHar(events: readonly NetworkEvent[], options: HarExportOptions = {}): Har {
  const startedDateTime = (options.startedAt ?? new Date()).toISOString();

  return {
    log: {
      version: '1.2',
      creator: { ...HAR_CREATOR },
      entries: events.map((event) => convertEventToHarEntry(event, startedDateTime)),
    },
  };
}

/**
 * Serialize HAR to JSON string
 */
export function serializeHar(har: Har, pretty: boolean = true): string {
  return JSON.stringify(har, null, pretty ? 2 : 0);
}
