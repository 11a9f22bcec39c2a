/**
 * Network Capture - passively records the programmatic (fetch/XHR) requests a
 * page makes, with their request headers and bodies.
 *
 * The response listener is synchronous and append-only: Playwright delivers
 * events on one thread and nothing here awaits, so the event list is in
 * response order and never interleaves.
 */

import type { Page, Response } from 'playwright';
import type { NetworkEvent } from '../types/index.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger.capture;

/**
 * Host fragments of telemetry endpoints that are never recorded
 */
export const DEFAULT_CAPTURE_DENYLIST = [
  'analytics',
  'sentry',
  'telemetry',
  'segment',
  'mixpanel',
  'amplitude',
  'hotjar',
  'doubleclick',
  'googletagmanager',
  'datadoghq',
  'newrelic',
  'logging',
];

const CAPTURED_RESOURCE_TYPES = new Set(['fetch', 'xhr']);

export interface NetworkCaptureOptions {
  /** Replaces the default denylist */
  denylist?: string[];
}

/**
 * Decode a body as strict UTF-8. Returns undefined when it is not text.
 */
export function decodeUtf8(body: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(body);
  } catch {
    return undefined;
  }
}

/**
 * Build the stored body fields. Bodies that are not valid UTF-8, or whose
 * request declares a content-encoding, are kept verbatim as base64.
 */
export function encodeBody(
  body: Buffer | null,
  requestHeaders: Record<string, string>
): Pick<NetworkEvent, 'post_data' | 'post_data_base64' | 'is_binary'> {
  if (!body || body.length === 0) {
    return { is_binary: false };
  }

  const encoded = Object.keys(requestHeaders).some((name) => name.toLowerCase() === 'content-encoding');
  const text = encoded ? undefined : decodeUtf8(body);

  if (text === undefined) {
    return { post_data_base64: body.toString('base64'), is_binary: true };
  }
  return { post_data: text, is_binary: false };
}

export class NetworkCapture {
  private captured: NetworkEvent[] = [];
  private denylist: string[];

  constructor(options: NetworkCaptureOptions = {}) {
    this.denylist = (options.denylist ?? DEFAULT_CAPTURE_DENYLIST).map((entry) => entry.toLowerCase());
  }

  /**
   * Snapshot of the events recorded so far, in arrival order
   */
  get events(): NetworkEvent[] {
    return [...this.captured];
  }

  get size(): number {
    return this.captured.length;
  }

  clear(): void {
    this.captured = [];
  }

  /**
   * Start listening on a page. Returns a function that stops listening.
   */
  attach(page: Page): () => void {
    const listener = (response: Response): void => {
      this.handleResponse(response);
    };
    page.on('response', listener);
    log.debug('Capture attached', { url: page.url() });

    return () => {
      page.off('response', listener);
      log.debug('Capture detached', { events: this.captured.length });
    };
  }

  isDenied(url: string): boolean {
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase();
    } catch {
      return false;
    }
    return this.denylist.some((entry) => host.includes(entry));
  }

  /**
   * Admit or drop one exchange. Errors only ever cost the event at hand.
   */
  handleResponse(response: Response): void {
    try {
      const request = response.request();
      if (!CAPTURED_RESOURCE_TYPES.has(request.resourceType())) return;

      const status = response.status();
      if (status >= 400) return;

      const url = response.url();
      if (this.isDenied(url)) return;

      const requestHeaders = request.headers();
      this.captured.push({
        method: request.method(),
        url,
        request_headers: requestHeaders,
        status,
        ...encodeBody(request.postDataBuffer(), requestHeaders),
      });
    } catch (error) {
      log.warn('Skipping event that could not be captured', { error: errorMessage(error) });
    }
  }
}
