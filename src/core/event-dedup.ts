/**
 * Endpoint normalization and deduplication of captured events.
 *
 * Identifier-shaped path segments are replaced by placeholders so repeated
 * calls to the same logical endpoint collapse onto one key:
 *   /1/board/507f1f77bcf86cd799439011?fields=id -> /1/board/{id}
 *   /b/a7UxwGZY/testboard                      -> /b/{shortId}/testboard
 */

import type { NetworkEvent } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.dedup;

export const ID_PLACEHOLDER = '{id}';
export const SHORT_ID_PLACEHOLDER = '{shortId}';

const OBJECT_ID_SEGMENT = /^[a-f0-9]{24}$/;
const SHORT_ID_SEGMENT = /^[a-zA-Z0-9]{8}$/;

function normalizeSegment(segment: string): string {
  if (OBJECT_ID_SEGMENT.test(segment)) return ID_PLACEHOLDER;
  // Any 8-character word matches too ("settings"); the reduction is lossy
  if (SHORT_ID_SEGMENT.test(segment)) return SHORT_ID_PLACEHOLDER;
  return segment;
}

function pathOf(urlOrPath: string): string {
  if (/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(urlOrPath)) {
    try {
      return new URL(urlOrPath).pathname;
    } catch {
      // fall through and treat it as a bare path
    }
  }
  return urlOrPath.split(/[?#]/, 1)[0] ?? '';
}

/**
 * Path-only endpoint pattern. The query string and fragment are dropped.
 */
export function normalizeEndpoint(urlOrPath: string): string {
  return pathOf(urlOrPath).split('/').map(normalizeSegment).join('/');
}

/**
 * Dedup key: scheme, host and normalized path. Unparseable URLs fall back to
 * the path pattern alone.
 */
export function endpointKey(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${normalizeEndpoint(parsed.pathname)}`;
  } catch {
    return normalizeEndpoint(url);
  }
}

/**
 * Keep the first event seen for each endpoint, in original order.
 * Running it on its own output returns the same list.
 */
export function dedupeEvents(events: readonly NetworkEvent[]): NetworkEvent[] {
  const seen = new Set<string>();
  const unique: NetworkEvent[] = [];

  for (const event of events) {
    const key = endpointKey(event.url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(event);
  }

  log.info('Deduplicated events', { before: events.length, after: unique.length });
  return unique;
}
