/**
 * Event Enricher - attaches an `ai_context` description to captured events.
 *
 * Classification of one event never depends on another, so events are fanned
 * out over a bounded pool and the results are reassembled by original index.
 */

import { z } from 'zod';
import type { EventContext, NetworkEvent } from '../types/index.js';
import { logger, errorMessage } from '../utils/logger.js';
import { parseModelJson } from '../utils/model-json.js';
import { normalizeEndpoint } from './event-dedup.js';

const log = logger.enricher;

export const DEFAULT_ENRICH_CONCURRENCY = 10;

/**
 * URL fragments of noisy requests that are not worth classifying
 */
export const ENRICH_SKIP_LIST = ['analytics', 'sentry', 'batch', 'heartbeat', 'gasv3'];

export function isTelemetryUrl(url: string): boolean {
  return ENRICH_SKIP_LIST.some((fragment) => url.includes(fragment));
}

export interface EventClassifier {
  /** Null means "nothing to say about this event" */
  classify(event: NetworkEvent): Promise<EventContext | null>;
}

export interface EnrichOptions {
  concurrency?: number;
  onProgress?: (done: number, total: number) => void;
}

/**
 * Classify every event with at most `concurrency` classifications in flight.
 * Output order equals input order regardless of completion order. Events whose
 * classification fails or returns null are passed through unchanged.
 */
export async function enrichEvents(
  events: readonly NetworkEvent[],
  classifier: EventClassifier,
  options: EnrichOptions = {}
): Promise<NetworkEvent[]> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_ENRICH_CONCURRENCY);
  const startTime = Date.now();
  const results = new Map<number, EventContext>();
  const pending: Set<Promise<void>> = new Set();
  let done = 0;
  let failed = 0;

  const classifyAt = async (index: number, event: NetworkEvent): Promise<void> => {
    try {
      const context = await classifier.classify(event);
      if (context) {
        results.set(index, context);
      }
    } catch (error) {
      failed++;
      log.debug('Classification failed', { url: event.url, error: errorMessage(error) });
    } finally {
      done++;
      options.onProgress?.(done, events.length);
    }
  };

  for (const [index, event] of events.entries()) {
    while (pending.size >= concurrency) {
      await Promise.race(pending);
    }

    const promise = classifyAt(index, event).finally(() => {
      pending.delete(promise);
    });
    pending.add(promise);
  }

  await Promise.all(pending);

  const enriched = events.map((event, index) => {
    const context = results.get(index);
    return context ? { ...event, ai_context: context } : { ...event };
  });

  log.timed('Enrichment completed', startTime, {
    total: events.length,
    enriched: results.size,
    failed,
  });

  return enriched;
}

// ============================================
// HEURISTIC CLASSIFIER
// ============================================

const AUTH_PATH = /(^|\/)(login|logout|signin|signout|auth|oauth2?|session|sessions|token|tokens|sso)(\/|$)/i;

const READ_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

/**
 * Rule-based classification from method and URL alone
 */
export class HeuristicEventClassifier implements EventClassifier {
  async classify(event: NetworkEvent): Promise<EventContext | null> {
    if (isTelemetryUrl(event.url)) return null;

    let path: string;
    try {
      path = new URL(event.url).pathname;
    } catch {
      path = event.url;
    }

    const method = event.method.toUpperCase();
    const resource = describeResource(path);

    if (AUTH_PATH.test(path)) {
      return { purpose: `Authentication call to ${resource}`, category: 'auth', useful_for_tool: false };
    }
    if (READ_METHODS.has(method)) {
      return { purpose: `Reads ${resource}`, category: 'read', useful_for_tool: method === 'GET' };
    }
    if (method === 'DELETE') {
      return { purpose: `Deletes ${resource}`, category: 'write', useful_for_tool: true };
    }
    return { purpose: `Writes ${resource}`, category: 'write', useful_for_tool: true };
  }
}

/**
 * Last segment of the endpoint pattern that is not a placeholder or a
 * version marker, e.g. "/1/boards/{id}/cards" -> "cards".
 */
export function describeResource(path: string): string {
  const segments = normalizeEndpoint(path)
    .split('/')
    .filter((segment) => segment && !segment.startsWith('{') && !/^v?\d+$/.test(segment));
  return segments[segments.length - 1] ?? 'root';
}

// ============================================
// MODEL CLASSIFIER
// ============================================

/**
 * Any text-completion model client
 */
export interface TextModel {
  complete(prompt: string): Promise<string>;
}

export const eventContextSchema = z.object({
  purpose: z.string(),
  category: z.enum(['read', 'write', 'auth', 'analytics', 'other']),
  useful_for_tool: z.boolean(),
});

const POST_DATA_PREVIEW = 500;

export function buildClassificationPrompt(event: NetworkEvent): string {
  const postData = event.post_data ? event.post_data.slice(0, POST_DATA_PREVIEW) : 'None';
  return `Analyze this API request and explain its PURPOSE in 1 short sentence.
Focus on what USER ACTION or DATA this relates to.

Method: ${event.method}
URL: ${event.url}
Post Data: ${postData}

Return ONLY a JSON object:
{"purpose": "Brief description of what this does", "category": "read|write|auth|analytics|other", "useful_for_tool": boolean}`;
}

export class ModelEventClassifier implements EventClassifier {
  constructor(private model: TextModel) {}

  async classify(event: NetworkEvent): Promise<EventContext | null> {
    if (isTelemetryUrl(event.url)) return null;

    const raw = await this.model.complete(buildClassificationPrompt(event));
    return parseModelJson(raw, eventContextSchema);
  }
}
