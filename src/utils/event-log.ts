/**
 * Event log files: JSON arrays of NetworkEvent.
 *
 * For a raw log `events.json` the pipeline also writes `events_enriched.json`
 * and `events_unique.json` beside it.
 */

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import type { NetworkEvent } from '../types/index.js';
import { writeFileAtomic } from './atomic-write.js';
import { logger, errorMessage } from './logger.js';

const log = logger.create('EventLog');

export const networkEventSchema = z.object({
  method: z.string(),
  url: z.string(),
  request_headers: z.record(z.string()),
  status: z.number().int(),
  post_data: z.string().optional(),
  post_data_base64: z.string().optional(),
  is_binary: z.boolean().default(false),
  ai_context: z
    .object({
      purpose: z.string(),
      category: z.enum(['read', 'write', 'auth', 'analytics', 'other']),
      useful_for_tool: z.boolean(),
    })
    .optional(),
});

export const eventLogSchema = z.array(networkEventSchema);

function withSuffix(logPath: string, suffix: string): string {
  return logPath.endsWith('.json')
    ? `${logPath.slice(0, -'.json'.length)}${suffix}.json`
    : `${logPath}${suffix}.json`;
}

export function enrichedLogPath(logPath: string): string {
  return withSuffix(logPath, '_enriched');
}

export function uniqueLogPath(logPath: string): string {
  return withSuffix(logPath, '_unique');
}

/**
 * Serialize events one at a time so a single bad event (a circular value, a
 * BigInt) costs only itself.
 */
export function serializeEvents(events: readonly NetworkEvent[]): { json: string; written: number; skipped: number } {
  const parts: string[] = [];
  let skipped = 0;

  for (const event of events) {
    try {
      const json = JSON.stringify(event, null, 2);
      if (json === undefined) {
        skipped++;
        continue;
      }
      parts.push(json.replace(/^/gm, '  '));
    } catch (error) {
      skipped++;
      log.warn('Skipping event that cannot be serialized', { url: event.url, error: errorMessage(error) });
    }
  }

  const json = parts.length === 0 ? '[]' : `[\n${parts.join(',\n')}\n]`;
  return { json, written: parts.length, skipped };
}

/**
 * Write an event log atomically. Returns the number of events written.
 */
export async function writeEventLog(logPath: string, events: readonly NetworkEvent[]): Promise<number> {
  const { json, written, skipped } = serializeEvents(events);
  await writeFileAtomic(logPath, json);
  log.info('Saved events', { file: logPath, written, skipped });
  return written;
}

/**
 * @throws when the file is missing, not JSON, or not an array of events
 */
export async function readEventLog(logPath: string): Promise<NetworkEvent[]> {
  const content = await fs.readFile(logPath, 'utf-8');
  const result = eventLogSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue';
    throw new Error(`Invalid event log ${logPath} (${where})`);
  }
  return result.data;
}
