/**
 * Helpers for model responses that are supposed to be JSON
 */

import { z } from 'zod';

/**
 * Thrown when a model response cannot be turned into the expected shape
 */
export class ModelResponseError extends Error {
  constructor(
    message: string,
    public readonly raw: string
  ) {
    super(message);
    this.name = 'ModelResponseError';
  }
}

/**
 * Remove a surrounding markdown code fence (```json ... ```) if present.
 */
export function stripCodeFences(text: string): string {
  let result = text.trim();
  const opening = result.match(/^```[a-zA-Z]*\s*/);
  if (opening) {
    result = result.slice(opening[0].length);
  }
  if (result.endsWith('```')) {
    result = result.slice(0, -3);
  }
  return result.trim();
}

/**
 * Parse a model response against a schema.
 *
 * @throws ModelResponseError on malformed JSON or a schema mismatch
 */
export function parseModelJson<S extends z.ZodTypeAny>(raw: string, schema: S): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch (error) {
    throw new ModelResponseError(
      `Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      raw
    );
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ModelResponseError(`Model response has the wrong shape: ${issues.join('; ')}`, raw);
  }
  return result.data;
}
