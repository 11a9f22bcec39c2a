/**
 * Session Store - durable home of the authenticated cookie jar.
 *
 * The file is Playwright storage-state JSON (`{cookies, origins}`). A bare
 * cookie array is accepted on load as well. Every cookie's `sameSite` is
 * normalized before anything reads it.
 */

import { promises as fs } from 'node:fs';
import type { BrowserContext } from 'playwright';
import { z } from 'zod';
import type { SameSite, SessionState, StoredCookie, StoredOrigin } from '../types/index.js';
import { writeJsonAtomic } from '../utils/atomic-write.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger.session;

/** Name of the cookie carrying the CSRF token for write requests */
export const CSRF_COOKIE_NAME = 'dsc';

/**
 * Map any browser sameSite value onto Strict | Lax | None.
 * Case-sensitive: only the canonical forms and lowercase strict/lax are kept.
 */
export function normalizeSameSite(raw: unknown): SameSite {
  switch (raw) {
    case 'Strict':
    case 'strict':
      return 'Strict';
    case 'Lax':
    case 'lax':
      return 'Lax';
    default:
      return 'None';
  }
}

function stripLeadingDot(domain: string): string {
  return domain.startsWith('.') ? domain.slice(1) : domain;
}

/**
 * Containment in either direction after stripping one leading dot from both
 * sides, so `.example.com` matches `example.com` and `www.example.com`.
 */
export function cookieDomainMatches(cookieDomain: string, host: string): boolean {
  const cookie = stripLeadingDot(cookieDomain.toLowerCase());
  const target = stripLeadingDot(host.toLowerCase());
  if (!cookie || !target) return false;
  return target.includes(cookie) || cookie.includes(target);
}

// ============================================
// FILE FORMAT
// ============================================

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string().optional(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.unknown().transform(normalizeSameSite),
});

const originSchema = z.object({
  origin: z.string(),
  localStorage: z.array(z.object({ name: z.string(), value: z.string() })),
});

const storageStateSchema = z.object({
  cookies: z.array(cookieSchema),
  origins: z.array(originSchema).optional(),
});

export const sessionFileSchema = z.union([
  storageStateSchema,
  z.array(cookieSchema).transform((cookies) => ({ cookies, origins: undefined })),
]);

/**
 * Anything shaped like a storage state; sameSite may be any string
 */
export interface StorageStateInput {
  cookies: Array<Omit<StoredCookie, 'sameSite'> & { sameSite?: string }>;
  origins?: StoredOrigin[];
}

export function normalizeSessionState(state: StorageStateInput): SessionState {
  return {
    cookies: state.cookies.map((cookie) => ({ ...cookie, sameSite: normalizeSameSite(cookie.sameSite) })),
    origins: state.origins,
  };
}

// ============================================
// STORE
// ============================================

export class SessionStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Overwrite the session file with a normalized copy of `state`.
   */
  async persist(state: StorageStateInput): Promise<SessionState> {
    const normalized = normalizeSessionState(state);
    await writeJsonAtomic(this.filePath, normalized);
    log.info('Session saved', { file: this.filePath, cookies: normalized.cookies.length });
    return normalized;
  }

  async persistFromContext(context: BrowserContext): Promise<SessionState> {
    return this.persist(await context.storageState());
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Read the session. Null when the file is missing or unreadable.
   */
  async load(): Promise<SessionState | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      log.debug('No session file', { file: this.filePath, error: errorMessage(error) });
      return null;
    }

    try {
      const parsed = sessionFileSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        log.warn('Session file has an unexpected shape', {
          file: this.filePath,
          issues: parsed.error.issues.length,
        });
        return null;
      }
      return parsed.data;
    } catch (error) {
      log.warn('Session file is not valid JSON', { file: this.filePath, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Cookies applicable to `url`, as name -> value. Later cookies win on a
   * name clash.
   */
  async lookupCookies(url: string): Promise<Record<string, string>> {
    const session = await this.load();
    if (!session) return {};

    let host: string;
    try {
      host = new URL(url).hostname;
    } catch {
      log.debug('Cannot look up cookies for an invalid URL', { url });
      return {};
    }

    const cookies: Record<string, string> = {};
    for (const cookie of session.cookies) {
      if (cookieDomainMatches(cookie.domain, host)) {
        cookies[cookie.name] = cookie.value;
      }
    }
    return cookies;
  }

  /**
   * `Cookie` header value for replaying a request to `url`
   */
  async cookieHeader(url: string): Promise<string> {
    const cookies = await this.lookupCookies(url);
    return Object.entries(cookies)
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }

  async lookupCsrfToken(): Promise<string> {
    const session = await this.load();
    const cookie = session?.cookies.find((c) => c.name === CSRF_COOKIE_NAME);
    return cookie?.value ?? '';
  }

  /**
   * Add the stored cookies to a browser context. Returns how many were added.
   */
  async injectInto(context: BrowserContext): Promise<number> {
    const session = await this.load();
    if (!session) {
      log.warn('No session to inject, continuing unauthenticated', { file: this.filePath });
      return 0;
    }

    await context.addCookies(
      session.cookies.map((cookie) => ({ ...cookie, path: cookie.path ?? '/' }))
    );
    log.info('Session cookies loaded', { count: session.cookies.length });
    return session.cookies.length;
  }
}
