/**
 * Recorder - the end-to-end capture pipeline.
 *
 * launch -> establish a session (stored or by login) -> capture while the
 * target page loads and a few controls are clicked -> write the raw log ->
 * enrich -> dedupe -> close the browser.
 */

import type { Page } from 'playwright';
import type { NetworkEvent } from '../types/index.js';
import type { RecorderConfig } from '../utils/config-schemas.js';
import { loginNotCompletedMessage } from '../utils/error-messages.js';
import { enrichedLogPath, uniqueLogPath, writeEventLog } from '../utils/event-log.js';
import { logger, errorMessage } from '../utils/logger.js';
import type { OperatorPrompt } from '../utils/operator-prompt.js';
import { getTimeout } from '../utils/timeouts.js';
import { BrowserManager } from './browser-manager.js';
import { dedupeEvents } from './event-dedup.js';
import { enrichEvents, type EventClassifier } from './event-enricher.js';
import { LoginOrchestrator, type LoginResult } from './login-orchestrator.js';
import { NetworkCapture } from './network-capture.js';
import type { PageAnalyzer } from './page-analyzer.js';
import { SessionStore } from './session-store.js';

const log = logger.recorder;

export const EXPLORE_SELECTOR = "button, [role='button']";

/**
 * What the recorder needs from a browser: a page and a way to shut down
 */
export interface BrowserHost {
  newPage(): Promise<Page>;
  cleanup(): Promise<void>;
}

// ============================================
// SESSION
// ============================================

export type SessionSource = 'stored' | 'login' | 'none';

export interface SessionOutcome {
  authenticated: boolean;
  source: SessionSource;
  login?: LoginResult;
}

export interface EstablishSessionOptions {
  store: SessionStore;
  orchestrator: LoginOrchestrator;
  targetUrl: string;
  /** Where the login flow starts; defaults to the target */
  loginUrl?: string;
  navigationTimeoutMs?: number;
}

/**
 * Reuse the stored session if there is one, otherwise log in and persist the
 * new session exactly once. A failed login is not fatal: the caller carries
 * on unauthenticated.
 */
export async function establishSession(page: Page, options: EstablishSessionOptions): Promise<SessionOutcome> {
  const timeout = getTimeout('NAVIGATION', options.navigationTimeoutMs);

  if (await options.store.exists()) {
    log.info('Loading stored session', { file: options.store.path });
    let injected = 0;
    try {
      injected = await options.store.injectInto(page.context());
    } catch (error) {
      log.warn('Stored session could not be injected, logging in instead', {
        file: options.store.path,
        error: errorMessage(error),
      });
    }
    if (injected > 0) {
      await openTarget(page, options.targetUrl, timeout);
      return { authenticated: true, source: 'stored' };
    }
  }

  const loginUrl = options.loginUrl ?? options.targetUrl;
  log.info('No session found, starting login', { loginUrl });
  try {
    await page.goto(loginUrl, { timeout });
  } catch (error) {
    log.warn('Login page did not finish loading', { loginUrl, error: errorMessage(error) });
  }

  const login = await options.orchestrator.run(page);
  if (!login.success) {
    log.warn(loginNotCompletedMessage(login.steps));
    return { authenticated: false, source: 'none', login };
  }

  await options.store.persistFromContext(page.context());

  if (!page.url().includes(options.targetUrl)) {
    await openTarget(page, options.targetUrl, timeout);
  }
  return { authenticated: true, source: 'login', login };
}

async function openTarget(page: Page, targetUrl: string, timeout: number): Promise<void> {
  try {
    await page.goto(targetUrl, { timeout });
  } catch (error) {
    log.warn('Target page did not finish loading', { targetUrl, error: errorMessage(error) });
  }
}

// ============================================
// OUTPUTS
// ============================================

export interface ProcessEventsOptions {
  eventsLog: string;
  classifier?: EventClassifier;
  concurrency?: number;
}

export interface ProcessedEvents {
  raw: number;
  enriched?: number;
  unique: number;
  files: { raw: string; enriched?: string; unique: string };
}

/**
 * Write the raw log, the enriched log (when a classifier is given) and the
 * deduplicated log next to each other.
 */
export async function processEvents(
  events: readonly NetworkEvent[],
  options: ProcessEventsOptions
): Promise<ProcessedEvents> {
  const raw = await writeEventLog(options.eventsLog, events);

  let current: NetworkEvent[] = [...events];
  let enriched: number | undefined;
  let enrichedFile: string | undefined;

  if (options.classifier) {
    current = await enrichEvents(events, options.classifier, {
      concurrency: options.concurrency,
      onProgress: (done, total) => {
        if (done === total || done % 10 === 0) {
          log.info('Analyzed events', { done, total });
        }
      },
    });
    enrichedFile = enrichedLogPath(options.eventsLog);
    enriched = await writeEventLog(enrichedFile, current);

    for (const event of current) {
      if (event.ai_context?.useful_for_tool) {
        log.info('Useful endpoint', { purpose: event.ai_context.purpose, category: event.ai_context.category });
      }
    }
  }

  const uniqueFile = uniqueLogPath(options.eventsLog);
  const unique = await writeEventLog(uniqueFile, dedupeEvents(current));

  return {
    raw,
    enriched,
    unique,
    files: { raw: options.eventsLog, enriched: enrichedFile, unique: uniqueFile },
  };
}

// ============================================
// RECORDER
// ============================================

export interface RecorderDeps {
  analyzer: PageAnalyzer;
  operator: OperatorPrompt;
  classifier?: EventClassifier;
  browser?: BrowserHost;
  store?: SessionStore;
  orchestrator?: LoginOrchestrator;
}

export interface RecorderOptions {
  navigationTimeoutMs?: number;
  networkIdleMs?: number;
  exploreClickTimeoutMs?: number;
  exploreSettleMs?: number;
}

export interface RecordResult extends ProcessedEvents {
  session: SessionOutcome;
  explored: number;
}

export class Recorder {
  private browser: BrowserHost;
  private store: SessionStore;
  private orchestrator: LoginOrchestrator;
  private classifier?: EventClassifier;

  private navigationTimeoutMs: number;
  private networkIdleMs: number;
  private exploreClickTimeoutMs: number;
  private exploreSettleMs: number;

  constructor(
    private config: RecorderConfig,
    deps: RecorderDeps,
    options: RecorderOptions = {}
  ) {
    this.browser = deps.browser ?? new BrowserManager({ headless: config.headless });
    this.store = deps.store ?? new SessionStore(config.sessionFile);
    this.orchestrator = deps.orchestrator ?? new LoginOrchestrator(
      { analyzer: deps.analyzer, operator: deps.operator },
      { maxSteps: config.maxLoginSteps }
    );
    this.classifier = deps.classifier;

    this.navigationTimeoutMs = getTimeout('NAVIGATION', options.navigationTimeoutMs);
    this.networkIdleMs = getTimeout('NAVIGATION', options.networkIdleMs);
    this.exploreClickTimeoutMs = getTimeout('EXPLORE_CLICK', options.exploreClickTimeoutMs);
    this.exploreSettleMs = getTimeout('EXPLORE_SETTLE', options.exploreSettleMs);
  }

  async record(): Promise<RecordResult> {
    const startTime = Date.now();

    try {
      const page = await this.browser.newPage();

      const session = await establishSession(page, {
        store: this.store,
        orchestrator: this.orchestrator,
        targetUrl: this.config.targetUrl,
        loginUrl: this.config.loginUrl,
        navigationTimeoutMs: this.navigationTimeoutMs,
      });

      const capture = new NetworkCapture({ denylist: this.config.captureDenylist });
      const detach = capture.attach(page);

      log.info('Opening target', { url: this.config.targetUrl });
      try {
        await page.goto(this.config.targetUrl, { timeout: this.navigationTimeoutMs });
        await page.waitForLoadState('networkidle', { timeout: this.networkIdleMs });
      } catch (error) {
        log.warn('Navigation error, continuing', { error: errorMessage(error) });
      }

      const explored = await this.explore(page);
      detach();

      const processed = await processEvents(capture.events, {
        eventsLog: this.config.eventsLog,
        classifier: this.classifier,
        concurrency: this.config.enrichConcurrency,
      });

      log.timed('Recording finished', startTime, {
        authenticated: session.authenticated,
        raw: processed.raw,
        unique: processed.unique,
      });

      return { ...processed, session, explored };
    } finally {
      await this.browser.cleanup();
    }
  }

  /**
   * Click the first few visible buttons so the page issues more requests.
   */
  private async explore(page: Page): Promise<number> {
    const limit = this.config.exploreClicks;
    if (limit === 0) return 0;

    const candidates = await page.locator(EXPLORE_SELECTOR).all();
    log.info('Starting interaction phase', { candidates: candidates.length, limit });

    let clicked = 0;
    for (const [index, candidate] of candidates.entries()) {
      if (clicked >= limit) break;
      try {
        if (!(await candidate.isVisible())) continue;
        await candidate.click({ timeout: this.exploreClickTimeoutMs });
        clicked++;
        await page.waitForTimeout(this.exploreSettleMs);
      } catch (error) {
        log.debug('Skipping element', { index, error: errorMessage(error) });
      }
    }
    return clicked;
  }
}
