/**
 * Page Analyzer - the oracle the login loop consults each cycle.
 *
 * The contract is a JSON object with selector fields (string or null), an
 * `is_logged_in` flag and a `step_description`. Two implementations ship:
 * - ModelPageAnalyzer sends a screenshot to a vision model and parses its answer
 * - HeuristicPageAnalyzer probes the DOM with well-known login selectors
 */

import type { Page } from 'playwright';
import { z } from 'zod';
import type { PageAffordanceMap } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { parseModelJson } from '../utils/model-json.js';

const log = logger.analyzer;

export interface PageAnalyzer {
  /** May throw; callers treat a failure as "no information this cycle" */
  analyze(page: Page): Promise<PageAffordanceMap>;
}

// ============================================
// WIRE CONTRACT
// ============================================

const selectorField = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export const pageAnalysisSchema = z.object({
  email_selector: selectorField,
  password_selector: selectorField,
  otp_selector: selectorField,
  primary_action_button_selector: selectorField,
  cookie_button_selector: selectorField,
  is_logged_in: z.boolean().default(false),
  step_description: z.string().default(''),
});

export type PageAnalysisPayload = z.input<typeof pageAnalysisSchema>;

/**
 * Map the analyzer's wire format onto a PageAffordanceMap.
 *
 * @throws ModelResponseError when the text is not valid JSON of the right shape
 */
export function parsePageAnalysis(raw: string): PageAffordanceMap {
  const parsed = parseModelJson(raw, pageAnalysisSchema);
  return {
    emailSelector: parsed.email_selector,
    passwordSelector: parsed.password_selector,
    otpSelector: parsed.otp_selector,
    primaryActionSelector: parsed.primary_action_button_selector,
    cookieConsentSelector: parsed.cookie_button_selector,
    isLoggedIn: parsed.is_logged_in,
    description: parsed.step_description,
  };
}

// ============================================
// MODEL-BACKED ANALYZER
// ============================================

/**
 * Any multimodal model client able to answer a prompt about an image
 */
export interface VisionModel {
  complete(prompt: string, image: { mimeType: 'image/png'; base64: string }): Promise<string>;
}

export const PAGE_ANALYSIS_PROMPT = `You are looking at a screenshot of a web page during a login flow.
Identify the CSS selectors of the controls a user needs next.

Return ONLY a JSON object:
{"email_selector": string|null, "password_selector": string|null, "otp_selector": string|null,
 "primary_action_button_selector": string|null, "cookie_button_selector": string|null,
 "is_logged_in": boolean, "step_description": "what this step of the login is"}

Use null for controls that are not on the page. Set is_logged_in to true only
when the page clearly belongs to an authenticated user.`;

export class ModelPageAnalyzer implements PageAnalyzer {
  constructor(
    private model: VisionModel,
    private prompt: string = PAGE_ANALYSIS_PROMPT
  ) {}

  async analyze(page: Page): Promise<PageAffordanceMap> {
    const screenshot = await page.screenshot({ type: 'png', fullPage: false });
    const raw = await this.model.complete(this.prompt, {
      mimeType: 'image/png',
      base64: screenshot.toString('base64'),
    });
    return parsePageAnalysis(raw);
  }
}

// ============================================
// HEURISTIC ANALYZER
// ============================================

export const EMAIL_SELECTORS = [
  'input[type="email"]',
  'input[name="email"]',
  'input[name="username"]',
  'input[name="user"]',
  'input[name="login"]',
  'input[id*="email"]',
  'input[id*="username"]',
  'input[autocomplete="email"]',
  'input[autocomplete="username"]',
];

export const PASSWORD_SELECTORS = [
  'input[type="password"]',
  'input[name="password"]',
  'input[autocomplete="current-password"]',
];

export const OTP_SELECTORS = [
  'input[autocomplete="one-time-code"]',
  'input[name="code"]',
  'input[name="otp"]',
  'input[name="totp"]',
  'input[name="mfa"]',
  'input[id*="otp"]',
  'input[id*="verification"]',
  'input[placeholder*="code" i]',
];

export const SUBMIT_SELECTORS = [
  'button[type="submit"]',
  'input[type="submit"]',
  '[data-testid*="login"]',
  '[data-testid*="submit"]',
];

export const COOKIE_CONSENT_SELECTORS = [
  '#onetrust-accept-btn-handler',
  '#CybotCookiebotDialogBodyLevelButtonLevelOptinAllowAll',
  '.cc-btn.cc-dismiss',
  '[class*="cookie"] button[class*="accept"]',
  '[class*="consent"] button[class*="accept"]',
  'button[aria-label*="accept" i]',
];

export const LOGGED_IN_SELECTORS = [
  'a[href*="logout"]',
  'a[href*="signout"]',
  'button:has-text("Log out")',
  'button:has-text("Sign out")',
  '[data-testid*="avatar"]',
  '[aria-label*="account menu" i]',
];

const LOGIN_URL_PATTERN = /\/(login|signin|sign-in|sign_in|auth|authenticate|sso)(\/|\?|#|$)/i;

export interface HeuristicAnalyzerOptions {
  /**
   * Only report logged in on a visible account marker (logout link, avatar).
   * Needed when login starts on the target page itself, where "not on a
   * login URL" says nothing.
   */
  requireLoggedInMarker?: boolean;
}

export class HeuristicPageAnalyzer implements PageAnalyzer {
  private requireLoggedInMarker: boolean;

  constructor(options: HeuristicAnalyzerOptions = {}) {
    this.requireLoggedInMarker = options.requireLoggedInMarker ?? false;
  }

  async analyze(page: Page): Promise<PageAffordanceMap> {
    const cookieConsentSelector = await this.firstVisible(page, COOKIE_CONSENT_SELECTORS);
    const emailSelector = await this.firstVisible(page, EMAIL_SELECTORS);
    const passwordSelector = await this.firstVisible(page, PASSWORD_SELECTORS);
    const otpSelector = await this.firstVisible(page, OTP_SELECTORS);
    const primaryActionSelector = await this.firstVisible(page, SUBMIT_SELECTORS);

    const hasCredentialField = Boolean(emailSelector || passwordSelector || otpSelector);
    const loggedInMarker = hasCredentialField ? undefined : await this.firstVisible(page, LOGGED_IN_SELECTORS);
    const onLoginUrl = LOGIN_URL_PATTERN.test(page.url());
    const urlOnly = !hasCredentialField && loggedInMarker === undefined && !onLoginUrl;
    const isLoggedIn =
      !hasCredentialField && (loggedInMarker !== undefined || (urlOnly && !this.requireLoggedInMarker));

    const found = [
      emailSelector && 'email',
      passwordSelector && 'password',
      otpSelector && 'one-time code',
      cookieConsentSelector && 'cookie banner',
    ].filter(Boolean);

    if (isLoggedIn && urlOnly) {
      log.warn('Treating page as logged in without an account marker', { url: page.url() });
    }

    const description = isLoggedIn
      ? loggedInMarker !== undefined
        ? `Account marker ${loggedInMarker} is visible`
        : 'No credential fields and not on a login URL; treating as logged in'
      : found.length > 0
        ? `Found ${found.join(', ')}`
        : 'No known login controls found';

    log.debug('Heuristic analysis', { url: page.url(), description });

    return {
      emailSelector,
      passwordSelector,
      otpSelector,
      primaryActionSelector,
      cookieConsentSelector,
      isLoggedIn,
      description,
    };
  }

  private async firstVisible(page: Page, selectors: string[]): Promise<string | undefined> {
    for (const selector of selectors) {
      try {
        if (await page.locator(selector).first().isVisible()) {
          return selector;
        }
      } catch {
        // invalid selector for this engine, try the next one
        continue;
      }
    }
    return undefined;
  }
}
