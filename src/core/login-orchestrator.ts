/**
 * Login Orchestrator - drives a page from "not authenticated" to
 * "authenticated" with a bounded analyze-act loop.
 *
 *   ANALYZING -> ACTING -> (ANALYZING | LOGGED_IN | STUCK)
 *
 * Each cycle asks the PageAnalyzer what is on screen, clears a cookie banner,
 * fills whichever credential fields are present with values the operator
 * supplies, and then submits. Submission prefers the analyzer's primary
 * action and falls back to a search over common button labels.
 */

import type { Locator, Page } from 'playwright';
import type { PageAffordanceMap } from '../types/index.js';
import { logger, errorMessage } from '../utils/logger.js';
import { defaultPromptFor, type OperatorPrompt, type SecretField } from '../utils/operator-prompt.js';
import { getTimeout } from '../utils/timeouts.js';
import { InputActuator } from './input-actuator.js';
import { OtpHandler } from './otp-handler.js';
import type { PageAnalyzer } from './page-analyzer.js';
import { clickSelf } from './page-scripts.js';

const log = logger.orchestrator;

// ============================================
// TYPES
// ============================================

export type LoginState = 'ANALYZING' | 'ACTING' | 'LOGGED_IN' | 'STUCK';

export type SubmitMethod = 'primary-action' | 'label-search' | 'none';

export interface FillReport {
  field: SecretField;
  /** False when the operator skipped the field */
  attempted: boolean;
  succeeded: boolean;
}

export interface CycleReport {
  step: number;
  description?: string;
  analyzerFailed: boolean;
  consentClicked: boolean;
  fills: FillReport[];
  successfulFills: number;
  failedFills: number;
  submitted: SubmitMethod;
  /** True when nothing at all was done on the page this cycle */
  idle: boolean;
}

export interface LoginResult {
  success: boolean;
  state: 'LOGGED_IN' | 'STUCK';
  steps: number;
  cycles: CycleReport[];
}

export interface LoginOrchestratorOptions {
  maxSteps?: number;
  settleMs?: number;
  consentSettleMs?: number;
  idleRetryMs?: number;
  labelSearchSettleMs?: number;
  networkIdleMs?: number;
  actionTimeoutMs?: number;
  /** Labels tried, in order, when no primary action could be clicked */
  submitLabels?: string[];
}

export interface LoginOrchestratorDeps {
  analyzer: PageAnalyzer;
  operator: OperatorPrompt;
  actuator?: InputActuator;
  otpHandler?: OtpHandler;
}

export const DEFAULT_MAX_STEPS = 10;

export const SUBMIT_LABELS = [
  'Log in', 'Log In', 'Sign in', 'Sign In',
  'Next', 'next', 'NEXT',
  'Continue', 'continue', 'CONTINUE',
  'Login', 'login', 'LOGIN',
  'Submit', 'submit', 'SUBMIT',
];

/**
 * Submit unless every attempted fill failed. A cycle with no fills at all
 * still submits (a "Continue" page, or the operator typed into the browser).
 */
export function shouldSubmit(tally: { successfulFills: number; failedFills: number }): boolean {
  return !(tally.failedFills > 0 && tally.successfulFills === 0);
}

/**
 * Interactive elements carrying a label, most specific first. Plain text
 * matches are left out so headings like "Log in to continue" are not hit.
 */
export function labelSelectors(label: string): string[] {
  const quoted = label.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  return [
    `a:text-is('${quoted}')`,
    `a:has-text('${quoted}')`,
    `input[type='submit'][value='${quoted}']`,
    `input[type='button'][value='${quoted}']`,
    `button:has-text('${quoted}')`,
  ];
}

// ============================================
// ORCHESTRATOR
// ============================================

export class LoginOrchestrator {
  private analyzer: PageAnalyzer;
  private operator: OperatorPrompt;
  private actuator: InputActuator;
  private otpHandler: OtpHandler;

  private maxSteps: number;
  private settleMs: number;
  private consentSettleMs: number;
  private idleRetryMs: number;
  private labelSearchSettleMs: number;
  private networkIdleMs: number;
  private actionTimeoutMs: number;
  private submitLabels: string[];

  private state: LoginState = 'ANALYZING';

  constructor(deps: LoginOrchestratorDeps, options: LoginOrchestratorOptions = {}) {
    this.analyzer = deps.analyzer;
    this.operator = deps.operator;
    this.actuator = deps.actuator ?? new InputActuator();
    this.otpHandler = deps.otpHandler ?? new OtpHandler(deps.operator);

    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.settleMs = getTimeout('CYCLE_SETTLE', options.settleMs);
    this.consentSettleMs = getTimeout('CONSENT_SETTLE', options.consentSettleMs);
    this.idleRetryMs = getTimeout('IDLE_RETRY', options.idleRetryMs);
    this.labelSearchSettleMs = getTimeout('LABEL_SEARCH_SETTLE', options.labelSearchSettleMs);
    this.networkIdleMs = getTimeout('NETWORK_IDLE', options.networkIdleMs);
    this.actionTimeoutMs = getTimeout('ACTION', options.actionTimeoutMs);
    this.submitLabels = options.submitLabels ?? SUBMIT_LABELS;
  }

  getState(): LoginState {
    return this.state;
  }

  async login(page: Page): Promise<boolean> {
    const result = await this.run(page);
    return result.success;
  }

  /**
   * Run the loop until the analyzer reports a logged-in page or the step
   * budget runs out. Never throws.
   */
  async run(page: Page): Promise<LoginResult> {
    const cycles: CycleReport[] = [];
    const startTime = Date.now();
    log.info('Starting login sequence', { maxSteps: this.maxSteps });

    for (let step = 1; step <= this.maxSteps; step++) {
      const report = newReport(step);
      cycles.push(report);

      let loggedIn = false;
      try {
        loggedIn = await this.cycle(page, report);
      } catch (error) {
        // Page closed or navigation tore down the context mid-cycle
        log.warn('Login cycle failed', { step, error: errorMessage(error) });
      }

      if (loggedIn) {
        this.state = 'LOGGED_IN';
        log.timed('Logged in', startTime, { steps: step });
        return { success: true, state: 'LOGGED_IN', steps: step, cycles };
      }
    }

    this.state = 'STUCK';
    log.warn('Max login steps reached', { maxSteps: this.maxSteps });
    return { success: false, state: 'STUCK', steps: this.maxSteps, cycles };
  }

  /**
   * One analyze-act cycle. Resolves true when the page is logged in.
   */
  private async cycle(page: Page, report: CycleReport): Promise<boolean> {
    this.state = 'ANALYZING';
    await page.waitForTimeout(this.settleMs);

    let analysis: PageAffordanceMap;
    try {
      analysis = await this.analyzer.analyze(page);
    } catch (error) {
      log.warn('Page analysis failed, retrying next step', { step: report.step, error: errorMessage(error) });
      report.analyzerFailed = true;
      report.idle = true;
      return false;
    }

    report.description = analysis.description;
    log.info('Page analyzed', { step: report.step, description: analysis.description });

    if (analysis.isLoggedIn) {
      report.idle = false;
      return true;
    }

    this.state = 'ACTING';
    let interacted = false;

    if (analysis.cookieConsentSelector) {
      log.info('Accepting cookie banner', { selector: analysis.cookieConsentSelector });
      if (await this.actuator.attempt(page, analysis.cookieConsentSelector)) {
        report.consentClicked = true;
        report.idle = false;
        await page.waitForTimeout(this.consentSettleMs);
        return false;
      }
      log.debug('Cookie banner click failed, continuing with the cycle');
    }

    const fields: Array<{ field: SecretField; selector: string | undefined }> = [
      { field: 'email', selector: analysis.emailSelector },
      { field: 'password', selector: analysis.passwordSelector },
      { field: 'otp', selector: analysis.otpSelector },
    ];

    for (const { field, selector } of fields) {
      if (!selector) continue;

      const value = await this.operator.requestSecret(field, defaultPromptFor(field));
      if (value === undefined) {
        report.fills.push({ field, attempted: false, succeeded: false });
        continue;
      }

      const succeeded = field === 'otp'
        ? await this.otpHandler.submitOtp(page, selector, value)
        : await this.actuator.attempt(page, selector, value);

      interacted = true;
      report.fills.push({ field, attempted: true, succeeded });
      if (succeeded) {
        report.successfulFills++;
      } else {
        report.failedFills++;
        log.warn('Could not fill field with any technique', { field, selector });
      }
    }

    const submit = shouldSubmit(report);

    if (analysis.primaryActionSelector) {
      if (!submit) {
        log.info('Skipping submit because every fill failed');
      } else if (await this.actuator.attempt(page, analysis.primaryActionSelector)) {
        await this.waitForNetworkIdle(page);
        report.submitted = 'primary-action';
        interacted = true;
      }
    }

    if (report.submitted === 'none' && submit) {
      log.info('No primary action clicked, searching for a submit label');
      if (await this.clickByLabel(page)) {
        report.submitted = 'label-search';
        interacted = true;
      }
    }

    log.debug('Cycle finished', {
      step: report.step,
      successfulFills: report.successfulFills,
      failedFills: report.failedFills,
      submitted: report.submitted,
    });

    report.idle = !interacted;
    if (!interacted) {
      log.info('Nothing to do on this page, waiting', { waitMs: this.idleRetryMs });
      await page.waitForTimeout(this.idleRetryMs);
    }
    return false;
  }

  /**
   * Click the first visible element carrying one of the submit labels.
   */
  private async clickByLabel(page: Page): Promise<boolean> {
    await page.waitForTimeout(this.labelSearchSettleMs);

    for (const label of this.submitLabels) {
      try {
        const button = page.getByRole('button', { name: label, exact: true });
        if (await button.first().isVisible()) {
          await this.forceClick(page, button.first(), label);
          return true;
        }

        for (const selector of labelSelectors(label)) {
          const matches = page.locator(selector);
          const count = await matches.count();
          for (let i = 0; i < count; i++) {
            const candidate = matches.nth(i);
            if (await candidate.isVisible()) {
              await this.forceClick(page, candidate, label);
              return true;
            }
          }
        }
      } catch (error) {
        log.debug('Label search attempt failed', { label, error: errorMessage(error) });
      }
    }

    log.info('No submit control found by label');
    return false;
  }

  private async forceClick(page: Page, locator: Locator, label: string): Promise<void> {
    log.info('Clicking control by label', { label });
    try {
      await locator.click({ timeout: this.actionTimeoutMs, force: true });
    } catch (error) {
      log.debug('Click failed, using script click', { label, error: errorMessage(error) });
      await locator.evaluate(clickSelf);
    }
    await this.waitForNetworkIdle(page);
  }

  private async waitForNetworkIdle(page: Page): Promise<void> {
    try {
      await page.waitForLoadState('networkidle', { timeout: this.networkIdleMs });
    } catch {
      log.debug('Network did not go idle', { timeoutMs: this.networkIdleMs });
    }
  }
}

function newReport(step: number): CycleReport {
  return {
    step,
    analyzerFailed: false,
    consentClicked: false,
    fills: [],
    successfulFills: 0,
    failedFills: 0,
    submitted: 'none',
    idle: true,
  };
}
