/**
 * OTP Handler - enters a one-time passcode through a four-stage ladder.
 *
 * 1. Clipboard paste with no prior focus (document-level paste handlers)
 * 2. Focus the best-guess input, then paste
 * 3. Focus the best-guess input, then type character by character
 * 4. Ask the operator to enter the code by hand and block on confirmation
 *
 * Stages 1-3 are verified by a probe of every input on the page. The code
 * always comes from the caller; it is never generated here.
 */

import type { Page } from 'playwright';
import type { ActionOutcome, OtpTechnique } from '../types/index.js';
import type { OperatorPrompt } from '../utils/operator-prompt.js';
import { logger, errorMessage } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';
import { focusBody, inputsHoldCode, writeClipboard } from './page-scripts.js';

const log = logger.otp;

/** Click target for stages 2-3 when the analyzer gave no selector */
export const GENERIC_OTP_TARGET = 'input';

export interface OtpHandlerOptions {
  keyDelayMs?: number;
  focusSettleMs?: number;
  probeSettleMs?: number;
  actionTimeoutMs?: number;
}

export interface OtpResult {
  succeeded: boolean;
  technique?: OtpTechnique;
  outcomes: ActionOutcome<OtpTechnique>[];
}

export class OtpHandler {
  private keyDelayMs: number;
  private focusSettleMs: number;
  private probeSettleMs: number;
  private actionTimeoutMs: number;

  constructor(
    private operator: OperatorPrompt,
    options: OtpHandlerOptions = {}
  ) {
    this.keyDelayMs = getTimeout('OTP_KEY_DELAY', options.keyDelayMs);
    this.focusSettleMs = getTimeout('OTP_FOCUS_SETTLE', options.focusSettleMs);
    this.probeSettleMs = getTimeout('OTP_PROBE_SETTLE', options.probeSettleMs);
    this.actionTimeoutMs = getTimeout('ACTION', options.actionTimeoutMs);
  }

  async submitOtp(page: Page, selector: string | undefined, code: string): Promise<boolean> {
    const result = await this.submitOtpDetailed(page, selector, code);
    return result.succeeded;
  }

  async submitOtpDetailed(page: Page, selector: string | undefined, code: string): Promise<OtpResult> {
    const outcomes: ActionOutcome<OtpTechnique>[] = [];
    const target = selector || GENERIC_OTP_TARGET;
    let clipboardReady = false;

    const ensureClipboard = async (): Promise<void> => {
      if (clipboardReady) return;
      await page.context().grantPermissions(['clipboard-read', 'clipboard-write']);
      await page.evaluate(writeClipboard, code);
      clipboardReady = true;
    };

    const stages: Array<{ technique: OtpTechnique; run: () => Promise<boolean> }> = [
      {
        technique: 'global-paste',
        run: async () => {
          await ensureClipboard();
          await page.evaluate(focusBody);
          await page.keyboard.press('ControlOrMeta+V');
          await page.waitForTimeout(this.probeSettleMs);
          return this.probe(page, code);
        },
      },
      {
        technique: 'focus-paste',
        run: async () => {
          if (!(await this.focusTarget(page, target))) return false;
          await ensureClipboard();
          await page.keyboard.press('ControlOrMeta+V');
          await page.waitForTimeout(this.probeSettleMs);
          return this.probe(page, code);
        },
      },
      {
        technique: 'focus-type',
        run: async () => {
          if (!(await this.focusTarget(page, target))) return false;
          for (const char of code) {
            await page.keyboard.type(char, { delay: this.keyDelayMs });
          }
          await page.waitForTimeout(this.probeSettleMs);
          return this.probe(page, code);
        },
      },
    ];

    log.debug('Entering one-time code', { selector: target, length: code.length });

    for (const stage of stages) {
      let succeeded = false;
      try {
        succeeded = await stage.run();
      } catch (error) {
        log.debug('OTP stage raised', { technique: stage.technique, error: errorMessage(error) });
      }
      outcomes.push({ technique: stage.technique, succeeded });

      if (succeeded) {
        log.info('OTP entered', { technique: stage.technique });
        return { succeeded: true, technique: stage.technique, outcomes };
      }
    }

    log.warn('Automatic OTP entry failed, waiting for operator');
    const confirmed = await this.operator.confirm(
      `Could not enter the one-time code automatically.\n` +
      `Please type the code "${code}" into the browser window yourself.`
    );
    outcomes.push({ technique: 'operator', succeeded: confirmed });

    return confirmed
      ? { succeeded: true, technique: 'operator', outcomes }
      : { succeeded: false, outcomes };
  }

  /**
   * Click the first match of the target if it is visible.
   */
  private async focusTarget(page: Page, selector: string): Promise<boolean> {
    const element = page.locator(selector).first();
    if (!(await element.isVisible())) {
      log.debug('OTP target not visible', { selector });
      return false;
    }
    await element.click({ force: true, timeout: this.actionTimeoutMs });
    await page.waitForTimeout(this.focusSettleMs);
    return true;
  }

  private async probe(page: Page, code: string): Promise<boolean> {
    try {
      return await page.evaluate(inputsHoldCode, { code });
    } catch (error) {
      log.debug('OTP probe failed', { error: errorMessage(error) });
      return false;
    }
  }
}
