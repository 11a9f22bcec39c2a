/**
 * Input Actuator - performs one logical UI action (fill or click) against a
 * live page through an ordered chain of fallback techniques.
 *
 * Techniques, tried once each and in order until one succeeds:
 * 1. native        - Playwright fill/click with a bounded timeout, fills verified by read-back
 * 2. simulated     - focus + per-key typing, or a real mouse gesture for clicks
 * 3. dom-injection - set the value (or call click()) by script and dispatch input/change
 *
 * Adding a technique means adding an ActuatorStrategy to the chain.
 */

import type { Page } from 'playwright';
import type { ActionOutcome, ActuatorTechnique } from '../types/index.js';
import { logger, errorMessage } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';
import { clickElement, injectValue } from './page-scripts.js';

const log = logger.actuator;

/**
 * A fill (value present) or a click (value absent) on one selector
 */
export interface ActuatorTarget {
  selector: string;
  value?: string;
}

export interface ActuatorStrategy {
  readonly technique: ActuatorTechnique;
  /** Resolve true on verified success; false or a thrown error hands over to the next strategy */
  tryAct(page: Page, target: ActuatorTarget): Promise<boolean>;
}

export interface ActuatorOptions {
  actionTimeoutMs?: number;
  readBackTimeoutMs?: number;
  keyDelayMs?: number;
}

export interface ActuationResult {
  succeeded: boolean;
  /** Technique that succeeded, if any */
  technique?: ActuatorTechnique;
  outcomes: ActionOutcome[];
}

interface ResolvedOptions {
  actionTimeoutMs: number;
  readBackTimeoutMs: number;
  keyDelayMs: number;
}

function resolveOptions(options: ActuatorOptions = {}): ResolvedOptions {
  return {
    actionTimeoutMs: getTimeout('ACTION', options.actionTimeoutMs),
    readBackTimeoutMs: getTimeout('READ_BACK', options.readBackTimeoutMs),
    keyDelayMs: getTimeout('TYPE_KEY_DELAY', options.keyDelayMs),
  };
}

/**
 * Exact read-back check. Elements without a value (contenteditable, buttons)
 * make inputValue throw, which counts as a mismatch.
 */
async function readBackMatches(
  page: Page,
  selector: string,
  expected: string,
  timeout: number
): Promise<boolean> {
  try {
    const actual = await page.inputValue(selector, { timeout });
    return actual === expected;
  } catch (error) {
    log.debug('Read-back failed', { selector, error: errorMessage(error) });
    return false;
  }
}

// ============================================
// STRATEGIES
// ============================================

export class NativeStrategy implements ActuatorStrategy {
  readonly technique = 'native' as const;
  private options: ResolvedOptions;

  constructor(options: ActuatorOptions = {}) {
    this.options = resolveOptions(options);
  }

  async tryAct(page: Page, target: ActuatorTarget): Promise<boolean> {
    const timeout = this.options.actionTimeoutMs;

    if (target.value === undefined) {
      await page.click(target.selector, { timeout, force: true });
      return true;
    }

    try {
      await page.waitForSelector(target.selector, { state: 'visible', timeout });
    } catch {
      log.debug('Selector not visible within timeout', { selector: target.selector });
    }

    await page.fill(target.selector, target.value, { timeout, force: true });
    return readBackMatches(page, target.selector, target.value, this.options.readBackTimeoutMs);
  }
}

export class SimulatedInputStrategy implements ActuatorStrategy {
  readonly technique = 'simulated' as const;
  private options: ResolvedOptions;

  constructor(options: ActuatorOptions = {}) {
    this.options = resolveOptions(options);
  }

  async tryAct(page: Page, target: ActuatorTarget): Promise<boolean> {
    const timeout = this.options.actionTimeoutMs;

    if (target.value === undefined) {
      await page.focus(target.selector, { timeout });
      const box = await page.locator(target.selector).first().boundingBox({ timeout });
      if (!box) return false;
      await page.mouse.click(box.x + box.width / 2, box.y + box.height / 2, {
        delay: this.options.keyDelayMs,
      });
      return true;
    }

    await page.click(target.selector, { timeout, force: true });
    await page.keyboard.press('ControlOrMeta+A');
    await page.keyboard.press('Backspace');
    await page.keyboard.type(target.value, { delay: this.options.keyDelayMs });
    return readBackMatches(page, target.selector, target.value, this.options.readBackTimeoutMs);
  }
}

export class DomInjectionStrategy implements ActuatorStrategy {
  readonly technique = 'dom-injection' as const;
  private options: ResolvedOptions;

  constructor(options: ActuatorOptions = {}) {
    this.options = resolveOptions(options);
  }

  async tryAct(page: Page, target: ActuatorTarget): Promise<boolean> {
    if (target.value === undefined) {
      return page.evaluate(clickElement, { selector: target.selector });
    }

    const injected = await page.evaluate(injectValue, {
      selector: target.selector,
      value: target.value,
    });
    if (!injected) return false;
    return readBackMatches(page, target.selector, target.value, this.options.readBackTimeoutMs);
  }
}

export function defaultStrategies(options: ActuatorOptions = {}): ActuatorStrategy[] {
  return [
    new NativeStrategy(options),
    new SimulatedInputStrategy(options),
    new DomInjectionStrategy(options),
  ];
}

// ============================================
// ACTUATOR
// ============================================

export class InputActuator {
  private strategies: ActuatorStrategy[];

  constructor(strategies: ActuatorStrategy[] = defaultStrategies()) {
    this.strategies = strategies;
  }

  /**
   * Fill `selector` with `value`, or click it when no value is given.
   * Resolves false only when every technique failed.
   */
  async attempt(page: Page, selector: string, value?: string): Promise<boolean> {
    const result = await this.attemptDetailed(page, selector, value);
    return result.succeeded;
  }

  async attemptDetailed(page: Page, selector: string, value?: string): Promise<ActuationResult> {
    const target: ActuatorTarget = { selector, value };
    const action = value === undefined ? 'click' : 'fill';
    const outcomes: ActionOutcome[] = [];

    for (const strategy of this.strategies) {
      let succeeded = false;
      try {
        succeeded = await strategy.tryAct(page, target);
      } catch (error) {
        const message = errorMessage(error);
        // Analyzer selectors are sometimes invalid CSS; not worth a stack of noise
        if (!message.includes('SyntaxError')) {
          log.debug('Technique raised', { action, selector, technique: strategy.technique, error: message });
        }
      }

      outcomes.push({ technique: strategy.technique, succeeded });

      if (succeeded) {
        log.debug('Action succeeded', { action, selector, technique: strategy.technique });
        return { succeeded: true, technique: strategy.technique, outcomes };
      }

      log.debug('Technique failed, escalating', { action, selector, technique: strategy.technique });
    }

    log.info('All techniques exhausted', { action, selector });
    return { succeeded: false, outcomes };
  }
}
