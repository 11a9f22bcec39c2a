/**
 * Browser Manager - Handles Playwright browser lifecycle
 *
 * Playwright is loaded lazily so the dedupe/har/serve commands work on a
 * machine without a browser build.
 */

import type { Browser, BrowserContext, Page } from 'playwright';
import { browserNotInstalledError } from '../utils/error-messages.js';
import { logger, errorMessage } from '../utils/logger.js';

// Re-export Page type for consumers
export type { Page } from 'playwright';

const log = logger.browser;

type PlaywrightModule = typeof import('playwright');

let playwrightModule: PlaywrightModule | null = null;

async function loadPlaywright(): Promise<PlaywrightModule> {
  if (!playwrightModule) {
    playwrightModule = await import('playwright');
  }
  return playwrightModule;
}

export interface BrowserConfig {
  headless: boolean;
  slowMo: number;
  userAgent?: string;
  viewport: { width: number; height: number };
  /** Clipboard access is needed for pasting one-time codes */
  grantClipboard: boolean;
}

const DEFAULT_CONFIG: BrowserConfig = {
  headless: false,
  slowMo: 0,
  viewport: { width: 1280, height: 800 },
  grantClipboard: true,
};

export class BrowserManager {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private config: BrowserConfig;

  constructor(config: Partial<BrowserConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async initialize(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }

    const pw = await loadPlaywright();
    try {
      this.browser = await pw.chromium.launch({
        headless: this.config.headless,
        slowMo: this.config.slowMo,
      });
    } catch (error) {
      throw new Error(browserNotInstalledError(errorMessage(error)));
    }

    log.info('Browser launched', { headless: this.config.headless });
    return this.browser;
  }

  async getContext(): Promise<BrowserContext> {
    const browser = await this.initialize();

    if (!this.context) {
      this.context = await browser.newContext({
        userAgent: this.config.userAgent,
        viewport: this.config.viewport,
      });
      if (this.config.grantClipboard) {
        await this.context.grantPermissions(['clipboard-read', 'clipboard-write']);
      }
    }

    return this.context;
  }

  async newPage(): Promise<Page> {
    const context = await this.getContext();
    return context.newPage();
  }

  async cleanup(): Promise<void> {
    if (this.context) {
      try {
        await this.context.close();
      } catch (error) {
        log.debug('Context already closed', { error: errorMessage(error) });
      }
      this.context = null;
    }

    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      log.info('Browser closed');
    }
  }

  getConfig(): BrowserConfig {
    return { ...this.config };
  }
}
