/**
 * Browser launch
 *
 * Starts Chrome through puppeteer-core and opens the page to snapshot.
 */

import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import { BrowserError, ErrorCode, getErrorMessage } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';
import type { PageLike } from '../dom-tree/dom-tree.service.js';

export type ChromeChannel = 'chrome' | 'chrome-beta' | 'chrome-dev' | 'chrome-canary';

export interface LaunchOptions {
  headless?: boolean;
  channel?: ChromeChannel;
  /** Takes precedence over channel */
  executablePath?: string;
  viewport?: { width: number; height: number };
  args?: string[];
}

const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

/** How long navigation may take before giving up */
export const NAVIGATION_TIMEOUT_MS = 30_000;

export async function launchBrowser(options: LaunchOptions = {}): Promise<Browser> {
  const logger = getLogger();
  const { headless = true, channel = 'chrome', executablePath, viewport, args = [] } = options;

  logger.info('Launching browser', { headless, channel, executablePath });

  try {
    const browser = await puppeteer.launch({
      channel: executablePath ? undefined : channel,
      executablePath,
      headless,
      defaultViewport: viewport ?? DEFAULT_VIEWPORT,
      args: ['--hide-crash-restore-bubble', ...args],
    });
    logger.info('Browser launched successfully');
    return browser;
  } catch (error) {
    throw new BrowserError(
      `Failed to launch browser: ${getErrorMessage(error)}`,
      ErrorCode.BROWSER_LAUNCH_FAILED,
      { channel, executablePath },
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * What openPage needs from a tab (a puppeteer Page fits)
 */
export interface NavigablePage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Open a new tab and wait until its DOM is ready.
 */
export async function openPage<P extends NavigablePage>(
  browser: { newPage(): Promise<P> },
  url: string,
): Promise<P> {
  const page = await browser.newPage();
  try {
    await page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS });
  } catch (error) {
    await page.close().catch((closeError: unknown) => {
      getLogger().debug('Closing page after failed navigation failed', {
        reason: getErrorMessage(closeError),
      });
    });
    throw new BrowserError(
      `Failed to navigate to ${url}: ${getErrorMessage(error)}`,
      ErrorCode.NAVIGATION_FAILED,
      { url },
      error instanceof Error ? error : undefined,
    );
  }
  getLogger().info('Page loaded', { url });
  return page;
}

/**
 * Narrow a puppeteer page to what DomTreeService drives.
 */
export function asPageLike(page: Page): PageLike {
  return {
    evaluate: (script) => page.evaluate(script),
    exposeFunction: (name, fn) => page.exposeFunction(name, fn),
  };
}

/**
 * Close the browser, logging rather than throwing on failure.
 */
export async function closeBrowser(browser: Pick<Browser, 'close'>): Promise<void> {
  try {
    await browser.close();
  } catch (error) {
    getLogger().warning('Failed to close browser', { reason: getErrorMessage(error) });
  }
}
