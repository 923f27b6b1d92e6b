#!/usr/bin/env node

/**
 * DOM snapshot CLI
 *
 * Opens a page, builds the annotated DOM tree (highlighting clickable
 * elements, in-viewport first) and prints it to stdout.
 */

import { asPageLike, closeBrowser, launchBrowser, openPage } from './browser/launch-browser.js';
import { parseArgs } from './cli/args.js';
import { resolveAppConfig, type AppConfig } from './config/app-config.js';
import { DomTreeService } from './dom-tree/dom-tree.service.js';
import { renderHighlightedElements } from './dom-tree/tree-utils.js';
import { AutomationError } from './shared/errors/index.js';
import { getLogger } from './shared/services/logging.service.js';

async function run(config: AppConfig): Promise<void> {
  const logger = getLogger();
  const browser = await launchBrowser({
    headless: config.headless,
    channel: config.channel,
    executablePath: config.executablePath,
  });

  try {
    const page = await openPage(browser, config.url);
    const service = new DomTreeService(asPageLike(page));

    if (config.refresh > 0) {
      const highlighted = await service.refreshHighlights({
        iterations: config.refresh,
        intervalMs: config.intervalMs,
        maxHighlight: config.maxHighlight,
      });
      logger.info('Refresh finished', { iterations: config.refresh, highlighted });
    }

    const tree = await service.getDomTree({
      highlight: config.highlight,
      maxHighlight: config.maxHighlight,
    });

    const output =
      config.format === 'list' ? renderHighlightedElements(tree) : JSON.stringify(tree, null, 2);
    process.stdout.write(`${output}\n`);
  } finally {
    await closeBrowser(browser);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = resolveAppConfig(args);
  getLogger().setMinLevel(config.logLevel);
  await run(config);
}

main().catch((error: unknown) => {
  const automationError = AutomationError.fromError(error);
  getLogger().error('Snapshot failed', automationError, {
    code: automationError.code,
    details: automationError.details,
  });
  process.exitCode = 1;
});
