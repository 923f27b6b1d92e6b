/**
 * Page script composition
 *
 * The engine factories are written as self-contained functions, so their
 * compiled source can be embedded in a single expression and evaluated by
 * the page. The expression wires host, log hook, classifier, highlighter
 * and tree builder together in the page and returns the build result.
 */

import { createBrowserDomHost } from './browser-host.js';
import { createClassifier } from './classifier.js';
import { createHighlighter } from './highlighter.js';
import { createPageLogHook } from './log-hook.js';
import { createTreeBuilder } from './tree-builder.js';
import type { DomTreeConfig } from './dom-tree.types.js';

export interface DomTreeScriptOptions {
  doHighlight: boolean;
  maxHighlight: number;
  config: DomTreeConfig;
  logBinding: string;
}

function wiringPrelude(config: DomTreeConfig, logBinding: string): string {
  return `
  const host = (${createBrowserDomHost.toString()})(window);
  const log = (${createPageLogHook.toString()})(${JSON.stringify(logBinding)});
  const config = ${JSON.stringify(config)};
  const classifier = (${createClassifier.toString()})(host, config, log);
  const highlighter = (${createHighlighter.toString()})(host, config, log);
  const builder = (${createTreeBuilder.toString()})(host, classifier, highlighter, log);`;
}

/**
 * Expression that builds the tree from `document.body` and evaluates to it.
 */
export function buildDomTreeScript(options: DomTreeScriptOptions): string {
  return `(() => {${wiringPrelude(options.config, options.logBinding)}
  return builder.buildTree(document.body, ${String(options.doHighlight)}, ${String(options.maxHighlight)});
})()`;
}

/**
 * Expression that removes the overlay container without rebuilding the tree.
 */
export function buildClearHighlightsScript(
  options: Pick<DomTreeScriptOptions, 'config' | 'logBinding'>,
): string {
  return `(() => {${wiringPrelude(options.config, options.logBinding)}
  builder.clearHighlightContainer();
  return null;
})()`;
}
