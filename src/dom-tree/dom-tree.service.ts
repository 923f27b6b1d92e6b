/**
 * DOM Tree Service
 *
 * Host-side entry point: runs the in-page tree builder, validates what comes
 * back and routes in-page log lines into the logging service.
 */

import { z } from 'zod';
import {
  DEFAULT_DOM_TREE_CONFIG,
  DEFAULT_MAX_HIGHLIGHT,
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_REFRESH_ITERATIONS,
  DOM_TREE_LOG_BINDING,
} from '../lib/constants.js';
import { DomTreeError, ErrorCode, getErrorMessage } from '../shared/errors/index.js';
import { getLogger, isLogLevel, type LoggingService } from '../shared/services/logging.service.js';
import { DomTreeResultSchema, MaxHighlightSchema } from './dom-tree.schemas.js';
import type { DomTreeConfig, DomTreeNode, ElementNode } from './dom-tree.types.js';
import { buildClearHighlightsScript, buildDomTreeScript } from './page-script.js';
import { countNodes, findClickableElements } from './tree-utils.js';

/**
 * The part of a browser page the service drives (a puppeteer Page fits)
 */
export interface PageLike {
  evaluate(script: string): Promise<unknown>;
  exposeFunction(name: string, fn: (level: unknown, message: unknown) => void): Promise<void>;
}

export interface DomTreeServiceOptions {
  config?: DomTreeConfig;
  /** Page binding name used to carry in-page log lines */
  logBinding?: string;
  logger?: LoggingService;
  sleep?: (ms: number) => Promise<void>;
}

export interface GetDomTreeOptions {
  highlight?: boolean;
  maxHighlight?: number;
}

export interface RefreshHighlightsOptions {
  intervalMs?: number;
  iterations?: number;
  maxHighlight?: number;
}

const RefreshOptionsSchema = z.object({
  intervalMs: z.number().nonnegative('intervalMs must not be negative'),
  iterations: z.number().int().positive('iterations must be at least 1'),
});

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class DomTreeService {
  private readonly config: DomTreeConfig;
  private readonly logBinding: string;
  private readonly logger: LoggingService;
  private readonly sleep: (ms: number) => Promise<void>;
  private bridgeAttached = false;
  private bridgePending: Promise<void> | null = null;

  constructor(
    private readonly page: PageLike,
    options: DomTreeServiceOptions = {},
  ) {
    this.config = options.config ?? DEFAULT_DOM_TREE_CONFIG;
    this.logBinding = options.logBinding ?? DOM_TREE_LOG_BINDING;
    this.logger = options.logger ?? getLogger();
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Build a snapshot of `document.body`, optionally painting highlight overlays.
   * Resolves to null when the page has nothing to mirror.
   */
  async getDomTree(options: GetDomTreeOptions = {}): Promise<DomTreeNode | null> {
    const doHighlight = options.highlight ?? false;
    const maxHighlight = this.validateMaxHighlight(options.maxHighlight ?? DEFAULT_MAX_HIGHLIGHT);

    await this.attachLogBridge();

    const script = buildDomTreeScript({
      doHighlight,
      maxHighlight,
      config: this.config,
      logBinding: this.logBinding,
    });
    const raw = await this.evaluate(script, 'buildDomTree');

    const parsed = DomTreeResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DomTreeError('Page returned a malformed DOM tree', ErrorCode.INVALID_TREE_PAYLOAD, {
        issues: parsed.error.issues.slice(0, 5).map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    this.logger.debug('DOM tree snapshot received', {
      highlight: doHighlight,
      maxHighlight,
      ...countNodes(parsed.data),
    });
    return parsed.data;
  }

  /**
   * Clickable and visible elements of a fresh snapshot (highlighted by default)
   */
  async getClickableElements(options: GetDomTreeOptions = {}): Promise<ElementNode[]> {
    const tree = await this.getDomTree({
      highlight: options.highlight ?? true,
      maxHighlight: options.maxHighlight,
    });
    return findClickableElements(tree);
  }

  /**
   * Remove overlays without rebuilding the tree
   */
  async clearHighlights(): Promise<void> {
    await this.attachLogBridge();
    await this.evaluate(
      buildClearHighlightsScript({ config: this.config, logBinding: this.logBinding }),
      'clearHighlightContainer',
    );
  }

  /**
   * Rebuild highlights repeatedly (e.g. while the user scrolls).
   * Returns the number of elements highlighted by the last rebuild.
   */
  async refreshHighlights(options: RefreshHighlightsOptions = {}): Promise<number> {
    const checked = RefreshOptionsSchema.safeParse({
      intervalMs: options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS,
      iterations: options.iterations ?? DEFAULT_REFRESH_ITERATIONS,
    });
    if (!checked.success) {
      throw new DomTreeError(
        checked.error.issues[0]?.message ?? 'Invalid refresh options',
        ErrorCode.INVALID_ARGUMENT,
      );
    }
    const { intervalMs, iterations } = checked.data;

    let highlighted = 0;
    for (let i = 0; i < iterations; i++) {
      const tree = await this.getDomTree({ highlight: true, maxHighlight: options.maxHighlight });
      highlighted = countNodes(tree).highlighted;
      this.logger.debug('Highlights refreshed', { iteration: i + 1, highlighted });

      if (i < iterations - 1) {
        await this.sleep(intervalMs);
      }
    }
    return highlighted;
  }

  private validateMaxHighlight(value: number): number {
    const checked = MaxHighlightSchema.safeParse(value);
    if (!checked.success) {
      throw new DomTreeError(
        checked.error.issues[0]?.message ?? 'Invalid maxHighlight',
        ErrorCode.INVALID_ARGUMENT,
        { maxHighlight: value },
      );
    }
    return checked.data;
  }

  private async evaluate(script: string, operation: string): Promise<unknown> {
    try {
      return await this.page.evaluate(script);
    } catch (error) {
      throw new DomTreeError(
        `Page evaluation failed during ${operation}: ${getErrorMessage(error)}`,
        ErrorCode.PAGE_EVALUATION_FAILED,
        { operation },
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Expose the log binding once per page. Without it the page logs to its console.
   * Concurrent callers share one attempt; a failed attempt is retried on the next call.
   */
  private attachLogBridge(): Promise<void> {
    if (this.bridgeAttached) return Promise.resolve();
    if (!this.bridgePending) {
      this.bridgePending = this.exposeLogBinding().finally(() => {
        this.bridgePending = null;
      });
    }
    return this.bridgePending;
  }

  private async exposeLogBinding(): Promise<void> {
    try {
      await this.page.exposeFunction(this.logBinding, (level, message) => {
        this.logger.logAt(isLogLevel(level) ? level : 'info', String(message), {
          source: 'dom-tree',
        });
      });
      this.bridgeAttached = true;
    } catch (error) {
      this.logger.warning('Could not expose DOM tree log binding; page will log to its console', {
        binding: this.logBinding,
        reason: getErrorMessage(error),
      });
    }
  }
}
