/**
 * DOM tree snapshot and highlight module.
 *
 * Mirrors a page into a serializable tree, classifies every element for
 * clickability, visibility and viewport membership, and labels a bounded,
 * in-viewport-first set of clickable elements with overlay indices.
 */

// Types
export type {
  TextNode,
  ElementNode,
  DomTreeNode,
  Rect,
  Size,
  ScrollOffset,
  StyleSnapshot,
  HostNodeKind,
  DomHost,
  DomTreeLogLevel,
  DomTreeLogHook,
  DomTreeConfig,
  HighlightStyleConfig,
  Classifier,
  HighlightCandidate,
  Highlighter,
  TreeBuilder,
} from './dom-tree.types.js';

// Engine factories (run in the page, or against any DomHost)
export { createClassifier } from './classifier.js';
export { createHighlighter } from './highlighter.js';
export { createTreeBuilder } from './tree-builder.js';
export { createBrowserDomHost } from './browser-host.js';
export { createPageLogHook } from './log-hook.js';
export {
  buildDomTreeScript,
  buildClearHighlightsScript,
  type DomTreeScriptOptions,
} from './page-script.js';

// Schemas and tree helpers
export {
  TextNodeSchema,
  ElementNodeSchema,
  DomTreeNodeSchema,
  DomTreeResultSchema,
  MaxHighlightSchema,
} from './dom-tree.schemas.js';
export {
  isElementNode,
  walkTree,
  findClickableElements,
  collectHighlightedElements,
  countNodes,
  getElementText,
  renderHighlightedElements,
  type NodeCounts,
  type RenderOptions,
} from './tree-utils.js';

// Host-side service
export {
  DomTreeService,
  type PageLike,
  type DomTreeServiceOptions,
  type GetDomTreeOptions,
  type RefreshHighlightsOptions,
} from './dom-tree.service.js';
