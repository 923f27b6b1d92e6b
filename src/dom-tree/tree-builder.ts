/**
 * DOM tree builder
 *
 * Mirrors a live document into a plain serializable tree in one synchronous,
 * depth-first pass, decorating every element with classifier results.
 * Clickable and visible elements are collected on the way and handed to the
 * highlighter after the walk, so classification never interleaves with
 * overlay writes.
 *
 * Safe to call repeatedly: every build starts by clearing the previous
 * overlay container.
 *
 * Shipped into the page as source text: keep it free of outside references.
 */

import type {
  Classifier,
  DomHost,
  DomTreeLogHook,
  DomTreeNode,
  ElementNode,
  HighlightCandidate,
  Highlighter,
  Size,
  TreeBuilder,
} from './dom-tree.types.js';

export function createTreeBuilder<N>(
  host: DomHost<N>,
  classifier: Classifier<N>,
  highlighter: Highlighter<N>,
  log: DomTreeLogHook,
): TreeBuilder<N> {
  // Unknown tops sort after every real coordinate
  const UNKNOWN_TOP = Number.MAX_SAFE_INTEGER;

  function readTop(element: N): number {
    try {
      const top = host.getBoundingRect(element).top;
      return Number.isFinite(top) ? top : UNKNOWN_TOP;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      log('warning', `Could not read position of candidate: ${detail}`);
      return UNKNOWN_TOP;
    }
  }

  function traverse(
    node: N,
    viewport: Size,
    candidates: Array<HighlightCandidate<N>>,
  ): DomTreeNode | null {
    const kind = host.getNodeKind(node);

    if (kind === 'text') {
      const content = host.getTextContent(node).trim();
      if (!content) return null;
      return { kind: 'text', content };
    }

    if (kind !== 'element') return null;

    const visible = classifier.isVisible(node, viewport);
    const clickable = classifier.isClickable(node);
    const inViewport = visible && classifier.isInViewport(node, viewport);

    const elementNode: ElementNode = {
      kind: 'element',
      tagName: host.getTagName(node),
      attributes: {},
      children: [],
      isClickable: clickable,
      isVisible: visible,
      isInViewport: inViewport,
    };

    for (const [name, value] of host.getAttributes(node)) {
      elementNode.attributes[name] = value;
    }

    // Snapshot the child list before recursing
    for (const child of [...host.getChildNodes(node)]) {
      const childNode = traverse(child, viewport, candidates);
      if (childNode !== null) elementNode.children.push(childNode);
    }

    if (clickable && visible) {
      candidates.push({ element: node, node: elementNode, top: readTop(node) });
    }

    return elementNode;
  }

  function buildTree(root: N, doHighlight = false, maxHighlight = 0): DomTreeNode | null {
    const cap = Number.isNaN(maxHighlight) ? 0 : Math.max(0, Math.floor(maxHighlight));
    log('info', `Starting DOM tree build with highlight=${doHighlight}, maxHighlight=${cap}`);

    highlighter.clear();
    log('debug', 'Cleared existing highlight container');

    const viewport = host.getViewportSize();
    const candidates: Array<HighlightCandidate<N>> = [];
    const tree = traverse(root, viewport, candidates);
    log('info', `Found ${candidates.length} clickable and visible elements`);

    if (doHighlight) {
      log('debug', 'Starting element highlighting');
      const highlighted = highlighter.highlight(candidates, cap);
      log('info', `Highlighted ${highlighted} elements`);
    }

    return tree;
  }

  return {
    buildTree,
    clearHighlightContainer: () => highlighter.clear(),
  };
}
