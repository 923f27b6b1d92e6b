/**
 * Helpers for reading snapshot trees on the host side
 */

import { LISTED_ATTRIBUTES } from '../lib/constants.js';
import type { DomTreeNode, ElementNode } from './dom-tree.types.js';

export function isElementNode(node: DomTreeNode): node is ElementNode {
  return node.kind === 'element';
}

/**
 * Visit every node depth-first, parents before children.
 */
export function walkTree(node: DomTreeNode, visit: (node: DomTreeNode) => void): void {
  visit(node);
  if (isElementNode(node)) {
    for (const child of node.children) {
      walkTree(child, visit);
    }
  }
}

/**
 * All clickable and visible elements (root included), in document order
 */
export function findClickableElements(tree: DomTreeNode | null): ElementNode[] {
  const result: ElementNode[] = [];
  if (!tree) return result;

  walkTree(tree, (node) => {
    if (isElementNode(node) && node.isClickable && node.isVisible) {
      result.push(node);
    }
  });
  return result;
}

/**
 * Highlighted elements ordered by their overlay label
 */
export function collectHighlightedElements(tree: DomTreeNode | null): ElementNode[] {
  const result: ElementNode[] = [];
  if (!tree) return result;

  walkTree(tree, (node) => {
    if (isElementNode(node) && node.highlightIndex !== undefined) {
      result.push(node);
    }
  });
  return result.sort((a, b) => (a.highlightIndex ?? 0) - (b.highlightIndex ?? 0));
}

export interface NodeCounts {
  elements: number;
  texts: number;
  clickable: number;
  inViewport: number;
  highlighted: number;
}

export function countNodes(tree: DomTreeNode | null): NodeCounts {
  const counts: NodeCounts = { elements: 0, texts: 0, clickable: 0, inViewport: 0, highlighted: 0 };
  if (!tree) return counts;

  walkTree(tree, (node) => {
    if (!isElementNode(node)) {
      counts.texts++;
      return;
    }
    counts.elements++;
    if (node.isClickable && node.isVisible) counts.clickable++;
    if (node.isInViewport) counts.inViewport++;
    if (node.highlightIndex !== undefined) counts.highlighted++;
  });
  return counts;
}

/**
 * Text of all descendant text nodes, joined by single spaces and cut to maxLength
 */
export function getElementText(node: DomTreeNode, maxLength = Infinity): string {
  const parts: string[] = [];
  walkTree(node, (current) => {
    if (current.kind === 'text') parts.push(current.content);
  });
  return parts.join(' ').slice(0, maxLength);
}

export interface RenderOptions {
  /** Attributes to include, in this order */
  attributes?: string[];
  maxTextLength?: number;
}

function escapeAttribute(value: string): string {
  return value.replace(/"/g, '&quot;').replace(/\s+/g, ' ');
}

/**
 * One line per highlighted element:
 * `[3]<button type="submit">Easy Apply</button>`
 */
export function renderHighlightedElements(
  tree: DomTreeNode | null,
  options: RenderOptions = {},
): string {
  const attributes = options.attributes ?? LISTED_ATTRIBUTES;
  const maxTextLength = options.maxTextLength ?? 80;

  return collectHighlightedElements(tree)
    .map((element) => {
      const attrs = attributes
        .filter((name) => element.attributes[name] !== undefined)
        .map((name) => ` ${name}="${escapeAttribute(element.attributes[name] ?? '')}"`)
        .join('');
      const text = getElementText(element, maxTextLength);
      return `[${element.highlightIndex}]<${element.tagName}${attrs}>${text}</${element.tagName}>`;
    })
    .join('\n');
}
