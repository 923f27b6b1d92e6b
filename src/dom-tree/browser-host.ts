/**
 * DomHost over a real browser window.
 *
 * Shipped into the page as source text: keep it free of outside references.
 */

import type { DomHost, HostNodeKind, Rect, StyleSnapshot } from './dom-tree.types.js';

export function createBrowserDomHost(win: Window & typeof globalThis): DomHost<Node> {
  const doc = win.document;
  const ELEMENT_NODE = 1;
  const TEXT_NODE = 3;

  function asElement(node: Node): Element {
    if (node instanceof win.Element) return node;
    throw new Error(`Expected an element, got node type ${node.nodeType}`);
  }

  function asHtmlElement(node: Node): HTMLElement {
    if (node instanceof win.HTMLElement) return node;
    throw new Error(`Expected an HTML element, got ${node.nodeName}`);
  }

  function toKebabCase(property: string): string {
    return property.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
  }

  return {
    getNodeKind(node: Node): HostNodeKind {
      if (node.nodeType === TEXT_NODE) return 'text';
      if (node.nodeType === ELEMENT_NODE) return 'element';
      return 'other';
    },

    getTextContent: (node) => node.textContent ?? '',

    getTagName: (element) => asElement(element).tagName.toLowerCase(),

    getAttributes(element) {
      return Array.from(asElement(element).attributes, (attr): [string, string] => [
        attr.name,
        attr.value,
      ]);
    },

    getAttribute: (element, name) => asElement(element).getAttribute(name),

    getChildNodes: (node) => Array.from(node.childNodes),

    getParentElement: (node) => node.parentElement,

    getBody: () => doc.body,

    isAttachedToBody(element) {
      const body = doc.body;
      return body !== null && body.contains(element);
    },

    getBoundingRect(element): Rect {
      const rect = asElement(element).getBoundingClientRect();
      return { left: rect.left, top: rect.top, width: rect.width, height: rect.height };
    },

    getComputedStyle(element): StyleSnapshot {
      const style = win.getComputedStyle(asElement(element));
      return {
        display: style.display,
        visibility: style.visibility,
        opacity: style.opacity,
        cursor: style.cursor,
      };
    },

    getViewportSize: () => ({ width: win.innerWidth, height: win.innerHeight }),

    getScrollOffset: () => ({ x: win.scrollX, y: win.scrollY }),

    getPageSize() {
      const root = doc.documentElement;
      const body = doc.body;
      return {
        width: Math.max(root.scrollWidth, body?.scrollWidth ?? 0),
        height: Math.max(root.scrollHeight, body?.scrollHeight ?? 0),
      };
    },

    findElementById: (id) => doc.getElementById(id),

    createElement: (tagName) => doc.createElement(tagName),

    setAttribute(element, name, value) {
      asElement(element).setAttribute(name, value);
    },

    applyStyles(element, styles) {
      const target = asHtmlElement(element);
      for (const [property, value] of Object.entries(styles)) {
        target.style.setProperty(toKebabCase(property), value);
      }
    },

    setTextContent(element, text) {
      element.textContent = text;
    },

    appendChild(parent, child) {
      parent.appendChild(child);
    },

    removeNode(node) {
      node.parentNode?.removeChild(node);
    },
  };
}
