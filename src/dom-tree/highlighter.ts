/**
 * Highlight selector and overlay renderer
 *
 * Orders clickable candidates (in-viewport first, then top to bottom),
 * assigns dense indices up to a cap and paints one box plus one label
 * per selected element inside a single overlay container.
 *
 * Shipped into the page as source text: keep it free of outside references.
 */

import type {
  DomHost,
  DomTreeConfig,
  DomTreeLogHook,
  HighlightCandidate,
  Highlighter,
} from './dom-tree.types.js';

export function createHighlighter<N>(
  host: DomHost<N>,
  config: DomTreeConfig,
  log: DomTreeLogHook,
): Highlighter<N> {
  const style = config.highlight;

  function clear(): void {
    const container = host.findElementById(style.containerId);
    if (container !== null) host.removeNode(container);
  }

  function getOrCreateContainer(): N {
    const existing = host.findElementById(style.containerId);
    if (existing !== null) return existing;

    const body = host.getBody();
    if (body === null) {
      throw new Error('Document has no body to hold the highlight container');
    }

    const page = host.getPageSize();
    const container = host.createElement('div');
    host.setAttribute(container, 'id', style.containerId);
    host.applyStyles(container, {
      position: 'absolute',
      top: '0',
      left: '0',
      width: `${page.width}px`,
      height: `${page.height}px`,
      pointerEvents: 'none',
      zIndex: style.zIndex,
    });
    host.appendChild(body, container);
    return container;
  }

  function colorFor(index: number): string {
    return style.palette[index % style.palette.length] ?? style.fallbackColor;
  }

  function paint(element: N, index: number): void {
    try {
      const container = getOrCreateContainer();
      const color = colorFor(index);
      const rect = host.getBoundingRect(element);
      const scroll = host.getScrollOffset();
      const left = `${rect.left + scroll.x}px`;
      const top = `${rect.top + scroll.y}px`;

      const overlay = host.createElement('div');
      host.applyStyles(overlay, {
        position: 'absolute',
        border: `${style.borderWidth} solid ${color}`,
        backgroundColor: `${color}${style.fillAlpha}`,
        pointerEvents: 'none',
        left,
        top,
        width: `${rect.width}px`,
        height: `${rect.height}px`,
      });

      const label = host.createElement('div');
      host.setTextContent(label, String(index));
      host.applyStyles(label, {
        position: 'absolute',
        background: color,
        color: style.labelTextColor,
        fontSize: style.labelFontSize,
        padding: style.labelPadding,
        pointerEvents: 'none',
        left,
        top,
        zIndex: style.zIndex,
      });

      host.appendChild(container, overlay);
      host.appendChild(container, label);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      log('error', `Error in highlightElement: ${detail}`);
    }
  }

  function highlight(candidates: Array<HighlightCandidate<N>>, maxHighlight: number): number {
    const ordered = [...candidates].sort((a, b) => {
      const aInView = a.node.isInViewport ? 1 : 0;
      const bInView = b.node.isInViewport ? 1 : 0;
      if (aInView !== bInView) return bInView - aInView;
      return a.top - b.top;
    });

    const inViewportCount = ordered.filter((candidate) => candidate.node.isInViewport).length;
    log(
      'info',
      `Found ${inViewportCount} elements in viewport out of ${ordered.length} total clickable`,
    );

    let count = 0;
    for (const candidate of ordered) {
      if (count >= maxHighlight) {
        log('debug', `Reached maximum highlight limit of ${maxHighlight}`);
        break;
      }
      paint(candidate.element, count);
      candidate.node.highlightIndex = count;
      count++;
    }

    return count;
  }

  return { clear, highlight };
}
