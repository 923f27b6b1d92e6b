/**
 * Element classifier
 *
 * Decides whether an element is clickable, visible and in the viewport.
 * Every predicate catches its own failures, logs them and answers `false`,
 * so a single odd element never aborts the tree walk.
 *
 * The factory is shipped into the page as source text (see page-script.ts):
 * it must not reference anything outside its own body.
 */

import type {
  Classifier,
  DomHost,
  DomTreeConfig,
  DomTreeLogHook,
  Size,
  StyleSnapshot,
} from './dom-tree.types.js';

export function createClassifier<N>(
  host: DomHost<N>,
  config: DomTreeConfig,
  log: DomTreeLogHook,
): Classifier<N> {
  const interactiveTags = new Set(config.interactiveTags);
  const interactiveRoles = new Set(config.interactiveRoles);
  const clickableInputTypes = new Set(config.clickableInputTypes);
  const classKeywords = config.clickableClassKeywords.map((keyword) => keyword.toLowerCase());

  function reportFailure(predicate: string, error: unknown): void {
    const detail = error instanceof Error ? error.message : String(error);
    log('error', `Error in ${predicate}: ${detail}`);
  }

  function isHiddenByStyle(style: StyleSnapshot): boolean {
    return (
      style.display === 'none' ||
      style.visibility === 'hidden' ||
      style.visibility === 'collapse' ||
      parseFloat(style.opacity) === 0
    );
  }

  function isClickable(element: N): boolean {
    try {
      const tag = host.getTagName(element);
      if (interactiveTags.has(tag)) return true;

      if (config.clickAttributes.some((name) => host.getAttribute(element, name) !== null)) {
        return true;
      }

      const role = host.getAttribute(element, 'role');
      if (role && interactiveRoles.has(role)) return true;

      if (host.getComputedStyle(element).cursor === 'pointer') return true;

      const classNames = (host.getAttribute(element, 'class') ?? '')
        .split(/\s+/)
        .filter((name) => name.length > 0)
        .map((name) => name.toLowerCase());
      if (classNames.some((name) => classKeywords.some((keyword) => name.includes(keyword)))) {
        return true;
      }

      if (tag === 'input') {
        const inputType = host.getAttribute(element, 'type');
        if (inputType !== null && clickableInputTypes.has(inputType)) return true;
      }

      return false;
    } catch (error) {
      reportFailure('isClickable', error);
      return false;
    }
  }

  function isVisible(element: N, viewport: Size): boolean {
    try {
      const rect = host.getBoundingRect(element);
      if (rect.width === 0 || rect.height === 0) return false;

      if (isHiddenByStyle(host.getComputedStyle(element))) return false;

      if (!host.isAttachedToBody(element)) return false;

      const body = host.getBody();
      let parent = host.getParentElement(element);
      while (parent !== null && parent !== body) {
        if (isHiddenByStyle(host.getComputedStyle(parent))) return false;
        parent = host.getParentElement(parent);
      }

      const margin = config.offscreenMargin;
      const right = rect.left + rect.width;
      const bottom = rect.top + rect.height;
      if (
        right < -margin ||
        bottom < -margin ||
        rect.left > viewport.width + margin ||
        rect.top > viewport.height + margin
      ) {
        return false;
      }

      return true;
    } catch (error) {
      reportFailure('isVisible', error);
      return false;
    }
  }

  function isInViewport(element: N, viewport: Size): boolean {
    try {
      const rect = host.getBoundingRect(element);
      const margin = config.viewportMargin;

      const inHorizontalView = rect.left < viewport.width + margin && rect.left + rect.width > -margin;
      const inVerticalView = rect.top < viewport.height + margin && rect.top + rect.height > -margin;
      const hasSize = rect.width >= config.minElementSize && rect.height >= config.minElementSize;
      const isReasonablyPositioned =
        Math.abs(rect.left) < config.maxReasonableOffset &&
        Math.abs(rect.top) < config.maxReasonableOffset;

      return inHorizontalView && inVerticalView && hasSize && isReasonablyPositioned;
    } catch (error) {
      reportFailure('isInViewport', error);
      return false;
    }
  }

  return { isClickable, isVisible, isInViewport };
}
