/**
 * Types for the DOM tree snapshot and highlight engine.
 *
 * The engine runs inside the page, so everything it returns must survive
 * JSON serialization. Element handles never leave the page.
 */

// ===== SNAPSHOT TREE =====

export interface TextNode {
  kind: 'text';
  /** Trimmed, never empty */
  content: string;
}

export interface ElementNode {
  kind: 'element';
  /** Lowercase tag name */
  tagName: string;
  attributes: Record<string, string>;
  children: DomTreeNode[];
  isClickable: boolean;
  isVisible: boolean;
  /** Only ever true when isVisible is true */
  isInViewport: boolean;
  /** Set only on elements selected for highlighting in this build */
  highlightIndex?: number;
}

export type DomTreeNode = ElementNode | TextNode;

// ===== GEOMETRY & STYLE =====

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface ScrollOffset {
  x: number;
  y: number;
}

/**
 * The subset of computed style the classifier reads.
 */
export interface StyleSnapshot {
  display: string;
  visibility: string;
  opacity: string;
  cursor: string;
}

// ===== HOST =====

export type HostNodeKind = 'text' | 'element' | 'other';

/**
 * Element inspection and overlay capabilities the engine needs from a document.
 *
 * `N` is the host's node type: `Node` in a browser, a fake node in tests.
 */
export interface DomHost<N> {
  getNodeKind(node: N): HostNodeKind;
  getTextContent(node: N): string;
  /** Lowercase */
  getTagName(element: N): string;
  getAttributes(element: N): Array<[name: string, value: string]>;
  getAttribute(element: N, name: string): string | null;
  getChildNodes(node: N): N[];
  getParentElement(node: N): N | null;
  getBody(): N | null;
  isAttachedToBody(element: N): boolean;

  getBoundingRect(element: N): Rect;
  getComputedStyle(element: N): StyleSnapshot;
  getViewportSize(): Size;
  getScrollOffset(): ScrollOffset;
  /** Size of the whole scrollable canvas */
  getPageSize(): Size;

  findElementById(id: string): N | null;
  createElement(tagName: string): N;
  setAttribute(element: N, name: string, value: string): void;
  applyStyles(element: N, styles: Record<string, string>): void;
  setTextContent(element: N, text: string): void;
  appendChild(parent: N, child: N): void;
  removeNode(node: N): void;
}

// ===== LOGGING =====

export type DomTreeLogLevel = 'info' | 'debug' | 'warning' | 'error';

/**
 * Logging seam. The default writes to the console; the hosting process may
 * replace it to route lines into its own pipeline.
 */
export type DomTreeLogHook = (level: DomTreeLogLevel, message: string) => void;

// ===== CONFIGURATION =====

/**
 * Engine tunables. Plain data so it can be shipped into the page as JSON.
 */
export interface DomTreeConfig {
  interactiveTags: string[];
  clickAttributes: string[];
  interactiveRoles: string[];
  clickableClassKeywords: string[];
  clickableInputTypes: string[];

  /** Tolerance around the viewport edges for viewport membership */
  viewportMargin: number;
  /** Elements further than this beyond the viewport count as not visible */
  offscreenMargin: number;
  /** Boxes positioned further than this from the origin are never in the viewport */
  maxReasonableOffset: number;
  minElementSize: number;

  highlight: HighlightStyleConfig;
}

export interface HighlightStyleConfig {
  containerId: string;
  zIndex: string;
  palette: string[];
  fallbackColor: string;
  /** Hex alpha appended to the palette color for the overlay fill */
  fillAlpha: string;
  borderWidth: string;
  labelTextColor: string;
  labelFontSize: string;
  labelPadding: string;
}

// ===== COMPONENTS =====

export interface Classifier<N> {
  isClickable(element: N): boolean;
  isVisible(element: N, viewport: Size): boolean;
  /** Only meaningful for elements already found visible */
  isInViewport(element: N, viewport: Size): boolean;
}

/**
 * An element found both clickable and visible during one build.
 */
export interface HighlightCandidate<N> {
  element: N;
  node: ElementNode;
  /** Top edge captured when the candidate was collected */
  top: number;
}

export interface Highlighter<N> {
  /** Removes the overlay container if present. Idempotent. */
  clear(): void;
  /**
   * Orders candidates, writes `highlightIndex` onto the first `maxHighlight`
   * and paints an overlay for each. Returns the number of indices assigned.
   */
  highlight(candidates: Array<HighlightCandidate<N>>, maxHighlight: number): number;
}

export interface TreeBuilder<N> {
  buildTree(root: N, doHighlight?: boolean, maxHighlight?: number): DomTreeNode | null;
  clearHighlightContainer(): void;
}
