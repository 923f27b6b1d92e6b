/**
 * Shared constants for interactive element discovery and highlighting
 *
 * These constants define what elements are considered clickable
 * and how highlighted elements are painted.
 */

import type { DomTreeConfig } from '../dom-tree/dom-tree.types.js';

/**
 * HTML tags that are inherently interactive
 */
export const INTERACTIVE_TAGS = ['a', 'button', 'input', 'select', 'textarea'];

/**
 * Click handler attributes that indicate clickable elements
 */
export const CLICK_HANDLER_ATTRIBUTES = ['onclick', 'ng-click', '@click', 'v-on:click'];

/**
 * ARIA roles that indicate interactive elements
 */
export const INTERACTIVE_ROLES = [
  'button',
  'link',
  'menuitem',
  'tab',
  'menuitemcheckbox',
  'menuitemradio',
  'radio',
  'switch',
  'option',
];

/**
 * Class name fragments that hint at clickability (matched case-insensitively)
 */
export const CLICKABLE_CLASS_KEYWORDS = ['btn', 'button', 'clickable', 'link'];

/**
 * Input types that are actionable on their own
 */
export const CLICKABLE_INPUT_TYPES = ['submit', 'button', 'radio', 'checkbox', 'reset', 'file'];

/**
 * Overlay colors, cycled by highlight index
 */
export const HIGHLIGHT_COLORS = [
  '#FF0000', '#00FF00', '#0000FF', '#FFA500', '#800080',
  '#008080', '#FF69B4', '#4B0082', '#FF4500', '#2E8B57',
  '#DC143C', '#4682B4', '#FF1493', '#8B0000', '#B8860B',
  '#9ACD32', '#FF8C00', '#1E90FF', '#FF00FF', '#ADFF2F',
  '#CD5C5C', '#20B2AA', '#FF6347', '#9932CC', '#FFB6C1',
];

export const HIGHLIGHT_CONTAINER_ID = 'dom-highlight-container';

/** Highest z-index browsers honour */
export const MAX_Z_INDEX = '2147483647';

/**
 * Name of the page binding that carries in-page log lines back to Node
 */
export const DOM_TREE_LOG_BINDING = '__domTreeLog';

export const DEFAULT_MAX_HIGHLIGHT = 75;

export const DEFAULT_REFRESH_INTERVAL_MS = 2000;

export const DEFAULT_REFRESH_ITERATIONS = 5;

export const DEFAULT_DOM_TREE_CONFIG: DomTreeConfig = {
  interactiveTags: INTERACTIVE_TAGS,
  clickAttributes: CLICK_HANDLER_ATTRIBUTES,
  interactiveRoles: INTERACTIVE_ROLES,
  clickableClassKeywords: CLICKABLE_CLASS_KEYWORDS,
  clickableInputTypes: CLICKABLE_INPUT_TYPES,
  viewportMargin: 2,
  offscreenMargin: 10000,
  maxReasonableOffset: 10000,
  minElementSize: 1,
  highlight: {
    containerId: HIGHLIGHT_CONTAINER_ID,
    zIndex: MAX_Z_INDEX,
    palette: HIGHLIGHT_COLORS,
    fallbackColor: '#FF0000',
    fillAlpha: '33',
    borderWidth: '2px',
    labelTextColor: '#fff',
    labelFontSize: '12px',
    labelPadding: '2px 4px',
  },
};

/**
 * Attributes worth showing when a highlighted element is rendered as text
 */
export const LISTED_ATTRIBUTES = [
  'id',
  'name',
  'type',
  'role',
  'aria-label',
  'placeholder',
  'title',
  'href',
  'value',
];
