/**
 * Zod schemas for snapshot trees coming back from the page
 */

import { z } from 'zod';
import type { DomTreeNode, ElementNode } from './dom-tree.types.js';

export const TextNodeSchema = z.object({
  kind: z.literal('text'),
  content: z.string().min(1).describe('Trimmed text content'),
});

export const ElementNodeSchema: z.ZodType<ElementNode> = z.lazy(() =>
  z.object({
    kind: z.literal('element'),
    tagName: z.string().describe('Lowercase tag name'),
    attributes: z.record(z.string()).describe('Attribute name to value'),
    children: z.array(DomTreeNodeSchema).describe('Child nodes in document order'),
    isClickable: z.boolean(),
    isVisible: z.boolean(),
    isInViewport: z.boolean(),
    highlightIndex: z.number().int().nonnegative().optional().describe('Overlay label'),
  }),
);

export const DomTreeNodeSchema: z.ZodType<DomTreeNode> = z.lazy(() =>
  z.union([TextNodeSchema, ElementNodeSchema]),
);

export const DomTreeResultSchema = DomTreeNodeSchema.nullable();

export const MaxHighlightSchema = z
  .number()
  .int('maxHighlight must be an integer')
  .nonnegative('maxHighlight must not be negative');
