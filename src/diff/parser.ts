/**
 * Block Parser
 *
 * Parses Roam API block data into Block trees
 * and provides utilities for flattening and indexing them.
 */

import type { Block, BlockAttributes, AttributeValue } from './types.js';
import type { RoamApiBlock } from '../types/roam.js';

const VIEW_TYPES = new Set(['bullet', 'document', 'numbered']);

function sortByOrder(blocks: RoamApiBlock[]): RoamApiBlock[] {
  return [...blocks].sort((a, b) => (a[':block/order'] ?? 0) - (b[':block/order'] ?? 0));
}

function parseAttributes(roamBlock: RoamApiBlock): BlockAttributes {
  const attributes: Record<string, AttributeValue> = {};

  const heading = roamBlock[':block/heading'];
  if (typeof heading === 'number' && heading > 0) {
    attributes.heading = heading;
  }

  // Pull results spell enum values as keywords (":document")
  const viewType = roamBlock[':children/view-type']?.replace(/^:/, '');
  if (viewType && VIEW_TYPES.has(viewType) && viewType !== 'bullet') {
    attributes['children-view-type'] = viewType;
  }

  // Blocks are expanded unless stored otherwise
  if (roamBlock[':block/open'] === false) {
    attributes.open = false;
  }

  return attributes;
}

/**
 * Parse a raw Roam API block into a Block.
 * Recursively processes children and sorts them by order. Page entities use
 * their title as text.
 *
 * @param roamBlock - Raw block data from Roam API
 * @returns Parsed Block carrying the Roam UID as identifier
 */
export function parseExistingBlock(roamBlock: RoamApiBlock): Block {
  const children = sortByOrder(roamBlock[':block/children'] ?? []).map((c) =>
    parseExistingBlock(c)
  );

  const block: Block = {
    text: roamBlock[':block/string'] ?? roamBlock[':node/title'] ?? '',
    attributes: parseAttributes(roamBlock),
    children,
  };
  const uid = roamBlock[':block/uid'];
  if (uid) {
    block.identifier = uid;
  }
  return block;
}

/**
 * Parse all top-level blocks from a Roam page.
 *
 * @param pageData - Raw page data from Roam API (with :block/children)
 */
export function parseExistingBlocks(pageData: RoamApiBlock): Block[] {
  return sortByOrder(pageData[':block/children'] ?? []).map((c) => parseExistingBlock(c));
}

/**
 * Flatten block trees into a single array in depth-first (pre-order) order.
 */
export function flattenBlocks(blocks: readonly Block[]): Block[] {
  const result: Block[] = [];

  function flatten(block: Block): void {
    result.push(block);
    for (const child of block.children) {
      flatten(child);
    }
  }

  for (const block of blocks) {
    flatten(block);
  }

  return result;
}

/**
 * Build an identifier -> Block lookup over one or more trees.
 * The first occurrence of an identifier wins.
 */
export function indexBlocks(blocks: readonly Block[]): Map<string, Block> {
  const index = new Map<string, Block>();
  for (const block of flattenBlocks(blocks)) {
    if (block.identifier !== undefined && !index.has(block.identifier)) {
      index.set(block.identifier, block);
    }
  }
  return index;
}

/**
 * Depth of the deepest block below `block` (0 for a leaf).
 */
export function getTreeDepth(block: Block): number {
  let depth = 0;
  for (const child of block.children) {
    depth = Math.max(depth, getTreeDepth(child) + 1);
  }
  return depth;
}
