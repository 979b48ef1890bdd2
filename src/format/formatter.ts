/**
 * Hierarchical Formatter
 *
 * Renders block trees as markdown, replacing reference markers through the
 * RefResolver. Two layouts:
 * - hierarchical: top-level blocks as paragraphs, descendants as nested bullets
 * - flat: top-level blocks and their children as paragraphs or headings,
 *   everything deeper as one unindented list with code blocks lifted out
 */

import type { Block } from '../diff/types.js';
import type { FetchCapability } from '../types/fetch.js';
import { flattenBlocks, indexBlocks } from '../diff/parser.js';
import { collectRefs } from '../refs/refs.js';
import { RefResolver } from '../refs/resolver.js';

export type OutputMode = 'hierarchical' | 'flat';

export interface FormatOptions {
  /** Reference resolution depth (default: 1) */
  level?: number;
  mode?: OutputMode;
  fetcher?: FetchCapability;
  /** Extra blocks references may point at, e.g. refs fetched with the page */
  references?: readonly Block[];
  /** Render top-level blocks as paragraphs instead of bullets (default: true) */
  topLevelAsParagraphs?: boolean;
  /** Quote the blocks a paragraph references below it */
  expandRefs?: boolean;
}

interface RenderContext {
  resolver: RefResolver;
  level: number;
  expandRefs: boolean;
  canFetch: boolean;
}

/**
 * Check if block is a Roam table.
 */
export function isTableBlock(block: Block): boolean {
  const text = block.text.trim();
  return text === '{{[[table]]}}' || text === '{{table}}';
}

/**
 * Check if block is a fenced code block.
 */
export function isCodeBlock(block: Block): boolean {
  return block.text.trim().startsWith('```');
}

/**
 * Render a referenced block and two levels of its children as a blockquote.
 * A null block renders as not found.
 */
export function formatRefBlock(uid: string, block: Block | null): string {
  if (!block) {
    return `> **((_${uid}_))**: _[not found]_`;
  }

  const lines = [`> **((_${uid}_))**: ${block.text}`];
  for (const child of block.children) {
    lines.push(`>   - ${child.text}`);
    for (const grandchild of child.children) {
      lines.push(`>     - ${grandchild.text}`);
    }
  }
  return lines.join('\n');
}

/**
 * Append a quoted copy of every block referenced in `text`, in document
 * order. Only UIDs present in `refBlocks` are quoted.
 */
export function expandRefsInText(text: string, refBlocks: ReadonlyMap<string, Block | null>): string {
  const quoted: string[] = [];
  for (const uid of collectRefs(text)) {
    const block = refBlocks.get(uid);
    if (block !== undefined) {
      quoted.push(formatRefBlock(uid, block));
    }
  }
  return quoted.length > 0 ? `${text}\n\n${quoted.join('\n\n')}` : text;
}

function withHeading(block: Block, text: string): string {
  const heading = block.attributes.heading;
  if (typeof heading === 'number' && heading > 0) {
    return `${'#'.repeat(heading)} ${text}`;
  }
  return text;
}

function renderText(block: Block, ctx: RenderContext): Promise<string> {
  const chain = new Set(block.identifier !== undefined ? [block.identifier] : []);
  return ctx.resolver.resolveText(block.text, ctx.level, chain);
}

/**
 * A block rendered as a paragraph or heading, followed by the blocks it
 * references when expansion is on.
 */
async function renderParagraph(block: Block, ctx: RenderContext): Promise<string> {
  const text = withHeading(block, await renderText(block, ctx));
  if (!ctx.expandRefs || ctx.level <= 0) return text;

  // A miss only counts as not found when a fetch was attempted
  const refBlocks = new Map<string, Block | null>();
  for (const uid of collectRefs(block.text)) {
    const target = await ctx.resolver.findBlock(uid, ctx.level);
    if (target || ctx.canFetch) {
      refBlocks.set(uid, target);
    }
  }
  return expandRefsInText(text, refBlocks);
}

/**
 * Format a Roam table as a GFM table.
 * Rows are the table's children; a row's cells are nested horizontally, each
 * cell being the first child of the previous one.
 */
async function formatTable(table: Block, ctx: RenderContext): Promise<string[]> {
  const rows: string[][] = [];
  for (const row of table.children) {
    const cells: string[] = [];
    let current: Block | undefined = row;
    while (current) {
      cells.push(await renderText(current, ctx));
      current = current.children[0];
    }
    rows.push(cells);
  }

  if (rows.length === 0) return [];

  const width = Math.max(...rows.map((r) => r.length));
  const padded = rows.map((r) => [...r, ...new Array<string>(width - r.length).fill('')]);
  const line = (cells: string[]): string => `| ${cells.join(' | ')} |`;

  return [
    line(padded[0]),
    line(new Array<string>(width).fill('---')),
    ...padded.slice(1).map(line),
  ];
}

async function formatNested(block: Block, depth: number, ctx: RenderContext): Promise<string[]> {
  const lines: string[] = [];

  // Empty blocks vanish but their children keep the same depth
  if (!block.text.trim()) {
    for (const child of block.children) {
      lines.push(...(await formatNested(child, depth, ctx)));
    }
    return lines;
  }

  const indent = '  '.repeat(depth);

  if (isTableBlock(block)) {
    const table = await formatTable(block, ctx);
    if (table.length > 0) {
      lines.push(...table.map((l) => `${indent}${l}`), '');
    }
    return lines;
  }

  lines.push(`${indent}- ${withHeading(block, await renderText(block, ctx))}`);
  for (const child of block.children) {
    lines.push(...(await formatNested(child, depth + 1, ctx)));
  }
  return lines;
}

async function formatHierarchical(
  blocks: readonly Block[],
  ctx: RenderContext,
  topLevelAsParagraphs: boolean
): Promise<string[]> {
  const lines: string[] = [];

  for (const block of blocks) {
    if (isTableBlock(block)) {
      const table = await formatTable(block, ctx);
      if (table.length > 0) {
        lines.push(...table, '');
      }
      continue;
    }

    if (block.text.trim()) {
      if (topLevelAsParagraphs) {
        lines.push(await renderParagraph(block, ctx), '');
      } else {
        lines.push(`- ${withHeading(block, await renderText(block, ctx))}`);
      }
    }

    if (block.children.length > 0) {
      const childDepth = topLevelAsParagraphs || !block.text.trim() ? 0 : 1;
      for (const child of block.children) {
        lines.push(...(await formatNested(child, childDepth, ctx)));
      }
      lines.push('');
    }
  }

  return lines;
}

/**
 * Blocks below the second level, as one list. Code blocks interrupt the list
 * and are emitted as they are.
 */
async function formatDeepList(blocks: readonly Block[], ctx: RenderContext): Promise<string[]> {
  const lines: string[] = [];
  let items: string[] = [];

  for (const block of flattenBlocks(blocks)) {
    if (!block.text.trim()) continue;
    const text = await renderText(block, ctx);
    if (isCodeBlock(block)) {
      if (items.length > 0) {
        lines.push(...items, '');
        items = [];
      }
      lines.push(text, '');
    } else {
      items.push(`- ${text}`);
    }
  }

  if (items.length > 0) {
    lines.push(...items, '');
  }
  return lines;
}

async function formatFlat(blocks: readonly Block[], ctx: RenderContext): Promise<string[]> {
  const lines: string[] = [];

  for (const block of blocks) {
    if (isTableBlock(block)) {
      lines.push('', ...(await formatTable(block, ctx)), '');
      continue;
    }
    if (block.text.trim()) {
      lines.push(await renderParagraph(block, ctx), '');
    }

    for (const child of block.children) {
      if (isTableBlock(child)) {
        lines.push(...(await formatTable(child, ctx)), '');
        continue;
      }
      if (child.text.trim()) {
        lines.push(await renderParagraph(child, ctx), '');
      }
      lines.push(...(await formatDeepList(child.children, ctx)));
    }
  }

  return lines;
}

/**
 * Format blocks as markdown.
 *
 * @param blocks - Top-level blocks (each may have children)
 * @param options - Resolution depth, layout and reference sources
 */
export async function formatBlocks(blocks: readonly Block[], options: FormatOptions = {}): Promise<string> {
  if (blocks.length === 0) return '';

  const ctx: RenderContext = {
    resolver: new RefResolver(indexBlocks([...blocks, ...(options.references ?? [])]), options.fetcher),
    level: options.level ?? 1,
    expandRefs: options.expandRefs ?? false,
    canFetch: options.fetcher !== undefined && (options.level ?? 1) > 1,
  };

  const lines =
    options.mode === 'flat'
      ? await formatFlat(blocks, ctx)
      : await formatHierarchical(blocks, ctx, options.topLevelAsParagraphs ?? true);

  return lines.join('\n').replace(/\n{3,}/g, '\n\n').trim();
}

/**
 * Format a single tree (a page or a block with its children).
 */
export function formatTree(root: Block, options: FormatOptions = {}): Promise<string> {
  return formatBlocks([root], options);
}
