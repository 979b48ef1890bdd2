import type {
  AlignOptions,
  Block,
  Correspondence,
  DiffStats,
  PlanAction,
} from '../diff/types.js';
import type { FetchCapability } from '../types/fetch.js';
import type { OutputMode } from '../format/formatter.js';
import { alignTrees, getDiffStats } from '../diff/diff.js';
import { planActions, summarizeActions } from '../diff/actions.js';
import { getTreeDepth } from '../diff/parser.js';
import { formatBlocks } from '../format/formatter.js';
import { formatValidationErrors, validateBlockTree } from '../shared/validation.js';
import { printDebug } from '../utils/log.js';

export interface PageSyncOptions extends AlignOptions {
  fetcher: FetchCapability;
  refPrefix?: string;
  debug?: boolean;
}

export interface PageSyncResult {
  pageExists: boolean;
  correspondence: Correspondence;
  actions: PlanAction[];
  stats: DiffStats;
  summary: string;
}

export interface RenderPageOptions {
  fetcher: FetchCapability;
  level?: number;
  mode?: OutputMode;
  topLevelAsParagraphs?: boolean;
  expandRefs?: boolean;
  debug?: boolean;
}

/**
 * Plan the operations that turn a page's current blocks into `desired`.
 *
 * The desired root stands for the page; only its children are synchronized.
 * A missing page is planned from an empty root, so the plan starts with
 * `create-page`.
 *
 * @throws Error if either tree fails validation
 * @throws PlanStructureError if alignment produced an inconsistent result
 */
export async function planPageSync(
  title: string,
  desired: Block,
  options: PageSyncOptions
): Promise<PageSyncResult> {
  const { fetcher, refPrefix, debug, ...alignOptions } = options;

  const desiredCheck = validateBlockTree(desired);
  if (!desiredCheck.valid) {
    throw new Error(`Invalid desired tree for "${title}":\n${formatValidationErrors(desiredCheck.errors)}`);
  }

  const fetched = await fetcher.fetchPage(title);
  const existing: Block = fetched ?? { text: title, attributes: {}, children: [] };

  const existingCheck = validateBlockTree(existing, { requireIdentifiers: true });
  if (!existingCheck.valid) {
    throw new Error(`Invalid existing tree for "${title}":\n${formatValidationErrors(existingCheck.errors)}`);
  }

  if (debug) {
    printDebug('Page trees', {
      title,
      pageExists: fetched !== null,
      existingDepth: getTreeDepth(existing),
      desiredDepth: getTreeDepth(desired),
    });
  }

  const correspondence = alignTrees(existing, desired, alignOptions);
  const actions = planActions(correspondence, { refPrefix });
  const stats = getDiffStats(correspondence);
  const summary = summarizeActions(actions);

  if (debug) {
    printDebug('Sync plan', { title, stats, summary });
  }

  return { pageExists: fetched !== null, correspondence, actions, stats, summary };
}

/**
 * Fetch a page and render its blocks as markdown. The title is not part of
 * the output. Blocks the page references are fetched alongside when the
 * fetcher can list them, so they resolve without spending a level.
 *
 * @returns The rendered text, or null when the page does not exist
 */
export async function renderPage(title: string, options: RenderPageOptions): Promise<string | null> {
  const page = await options.fetcher.fetchPage(title);
  if (!page) {
    if (options.debug) {
      printDebug('Page not found', { title });
    }
    return null;
  }

  const level = options.level ?? 1;
  const references =
    level > 0 && page.identifier !== undefined && options.fetcher.fetchReferences
      ? await options.fetcher.fetchReferences(page.identifier)
      : [];

  if (options.debug) {
    printDebug('Render page', { title, level, references: references.length });
  }

  return formatBlocks(page.children, {
    level,
    mode: options.mode,
    fetcher: options.fetcher,
    references,
    topLevelAsParagraphs: options.topLevelAsParagraphs,
    expandRefs: options.expandRefs,
  });
}
