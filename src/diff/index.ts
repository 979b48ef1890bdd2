/**
 * Block Tree Diff
 *
 * Computes the operations that turn an existing block tree into a desired one
 * while keeping the identifiers of blocks that survive the edit.
 *
 * Usage:
 * ```typescript
 * import { parseExistingBlock, alignTrees, planActions, getDiffStats } from './diff/index.js';
 *
 * // 1. Parse existing page data
 * const existing = parseExistingBlock(pageData);
 *
 * // 2. Align it against the desired tree
 * const correspondence = alignTrees(existing, desired);
 *
 * // 3. Generate the ordered plan
 * const actions = planActions(correspondence);
 *
 * // 4. Check stats
 * const stats = getDiffStats(correspondence);
 * console.log(`Preserved ${stats.preserved} UIDs`);
 * ```
 */

// Types
export type {
  AttributeValue,
  BlockAttributes,
  Block,
  BlockRef,
  RefKind,
  Classification,
  CorrespondenceEntry,
  MatchedEntry,
  CreatedEntry,
  Correspondence,
  CandidatePair,
  TieBreaker,
  BlockScorer,
  AlignOptions,
  NodeRef,
  PlanAction,
  PlanActionType,
  CreatePageAction,
  CreateBlockAction,
  UpdateBlockAction,
  MoveBlockAction,
  DeleteBlockAction,
  DiffStats,
} from './types.js';

// Parser
export {
  parseExistingBlock,
  parseExistingBlocks,
  flattenBlocks,
  indexBlocks,
  getTreeDepth,
} from './parser.js';

// Matcher
export {
  normalizeText,
  normalizeForMatching,
  taskStatus,
  attributesEqual,
  diceCoefficient,
  scoreBlocks,
  isPlaceholder,
} from './matcher.js';

// Diff
export {
  DEFAULT_MATCH_THRESHOLD,
  preferStablePosition,
  matchSiblings,
  longestIncreasingSubsequence,
  alignTrees,
  classify,
  walkCorrespondence,
  getDiffStats,
  isDiffEmpty,
} from './diff.js';

// Actions
export type { PlanOptions } from './actions.js';
export {
  validateCorrespondence,
  planActions,
  isPlanEmpty,
  filterActions,
  groupActionsByType,
  summarizeActions,
} from './actions.js';

// Roam translation
export type { TranslationResult } from './translate.js';
export { toRoamBatchActions } from './translate.js';
