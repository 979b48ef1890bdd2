/**
 * Diff Computation
 *
 * Aligns an existing block tree against a desired block tree, one sibling
 * level at a time, and classifies every node as unchanged, changed, moved,
 * created or deleted.
 */

import type {
  AlignOptions,
  Block,
  BlockScorer,
  CandidatePair,
  Classification,
  Correspondence,
  CorrespondenceEntry,
  CreatedEntry,
  DiffStats,
  MatchedEntry,
  TieBreaker,
} from './types.js';
import { attributesEqual, isPlaceholder, scoreBlocks } from './matcher.js';

export const DEFAULT_MATCH_THRESHOLD = 0.5;

/**
 * Default tie-break for equally scored candidates:
 * 1. Pairs that keep their index (no move implied)
 * 2. Earliest in desired order
 * 3. Earliest in existing order
 */
export const preferStablePosition: TieBreaker = (a, b) => {
  const aStays = a.existingIndex === a.desiredIndex ? 0 : 1;
  const bStays = b.existingIndex === b.desiredIndex ? 0 : 1;
  return aStays - bStays || a.desiredIndex - b.desiredIndex || a.existingIndex - b.existingIndex;
};

interface ResolvedOptions {
  threshold: number;
  scorer: BlockScorer;
  tieBreak: TieBreaker;
}

/**
 * Match the children of one existing/desired pair.
 *
 * @returns Map of desired index -> existing index
 */
export function matchSiblings(
  existing: readonly Block[],
  desired: readonly Block[],
  options: AlignOptions = {}
): Map<number, number> {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const scorer = options.scorer ?? scoreBlocks;
  const tieBreak = options.tieBreak ?? preferStablePosition;

  const candidates: CandidatePair[] = [];
  existing.forEach((existingBlock, existingIndex) => {
    desired.forEach((desiredBlock, desiredIndex) => {
      const score = scorer(existingBlock, desiredBlock);
      if (score >= threshold) {
        candidates.push({ existingIndex, desiredIndex, score });
      }
    });
  });

  candidates.sort((a, b) => b.score - a.score || tieBreak(a, b));

  const matches = new Map<number, number>(); // desiredIndex -> existingIndex
  const usedExisting = new Set<number>();

  for (const candidate of candidates) {
    if (matches.has(candidate.desiredIndex) || usedExisting.has(candidate.existingIndex)) continue;
    matches.set(candidate.desiredIndex, candidate.existingIndex);
    usedExisting.add(candidate.existingIndex);
  }

  // Empty placeholders carry nothing to compare, so they pair by position
  desired.forEach((desiredBlock, idx) => {
    if (matches.has(idx) || usedExisting.has(idx) || idx >= existing.length) return;
    if (isPlaceholder(desiredBlock) && isPlaceholder(existing[idx])) {
      matches.set(idx, idx);
      usedExisting.add(idx);
    }
  });

  return matches;
}

/**
 * Positions (into `values`) of one longest strictly increasing subsequence.
 */
export function longestIncreasingSubsequence(values: readonly number[]): Set<number> {
  const tails: number[] = [];
  const previous: number[] = new Array<number>(values.length).fill(-1);

  for (let i = 0; i < values.length; i++) {
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (values[tails[mid]] < values[i]) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    if (lo > 0) {
      previous[i] = tails[lo - 1];
    }
    tails[lo] = i;
  }

  const result = new Set<number>();
  let cursor = tails.length > 0 ? tails[tails.length - 1] : -1;
  while (cursor >= 0) {
    result.add(cursor);
    cursor = previous[cursor];
  }
  return result;
}

function createdSubtree(block: Block, desiredIndex: number): CreatedEntry {
  return {
    status: 'created',
    desired: block,
    desiredIndex,
    children: block.children.map((child, idx) => createdSubtree(child, idx)),
  };
}

function alignPair(
  existing: Block,
  desired: Block,
  existingIndex: number,
  desiredIndex: number,
  moved: boolean,
  isRoot: boolean,
  options: ResolvedOptions
): MatchedEntry {
  const matches = matchSiblings(existing.children, desired.children, options);

  // Matched children whose relative order survives stay put; the rest move
  const matchedDesired = [...matches.keys()].sort((a, b) => a - b);
  const anchors = longestIncreasingSubsequence(
    matchedDesired.map((idx) => matches.get(idx) ?? -1)
  );
  const movedDesired = new Set(matchedDesired.filter((_, pos) => !anchors.has(pos)));

  const children: CorrespondenceEntry[] = desired.children.map((desiredChild, idx) => {
    const existingChildIndex = matches.get(idx);
    if (existingChildIndex === undefined) {
      return createdSubtree(desiredChild, idx);
    }
    return alignPair(
      existing.children[existingChildIndex],
      desiredChild,
      existingChildIndex,
      idx,
      movedDesired.has(idx),
      false,
      options
    );
  });

  const matchedExisting = new Set(matches.values());
  const deleted = existing.children.filter((_, idx) => !matchedExisting.has(idx));

  const changed =
    !isRoot &&
    (existing.text !== desired.text || !attributesEqual(existing.attributes, desired.attributes));

  const descendantsChanged =
    deleted.length > 0 ||
    children.some(
      (child) =>
        child.status === 'created' || child.changed || child.moved || child.descendantsChanged
    );

  return {
    status: 'matched',
    existing,
    desired,
    existingIndex,
    desiredIndex,
    changed,
    moved: !isRoot && moved,
    descendantsChanged,
    children,
    deleted,
  };
}

/**
 * Compute the correspondence between an existing tree and a desired tree.
 *
 * The roots always pair: they stand for the page (or parent block) being
 * synchronized and are never reported as changed or moved. Below the roots,
 * children are matched per sibling level only; a match is never proposed
 * across different parents.
 *
 * @param existing - Root of the tree fetched from the store
 * @param desired - Root of the tree the store should end up with
 */
export function alignTrees(
  existing: Block,
  desired: Block,
  options: AlignOptions = {}
): Correspondence {
  const resolved: ResolvedOptions = {
    threshold: options.threshold ?? DEFAULT_MATCH_THRESHOLD,
    scorer: options.scorer ?? scoreBlocks,
    tieBreak: options.tieBreak ?? preferStablePosition,
  };
  return { root: alignPair(existing, desired, 0, 0, false, true, resolved) };
}

/**
 * Classifications of a single entry. A matched node can be both changed and
 * moved; a node needing no operation of its own is `matched-unchanged`.
 */
export function classify(entry: CorrespondenceEntry): Classification[] {
  if (entry.status === 'created') return ['created'];

  const result: Classification[] = [];
  if (entry.changed) result.push('matched-changed');
  if (entry.moved) result.push('matched-moved');
  if (result.length === 0) result.push('matched-unchanged');
  return result;
}

/**
 * Visit every entry below the root in pre-order.
 */
export function walkCorrespondence(
  correspondence: Correspondence,
  visit: (entry: CorrespondenceEntry, depth: number) => void
): void {
  function walk(entry: CorrespondenceEntry, depth: number): void {
    visit(entry, depth);
    for (const child of entry.children) {
      walk(child, depth + 1);
    }
  }
  for (const child of correspondence.root.children) {
    walk(child, 0);
  }
}

/**
 * Extract statistics from a Correspondence.
 * `creates` counts every new block; `deletes` counts removed subtree roots.
 */
export function getDiffStats(correspondence: Correspondence): DiffStats {
  const stats: DiffStats = { creates: 0, updates: 0, moves: 0, deletes: 0, preserved: 0 };

  stats.deletes += correspondence.root.deleted.length;
  walkCorrespondence(correspondence, (entry) => {
    if (entry.status === 'created') {
      stats.creates++;
      return;
    }
    stats.preserved++;
    if (entry.changed) stats.updates++;
    if (entry.moved) stats.moves++;
    stats.deletes += entry.deleted.length;
  });

  return stats;
}

/**
 * Check if a correspondence contains no changes.
 */
export function isDiffEmpty(correspondence: Correspondence): boolean {
  return !correspondence.root.descendantsChanged;
}
