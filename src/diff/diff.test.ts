import { describe, it, expect } from 'vitest';
import {
  alignTrees,
  classify,
  getDiffStats,
  isDiffEmpty,
  longestIncreasingSubsequence,
  matchSiblings,
  walkCorrespondence,
} from './diff.js';
import type { Block, BlockAttributes, Classification, MatchedEntry, TieBreaker } from './types.js';

function existing(identifier: string, text: string, children: Block[] = [], attributes: BlockAttributes = {}): Block {
  return { identifier, text, attributes, children };
}

function desired(text: string, children: Block[] = [], attributes: BlockAttributes = {}): Block {
  return { text, attributes, children };
}

function page(children: Block[]): Block {
  return existing('page00001', 'Page', children);
}

function target(children: Block[]): Block {
  return desired('Page', children);
}

function matchedChild(entry: MatchedEntry, idx: number): MatchedEntry {
  const child = entry.children[idx];
  if (child.status !== 'matched') {
    throw new Error(`Expected child ${idx} to be matched`);
  }
  return child;
}

/** Classification labels keyed by desired text */
function labels(root: MatchedEntry): Record<string, Classification[]> {
  const result: Record<string, Classification[]> = {};
  walkCorrespondence({ root }, (entry) => {
    result[entry.desired.text] = classify(entry);
  });
  return result;
}

describe('longestIncreasingSubsequence', () => {
  it('returns positions of one longest increasing run', () => {
    expect(longestIncreasingSubsequence([0, 1, 2])).toEqual(new Set([0, 1, 2]));
    expect(longestIncreasingSubsequence([1, 2, 0])).toEqual(new Set([0, 1]));
    expect(longestIncreasingSubsequence([0, 2, 3, 1])).toEqual(new Set([0, 1, 2]));
  });

  it('handles empty and reversed input', () => {
    expect(longestIncreasingSubsequence([])).toEqual(new Set());
    expect(longestIncreasingSubsequence([1, 0])).toEqual(new Set([1]));
  });
});

describe('matchSiblings', () => {
  it('matches identical text regardless of position', () => {
    const matches = matchSiblings(
      [existing('uid000001', 'Alpha one'), existing('uid000002', 'Beta two')],
      [desired('Beta two'), desired('Alpha one')]
    );
    expect(matches).toEqual(
      new Map([
        [0, 1],
        [1, 0],
      ])
    );
  });

  it('skips candidates below the threshold', () => {
    const matches = matchSiblings([existing('uid000001', 'Alpha one')], [desired('Beta two')]);
    expect(matches.size).toBe(0);
  });

  it('uses the configured threshold', () => {
    const ex = [existing('uid000001', 'Alpha one')];
    const de = [desired('Alpha one!')];
    expect(matchSiblings(ex, de).get(0)).toBe(0);
    expect(matchSiblings(ex, de, { threshold: 0.99 }).size).toBe(0);
  });

  it('breaks ties in favour of the same index', () => {
    const matches = matchSiblings(
      [existing('uid000001', 'Same'), existing('uid000002', 'Same')],
      [desired('Same')]
    );
    expect(matches.get(0)).toBe(0);
  });

  it('accepts a custom tie-break', () => {
    const preferLast: TieBreaker = (a, b) => b.existingIndex - a.existingIndex;
    const matches = matchSiblings(
      [existing('uid000001', 'Same'), existing('uid000002', 'Same')],
      [desired('Same')],
      { tieBreak: preferLast }
    );
    expect(matches.get(0)).toBe(1);
  });

  it('pairs empty placeholders by position', () => {
    const matches = matchSiblings(
      [existing('uid000001', '', [], { heading: 1 }), existing('uid000002', 'Alpha one')],
      [desired(''), desired('Alpha one')]
    );
    expect(matches.get(0)).toBe(0);
    expect(matches.get(1)).toBe(1);
  });

  it('uses a custom scorer', () => {
    const matches = matchSiblings(
      [existing('uid000001', 'anything')],
      [desired('else')],
      { scorer: () => 1 }
    );
    expect(matches.get(0)).toBe(0);
  });
});

describe('alignTrees', () => {
  it('reports no changes for identical trees', () => {
    const ex = page([existing('uid000001', 'Alpha one', [existing('uid000002', 'Nested')]), existing('uid000003', 'Beta two')]);
    const de = target([desired('Alpha one', [desired('Nested')]), desired('Beta two')]);

    const correspondence = alignTrees(ex, de);

    expect(isDiffEmpty(correspondence)).toBe(true);
    expect(getDiffStats(correspondence)).toEqual({ creates: 0, updates: 0, moves: 0, deletes: 0, preserved: 3 });
    expect(labels(correspondence.root)).toEqual({
      'Alpha one': ['matched-unchanged'],
      Nested: ['matched-unchanged'],
      'Beta two': ['matched-unchanged'],
    });
  });

  it('never marks the roots as changed or moved', () => {
    const correspondence = alignTrees(existing('page00001', 'Old title'), desired('New title'));
    expect(correspondence.root.changed).toBe(false);
    expect(correspondence.root.moved).toBe(false);
    expect(isDiffEmpty(correspondence)).toBe(true);
  });

  it('classifies a relocated block as the only move', () => {
    const ex = page([
      existing('uid000001', 'Alpha one'),
      existing('uid000002', 'Beta two'),
      existing('uid000003', 'Gamma three'),
    ]);
    const de = target([desired('Beta two'), desired('Gamma three'), desired('Alpha one')]);

    const correspondence = alignTrees(ex, de);

    expect(labels(correspondence.root)).toEqual({
      'Beta two': ['matched-unchanged'],
      'Gamma three': ['matched-unchanged'],
      'Alpha one': ['matched-moved'],
    });
    expect(getDiffStats(correspondence).moves).toBe(1);
  });

  it('does not count insertions as moves of later siblings', () => {
    const ex = page([existing('uid000001', 'Alpha one'), existing('uid000002', 'Beta two')]);
    const de = target([desired('Delta four'), desired('Alpha one'), desired('Beta two')]);

    const correspondence = alignTrees(ex, de);

    expect(labels(correspondence.root)).toEqual({
      'Delta four': ['created'],
      'Alpha one': ['matched-unchanged'],
      'Beta two': ['matched-unchanged'],
    });
  });

  it('reports a block that is both edited and relocated', () => {
    const ex = page([
      existing('uid000001', 'Alpha one'),
      existing('uid000002', 'Beta two'),
      existing('uid000003', 'Gamma three'),
    ]);
    const de = target([desired('Beta two'), desired('Gamma three'), desired('Alpha one!')]);

    const correspondence = alignTrees(ex, de);

    expect(classify(matchedChild(correspondence.root, 2))).toEqual(['matched-changed', 'matched-moved']);
  });

  it('detects attribute-only changes', () => {
    const ex = page([existing('uid000001', 'Heading', [], { heading: 1 })]);
    const de = target([desired('Heading', [], { heading: 2 })]);

    const child = matchedChild(alignTrees(ex, de).root, 0);

    expect(child.changed).toBe(true);
    expect(child.existing.identifier).toBe('uid000001');
  });

  it('deletes an unmatched subtree as a unit', () => {
    const ex = page([
      existing('uid000001', 'Alpha one', [existing('uid000002', 'Child A'), existing('uid000003', 'Child B')]),
      existing('uid000004', 'Beta two'),
    ]);
    const de = target([desired('Beta two')]);

    const correspondence = alignTrees(ex, de);

    expect(correspondence.root.deleted.map((b) => b.identifier)).toEqual(['uid000001']);
    expect(getDiffStats(correspondence)).toEqual({ creates: 0, updates: 0, moves: 0, deletes: 1, preserved: 1 });
  });

  it('creates unmatched desired subtrees', () => {
    const ex = page([]);
    const de = target([desired('Delta four', [desired('Nested')])]);

    const correspondence = alignTrees(ex, de);

    expect(correspondence.root.children[0].status).toBe('created');
    expect(correspondence.root.children[0].children[0].status).toBe('created');
    expect(getDiffStats(correspondence).creates).toBe(2);
  });

  it('never reuses an identifier across parents', () => {
    const ex = page([
      existing('uid000001', 'Alpha one', [existing('uid000002', 'Xylophone keys')]),
      existing('uid000003', 'Beta two'),
    ]);
    const de = target([desired('Alpha one'), desired('Beta two', [desired('Xylophone keys')])]);

    const root = alignTrees(ex, de).root;

    expect(matchedChild(root, 0).deleted.map((b) => b.identifier)).toEqual(['uid000002']);
    expect(matchedChild(root, 1).children[0].status).toBe('created');
  });

  it('flags ancestors of a nested change', () => {
    const ex = page([existing('uid000001', 'Alpha one', [existing('uid000002', 'Nested')])]);
    const de = target([desired('Alpha one', [desired('Nested edit')])]);

    const root = alignTrees(ex, de).root;

    expect(root.descendantsChanged).toBe(true);
    expect(matchedChild(root, 0).descendantsChanged).toBe(true);
    expect(classify(matchedChild(root, 0))).toEqual(['matched-unchanged']);
  });

  it('does not mutate its inputs', () => {
    const ex = page([existing('uid000001', 'Alpha one'), existing('uid000002', 'Beta two')]);
    const de = target([desired('Beta two'), desired('Gamma three')]);
    const exCopy = structuredClone(ex);
    const deCopy = structuredClone(de);

    alignTrees(ex, de);

    expect(ex).toEqual(exCopy);
    expect(de).toEqual(deCopy);
  });
});
