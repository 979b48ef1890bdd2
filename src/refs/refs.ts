import type { Block, BlockRef, RefKind } from '../diff/types.js';
import { flattenBlocks } from '../diff/parser.js';

const UID = '[a-zA-Z0-9_-]+';
const TITLE = '[^\\[\\]]+';
const EMBED_PREFIX = '\\{\\{\\[?\\[?embed\\]?\\]?:\\s*';

// Alternatives are tried left to right, so embeds and aliases win over the
// plain references they contain
const REF_PATTERN = new RegExp(
  [
    `${EMBED_PREFIX}\\(\\((?<embedUid>${UID})\\)\\)\\s*\\}\\}`,
    `${EMBED_PREFIX}\\[\\[(?<embedTitle>${TITLE})\\]\\]\\s*\\}\\}`,
    `\\[(?<label>[^\\[\\]]*)\\]\\((?:\\(\\((?<aliasUid>${UID})\\)\\)|\\[\\[(?<aliasTitle>${TITLE})\\]\\])\\)`,
    `\\(\\((?<uid>${UID})\\)\\)`,
    `\\[\\[(?<title>${TITLE})\\]\\]`,
  ].join('|'),
  'g'
);

function classifyMatch(groups: Record<string, string | undefined>): [RefKind, string] | null {
  if (groups.embedUid !== undefined) return ['block-embed', groups.embedUid];
  if (groups.embedTitle !== undefined) return ['page-embed', groups.embedTitle];
  if (groups.aliasUid !== undefined) return ['alias', groups.aliasUid];
  if (groups.aliasTitle !== undefined) return ['alias', groups.aliasTitle];
  if (groups.uid !== undefined) return ['block-reference', groups.uid];
  if (groups.title !== undefined) return ['page-reference', groups.title];
  return null;
}

/**
 * Find every reference marker in text, in document order, without overlaps.
 */
export function extractRefs(text: string): BlockRef[] {
  const refs: BlockRef[] = [];
  for (const match of text.matchAll(REF_PATTERN)) {
    const classified = match.groups ? classifyMatch(match.groups) : null;
    if (!classified || match.index === undefined) continue;
    const [targetKind, targetId] = classified;
    refs.push({
      targetKind,
      targetId,
      span: { start: match.index, end: match.index + match[0].length },
      marker: match[0],
    });
  }
  return refs;
}

/**
 * Extract all block UIDs referenced in text (references and embeds).
 */
export function collectRefs(text: string): Set<string> {
  const uids = new Set<string>();
  for (const ref of extractRefs(text)) {
    if (ref.targetKind === 'block-reference' || ref.targetKind === 'block-embed') {
      uids.add(ref.targetId);
    }
  }
  return uids;
}

/**
 * Collect block UIDs referenced anywhere in the trees that the lookup cannot
 * answer, i.e. what would have to be fetched.
 */
export function collectUnresolvedRefs(
  blocks: readonly Block[],
  lookup: ReadonlyMap<string, Block>
): Set<string> {
  const unresolved = new Set<string>();
  for (const block of flattenBlocks(blocks)) {
    for (const uid of collectRefs(block.text)) {
      if (!lookup.has(uid)) {
        unresolved.add(uid);
      }
    }
  }
  return unresolved;
}

/**
 * Replace the spans of `refs` in `text` with the given replacements.
 * `refs` must be in document order and non-overlapping.
 */
export function spliceRefs(text: string, refs: readonly BlockRef[], replacements: readonly string[]): string {
  let result = '';
  let cursor = 0;
  refs.forEach((ref, idx) => {
    result += text.slice(cursor, ref.span.start) + (replacements[idx] ?? ref.marker);
    cursor = ref.span.end;
  });
  return result + text.slice(cursor);
}
