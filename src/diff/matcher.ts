/**
 * Block Matcher
 *
 * Scores how likely two blocks are the same logical note after an edit:
 * 1. Normalize text (cosmetic markup, list prefixes, task markers, whitespace)
 * 2. Compare normalized text with a character-bigram Dice coefficient
 * 3. Add a bonus when attributes (and task status) are equal
 */

import type { Block, AttributeValue } from './types.js';

export const TEXT_WEIGHT = 0.85;
export const ATTRIBUTE_WEIGHT = 0.15;

// Both {{TODO}} and {{[[TODO]]}} spellings
const TASK_MARKER_PATTERN = /^\{\{(?:\[\[)?(TODO|DONE)(?:\]\])?\}\}\s*/;
const COSMETIC_MARKUP_PATTERN = /\*\*|__|\^\^|~~|`/g;

/**
 * Normalize text for exact matching.
 * Trims whitespace only.
 */
export function normalizeText(text: string): string {
  return text.trim();
}

/**
 * Normalize text for fuzzy matching.
 * Removes list prefixes (1. , 2. , etc.), a leading task marker and cosmetic
 * markup, collapses whitespace and lower-cases.
 */
export function normalizeForMatching(text: string): string {
  return text
    .trim()
    .replace(/^\d+\.\s+/, '')
    .replace(TASK_MARKER_PATTERN, '')
    .replace(COSMETIC_MARKUP_PATTERN, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/**
 * Task status carried by a leading {{[[TODO]]}} / {{[[DONE]]}} marker.
 */
export function taskStatus(text: string): 'TODO' | 'DONE' | undefined {
  const match = text.trim().match(TASK_MARKER_PATTERN);
  if (!match) return undefined;
  return match[1] === 'DONE' ? 'DONE' : 'TODO';
}

function matchingAttributes(block: Block): Record<string, AttributeValue> {
  const status = taskStatus(block.text);
  return status ? { ...block.attributes, status } : { ...block.attributes };
}

/**
 * Check two attribute maps for exact equality.
 */
export function attributesEqual(
  a: Readonly<Record<string, AttributeValue>>,
  b: Readonly<Record<string, AttributeValue>>
): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

function bigrams(text: string): string[] {
  const result: string[] = [];
  for (let i = 0; i < text.length - 1; i++) {
    result.push(text.slice(i, i + 2));
  }
  return result;
}

/**
 * Sørensen–Dice coefficient over character bigrams (multiset).
 */
export function diceCoefficient(a: string, b: string): number {
  if (a === b) return 1;
  const aGrams = bigrams(a);
  const bGrams = bigrams(b);
  if (aGrams.length === 0 || bGrams.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const gram of aGrams) {
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }

  let shared = 0;
  for (const gram of bGrams) {
    const count = counts.get(gram) ?? 0;
    if (count > 0) {
      shared++;
      counts.set(gram, count - 1);
    }
  }

  return (2 * shared) / (aGrams.length + bGrams.length);
}

/**
 * Score how well `desired` corresponds to `existing`, in [0, 1].
 * Pure function of text and attributes; identifiers and children are ignored.
 *
 * Blocks whose normalized text is empty only score 1 when their attributes
 * match exactly; otherwise they score 0 and are left to positional pairing.
 */
export function scoreBlocks(existing: Block, desired: Block): number {
  const a = normalizeForMatching(existing.text);
  const b = normalizeForMatching(desired.text);
  const sameAttributes = attributesEqual(matchingAttributes(existing), matchingAttributes(desired));

  if (a === '' || b === '') {
    return a === b && sameAttributes ? 1 : 0;
  }
  if (a === b && sameAttributes) {
    return 1;
  }

  return TEXT_WEIGHT * diceCoefficient(a, b) + (sameAttributes ? ATTRIBUTE_WEIGHT : 0);
}

/**
 * True when a block has no content to match on.
 */
export function isPlaceholder(block: Block): boolean {
  return normalizeForMatching(block.text) === '';
}
