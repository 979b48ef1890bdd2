import { describe, it, expect } from 'vitest';
import {
  normalizeText,
  normalizeForMatching,
  taskStatus,
  attributesEqual,
  diceCoefficient,
  scoreBlocks,
  isPlaceholder,
} from './matcher.js';
import type { Block, BlockAttributes } from './types.js';

function block(text: string, attributes: BlockAttributes = {}): Block {
  return { text, attributes, children: [] };
}

describe('normalizeText', () => {
  it('trims whitespace', () => {
    expect(normalizeText('  hello  ')).toBe('hello');
    expect(normalizeText('\thello\n')).toBe('hello');
  });

  it('preserves internal whitespace', () => {
    expect(normalizeText('hello   world')).toBe('hello   world');
  });
});

describe('normalizeForMatching', () => {
  it('removes numbered list prefixes', () => {
    expect(normalizeForMatching('1. First item')).toBe('first item');
    expect(normalizeForMatching('10. Tenth item')).toBe('tenth item');
  });

  it('strips cosmetic markup', () => {
    expect(normalizeForMatching('**Bold** and __italic__ ^^mark^^ ~~gone~~ `code`')).toBe(
      'bold and italic mark gone code'
    );
  });

  it('strips a leading task marker', () => {
    expect(normalizeForMatching('{{[[TODO]]}} Buy milk')).toBe('buy milk');
    expect(normalizeForMatching('{{DONE}} Buy milk')).toBe('buy milk');
  });

  it('collapses whitespace and lower-cases', () => {
    expect(normalizeForMatching('  Hello \n  World ')).toBe('hello world');
  });

  it('keeps bullet-like text', () => {
    expect(normalizeForMatching('- Bullet point')).toBe('- bullet point');
  });
});

describe('taskStatus', () => {
  it('reads the marker value', () => {
    expect(taskStatus('{{[[TODO]]}} Ship it')).toBe('TODO');
    expect(taskStatus('{{[[DONE]]}} Ship it')).toBe('DONE');
    expect(taskStatus('Ship it')).toBeUndefined();
  });
});

describe('attributesEqual', () => {
  it('compares keys and values', () => {
    expect(attributesEqual({ heading: 1 }, { heading: 1 })).toBe(true);
    expect(attributesEqual({ heading: 1 }, { heading: 2 })).toBe(false);
    expect(attributesEqual({ heading: 1 }, {})).toBe(false);
    expect(attributesEqual({}, {})).toBe(true);
  });
});

describe('diceCoefficient', () => {
  it('is 1 for identical strings', () => {
    expect(diceCoefficient('abc', 'abc')).toBe(1);
  });

  it('counts shared bigrams', () => {
    // ni ig gh ht / na ac ch ht -> one shared of eight
    expect(diceCoefficient('night', 'nacht')).toBe(0.25);
  });

  it('is 0 when a string has no bigrams', () => {
    expect(diceCoefficient('a', 'b')).toBe(0);
  });
});

describe('scoreBlocks', () => {
  it('scores identical blocks as 1', () => {
    expect(scoreBlocks(block('Hello world'), block('Hello world'))).toBe(1);
  });

  it('ignores cosmetic differences', () => {
    expect(scoreBlocks(block('1. **Hello** world'), block('hello   world'))).toBe(1);
  });

  it('ignores identifiers and children', () => {
    const a: Block = { identifier: 'uid000001', text: 'Same', attributes: {}, children: [block('x')] };
    const b: Block = { text: 'Same', attributes: {}, children: [] };
    expect(scoreBlocks(a, b)).toBe(1);
  });

  it('withholds the attribute bonus when attributes differ', () => {
    expect(scoreBlocks(block('Title', { heading: 1 }), block('Title', { heading: 2 }))).toBeCloseTo(0.85);
  });

  it('treats task status as an attribute', () => {
    expect(scoreBlocks(block('{{[[TODO]]}} Ship it'), block('{{[[DONE]]}} Ship it'))).toBeCloseTo(0.85);
  });

  it('weights partial text similarity', () => {
    expect(scoreBlocks(block('night'), block('nacht'))).toBeCloseTo(0.85 * 0.25 + 0.15);
  });

  it('scores empty blocks by attributes only', () => {
    expect(scoreBlocks(block(''), block('  '))).toBe(1);
    expect(scoreBlocks(block('', { heading: 1 }), block(''))).toBe(0);
    expect(scoreBlocks(block(''), block('text'))).toBe(0);
  });

  it('is symmetric for these inputs', () => {
    const a = block('Meeting notes for Monday');
    const b = block('Meeting notes for Tuesday');
    expect(scoreBlocks(a, b)).toBe(scoreBlocks(b, a));
  });
});

describe('isPlaceholder', () => {
  it('detects blocks with nothing to compare', () => {
    expect(isPlaceholder(block('   '))).toBe(true);
    expect(isPlaceholder(block('**'))).toBe(true);
    expect(isPlaceholder(block('x'))).toBe(false);
  });
});
