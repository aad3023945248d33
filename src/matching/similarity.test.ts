import { describe, it, expect } from 'vitest';
import { levenshtein, normalizeTitle, titleSimilarity } from './similarity';

describe('normalizeTitle', () => {
  it('lower-cases, strips punctuation and collapses whitespace', () => {
    expect(normalizeTitle('  Vintage  LAMP - Brass, (1970s)! ')).toBe('vintage lamp brass 1970s');
  });
});

describe('levenshtein', () => {
  it('counts edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });
});

describe('titleSimilarity', () => {
  it('ignores case and punctuation', () => {
    expect(titleSimilarity('Blue Vase!', 'blue   vase')).toBe(1);
  });

  it('scores two substitutions in ten characters as 0.8', () => {
    expect(titleSimilarity('abcdefghij', 'abcdefghXY')).toBe(0.8);
  });

  it('scores empty titles as no match', () => {
    expect(titleSimilarity('', 'anything')).toBe(0);
    expect(titleSimilarity('!!!', '???')).toBe(0);
  });
});
