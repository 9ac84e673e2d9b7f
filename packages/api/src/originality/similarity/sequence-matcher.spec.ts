import { compareTexts } from './lexical-matcher';
import { matchingBlocks, similarityRatio } from './sequence-matcher';

const WORDS = ['the', 'and', 'of', 'to', 'in', 'is', 'that', 'it', 'was', 'for'];

function commonProse(seed: number, length: number): string {
  let state = seed;
  const words: string[] = [];
  let size = 0;
  while (size < length) {
    state = (state * 16_807) % 2_147_483_647;
    const word = WORDS[state % WORDS.length];
    words.push(word);
    size += word.length + 1;
  }
  return words.join(' ');
}

describe('matchingBlocks', () => {
  it('should return the longest runs in order', () => {
    const blocks = matchingBlocks(['a', 'b', 'c', 'x', 'd', 'e'], ['a', 'b', 'c', 'y', 'd', 'e']);

    expect(blocks).toEqual([
      { a: 0, b: 0, size: 3 },
      { a: 4, b: 4, size: 2 },
    ]);
    expect(similarityRatio(blocks, 6, 6)).toBeCloseTo(10 / 12, 10);
  });

  it('should match identical sequences as one block', () => {
    const items = Array.from({ length: 300 }, () => 'same');

    expect(matchingBlocks(items, [...items])).toEqual([{ a: 0, b: 0, size: 300 }]);
  });

  it('should extend matches over frequent elements in long sequences', () => {
    const b = Array.from({ length: 200 }, (_, i) => (i % 2 === 0 ? `w${i / 2}` : 'the'));
    const a = [...b];
    a[100] = 'zz';

    const blocks = matchingBlocks(a, b);

    expect(blocks).toEqual([
      { a: 0, b: 0, size: 100 },
      { a: 101, b: 101, size: 99 },
    ]);
    expect(similarityRatio(blocks, 200, 200)).toBeCloseTo(0.995, 10);
  });

  it('should align two maximum-size texts of common words quickly', () => {
    const a = commonProse(1, 49_000);
    const b = commonProse(2, 49_000);

    const startedAt = Date.now();
    const result = compareTexts(a, b, { mode: 'prose', maxChars: 50_000, minBlockTokens: 3 });

    expect(Date.now() - startedAt).toBeLessThan(5_000);
    expect(result.ratio).toBeGreaterThanOrEqual(0);
    expect(result.ratio).toBeLessThanOrEqual(1);
    expect(result.truncated).toBe(false);
  }, 30_000);
});
