import { MatchedSpan } from '../originality.types';
import { LexMode, Token, tokenize } from '../text/tokenizer';
import { matchingBlocks, shouldSwap, similarityRatio } from './sequence-matcher';

export type LexicalVariant = 'raw' | 'stripped';

export interface LexicalOptions {
  mode: LexMode;
  maxChars: number;
  minBlockTokens: number;
}

export interface LexicalComparison {
  ratio: number;
  /** Matched blocks of at least `minBlockTokens` tokens. */
  spans: MatchedSpan[];
  /** The single longest matched block, regardless of its length. */
  longestSpan: MatchedSpan | null;
  truncated: boolean;
}

export interface LexicalPairComparison {
  raw: LexicalComparison;
  stripped: LexicalComparison;
}

function capText(text: string, maxChars: number): { text: string; truncated: boolean } {
  return text.length > maxChars ? { text: text.slice(0, maxChars), truncated: true } : { text, truncated: false };
}

/**
 * The stripped variant drops comments for code and punctuation for prose, so
 * text that differs only in those still aligns.
 */
function keptWhenStripped(mode: LexMode): (token: Token) => boolean {
  return (token) => (mode === 'prose' ? token.type !== 'symbol' : token.type !== 'comment');
}

export function lexicalTokens(text: string, mode: LexMode, variant: LexicalVariant): Token[] {
  const { tokens } = tokenize(text, mode);
  return variant === 'raw' ? tokens : tokens.filter(keptWhenStripped(mode));
}

export function compareTokens(
  tokensA: Token[],
  tokensB: Token[],
  minBlockTokens: number,
): Omit<LexicalComparison, 'truncated'> {
  const keysA = tokensA.map((token) => token.text.toLowerCase());
  const keysB = tokensB.map((token) => token.text.toLowerCase());
  const swap = shouldSwap(keysA, keysB);
  const [first, second] = swap ? [tokensB, tokensA] : [tokensA, tokensB];
  const blocks = swap ? matchingBlocks(keysB, keysA) : matchingBlocks(keysA, keysB);

  const toSpan = (a: number, b: number, size: number): MatchedSpan => {
    const left = { start: first[a].start, end: first[a + size - 1].end };
    const right = { start: second[b].start, end: second[b + size - 1].end };
    return swap ? { source: right, target: left } : { source: left, target: right };
  };

  let longestSpan: MatchedSpan | null = null;
  let longestSize = 0;
  const spans: MatchedSpan[] = [];
  for (const block of blocks) {
    const span = toSpan(block.a, block.b, block.size);
    if (block.size > longestSize) {
      longestSize = block.size;
      longestSpan = span;
    }
    if (block.size >= minBlockTokens) spans.push(span);
  }

  return {
    ratio: similarityRatio(blocks, keysA.length, keysB.length),
    spans,
    longestSpan,
  };
}

export function compareTexts(
  a: string,
  b: string,
  options: LexicalOptions,
  variant: LexicalVariant = 'raw',
): LexicalComparison {
  const left = capText(a, options.maxChars);
  const right = capText(b, options.maxChars);
  const result = compareTokens(
    lexicalTokens(left.text, options.mode, variant),
    lexicalTokens(right.text, options.mode, variant),
    options.minBlockTokens,
  );
  return { ...result, truncated: left.truncated || right.truncated };
}

/** Raw and stripped comparisons of the same pair, sharing one tokenization per side. */
export function comparePair(a: string, b: string, options: LexicalOptions): LexicalPairComparison {
  const left = capText(a, options.maxChars);
  const right = capText(b, options.maxChars);
  const truncated = left.truncated || right.truncated;

  const tokensA = tokenize(left.text, options.mode).tokens;
  const tokensB = tokenize(right.text, options.mode).tokens;
  const keep = keptWhenStripped(options.mode);

  return {
    raw: { ...compareTokens(tokensA, tokensB, options.minBlockTokens), truncated },
    stripped: {
      ...compareTokens(tokensA.filter(keep), tokensB.filter(keep), options.minBlockTokens),
      truncated,
    },
  };
}
