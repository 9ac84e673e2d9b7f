import { ContentUnit, MatchedSpan, SimilarityMatch } from '../originality.types';
import { LexMode, lexModeFor } from '../text/tokenizer';
import { comparePair, LexicalComparison } from './lexical-matcher';
import { compareSkeletons, fingerprint, Skeleton } from './structural-fingerprinter';

export const INTERNAL_FLAG_THRESHOLD = 0.7;
export const INTERNAL_RETAIN_THRESHOLD = 0.4;

const LEXICAL_WEIGHT = 0.3;
const STRIPPED_WEIGHT = 0.4;
const STRUCTURAL_WEIGHT = 0.3;

export interface InternalComparisonOptions {
  maxChars: number;
  minBlockTokens: number;
  /** Epoch millis after which the comparison gives up. */
  deadlineAt?: number;
}

export interface PairScore {
  weight: number;
  lexical: number;
  stripped: number;
  structural: number | null;
  kind: 'lexical' | 'structural';
  spans: MatchedSpan[];
}

export interface InternalComparisonResult {
  matches: SimilarityMatch[];
  pairsCompared: number;
  notes: string[];
}

function pairMode(a: ContentUnit, b: ContentUnit): LexMode {
  if (a.kind !== 'code' || b.kind !== 'code') return 'prose';
  const modeA = lexModeFor(a.language);
  const modeB = lexModeFor(b.language);
  if (modeA === modeB) return modeA;
  // Mixed families: pick one that does not depend on argument order.
  if (modeA === 'prose') return modeB;
  if (modeB === 'prose') return modeA;
  return 'c_family';
}

function capped(unit: ContentUnit, maxChars: number): string {
  return unit.normalizedText.slice(0, maxChars);
}

function dominantLexical(raw: LexicalComparison, stripped: LexicalComparison): LexicalComparison {
  return stripped.ratio >= raw.ratio ? stripped : raw;
}

function lexicalSpans(
  comparison: LexicalComparison,
  a: ContentUnit,
  b: ContentUnit,
  maxChars: number,
): MatchedSpan[] {
  if (comparison.spans.length > 0) return comparison.spans;
  if (comparison.longestSpan) return [comparison.longestSpan];
  return [
    {
      source: { start: 0, end: Math.min(a.normalizedText.length, maxChars) },
      target: { start: 0, end: Math.min(b.normalizedText.length, maxChars) },
    },
  ];
}

/**
 * Scores one pair of units. Skeletons are passed in so each unit is
 * fingerprinted once per submission.
 */
export function scorePair(
  a: ContentUnit,
  b: ContentUnit,
  skeletonA: Skeleton | null,
  skeletonB: Skeleton | null,
  options: InternalComparisonOptions,
): PairScore {
  const lexical = comparePair(capped(a, options.maxChars), capped(b, options.maxChars), {
    mode: pairMode(a, b),
    maxChars: options.maxChars,
    minBlockTokens: options.minBlockTokens,
  });

  const structure =
    skeletonA && skeletonB ? compareSkeletons(skeletonA, skeletonB, options.minBlockTokens) : null;
  const structural = structure && !structure.parseFailed ? structure.similarity : null;

  const weight =
    structural === null
      ? (LEXICAL_WEIGHT * lexical.raw.ratio + STRIPPED_WEIGHT * lexical.stripped.ratio) /
        (LEXICAL_WEIGHT + STRIPPED_WEIGHT)
      : LEXICAL_WEIGHT * lexical.raw.ratio +
        STRIPPED_WEIGHT * lexical.stripped.ratio +
        STRUCTURAL_WEIGHT * structural;

  const structuralDominates =
    structural !== null && structural > lexical.raw.ratio && structural > lexical.stripped.ratio;

  const spans =
    structuralDominates && structure && structure.spans.length > 0
      ? structure.spans
      : lexicalSpans(dominantLexical(lexical.raw, lexical.stripped), a, b, options.maxChars);

  return {
    weight: Math.min(1, Math.max(0, weight)),
    lexical: lexical.raw.ratio,
    stripped: lexical.stripped.ratio,
    structural,
    kind: structuralDominates ? 'structural' : 'lexical',
    spans,
  };
}

export function compareMatches(x: SimilarityMatch, y: SimilarityMatch): number {
  const targetIndex = (match: SimilarityMatch): number =>
    match.target.type === 'sibling' ? match.target.unitIndex : Number.MAX_SAFE_INTEGER;
  return (
    y.score - x.score ||
    x.source.unitIndex - y.source.unitIndex ||
    targetIndex(x) - targetIndex(y)
  );
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Compares every pair of units in a submission and keeps the pairs whose
 * weight reaches the retain threshold, strongest first. Yields between
 * units and pairs; resolves to null once `deadlineAt` has passed.
 */
export async function compareSubmissionUnits(
  units: ContentUnit[],
  options: InternalComparisonOptions,
): Promise<InternalComparisonResult | null> {
  const { deadlineAt } = options;
  const expired = (): boolean => deadlineAt !== undefined && Date.now() >= deadlineAt;

  const notes: string[] = [];
  const skeletons: Array<Skeleton | null> = [];
  for (const unit of units) {
    if (expired()) return null;
    if (unit.kind !== 'code') {
      skeletons.push(null);
      continue;
    }
    const skeleton = fingerprint(capped(unit, options.maxChars), unit.language);
    if (skeleton.parseFailed) {
      notes.push(`${unit.fileName}: structure not compared (${skeleton.failureReason ?? 'parse failed'})`);
    }
    skeletons.push(skeleton);
    await yieldToEventLoop();
  }

  for (const unit of units) {
    if (unit.truncated) {
      notes.push(`${unit.fileName}: only the first ${options.maxChars} characters were compared`);
    }
  }

  const matches: SimilarityMatch[] = [];
  let pairsCompared = 0;

  for (let i = 0; i < units.length; i += 1) {
    for (let j = i + 1; j < units.length; j += 1) {
      if (expired()) return null;
      const a = units[i];
      const b = units[j];
      const pair = scorePair(a, b, skeletons[i], skeletons[j], options);
      pairsCompared += 1;
      await yieldToEventLoop();
      if (pair.weight < INTERNAL_RETAIN_THRESHOLD) continue;

      matches.push({
        source: { unitIndex: a.index, fileName: a.fileName },
        target: { type: 'sibling', unitIndex: b.index, fileName: b.fileName },
        score: pair.weight,
        kind: pair.kind,
        flagged: pair.weight >= INTERNAL_FLAG_THRESHOLD,
        spans: pair.spans,
        components: { lexical: pair.lexical, stripped: pair.stripped, structural: pair.structural },
      });
    }
  }

  if (expired()) return null;
  matches.sort(compareMatches);
  return { matches, pairsCompared, notes };
}
