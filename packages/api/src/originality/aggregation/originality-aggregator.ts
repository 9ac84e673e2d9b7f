import { contributesSignal } from '../authorship/authorship-classifier';
import {
  AggregationSignals,
  AuthorshipVerdict,
  RiskLevel,
  SimilarityMatch,
} from '../originality.types';

export interface AggregationInput {
  internalMatches: SimilarityMatch[] | null;
  crossMatches: SimilarityMatch[] | null;
  verdicts: AuthorshipVerdict[] | null;
}

export interface Aggregation {
  signals: AggregationSignals;
  originalityScore: number;
  riskLevel: RiskLevel;
  duplicationScore: number;
  authorshipScore: number | null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function riskLevelFor(score: number): RiskLevel {
  if (score >= 85) return 'low';
  if (score >= 70) return 'medium';
  if (score >= 50) return 'high';
  return 'critical';
}

function strongest(matches: SimilarityMatch[]): number {
  return matches.reduce((best, match) => Math.max(best, clamp(match.score, 0, 1)), 0);
}

/**
 * Signals for the three branches. A null input means the branch did not
 * complete; its signal is then null and excluded from the combination.
 */
export function collectSignals(input: AggregationInput): AggregationSignals {
  let authorship: number | null = null;
  if (input.verdicts) {
    const contributing = input.verdicts.filter(contributesSignal);
    if (contributing.length > 0) {
      authorship = contributing.reduce((best, verdict) => Math.max(best, clamp(verdict.confidence, 0, 100)), 0) / 100;
    }
  }

  return {
    internalDuplication: input.internalMatches ? strongest(input.internalMatches) : null,
    crossSubmission: input.crossMatches ? strongest(input.crossMatches) : null,
    authorship,
  };
}

/** Noisy-OR: each available signal independently removes part of the remaining credit. */
export function combinePenalty(signals: AggregationSignals): number {
  const available = [signals.internalDuplication, signals.crossSubmission, signals.authorship].filter(
    (signal): signal is number => signal !== null,
  );
  const retained = available.reduce((product, signal) => product * (1 - clamp(signal, 0, 1)), 1);
  return 1 - retained;
}

export function aggregate(input: AggregationInput): Aggregation {
  const signals = collectSignals(input);
  const originalityScore = round2(clamp(100 * (1 - combinePenalty(signals)), 0, 100));
  const duplication = 1 - (1 - (signals.internalDuplication ?? 0)) * (1 - (signals.crossSubmission ?? 0));

  return {
    signals,
    originalityScore,
    riskLevel: riskLevelFor(originalityScore),
    duplicationScore: round2(clamp(100 * duplication, 0, 100)),
    authorshipScore: signals.authorship === null ? null : round2(100 * signals.authorship),
  };
}
