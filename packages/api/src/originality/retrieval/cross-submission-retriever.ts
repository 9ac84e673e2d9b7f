import { Logger } from '@nestjs/common';

import { errorMessage } from '../../common/errors/originality.errors';
import { RetryPolicy, withRetry } from '../../common/resilience/with-retry';
import { EmbeddingClient, SearchHit, SubmissionIndex } from '../collaborators';
import { ContentUnit, MatchedSpan, SimilarityMatch, Submission } from '../originality.types';
import { compareTexts } from '../similarity/lexical-matcher';
import { lexModeFor } from '../text/tokenizer';

export const CROSS_FLAG_THRESHOLD = 0.7;
export const CROSS_RETAIN_THRESHOLD = 0.4;

/** Embedding models take a bounded input; the head of the unit stands in for it. */
const EMBED_MAX_CHARS = 8_000;

export interface RetrievalOptions {
  k: number;
  maxChars: number;
  minBlockTokens: number;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export interface UnitEmbedding {
  unit: ContentUnit;
  embedding: number[];
}

export interface RetrievalResult {
  matches: SimilarityMatch[];
  /** At least one unit was searched against a non-empty index. */
  checked: boolean;
  embeddings: UnitEmbedding[];
  notes: string[];
}

interface UnitOutcome {
  matches: SimilarityMatch[];
  checked: boolean;
  embedding: number[] | null;
  note: string | null;
}

export class CrossSubmissionRetriever {
  private readonly logger = new Logger(CrossSubmissionRetriever.name);

  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly index: SubmissionIndex,
    private readonly options: RetrievalOptions,
  ) {}

  async retrieve(submission: Submission): Promise<RetrievalResult> {
    const outcomes = await Promise.all(
      submission.units.map((unit) => this.retrieveUnit(submission, unit)),
    );

    const matches = outcomes
      .flatMap((outcome) => outcome.matches)
      .sort(
        (x, y) =>
          y.score - x.score ||
          x.source.unitIndex - y.source.unitIndex ||
          externalId(x).localeCompare(externalId(y)),
      );

    const embeddings: UnitEmbedding[] = [];
    outcomes.forEach((outcome, i) => {
      if (outcome.embedding) embeddings.push({ unit: submission.units[i], embedding: outcome.embedding });
    });

    return {
      matches,
      checked: outcomes.some((outcome) => outcome.checked),
      embeddings,
      notes: outcomes.flatMap((outcome) => (outcome.note ? [outcome.note] : [])),
    };
  }

  private policy(subsystem: string): RetryPolicy {
    return {
      subsystem,
      timeoutMs: this.options.timeoutMs,
      retries: this.options.retries,
      backoffMs: this.options.backoffMs,
      onRetry: (attempt, err) =>
        this.logger.warn(`${subsystem} attempt ${attempt} failed, retrying: ${errorMessage(err)}`),
    };
  }

  private async retrieveUnit(submission: Submission, unit: ContentUnit): Promise<UnitOutcome> {
    let embedding: number[];
    try {
      embedding = await withRetry(
        () => this.embeddings.embed(unit.normalizedText.slice(0, EMBED_MAX_CHARS)),
        this.policy('embedding'),
      );
    } catch (err) {
      this.logger.warn(`Embedding failed for ${unit.fileName}: ${errorMessage(err)}`);
      return { matches: [], checked: false, embedding: null, note: `${unit.fileName}: embedding unavailable` };
    }

    try {
      const result = await withRetry(
        () =>
          this.index.search(embedding, this.options.k, {
            contentKind: unit.kind,
            excludeAuthorId: submission.authorId,
            excludeSubmissionId: submission.id,
          }),
        this.policy('submission index'),
      );

      if (result.searched === 0) {
        return { matches: [], checked: false, embedding, note: `${unit.fileName}: no prior submissions to compare against` };
      }

      const matches = result.hits
        .filter((hit) => clamp01(hit.similarity) >= CROSS_RETAIN_THRESHOLD)
        .map((hit) => this.toMatch(unit, hit));
      return { matches, checked: true, embedding, note: null };
    } catch (err) {
      this.logger.warn(`Submission index search failed for ${unit.fileName}: ${errorMessage(err)}`);
      return { matches: [], checked: false, embedding, note: `${unit.fileName}: submission index unavailable` };
    }
  }

  private toMatch(unit: ContentUnit, hit: SearchHit): SimilarityMatch {
    const score = clamp01(hit.similarity);
    return {
      source: { unitIndex: unit.index, fileName: unit.fileName },
      target: { type: 'external', submissionId: hit.submissionId, authorId: hit.authorId, excerpt: hit.excerpt },
      score,
      kind: 'semantic',
      flagged: score >= CROSS_FLAG_THRESHOLD,
      spans: this.locateSpans(unit, hit.excerpt),
    };
  }

  private locateSpans(unit: ContentUnit, excerpt: string): MatchedSpan[] {
    const alignment = compareTexts(unit.normalizedText, excerpt, {
      mode: unit.kind === 'code' ? lexModeFor(unit.language) : 'prose',
      maxChars: this.options.maxChars,
      minBlockTokens: this.options.minBlockTokens,
    });
    if (alignment.spans.length > 0) return alignment.spans;
    if (alignment.longestSpan) return [alignment.longestSpan];
    return [
      {
        source: { start: 0, end: Math.min(unit.normalizedText.length, this.options.maxChars) },
        target: { start: 0, end: excerpt.length },
      },
    ];
  }
}

function externalId(match: SimilarityMatch): string {
  return match.target.type === 'external' ? match.target.submissionId : '';
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
