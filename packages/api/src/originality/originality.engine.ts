import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';

import {
  errorMessage,
  NoAnalyzableContentError,
  UpstreamInputError,
} from '../common/errors/originality.errors';
import { deepFreeze } from '../common/utils/deep-freeze';
import { loadOriginalityConfig, OriginalityConfig } from '../config/originality.config';
import { aggregate } from './aggregation/originality-aggregator';
import { AuthorshipClassifier, contributesSignal } from './authorship/authorship-classifier';
import {
  EMBEDDING_CLIENT,
  EmbeddingClient,
  SUBMISSION_INDEX,
  SubmissionIndex,
  TEXT_GENERATION_CLIENT,
  TextGenerationClient,
} from './collaborators';
import {
  AuthorshipVerdict,
  ContentUnit,
  OriginalityReport,
  SimilarityMatch,
  Submission,
  SubmissionInput,
  UnanalyzableUnit,
} from './originality.types';
import { RecommendationSynthesizer } from './recommendations/recommendation-synthesizer';
import { CrossSubmissionRetriever, RetrievalResult, UnitEmbedding } from './retrieval/cross-submission-retriever';
import { compareSubmissionUnits } from './similarity/internal-comparator';
import { buildContentUnit } from './text/normalizer';

export interface EngineResult {
  report: OriginalityReport;
  /** Embeddings computed during retrieval, for indexing the submission afterwards. */
  embeddings: UnitEmbedding[];
}

type Bounded<T> = { finished: true; value: T } | { finished: false };

interface AuthorshipOutcome {
  verdicts: AuthorshipVerdict[];
  timedOut: boolean;
}

@Injectable()
export class OriginalityEngine {
  private readonly logger = new Logger(OriginalityEngine.name);
  private readonly settings: OriginalityConfig;
  private readonly retriever: CrossSubmissionRetriever;
  private readonly classifier: AuthorshipClassifier;
  private readonly synthesizer: RecommendationSynthesizer;

  constructor(
    @Inject(TEXT_GENERATION_CLIENT) textGeneration: TextGenerationClient,
    @Inject(EMBEDDING_CLIENT) embeddings: EmbeddingClient,
    @Inject(SUBMISSION_INDEX) index: SubmissionIndex,
    configService: ConfigService,
  ) {
    this.settings = configService.get<OriginalityConfig>('originality') ?? loadOriginalityConfig();

    const callPolicy = {
      timeoutMs: this.settings.callTimeoutMs,
      retries: this.settings.retries,
      backoffMs: this.settings.retryBackoffMs,
    };
    this.retriever = new CrossSubmissionRetriever(embeddings, index, {
      ...callPolicy,
      k: this.settings.retrievalK,
      maxChars: this.settings.maxCompareChars,
      minBlockTokens: this.settings.minBlockTokens,
    });
    this.classifier = new AuthorshipClassifier(textGeneration, callPolicy);
    this.synthesizer = new RecommendationSynthesizer(textGeneration, callPolicy);
  }

  /**
   * Produces one frozen report for the submission. Throws
   * NoAnalyzableContentError when none of its files can be analyzed; every
   * other failure degrades the report instead.
   */
  async analyze(input: SubmissionInput): Promise<EngineResult> {
    const startedAt = Date.now();
    const deadlineAt = startedAt + this.settings.deadlineMs;
    const { units, unanalyzable } = this.buildUnits(input);
    const notes = unanalyzable.map((entry) => `${entry.fileName}: skipped (${entry.reason})`);

    if (units.length === 0) {
      throw new NoAnalyzableContentError(unanalyzable);
    }

    const submission: Submission = {
      id: input.submissionId,
      authorId: input.authorId,
      units,
      createdAt: input.createdAt ?? new Date(startedAt),
    };

    // Network-bound branches first so their requests are in flight while the
    // CPU-bound comparison runs.
    const crossBranch = this.runRetrieval(submission, deadlineAt);
    const authorshipBranch = this.runAuthorship(units, deadlineAt);
    const internalBranch = this.runInternalComparison(units, deadlineAt, notes);

    const [internal, cross, authorship] = await Promise.all([internalBranch, crossBranch, authorshipBranch]);

    let crossMatches: SimilarityMatch[] | null = null;
    let embeddings: UnitEmbedding[] = [];
    if (cross.finished) {
      notes.push(...cross.value.notes);
      embeddings = cross.value.embeddings;
      crossMatches = cross.value.checked ? cross.value.matches : null;
    } else {
      notes.push('Cross-submission search did not finish before the deadline.');
    }

    const authorshipChecked = !authorship.timedOut && authorship.verdicts.some(contributesSignal);
    if (authorship.timedOut) {
      notes.push('Authorship classification did not finish before the deadline; unfinished files were estimated heuristically.');
    }
    const estimated = authorship.verdicts.filter((verdict) => verdict.source === 'heuristic').length;
    if (estimated > 0 && !authorship.timedOut) {
      notes.push(`${estimated} authorship verdict(s) estimated heuristically.`);
    }

    const aggregation = aggregate({
      internalMatches: internal,
      crossMatches,
      verdicts: authorshipChecked ? authorship.verdicts : null,
    });

    const availability = {
      internalComparisonChecked: internal !== null,
      crossSubmissionChecked: crossMatches !== null,
      authorshipChecked,
    };

    const synthesis = await this.synthesizer.synthesize(
      {
        aggregation,
        internalMatches: internal ?? [],
        crossMatches: crossMatches ?? [],
        verdicts: authorship.verdicts,
        units,
        availability,
      },
      deadlineAt - Date.now(),
    );

    const report: OriginalityReport = {
      reportId: randomUUID(),
      submissionId: submission.id,
      authorId: submission.authorId,
      originalityScore: aggregation.originalityScore,
      riskLevel: aggregation.riskLevel,
      duplicationScore: aggregation.duplicationScore,
      authorshipScore: aggregation.authorshipScore,
      signals: aggregation.signals,
      matches: [...(internal ?? []), ...(crossMatches ?? [])],
      verdicts: authorship.verdicts,
      recommendations: synthesis.recommendations,
      availability: { ...availability, recommendationsElaborated: synthesis.elaborated },
      unanalyzableUnits: unanalyzable,
      notes,
      generatedAt: new Date(),
    };

    this.logger.log(
      `Submission ${submission.id}: score ${report.originalityScore} (${report.riskLevel}) in ${Date.now() - startedAt}ms`,
    );
    return { report: deepFreeze(report), embeddings };
  }

  private buildUnits(input: SubmissionInput): { units: ContentUnit[]; unanalyzable: UnanalyzableUnit[] } {
    const units: ContentUnit[] = [];
    const unanalyzable: UnanalyzableUnit[] = [];
    input.files.forEach((file, index) => {
      try {
        units.push(buildContentUnit(file, index, this.settings.maxCompareChars));
      } catch (err) {
        if (!(err instanceof UpstreamInputError)) throw err;
        this.logger.warn(`Skipping ${file.fileName}: ${err.reason}`);
        unanalyzable.push({ fileName: file.fileName, reason: err.reason });
      }
    });
    return { units, unanalyzable };
  }

  private async runInternalComparison(
    units: ContentUnit[],
    deadlineAt: number,
    notes: string[],
  ): Promise<SimilarityMatch[] | null> {
    try {
      const result = await compareSubmissionUnits(units, {
        maxChars: this.settings.maxCompareChars,
        minBlockTokens: this.settings.minBlockTokens,
        deadlineAt,
      });
      if (!result) {
        this.logger.warn('Internal comparison did not finish before the deadline');
        notes.push('Internal comparison did not finish before the deadline.');
        return null;
      }
      notes.push(...result.notes);
      return result.matches;
    } catch (err) {
      this.logger.error(`Internal comparison failed: ${errorMessage(err)}`);
      notes.push('Internal comparison failed.');
      return null;
    }
  }

  private async runRetrieval(submission: Submission, deadlineAt: number): Promise<Bounded<RetrievalResult>> {
    try {
      return await this.beforeDeadline(this.retriever.retrieve(submission), deadlineAt);
    } catch (err) {
      this.logger.error(`Cross-submission retrieval failed: ${errorMessage(err)}`);
      return { finished: false };
    }
  }

  private async runAuthorship(units: ContentUnit[], deadlineAt: number): Promise<AuthorshipOutcome> {
    const finished = new Map<number, AuthorshipVerdict>();
    const all = Promise.all(
      units.map(async (unit) => {
        const verdict = await this.classifier.classify(unit);
        finished.set(unit.index, verdict);
        return verdict;
      }),
    );

    let outcome: Bounded<AuthorshipVerdict[]>;
    try {
      outcome = await this.beforeDeadline(all, deadlineAt);
    } catch (err) {
      this.logger.error(`Authorship classification failed: ${errorMessage(err)}`);
      outcome = { finished: false };
    }
    if (outcome.finished) {
      return { verdicts: outcome.value, timedOut: false };
    }

    return {
      verdicts: units.map(
        (unit) => finished.get(unit.index) ?? this.classifier.heuristicVerdict(unit, 'deadline_exceeded'),
      ),
      timedOut: true,
    };
  }

  private async beforeDeadline<T>(task: Promise<T>, deadlineAt: number): Promise<Bounded<T>> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<Bounded<T>>((resolve) => {
      timer = setTimeout(() => resolve({ finished: false }), Math.max(0, deadlineAt - Date.now()));
    });
    try {
      return await Promise.race([task.then((value): Bounded<T> => ({ finished: true, value })), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
