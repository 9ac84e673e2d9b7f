import { Logger } from '@nestjs/common';

import {
  errorMessage,
  InvalidTransitionError,
  MalformedResponseError,
} from '../../common/errors/originality.errors';
import { withRetry } from '../../common/resilience/with-retry';
import { TextGenerationClient } from '../collaborators';
import {
  AuthorshipCategory,
  AuthorshipVerdict,
  ClassifierStage,
  ContentUnit,
  FallbackReason,
  RationaleEntry,
} from '../originality.types';
import {
  buildDeepAnalysisPrompt,
  buildTriagePrompt,
  DEEP_ANALYSIS_SYSTEM,
  TRIAGE_SYSTEM,
} from './authorship.prompts';
import { heuristicEstimate } from './heuristics';
import { DeepAnalysis, DeepDimension, parseDeepAnalysis, parseTriage, TriageVerdict } from './verdict-parser';

export const DEEP_WEIGHTS: Record<DeepDimension, number> = {
  documentation_style: 0.25,
  structure_formatting: 0.2,
  naming: 0.2,
  error_handling: 0.15,
  complexity_approach: 0.1,
  personal_style: 0.1,
};

const DIMENSION_ORDER: readonly DeepDimension[] = [
  'documentation_style',
  'structure_formatting',
  'naming',
  'error_handling',
  'complexity_approach',
  'personal_style',
];

const TRANSITIONS: Record<ClassifierStage, readonly ClassifierStage[]> = {
  PENDING: ['TRIAGED', 'DONE'],
  TRIAGED: ['DONE', 'DEEP_ANALYZED'],
  DONE: [],
  DEEP_ANALYZED: [],
};

export interface ClassifierOptions {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export function categoryFor(confidence: number): AuthorshipCategory {
  if (confidence >= 70) return 'ai_generated';
  if (confidence >= 50) return 'heavily_assisted';
  if (confidence >= 30) return 'lightly_assisted';
  return 'human_written';
}

/**
 * Heuristic verdicts produced because the classifier could not be reached (or
 * ran out of time) are shown in the report but do not feed the score.
 */
export function contributesSignal(verdict: AuthorshipVerdict): boolean {
  return verdict.fallbackReason !== 'unavailable' && verdict.fallbackReason !== 'deadline_exceeded';
}

/** Per-unit classification state. Only the transitions in TRANSITIONS are allowed. */
export class ClassificationRun {
  private current: ClassifierStage = 'PENDING';

  get stage(): ClassifierStage {
    return this.current;
  }

  transition(next: ClassifierStage): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InvalidTransitionError(this.current, next);
    }
    this.current = next;
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class AuthorshipClassifier {
  private readonly logger = new Logger(AuthorshipClassifier.name);

  constructor(
    private readonly client: TextGenerationClient,
    private readonly options: ClassifierOptions,
  ) {}

  async classify(unit: ContentUnit): Promise<AuthorshipVerdict> {
    const run = new ClassificationRun();

    let triage: TriageVerdict;
    try {
      triage = parseTriage(await this.complete(buildTriagePrompt(unit), TRIAGE_SYSTEM, 200));
    } catch (err) {
      return this.fallback(unit, run, err);
    }
    run.transition('TRIAGED');

    if (triage.kind === 'obviously_ai') {
      run.transition('DONE');
      const confidence = Math.max(triage.score ?? 85, 70);
      return this.triageVerdict(unit, confidence, 'triage judged the content obviously machine-generated');
    }
    if (triage.kind === 'obviously_human') {
      run.transition('DONE');
      const confidence = Math.min(triage.score ?? 15, 29);
      return this.triageVerdict(unit, confidence, 'triage judged the content obviously human-written');
    }
    if (triage.kind === 'unknown') {
      this.logger.warn(`Unrecognised triage verdict "${triage.raw}" for ${unit.fileName}; running deep analysis`);
    }

    let analysis: DeepAnalysis;
    try {
      analysis = parseDeepAnalysis(
        await this.complete(buildDeepAnalysisPrompt(unit), DEEP_ANALYSIS_SYSTEM, 900),
      );
    } catch (err) {
      return this.fallback(unit, run, err);
    }
    run.transition('DEEP_ANALYZED');
    return this.deepVerdict(unit, analysis);
  }

  classifyAll(units: ContentUnit[]): Promise<AuthorshipVerdict[]> {
    return Promise.all(units.map((unit) => this.classify(unit)));
  }

  heuristicVerdict(unit: ContentUnit, reason: FallbackReason): AuthorshipVerdict {
    const estimate = heuristicEstimate(unit);
    return {
      unit: { unitIndex: unit.index, fileName: unit.fileName },
      confidence: estimate.confidence,
      category: categoryFor(estimate.confidence),
      rationale: estimate.rationale,
      stage: 'DONE',
      source: 'heuristic',
      degradedConfidence: true,
      fallbackReason: reason,
    };
  }

  private async complete(prompt: string, system: string, maxTokens: number): Promise<string> {
    return withRetry(
      () => this.client.complete(prompt, { system, maxTokens, temperature: 0.1, json: true }),
      {
        subsystem: 'authorship classifier',
        timeoutMs: this.options.timeoutMs,
        retries: this.options.retries,
        backoffMs: this.options.backoffMs,
        onRetry: (attempt, err) =>
          this.logger.warn(`Authorship classifier attempt ${attempt} failed, retrying: ${errorMessage(err)}`),
      },
    );
  }

  private fallback(unit: ContentUnit, run: ClassificationRun, err: unknown): AuthorshipVerdict {
    run.transition('DONE');
    const reason: FallbackReason = err instanceof MalformedResponseError ? 'malformed_response' : 'unavailable';
    this.logger.warn(`Heuristic authorship verdict for ${unit.fileName} (${reason}): ${errorMessage(err)}`);
    return this.heuristicVerdict(unit, reason);
  }

  private triageVerdict(unit: ContentUnit, confidence: number, evidence: string): AuthorshipVerdict {
    return {
      unit: { unitIndex: unit.index, fileName: unit.fileName },
      confidence,
      category: categoryFor(confidence),
      rationale: [{ dimension: 'triage', dimensionScore: confidence, evidence }],
      stage: 'DONE',
      source: 'triage',
      degradedConfidence: false,
      fallbackReason: null,
    };
  }

  private deepVerdict(unit: ContentUnit, analysis: DeepAnalysis): AuthorshipVerdict {
    let estimate: number | null = null;
    let degraded = false;
    let confidence = 0;
    const rationale: RationaleEntry[] = [];

    for (const dimension of DIMENSION_ORDER) {
      const weight = DEEP_WEIGHTS[dimension];
      const scored = analysis[dimension];
      if (scored) {
        confidence += weight * scored.score;
        rationale.push({ dimension, dimensionScore: scored.score, evidence: scored.evidence });
        continue;
      }
      estimate ??= heuristicEstimate(unit).confidence;
      degraded = true;
      confidence += weight * estimate;
      rationale.push({ dimension, dimensionScore: estimate, evidence: 'not returned; estimated from surface statistics' });
    }

    const rounded = round2(Math.min(100, Math.max(0, confidence)));
    return {
      unit: { unitIndex: unit.index, fileName: unit.fileName },
      confidence: rounded,
      category: categoryFor(rounded),
      rationale,
      stage: 'DEEP_ANALYZED',
      source: 'deep_analysis',
      degradedConfidence: degraded,
      fallbackReason: null,
    };
  }
}
