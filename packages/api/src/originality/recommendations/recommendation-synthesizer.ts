import { Logger } from '@nestjs/common';

import { errorMessage, MalformedResponseError } from '../../common/errors/originality.errors';
import { withRetry, withTimeout } from '../../common/resilience/with-retry';
import { Aggregation } from '../aggregation/originality-aggregator';
import { extractJson } from '../authorship/verdict-parser';
import { TextGenerationClient } from '../collaborators';
import {
  AuthorshipVerdict,
  AvailabilityFlags,
  ContentUnit,
  SimilarityMatch,
} from '../originality.types';

export interface SynthesisInput {
  aggregation: Aggregation;
  internalMatches: SimilarityMatch[];
  crossMatches: SimilarityMatch[];
  verdicts: AuthorshipVerdict[];
  units: ContentUnit[];
  availability: Omit<AvailabilityFlags, 'recommendationsElaborated'>;
}

export interface Synthesis {
  recommendations: string[];
  elaborated: boolean;
}

export interface SynthesizerOptions {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

const MAX_EVIDENCE_ITEMS = 3;

function plural(count: number, word: string, many = `${word}s`): string {
  return `${count} ${count === 1 ? word : many}`;
}

function numbered(title: string, actions: string[]): string {
  return [title, ...actions.map((action, i) => `  ${i + 1}. ${action}`)].join('\n');
}

function overallAssessment(aggregation: Aggregation): string {
  const score = aggregation.originalityScore.toFixed(2);
  switch (aggregation.riskLevel) {
    case 'low':
      return `Assessment: strong originality (score ${score}). The work shows few integrity concerns.`;
    case 'medium':
      return `Assessment: minor concerns (score ${score}). Some similarities or assistance patterns warrant a closer look.`;
    case 'high':
      return `Assessment: moderate risk (score ${score}). Significant findings call for manual review and a conversation with the author.`;
    default:
      return `Assessment: high risk (score ${score}). Substantial originality concerns were found; investigate before grading.`;
  }
}

function authorshipBlock(verdicts: AuthorshipVerdict[]): string | null {
  const suspicious = verdicts
    .filter((verdict) => verdict.category === 'ai_generated' || verdict.category === 'heavily_assisted')
    .sort((x, y) => y.confidence - x.confidence);
  if (suspicious.length === 0) return null;

  const strong = suspicious.some((verdict) => verdict.category === 'ai_generated');
  const evidence = suspicious.slice(0, MAX_EVIDENCE_ITEMS).map((verdict) => {
    const top = [...verdict.rationale].sort((x, y) => y.dimensionScore - x.dimensionScore)[0];
    const detail = top ? `; strongest indicator ${top.dimension}: ${top.evidence}` : '';
    const degraded = verdict.degradedConfidence ? ', estimated' : '';
    return `  - ${verdict.unit.fileName}: confidence ${verdict.confidence}${degraded}${detail}`;
  });

  const actions = strong
    ? [
        'Meet the author to discuss the flagged files.',
        'Ask for drafts, notes or version history that show how the work developed.',
        'Have the author explain the flagged sections in their own words.',
        'Record the outcome of the review.',
      ]
    : [
        'Review the course policy on AI tools with the author.',
        'Clarify which kinds of assistance are acceptable.',
      ];

  return [
    `Authorship: ${strong ? 'machine-generated content suspected' : 'possible AI assistance'} in ${plural(suspicious.length, 'file')}.`,
    ...evidence,
    numbered(strong ? 'Required actions:' : 'Recommended actions:', actions),
  ].join('\n');
}

function internalBlock(matches: SimilarityMatch[]): string | null {
  if (matches.length === 0) return null;
  const flagged = matches.filter((match) => match.flagged);

  const evidence = matches.slice(0, MAX_EVIDENCE_ITEMS).map((match) => {
    const target = match.target.type === 'sibling' ? match.target.fileName : match.target.submissionId;
    return `  - ${match.source.fileName} and ${target}: similarity ${match.score.toFixed(2)} (${match.kind})`;
  });

  const actions =
    flagged.length > 0
      ? [
          'Confirm the author can explain why the files overlap.',
          'Check whether shared logic should have been factored into a common function or module.',
          'Compare the overlap against the assignment rules on reuse.',
        ]
      : ['Check whether the shared structure comes from a provided template or legitimate shared utilities.'];

  return [
    `Internal duplication: ${plural(flagged.length, 'flagged pair')} and ${plural(matches.length - flagged.length, 'weaker match', 'weaker matches')} between files of this submission.`,
    ...evidence,
    numbered(flagged.length > 0 ? 'Required actions:' : 'Recommended actions:', actions),
  ].join('\n');
}

function crossBlock(matches: SimilarityMatch[]): string | null {
  if (matches.length === 0) return null;
  const flagged = matches.filter((match) => match.flagged);
  const submissions = new Set(
    matches.map((match) => (match.target.type === 'external' ? match.target.submissionId : '')),
  );

  const evidence = matches.slice(0, MAX_EVIDENCE_ITEMS).map((match) => {
    const target = match.target.type === 'external' ? `submission ${match.target.submissionId}` : match.target.fileName;
    return `  - ${match.source.fileName} resembles ${target}: similarity ${match.score.toFixed(2)}`;
  });

  return [
    `Cross-submission similarity: ${plural(matches.length, 'match', 'matches')} (${flagged.length} flagged) against ${plural(submissions.size, 'earlier submission')} by other authors.`,
    ...evidence,
    numbered('Required actions:', [
      'Compare the matched passages side by side.',
      'Check whether the matched submissions belong to the same assignment or group.',
      'Ask the author how the similar passages were produced.',
    ]),
  ].join('\n');
}

function bestPractices(units: ContentUnit[]): string {
  if (units.some((unit) => unit.kind === 'code')) {
    return [
      'Good practice for code submissions:',
      '  - Independently implemented versions of a known algorithm are acceptable; copied implementations are not.',
      '  - Credit any external library, snippet or generated code in comments or the README.',
      '  - Comments should explain the approach taken rather than restate each line.',
    ].join('\n');
  }
  return [
    'Good practice for written work:',
    '  - Quote and cite every direct borrowing in the required citation style.',
    "  - Paraphrase substantially and keep the author's own analysis visible.",
    '  - Disclose any use of writing assistants as the course policy requires.',
  ].join('\n');
}

function nextSteps(): string {
  return numbered('Next steps:', [
    'Review every flagged item above against the source material.',
    'Interview the author before reaching a conclusion.',
    'Decide whether a resubmission with proper attribution is appropriate.',
    'Document the decision and its evidence.',
  ]);
}

function coverageNote(availability: SynthesisInput['availability']): string | null {
  const missing: string[] = [];
  if (!availability.internalComparisonChecked) missing.push('internal comparison');
  if (!availability.crossSubmissionChecked) missing.push('cross-submission search');
  if (!availability.authorshipChecked) missing.push('authorship classification');
  if (missing.length === 0) return null;
  return `Coverage: ${missing.join(' and ')} did not complete, so the score leaves those checks out. Re-run the analysis before drawing conclusions from their absence.`;
}

/** Deterministic recommendations built only from the findings. Never empty. */
export function templateRecommendations(input: SynthesisInput): string[] {
  const items: Array<string | null> = [
    overallAssessment(input.aggregation),
    authorshipBlock(input.verdicts),
    internalBlock(input.internalMatches),
    crossBlock(input.crossMatches),
    coverageNote(input.availability),
    bestPractices(input.units),
    input.aggregation.originalityScore < 70 ? nextSteps() : null,
  ];
  return items.filter((item): item is string => item !== null);
}

function buildElaborationPrompt(input: SynthesisInput, findings: string[]): string {
  const kinds = new Set(input.units.map((unit) => unit.kind));
  return `You advise an instructor reviewing a student submission (${[...kinds].join(', ')}) for originality.
Originality score: ${input.aggregation.originalityScore} (risk ${input.aggregation.riskLevel}).

Findings and standard guidance:
${findings.join('\n\n')}

Rewrite these into clear, specific recommendations for the instructor. Keep the same order: an overall assessment first, then one item per finding category with its evidence and numbered actions, then general good practice${input.aggregation.originalityScore < 70 ? ', then a numbered next-steps plan' : ''}. Do not invent findings.

Return ONLY a JSON array of strings.`;
}

export function parseRecommendations(raw: string): string[] {
  const body = extractJson(raw, 'recommendations', 'array');
  if (!Array.isArray(body)) throw new MalformedResponseError('recommendations', raw);
  const items = body
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  if (items.length === 0) throw new MalformedResponseError('recommendations', raw);
  return items;
}

export class RecommendationSynthesizer {
  private readonly logger = new Logger(RecommendationSynthesizer.name);

  constructor(
    private readonly client: TextGenerationClient,
    private readonly options: SynthesizerOptions,
  ) {}

  /**
   * Asks the model to elaborate the templated findings within `remainingMs`.
   * Any failure returns the template unchanged.
   */
  async synthesize(input: SynthesisInput, remainingMs: number): Promise<Synthesis> {
    const template = templateRecommendations(input);
    if (remainingMs <= 0) {
      this.logger.warn('No time left for recommendation elaboration; using template');
      return { recommendations: template, elaborated: false };
    }

    const prompt = buildElaborationPrompt(input, template);
    try {
      const raw = await withTimeout(
        () =>
          withRetry(
            () =>
              this.client.complete(prompt, {
                system: 'You write concise academic-integrity guidance. Return only valid JSON.',
                maxTokens: 1_200,
                temperature: 0.3,
              }),
            {
              subsystem: 'recommendations',
              timeoutMs: Math.min(this.options.timeoutMs, remainingMs),
              retries: this.options.retries,
              backoffMs: this.options.backoffMs,
            },
          ),
        remainingMs,
        'recommendations',
      );
      return { recommendations: parseRecommendations(raw), elaborated: true };
    } catch (err) {
      this.logger.warn(`Recommendation elaboration failed; using template: ${errorMessage(err)}`);
      return { recommendations: template, elaborated: false };
    }
  }
}
