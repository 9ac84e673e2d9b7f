import type {
  AuthorshipVerdictPayload,
  OriginalityReportPayload,
  SimilarityMatchPayload,
} from '@originality/shared';

import { AuthorshipVerdict, OriginalityReport, SimilarityMatch } from '../originality.types';

function toMatchPayload(match: SimilarityMatch): SimilarityMatchPayload {
  return {
    source: { unit_index: match.source.unitIndex, file_name: match.source.fileName },
    target:
      match.target.type === 'sibling'
        ? { type: 'sibling', unit_index: match.target.unitIndex, file_name: match.target.fileName }
        : {
            type: 'external',
            submission_id: match.target.submissionId,
            author_id: match.target.authorId,
            excerpt: match.target.excerpt,
          },
    score: match.score,
    kind: match.kind,
    flagged: match.flagged,
    spans: match.spans.map((span) => ({
      source: { start: span.source.start, end: span.source.end },
      target: { start: span.target.start, end: span.target.end },
    })),
    components: match.components
      ? {
          lexical: match.components.lexical,
          stripped: match.components.stripped,
          structural: match.components.structural,
        }
      : null,
  };
}

function toVerdictPayload(verdict: AuthorshipVerdict): AuthorshipVerdictPayload {
  return {
    unit: { unit_index: verdict.unit.unitIndex, file_name: verdict.unit.fileName },
    confidence: verdict.confidence,
    category: verdict.category,
    rationale: verdict.rationale.map((entry) => ({
      dimension: entry.dimension,
      dimension_score: entry.dimensionScore,
      evidence: entry.evidence,
    })),
    stage: verdict.stage,
    source: verdict.source,
    degraded_confidence: verdict.degradedConfidence,
    fallback_reason: verdict.fallbackReason,
  };
}

/** The serialized, snake_case form of a report as returned over HTTP and stored. */
export function toReportPayload(report: OriginalityReport): OriginalityReportPayload {
  return {
    report_id: report.reportId,
    submission_id: report.submissionId,
    author_id: report.authorId,
    originality_score: report.originalityScore,
    risk_level: report.riskLevel,
    duplication_score: report.duplicationScore,
    authorship_score: report.authorshipScore,
    signals: {
      internal_duplication: report.signals.internalDuplication,
      cross_submission: report.signals.crossSubmission,
      authorship: report.signals.authorship,
    },
    matches: report.matches.map(toMatchPayload),
    verdicts: report.verdicts.map(toVerdictPayload),
    recommendations: [...report.recommendations],
    internal_comparison_checked: report.availability.internalComparisonChecked,
    cross_submission_checked: report.availability.crossSubmissionChecked,
    authorship_checked: report.availability.authorshipChecked,
    recommendations_elaborated: report.availability.recommendationsElaborated,
    unanalyzable_units: report.unanalyzableUnits.map((unit) => ({ file_name: unit.fileName, reason: unit.reason })),
    notes: [...report.notes],
    generated_at: report.generatedAt.toISOString(),
  };
}
