export type ContentKind = 'code' | 'natural_language' | 'unknown';
export type MatchKind = 'lexical' | 'structural' | 'semantic';
export type AuthorshipCategory = 'ai_generated' | 'heavily_assisted' | 'lightly_assisted' | 'human_written';
export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';
export type VerdictSource = 'triage' | 'deep_analysis' | 'heuristic';
export type FallbackReason = 'unavailable' | 'malformed_response' | 'deadline_exceeded';

export interface TextRangePayload {
  start: number;
  end: number;
}

export interface MatchedSpanPayload {
  source: TextRangePayload;
  target: TextRangePayload;
}

export interface UnitReferencePayload {
  unit_index: number;
  file_name: string;
}

export type MatchTargetPayload =
  | { type: 'sibling'; unit_index: number; file_name: string }
  | { type: 'external'; submission_id: string; author_id: string; excerpt: string };

export interface SimilarityMatchPayload {
  source: UnitReferencePayload;
  target: MatchTargetPayload;
  score: number;
  kind: MatchKind;
  flagged: boolean;
  spans: MatchedSpanPayload[];
  components: {
    lexical: number;
    stripped: number;
    structural: number | null;
  } | null;
}

export interface RationaleEntryPayload {
  dimension: string;
  dimension_score: number;
  evidence: string;
}

export interface AuthorshipVerdictPayload {
  unit: UnitReferencePayload;
  confidence: number;
  category: AuthorshipCategory;
  rationale: RationaleEntryPayload[];
  stage: 'DONE' | 'DEEP_ANALYZED';
  source: VerdictSource;
  degraded_confidence: boolean;
  fallback_reason: FallbackReason | null;
}

export interface OriginalityReportPayload {
  report_id: string;
  submission_id: string;
  author_id: string;
  originality_score: number;
  risk_level: RiskLevel;
  duplication_score: number;
  authorship_score: number | null;
  signals: {
    internal_duplication: number | null;
    cross_submission: number | null;
    authorship: number | null;
  };
  matches: SimilarityMatchPayload[];
  verdicts: AuthorshipVerdictPayload[];
  recommendations: string[];
  internal_comparison_checked: boolean;
  cross_submission_checked: boolean;
  authorship_checked: boolean;
  recommendations_elaborated: boolean;
  unanalyzable_units: Array<{ file_name: string; reason: string }>;
  notes: string[];
  generated_at: string;
}

export interface ReportSummaryPayload {
  report_id: string;
  submission_id: string;
  originality_score: number;
  risk_level: RiskLevel;
  created_at: string;
}
