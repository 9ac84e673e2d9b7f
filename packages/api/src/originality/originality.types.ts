export type ContentKind = 'code' | 'natural_language' | 'unknown';

export type MatchKind = 'lexical' | 'structural' | 'semantic';

export type AuthorshipCategory =
  | 'ai_generated'
  | 'heavily_assisted'
  | 'lightly_assisted'
  | 'human_written';

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface SubmissionFileInput {
  fileName: string;
  text: string;
  contentKind: ContentKind;
}

export interface SubmissionInput {
  submissionId: string;
  authorId: string;
  createdAt?: Date;
  files: SubmissionFileInput[];
}

export interface ContentUnit {
  index: number;
  fileName: string;
  rawText: string;
  normalizedText: string;
  kind: ContentKind;
  language: string | null;
  /** Normalized text exceeds the comparison cap and is compared in part. */
  truncated: boolean;
}

export interface Submission {
  id: string;
  authorId: string;
  units: ContentUnit[];
  createdAt: Date;
}

/** Half-open character range into a normalized text (or a retrieved excerpt). */
export interface TextRange {
  start: number;
  end: number;
}

export interface MatchedSpan {
  source: TextRange;
  target: TextRange;
}

export interface UnitReference {
  unitIndex: number;
  fileName: string;
}

export type MatchTarget =
  | ({ type: 'sibling' } & UnitReference)
  | { type: 'external'; submissionId: string; authorId: string; excerpt: string };

export interface MatchComponents {
  lexical: number;
  stripped: number;
  structural: number | null;
}

export interface SimilarityMatch {
  source: UnitReference;
  target: MatchTarget;
  score: number;
  kind: MatchKind;
  flagged: boolean;
  spans: MatchedSpan[];
  components?: MatchComponents;
}

export interface RationaleEntry {
  dimension: string;
  dimensionScore: number;
  evidence: string;
}

export type ClassifierStage = 'PENDING' | 'TRIAGED' | 'DONE' | 'DEEP_ANALYZED';

export type TerminalStage = Extract<ClassifierStage, 'DONE' | 'DEEP_ANALYZED'>;

export type VerdictSource = 'triage' | 'deep_analysis' | 'heuristic';

export type FallbackReason = 'unavailable' | 'malformed_response' | 'deadline_exceeded';

export interface AuthorshipVerdict {
  unit: UnitReference;
  confidence: number;
  category: AuthorshipCategory;
  rationale: RationaleEntry[];
  stage: TerminalStage;
  source: VerdictSource;
  degradedConfidence: boolean;
  fallbackReason: FallbackReason | null;
}

export interface AvailabilityFlags {
  internalComparisonChecked: boolean;
  crossSubmissionChecked: boolean;
  authorshipChecked: boolean;
  recommendationsElaborated: boolean;
}

export interface AggregationSignals {
  internalDuplication: number | null;
  crossSubmission: number | null;
  authorship: number | null;
}

export interface UnanalyzableUnit {
  fileName: string;
  reason: string;
}

export interface OriginalityReport {
  reportId: string;
  submissionId: string;
  authorId: string;
  originalityScore: number;
  riskLevel: RiskLevel;
  duplicationScore: number;
  authorshipScore: number | null;
  signals: AggregationSignals;
  matches: SimilarityMatch[];
  verdicts: AuthorshipVerdict[];
  recommendations: string[];
  availability: AvailabilityFlags;
  unanalyzableUnits: UnanalyzableUnit[];
  notes: string[];
  generatedAt: Date;
}
