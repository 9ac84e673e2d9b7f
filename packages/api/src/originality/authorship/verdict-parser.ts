import { MalformedResponseError } from '../../common/errors/originality.errors';

export type TriageVerdict =
  | { kind: 'obviously_ai'; score: number | null }
  | { kind: 'obviously_human'; score: number | null }
  | { kind: 'uncertain'; score: number | null }
  | { kind: 'unknown'; raw: string; score: number | null };

export type DeepDimension =
  | 'documentation_style'
  | 'structure_formatting'
  | 'naming'
  | 'error_handling'
  | 'complexity_approach'
  | 'personal_style';

export interface DimensionScore {
  score: number;
  evidence: string;
}

export type DeepAnalysis = Partial<Record<DeepDimension, DimensionScore>>;

const TRIAGE_SYNONYMS = new Map<string, 'obviously_ai' | 'obviously_human' | 'uncertain'>([
  ['obviously_ai', 'obviously_ai'],
  ['ai', 'obviously_ai'],
  ['ai_generated', 'obviously_ai'],
  ['machine_generated', 'obviously_ai'],
  ['likely_ai', 'obviously_ai'],
  ['obviously_human', 'obviously_human'],
  ['human', 'obviously_human'],
  ['human_written', 'obviously_human'],
  ['likely_human', 'obviously_human'],
  ['uncertain', 'uncertain'],
  ['unsure', 'uncertain'],
  ['unclear', 'uncertain'],
  ['mixed', 'uncertain'],
]);

const DIMENSION_ALIASES = new Map<string, DeepDimension>([
  ['documentation_style', 'documentation_style'],
  ['documentation', 'documentation_style'],
  ['structure_formatting', 'structure_formatting'],
  ['structure', 'structure_formatting'],
  ['formatting', 'structure_formatting'],
  ['naming', 'naming'],
  ['naming_identifiers', 'naming'],
  ['error_handling', 'error_handling'],
  ['complexity_approach', 'complexity_approach'],
  ['complexity', 'complexity_approach'],
  ['personal_style', 'personal_style'],
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cleanJson(raw: string): string {
  return raw
    .trim()
    .replace(/^```json\s*/i, '')
    .replace(/^```\s*/i, '')
    .replace(/```\s*$/i, '');
}

/**
 * Parses the first JSON object or array found in a model response, tolerating
 * code fences and surrounding prose.
 */
export function extractJson(raw: string, subsystem: string, shape: 'object' | 'array' = 'object'): unknown {
  const cleaned = cleanJson(raw);
  const [open, close] = shape === 'object' ? ['{', '}'] : ['[', ']'];
  const start = cleaned.indexOf(open);
  const end = cleaned.lastIndexOf(close);
  if (start === -1 || end <= start) {
    throw new MalformedResponseError(subsystem, raw);
  }
  try {
    return JSON.parse(cleaned.slice(start, end + 1));
  } catch {
    throw new MalformedResponseError(subsystem, raw);
  }
}

function normalizeKey(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function readScore(value: unknown): number | null {
  const parsed = typeof value === 'string' ? Number.parseFloat(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) return null;
  return Math.min(100, Math.max(0, parsed));
}

export function parseTriage(raw: string): TriageVerdict {
  const body = extractJson(raw, 'triage');
  if (!isRecord(body)) throw new MalformedResponseError('triage', raw);

  const verdict = body.verdict ?? body.quick_verdict;
  if (typeof verdict !== 'string') throw new MalformedResponseError('triage', raw);

  const score = readScore(body.score ?? body.confidence ?? body.initial_confidence);
  const kind = TRIAGE_SYNONYMS.get(normalizeKey(verdict));
  return kind ? { kind, score } : { kind: 'unknown', raw: verdict, score };
}

export function parseDeepAnalysis(raw: string): DeepAnalysis {
  const body = extractJson(raw, 'deep analysis');
  if (!isRecord(body)) throw new MalformedResponseError('deep analysis', raw);

  const source = body.dimensions ?? body.confidence_breakdown;
  if (!isRecord(source)) throw new MalformedResponseError('deep analysis', raw);

  const analysis: DeepAnalysis = {};
  for (const [key, value] of Object.entries(source)) {
    const dimension = DIMENSION_ALIASES.get(normalizeKey(key));
    if (!dimension || analysis[dimension]) continue;

    const score = readScore(isRecord(value) ? value.score : value);
    if (score === null) continue;
    const evidence = isRecord(value) && typeof value.evidence === 'string' ? value.evidence.trim() : '';
    analysis[dimension] = { score, evidence };
  }

  if (Object.keys(analysis).length === 0) {
    throw new MalformedResponseError('deep analysis', raw);
  }
  return analysis;
}
