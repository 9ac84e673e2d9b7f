import { ContentUnit, RationaleEntry } from '../originality.types';
import { lineOf, lineStarts } from '../text/line-index';
import { lexModeFor, tokenize } from '../text/tokenizer';

export interface HeuristicEstimate {
  confidence: number;
  rationale: RationaleEntry[];
}

const FORMAL_MARKERS = [
  'furthermore',
  'moreover',
  'additionally',
  'in conclusion',
  'it is important to note',
  'overall',
  'comprehensive',
  'multifaceted',
  'various',
  'numerous',
  'in summary',
  'consequently',
];

const INFORMAL_MARKERS = [
  "n't",
  "i'm",
  "it's",
  "i've",
  'i think',
  'kind of',
  'pretty',
  'really',
  'honestly',
  'stuff',
  'gonna',
];

function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function shannonEntropy(items: string[]): number {
  if (items.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const item of items) counts.set(item, (counts.get(item) ?? 0) + 1);
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / items.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

function coefficientOfVariation(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  if (mean === 0) return 0;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance) / mean;
}

function codeEstimate(text: string, language: string | null): HeuristicEstimate {
  const mode = lexModeFor(language);
  const { tokens } = tokenize(text, mode === 'prose' ? 'c_family' : mode);
  const lines = text.split('\n').filter((line) => line.trim() !== '');

  const starts = lineStarts(text);
  const commentLines = new Set<number>();
  for (const token of tokens.filter((t) => t.type === 'comment')) {
    const first = lineOf(starts, token.start);
    const last = lineOf(starts, Math.max(token.start, token.end - 1));
    for (let line = first; line <= last; line += 1) commentLines.add(line);
  }
  const commentDensity = lines.length === 0 ? 0 : Math.min(1, commentLines.size / lines.length);

  // Descriptive names spread over many characters; terse names reuse a few.
  const identifierChars = tokens
    .filter((t) => t.type === 'word')
    .flatMap((t) => Array.from(t.text.toLowerCase()));
  const identifierEntropy = shannonEntropy(identifierChars);

  const lineLengthCv = coefficientOfVariation(lines.map((line) => line.trim().length));

  const commentScore = clampScore(commentDensity * 250);
  const namingScore = clampScore(((identifierEntropy - 2.5) / 1.7) * 100);
  const uniformityScore = clampScore((1 - lineLengthCv / 0.8) * 100);

  return {
    confidence: round2(0.4 * commentScore + 0.3 * namingScore + 0.3 * uniformityScore),
    rationale: [
      {
        dimension: 'comment_density',
        dimensionScore: round2(commentScore),
        evidence: `${Math.round(commentDensity * 100)}% of non-blank lines carry comments`,
      },
      {
        dimension: 'identifier_entropy',
        dimensionScore: round2(namingScore),
        evidence: `identifier character entropy ${identifierEntropy.toFixed(2)} bits`,
      },
      {
        dimension: 'line_length_variance',
        dimensionScore: round2(uniformityScore),
        evidence: `line length coefficient of variation ${lineLengthCv.toFixed(2)}`,
      },
    ],
  };
}

function proseEstimate(text: string): HeuristicEstimate {
  const lower = text.toLowerCase();
  const words = lower.match(/[\p{L}']+/gu) ?? [];
  const sentences = text
    .split(/[.!?]+\s+|\n{2,}/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence !== '');

  const count = (markers: string[]): number =>
    markers.reduce((sum, marker) => sum + (lower.split(marker).length - 1), 0);
  const formal = count(FORMAL_MARKERS);
  const informal = count(INFORMAL_MARKERS);
  const per100 = words.length === 0 ? 0 : 100 / words.length;
  const registerScore = clampScore(50 + (formal - informal) * per100 * 25);

  const sentenceCv = coefficientOfVariation(sentences.map((s) => s.split(/\s+/).length));
  const uniformityScore = clampScore((1 - sentenceCv / 0.6) * 100);

  return {
    confidence: round2(0.5 * registerScore + 0.5 * uniformityScore),
    rationale: [
      {
        dimension: 'register',
        dimensionScore: round2(registerScore),
        evidence: `${formal} formal and ${informal} informal markers`,
      },
      {
        dimension: 'sentence_length_variance',
        dimensionScore: round2(uniformityScore),
        evidence: `sentence length coefficient of variation ${sentenceCv.toFixed(2)}`,
      },
    ],
  };
}

/**
 * Deterministic machine-authorship estimate from surface statistics. Used when
 * the classifier cannot answer and to fill dimensions it leaves out.
 */
export function heuristicEstimate(unit: ContentUnit): HeuristicEstimate {
  return unit.kind === 'code'
    ? codeEstimate(unit.normalizedText, unit.language)
    : proseEstimate(unit.normalizedText);
}
