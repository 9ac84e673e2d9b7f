import { ContentUnit } from '../originality.types';

const TRIAGE_EXCERPT_CHARS = 1_500;
const DEEP_EXCERPT_CHARS = 6_000;

export const TRIAGE_SYSTEM =
  'You screen student submissions for machine-generated content. Return only valid JSON.';

export const DEEP_ANALYSIS_SYSTEM =
  'You are a careful reviewer of authorship in academic submissions. Base every score on evidence quoted from the content. Return only valid JSON.';

function describeUnit(unit: ContentUnit): string {
  if (unit.kind === 'code') return `code (${unit.language ?? 'unknown language'})`;
  return 'written text';
}

export function buildTriagePrompt(unit: ContentUnit): string {
  return `Decide quickly whether the following ${describeUnit(unit)} from "${unit.fileName}" was obviously produced by an AI assistant, obviously written by a person, or whether that is uncertain.

Signs of machine authorship: comments that narrate obvious steps, uniformly perfect formatting, generic names such as data, result or handler, a textbook tone with stock transitions ("Furthermore", "In conclusion"), no contractions or personal voice.
Signs of human authorship: inconsistent formatting, pragmatic shortcuts and abbreviations, comments that explain why rather than what, informal wording, uneven paragraph lengths.

Content:
"""
${unit.normalizedText.slice(0, TRIAGE_EXCERPT_CHARS)}
"""

Return ONLY valid JSON:
{
  "verdict": <"obviously_ai"|"obviously_human"|"uncertain">,
  "score": <integer 0-100, likelihood the content is machine-generated>
}`;
}

export function buildDeepAnalysisPrompt(unit: ContentUnit): string {
  return `Assess how likely it is that the following ${describeUnit(unit)} from "${unit.fileName}" was generated by an AI assistant. Score each dimension from 0 (clearly human) to 100 (clearly machine-generated) and cite specific evidence from the content.

Dimensions:
- documentation_style: how comments or explanations are written
- structure_formatting: consistency of layout and organisation
- naming: choice of identifiers or vocabulary
- error_handling: how edge cases and failures are treated (or argued, for prose)
- complexity_approach: whether the approach fits the problem or reads like a template
- personal_style: presence of a recognisable personal voice or habits

Content:
"""
${unit.normalizedText.slice(0, DEEP_EXCERPT_CHARS)}
"""

Return ONLY valid JSON:
{
  "dimensions": {
    "documentation_style": { "score": <0-100>, "evidence": "<short quote or observation>" },
    "structure_formatting": { "score": <0-100>, "evidence": "..." },
    "naming": { "score": <0-100>, "evidence": "..." },
    "error_handling": { "score": <0-100>, "evidence": "..." },
    "complexity_approach": { "score": <0-100>, "evidence": "..." },
    "personal_style": { "score": <0-100>, "evidence": "..." }
  }
}`;
}
