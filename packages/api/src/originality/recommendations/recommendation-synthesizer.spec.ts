import { SubsystemUnavailableError } from '../../common/errors/originality.errors';
import { aggregate } from '../aggregation/originality-aggregator';
import { CompletionConstraints } from '../collaborators';
import { AuthorshipVerdict, SimilarityMatch } from '../originality.types';
import { buildContentUnit } from '../text/normalizer';
import {
  parseRecommendations,
  RecommendationSynthesizer,
  SynthesisInput,
  templateRecommendations,
} from './recommendation-synthesizer';

const options = { timeoutMs: 1_000, retries: 1, backoffMs: 0 };

const essay = buildContentUnit(
  { fileName: 'essay.txt', text: 'Rivers carve valleys over thousands of years.', contentKind: 'natural_language' },
  0,
);
const script = buildContentUnit({ fileName: 'main.py', text: 'print(1)', contentKind: 'code' }, 1);

const allChecked = { internalComparisonChecked: true, crossSubmissionChecked: true, authorshipChecked: true };

function cleanInput(): SynthesisInput {
  return {
    aggregation: aggregate({ internalMatches: [], crossMatches: [], verdicts: [] }),
    internalMatches: [],
    crossMatches: [],
    verdicts: [],
    units: [essay],
    availability: allChecked,
  };
}

function flaggedInput(): SynthesisInput {
  const internal: SimilarityMatch = {
    source: { unitIndex: 0, fileName: 'essay.txt' },
    target: { type: 'sibling', unitIndex: 1, fileName: 'main.py' },
    score: 0.8,
    kind: 'lexical',
    flagged: true,
    spans: [],
  };
  const verdict: AuthorshipVerdict = {
    unit: { unitIndex: 0, fileName: 'essay.txt' },
    confidence: 88,
    category: 'ai_generated',
    rationale: [
      { dimension: 'naming', dimensionScore: 60, evidence: 'generic names' },
      { dimension: 'documentation_style', dimensionScore: 95, evidence: 'every line commented' },
    ],
    stage: 'DONE',
    source: 'triage',
    degradedConfidence: false,
    fallbackReason: null,
  };
  return {
    aggregation: aggregate({ internalMatches: [internal], crossMatches: null, verdicts: [verdict] }),
    internalMatches: [internal],
    crossMatches: [],
    verdicts: [verdict],
    units: [essay, script],
    availability: { ...allChecked, crossSubmissionChecked: false },
  };
}

function scripted(reply: string | Error) {
  return jest.fn(async (_prompt: string, _constraints: CompletionConstraints): Promise<string> => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
}

describe('templateRecommendations', () => {
  it('should give an assessment and writing guidance for clean prose', () => {
    const items = templateRecommendations(cleanInput());

    expect(items).toHaveLength(2);
    expect(items[0]).toBe('Assessment: strong originality (score 100.00). The work shows few integrity concerns.');
    expect(items[1].split('\n')[0]).toBe('Good practice for written work:');
  });

  it('should cover every finding in a fixed order', () => {
    const items = templateRecommendations(flaggedInput());

    expect(items.map((item) => item.split('\n')[0])).toEqual([
      'Assessment: high risk (score 2.40). Substantial originality concerns were found; investigate before grading.',
      'Authorship: machine-generated content suspected in 1 file.',
      'Internal duplication: 1 flagged pair and 0 weaker matches between files of this submission.',
      'Coverage: cross-submission search did not complete, so the score leaves those checks out. Re-run the analysis before drawing conclusions from their absence.',
      'Good practice for code submissions:',
      'Next steps:',
    ]);
    expect(items[1].split('\n')[1]).toBe(
      '  - essay.txt: confidence 88; strongest indicator documentation_style: every line commented',
    );
  });
});

describe('parseRecommendations', () => {
  it('should keep non-empty strings', () => {
    expect(parseRecommendations('```json\n["First.", " ", 3, "Second."]\n```')).toEqual(['First.', 'Second.']);
  });

  it('should reject an empty list', () => {
    expect(() => parseRecommendations('[]')).toThrow('recommendations returned a malformed response');
  });
});

describe('RecommendationSynthesizer', () => {
  it('should use the elaborated list when the model answers', async () => {
    const complete = scripted('["Review the flagged files.", "Talk to the author."]');
    const synthesizer = new RecommendationSynthesizer({ complete }, options);

    await expect(synthesizer.synthesize(flaggedInput(), 5_000)).resolves.toEqual({
      recommendations: ['Review the flagged files.', 'Talk to the author.'],
      elaborated: true,
    });
    expect(complete.mock.calls[0][0]).toContain('Originality score: 2.4 (risk critical).');
  });

  it('should fall back to the template on a malformed answer', async () => {
    const synthesizer = new RecommendationSynthesizer({ complete: scripted('I cannot help with that.') }, options);
    const input = flaggedInput();

    await expect(synthesizer.synthesize(input, 5_000)).resolves.toEqual({
      recommendations: templateRecommendations(input),
      elaborated: false,
    });
  });

  it('should fall back to the template when the model is unavailable', async () => {
    const complete = scripted(new SubsystemUnavailableError('recommendations', 'down'));
    const synthesizer = new RecommendationSynthesizer({ complete }, options);

    const result = await synthesizer.synthesize(cleanInput(), 5_000);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(result.elaborated).toBe(false);
  });

  it('should not call the model when no time is left', async () => {
    const complete = scripted('["unused"]');
    const synthesizer = new RecommendationSynthesizer({ complete }, options);

    const result = await synthesizer.synthesize(cleanInput(), 0);

    expect(complete).not.toHaveBeenCalled();
    expect(result).toEqual({ recommendations: templateRecommendations(cleanInput()), elaborated: false });
  });
});
