import { OriginalityReport } from '../originality.types';
import { toReportPayload } from './report-payload';
import { renderReportMarkdown } from './report-markdown';

function sampleReport(): OriginalityReport {
  return {
    reportId: '6a0f1c2e-1111-4222-8333-444455556666',
    submissionId: 'sub-1',
    authorId: 'author-1',
    originalityScore: 21,
    riskLevel: 'critical',
    duplicationScore: 76.67,
    authorshipScore: 10,
    signals: { internalDuplication: 0.7667, crossSubmission: null, authorship: 0.1 },
    matches: [
      {
        source: { unitIndex: 0, fileName: 'a.py' },
        target: { type: 'sibling', unitIndex: 1, fileName: 'b.py' },
        score: 0.7667,
        kind: 'structural',
        flagged: true,
        spans: [{ source: { start: 0, end: 31 }, target: { start: 0, end: 27 } }],
        components: { lexical: 0.6667, stripped: 0.6667, structural: 1 },
      },
      {
        source: { unitIndex: 1, fileName: 'b.py' },
        target: { type: 'external', submissionId: 'old-1', authorId: 'author-2', excerpt: 'def add' },
        score: 0.5,
        kind: 'semantic',
        flagged: false,
        spans: [],
      },
    ],
    verdicts: [
      {
        unit: { unitIndex: 0, fileName: 'a.py' },
        confidence: 10,
        category: 'human_written',
        rationale: [{ dimension: 'triage', dimensionScore: 10, evidence: 'looks hand-written' }],
        stage: 'DONE',
        source: 'triage',
        degradedConfidence: false,
        fallbackReason: null,
      },
      {
        unit: { unitIndex: 1, fileName: 'b.py' },
        confidence: 35,
        category: 'lightly_assisted',
        rationale: [],
        stage: 'DONE',
        source: 'heuristic',
        degradedConfidence: true,
        fallbackReason: 'malformed_response',
      },
    ],
    recommendations: ['Assessment: high risk.', 'Next steps:\n  1. Talk to the author.'],
    availability: {
      internalComparisonChecked: true,
      crossSubmissionChecked: false,
      authorshipChecked: true,
      recommendationsElaborated: false,
    },
    unanalyzableUnits: [{ fileName: 'empty.txt', reason: 'empty text' }],
    notes: ['empty.txt: skipped (empty text)'],
    generatedAt: new Date('2026-03-01T12:00:00.000Z'),
  };
}

describe('toReportPayload', () => {
  it('should serialize to snake_case', () => {
    const payload = toReportPayload(sampleReport());

    expect(payload).toMatchObject({
      report_id: '6a0f1c2e-1111-4222-8333-444455556666',
      originality_score: 21,
      risk_level: 'critical',
      signals: { internal_duplication: 0.7667, cross_submission: null, authorship: 0.1 },
      cross_submission_checked: false,
      unanalyzable_units: [{ file_name: 'empty.txt', reason: 'empty text' }],
      generated_at: '2026-03-01T12:00:00.000Z',
    });
    expect(payload.matches[0].target).toEqual({ type: 'sibling', unit_index: 1, file_name: 'b.py' });
    expect(payload.matches[1].target).toEqual({
      type: 'external',
      submission_id: 'old-1',
      author_id: 'author-2',
      excerpt: 'def add',
    });
    expect(payload.matches[1].components).toBeNull();
    expect(payload.verdicts[1]).toMatchObject({ degraded_confidence: true, fallback_reason: 'malformed_response' });
  });
});

describe('renderReportMarkdown', () => {
  it('should render every section of the report', () => {
    const lines = renderReportMarkdown(toReportPayload(sampleReport())).split('\n');

    expect(lines[0]).toBe('# Originality Report');
    expect(lines).toContain('- **Originality score**: 21.00 / 100');
    expect(lines).toContain('- **Risk level**: CRITICAL');
    expect(lines).toContain('- **Authorship score**: 10.00');
    expect(lines).toContain('- Cross-submission search: no');
    expect(lines).toContain('- empty.txt: skipped (empty text)');
    expect(lines).toContain('1. **a.py** vs **b.py**: 76.7% structural (flagged), 1 matched span(s)');
    expect(lines).toContain('2. **b.py** vs **submission old-1 (author author-2)**: 50.0% semantic, 0 matched span(s)');
    expect(lines).toContain('- **a.py**: human_written (confidence 10; triage)');
    expect(lines).toContain('  - triage 10: looks hand-written');
    expect(lines).toContain('- **b.py**: lightly_assisted (confidence 35; heuristic, degraded, malformed_response)');
    expect(lines).toContain('- Next steps:');
    expect(lines).toContain('    1. Talk to the author.');
  });

  it('should say when nothing matched', () => {
    const report = { ...sampleReport(), matches: [], unanalyzableUnits: [], notes: [] };
    const markdown = renderReportMarkdown(toReportPayload(report));

    expect(markdown.split('\n')).toContain('No significant similarities detected.');
    expect(markdown).not.toContain('## Notes');
    expect(markdown.endsWith('\n')).toBe(true);
  });
});
