import { ConfigService } from '@nestjs/config';

import { NoAnalyzableContentError } from '../common/errors/originality.errors';
import { loadOriginalityConfig, OriginalityConfig } from '../config/originality.config';
import { CompletionConstraints, SearchResult, SubmissionIndex } from './collaborators';
import { OriginalityEngine } from './originality.engine';
import { SubmissionInput } from './originality.types';

const DEF_ADD_A = 'def add(a, b):\n    return a + b';
const DEF_ADD_B = 'def add(x, y): return x + y';

function settings(overrides: Partial<OriginalityConfig> = {}): ConfigService {
  return new ConfigService({
    originality: { ...loadOriginalityConfig({}), retryBackoffMs: 0, callTimeoutMs: 1_000, ...overrides },
  });
}

function input(files: SubmissionInput['files']): SubmissionInput {
  return { submissionId: 'sub-1', authorId: 'author-1', files };
}

function answering(reply: (prompt: string) => string) {
  return jest.fn(async (prompt: string, _constraints: CompletionConstraints): Promise<string> => reply(prompt));
}

function hanging() {
  return jest.fn((_prompt: string, _constraints: CompletionConstraints) => new Promise<string>(() => undefined));
}

function index(result: SearchResult): SubmissionIndex {
  return { search: jest.fn(async () => result), add: jest.fn(async () => undefined) };
}

const humanTriage = (prompt: string): string =>
  prompt.includes('Return ONLY a JSON array')
    ? '["Review the flagged files with the author."]'
    : '{"verdict": "obviously_human", "score": 10}';

describe('OriginalityEngine', () => {
  it('should produce a frozen report from every branch', async () => {
    const complete = answering(humanTriage);
    const embed = jest.fn(async (_text: string) => [1, 0]);
    const engine = new OriginalityEngine({ complete }, { embed }, index({ searched: 0, hits: [] }), settings());

    const { report, embeddings } = await engine.analyze(
      input([
        { fileName: 'a.py', text: DEF_ADD_A, contentKind: 'code' },
        { fileName: 'b.py', text: DEF_ADD_B, contentKind: 'code' },
      ]),
    );

    expect(report.matches).toHaveLength(1);
    expect(report.matches[0]).toMatchObject({ kind: 'structural', flagged: true });
    expect(report.signals.crossSubmission).toBeNull();
    expect(report.signals.authorship).toBe(0.1);
    expect(report.originalityScore).toBeCloseTo(21, 1);
    expect(report.riskLevel).toBe('critical');
    expect(report.availability).toEqual({
      internalComparisonChecked: true,
      crossSubmissionChecked: false,
      authorshipChecked: true,
      recommendationsElaborated: true,
    });
    expect(report.recommendations).toEqual(['Review the flagged files with the author.']);
    expect(report.verdicts.map((verdict) => verdict.confidence)).toEqual([10, 10]);
    expect(report.notes).toEqual([
      'a.py: no prior submissions to compare against',
      'b.py: no prior submissions to compare against',
    ]);
    expect(embeddings).toHaveLength(2);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.matches[0].spans)).toBe(true);
  });

  it('should include cross-submission hits when the index has entries', async () => {
    const engine = new OriginalityEngine(
      { complete: answering(humanTriage) },
      { embed: jest.fn(async (_text: string) => [1, 0]) },
      index({
        searched: 3,
        hits: [{ submissionId: 'old-1', authorId: 'author-2', similarity: 0.9, excerpt: DEF_ADD_A }],
      }),
      settings(),
    );

    const { report } = await engine.analyze(input([{ fileName: 'a.py', text: DEF_ADD_A, contentKind: 'code' }]));

    expect(report.availability.crossSubmissionChecked).toBe(true);
    expect(report.signals.crossSubmission).toBe(0.9);
    expect(report.matches).toHaveLength(1);
    expect(report.matches[0]).toMatchObject({ kind: 'semantic', flagged: true });
  });

  it('should skip unusable files and analyze the rest', async () => {
    const engine = new OriginalityEngine(
      { complete: answering(humanTriage) },
      { embed: jest.fn(async (_text: string) => [1, 0]) },
      index({ searched: 0, hits: [] }),
      settings(),
    );

    const { report } = await engine.analyze(
      input([
        { fileName: 'empty.txt', text: '', contentKind: 'natural_language' },
        { fileName: 'a.py', text: DEF_ADD_A, contentKind: 'code' },
      ]),
    );

    expect(report.unanalyzableUnits).toEqual([{ fileName: 'empty.txt', reason: 'empty text' }]);
    expect(report.notes[0]).toBe('empty.txt: skipped (empty text)');
    expect(report.verdicts[0].unit).toEqual({ unitIndex: 1, fileName: 'a.py' });
  });

  it('should refuse a submission with nothing to analyze', async () => {
    const engine = new OriginalityEngine(
      { complete: answering(humanTriage) },
      { embed: jest.fn(async (_text: string) => [1, 0]) },
      index({ searched: 0, hits: [] }),
      settings(),
    );

    const analysis = engine.analyze(
      input([
        { fileName: 'empty.txt', text: '   ', contentKind: 'natural_language' },
        { fileName: 'blob.bin', text: '\u0000\u0001\u0002', contentKind: 'unknown' },
      ]),
    );

    await expect(analysis).rejects.toBeInstanceOf(NoAnalyzableContentError);
    await expect(analysis).rejects.toMatchObject({
      unanalyzable: [
        { fileName: 'empty.txt', reason: 'empty text' },
        { fileName: 'blob.bin', reason: 'text looks binary or unreadable' },
      ],
    });
  });

  it('should report on time with heuristic verdicts when collaborators hang', async () => {
    const complete = hanging();
    const engine = new OriginalityEngine(
      { complete },
      { embed: jest.fn((_text: string) => new Promise<number[]>(() => undefined)) },
      index({ searched: 0, hits: [] }),
      settings({ deadlineMs: 50, callTimeoutMs: 100 }),
    );

    const startedAt = Date.now();
    const { report, embeddings } = await engine.analyze(
      input([
        { fileName: 'a.py', text: DEF_ADD_A, contentKind: 'code' },
        { fileName: 'b.py', text: DEF_ADD_B, contentKind: 'code' },
      ]),
    );

    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(embeddings).toEqual([]);
    expect(report.availability).toEqual({
      internalComparisonChecked: true,
      crossSubmissionChecked: false,
      authorshipChecked: false,
      recommendationsElaborated: false,
    });
    expect(report.verdicts.map((verdict) => verdict.fallbackReason)).toEqual(['deadline_exceeded', 'deadline_exceeded']);
    expect(report.authorshipScore).toBeNull();
    expect(report.matches).toHaveLength(1);
    expect(report.notes).toContain('Cross-submission search did not finish before the deadline.');
    expect(report.recommendations[0]).toMatch(/^Assessment: /);
  });

  it('should leave internal comparison out when it misses the deadline', async () => {
    const engine = new OriginalityEngine(
      { complete: hanging() },
      { embed: jest.fn((_text: string) => new Promise<number[]>(() => undefined)) },
      index({ searched: 0, hits: [] }),
      settings({ deadlineMs: 0, callTimeoutMs: 100 }),
    );

    const { report } = await engine.analyze(
      input([
        { fileName: 'a.py', text: DEF_ADD_A, contentKind: 'code' },
        { fileName: 'b.py', text: DEF_ADD_B, contentKind: 'code' },
      ]),
    );

    expect(report.availability).toEqual({
      internalComparisonChecked: false,
      crossSubmissionChecked: false,
      authorshipChecked: false,
      recommendationsElaborated: false,
    });
    expect(report.matches).toEqual([]);
    expect(report.signals.internalDuplication).toBeNull();
    expect(report.notes).toContain('Internal comparison did not finish before the deadline.');
  });
});
