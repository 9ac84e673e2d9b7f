import { SubsystemUnavailableError } from '../../common/errors/originality.errors';
import { SearchFilter, SearchResult } from '../collaborators';
import { Submission } from '../originality.types';
import { buildContentUnit } from '../text/normalizer';
import { CrossSubmissionRetriever, RetrievalOptions } from './cross-submission-retriever';

const options: RetrievalOptions = { k: 50, maxChars: 50_000, minBlockTokens: 3, timeoutMs: 1_000, retries: 1, backoffMs: 0 };

const ESSAY = 'the quick brown fox jumps over the lazy dog';

function submission(...texts: string[]): Submission {
  return {
    id: 'sub-1',
    authorId: 'author-1',
    createdAt: new Date('2026-01-01T00:00:00Z'),
    units: texts.map((text, i) =>
      buildContentUnit({ fileName: `part${i}.txt`, text, contentKind: 'natural_language' }, i),
    ),
  };
}

function setup(search: (vector: number[], k: number, filter: SearchFilter) => Promise<SearchResult>) {
  const embed = jest.fn(async (_text: string) => [0.1, 0.2, 0.3]);
  const index = { search: jest.fn(search), add: jest.fn(async () => undefined) };
  const retriever = new CrossSubmissionRetriever({ embed }, index, options);
  return { embed, index, retriever };
}

describe('CrossSubmissionRetriever', () => {
  it('should keep hits at or above the retain threshold, strongest first', async () => {
    const excerpt = 'a quick brown fox jumps high';
    const { index, retriever } = setup(async () => ({
      searched: 12,
      hits: [
        { submissionId: 'old-1', authorId: 'author-2', similarity: 0.82, excerpt },
        { submissionId: 'old-2', authorId: 'author-3', similarity: 0.35, excerpt },
        { submissionId: 'old-3', authorId: 'author-4', similarity: 0.55, excerpt },
      ],
    }));

    const result = await retriever.retrieve(submission(ESSAY));

    expect(index.search).toHaveBeenCalledWith([0.1, 0.2, 0.3], 50, {
      contentKind: 'natural_language',
      excludeAuthorId: 'author-1',
      excludeSubmissionId: 'sub-1',
    });
    expect(result.checked).toBe(true);
    expect(result.notes).toEqual([]);
    expect(result.matches.map((match) => [match.score, match.flagged])).toEqual([
      [0.82, true],
      [0.55, false],
    ]);
    expect(result.matches[0].kind).toBe('semantic');
    expect(result.matches[0].target).toEqual({ type: 'external', submissionId: 'old-1', authorId: 'author-2', excerpt });
    expect(result.matches[0].spans).toEqual([{ source: { start: 4, end: 25 }, target: { start: 2, end: 23 } }]);
  });

  it('should order equal scores by source unit then submission id', async () => {
    const { retriever } = setup(async () => ({
      searched: 2,
      hits: [
        { submissionId: 'old-b', authorId: 'author-2', similarity: 0.9, excerpt: ESSAY },
        { submissionId: 'old-a', authorId: 'author-3', similarity: 0.9, excerpt: ESSAY },
      ],
    }));

    const result = await retriever.retrieve(submission(ESSAY, ESSAY));

    expect(
      result.matches.map((match) => [match.source.unitIndex, match.target.type === 'external' ? match.target.submissionId : '']),
    ).toEqual([
      [0, 'old-a'],
      [0, 'old-b'],
      [1, 'old-a'],
      [1, 'old-b'],
    ]);
  });

  it('should report an empty index as unchecked', async () => {
    const { retriever } = setup(async () => ({ searched: 0, hits: [] }));

    const result = await retriever.retrieve(submission(ESSAY));

    expect(result.checked).toBe(false);
    expect(result.matches).toEqual([]);
    expect(result.embeddings).toHaveLength(1);
    expect(result.notes).toEqual(['part0.txt: no prior submissions to compare against']);
  });

  it('should retry the embedding once and then report it unavailable', async () => {
    const { embed, index, retriever } = setup(async () => ({ searched: 1, hits: [] }));
    embed.mockRejectedValue(new SubsystemUnavailableError('embedding', 'connection reset'));

    const result = await retriever.retrieve(submission(ESSAY));

    expect(embed).toHaveBeenCalledTimes(2);
    expect(index.search).not.toHaveBeenCalled();
    expect(result).toEqual({ matches: [], checked: false, embeddings: [], notes: ['part0.txt: embedding unavailable'] });
  });

  it('should not retry a non-retryable failure', async () => {
    const { embed, retriever } = setup(async () => ({ searched: 1, hits: [] }));
    embed.mockRejectedValue(new SubsystemUnavailableError('embedding', 'not configured', false));

    await retriever.retrieve(submission(ESSAY));

    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('should keep the embedding when the index fails', async () => {
    const { retriever } = setup(async () => {
      throw new SubsystemUnavailableError('submission index', 'connection refused');
    });

    const result = await retriever.retrieve(submission(ESSAY));

    expect(result.checked).toBe(false);
    expect(result.embeddings).toHaveLength(1);
    expect(result.notes).toEqual(['part0.txt: submission index unavailable']);
  });

  it('should count the submission as checked when any unit was searched', async () => {
    const searches: SearchResult[] = [
      { searched: 0, hits: [] },
      { searched: 4, hits: [] },
    ];
    const { retriever } = setup(async () => searches.shift() ?? { searched: 0, hits: [] });

    const result = await retriever.retrieve(submission(ESSAY, 'another paragraph of plain words'));

    expect(result.checked).toBe(true);
  });
});
