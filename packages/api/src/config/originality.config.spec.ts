import { loadOriginalityConfig } from './originality.config';

describe('loadOriginalityConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadOriginalityConfig({})).toEqual({
      deadlineMs: 30_000,
      callTimeoutMs: 8_000,
      retryBackoffMs: 250,
      retries: 1,
      retrievalK: 50,
      maxCompareChars: 50_000,
      minBlockTokens: 3,
      indexSubmissions: true,
      indexCandidateLimit: 5_000,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadOriginalityConfig({
      ORIGINALITY_DEADLINE_MS: '5000',
      ORIGINALITY_RETRIEVAL_K: '10',
      ORIGINALITY_INDEX_SUBMISSIONS: 'false',
    });

    expect(config.deadlineMs).toBe(5_000);
    expect(config.retrievalK).toBe(10);
    expect(config.indexSubmissions).toBe(false);
  });

  it('should ignore invalid numbers and keep at least one block token', () => {
    const config = loadOriginalityConfig({ ORIGINALITY_CALL_TIMEOUT_MS: 'soon', ORIGINALITY_MIN_BLOCK_TOKENS: '0' });

    expect(config.callTimeoutMs).toBe(8_000);
    expect(config.minBlockTokens).toBe(1);
  });
});
