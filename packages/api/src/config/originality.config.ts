import { registerAs } from '@nestjs/config';

export interface OriginalityConfig {
  deadlineMs: number;
  callTimeoutMs: number;
  retryBackoffMs: number;
  retries: number;
  retrievalK: number;
  maxCompareChars: number;
  minBlockTokens: number;
  indexSubmissions: boolean;
  indexCandidateLimit: number;
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadOriginalityConfig(env: NodeJS.ProcessEnv = process.env): OriginalityConfig {
  return {
    deadlineMs: readInt(env.ORIGINALITY_DEADLINE_MS, 30_000),
    callTimeoutMs: readInt(env.ORIGINALITY_CALL_TIMEOUT_MS, 8_000),
    retryBackoffMs: readInt(env.ORIGINALITY_RETRY_BACKOFF_MS, 250),
    // Outbound calls get at most one retry.
    retries: 1,
    retrievalK: readInt(env.ORIGINALITY_RETRIEVAL_K, 50),
    maxCompareChars: readInt(env.ORIGINALITY_MAX_COMPARE_CHARS, 50_000),
    minBlockTokens: Math.max(1, readInt(env.ORIGINALITY_MIN_BLOCK_TOKENS, 3)),
    indexSubmissions: readBool(env.ORIGINALITY_INDEX_SUBMISSIONS, true),
    indexCandidateLimit: readInt(env.ORIGINALITY_INDEX_CANDIDATE_LIMIT, 5_000),
  };
}

export const originalityConfig = registerAs('originality', () => loadOriginalityConfig());
