import { ContentKind } from './originality.types';

export const TEXT_GENERATION_CLIENT = Symbol('TEXT_GENERATION_CLIENT');
export const EMBEDDING_CLIENT = Symbol('EMBEDDING_CLIENT');
export const SUBMISSION_INDEX = Symbol('SUBMISSION_INDEX');

export interface CompletionConstraints {
  system: string;
  maxTokens: number;
  temperature: number;
  /** Ask the model for a JSON object. */
  json?: boolean;
}

/**
 * Implementations throw SubsystemUnavailableError when the model cannot be
 * reached; callers own timeouts and retries.
 */
export interface TextGenerationClient {
  complete(prompt: string, constraints: CompletionConstraints): Promise<string>;
}

export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
}

export interface SearchFilter {
  contentKind: ContentKind;
  excludeAuthorId: string;
  excludeSubmissionId: string;
}

export interface SearchHit {
  submissionId: string;
  authorId: string;
  similarity: number;
  excerpt: string;
}

export interface SearchResult {
  hits: SearchHit[];
  /** Number of stored entries considered; 0 means the index holds nothing comparable. */
  searched: number;
}

export interface IndexEntry {
  submissionId: string;
  authorId: string;
  fileName: string;
  contentKind: ContentKind;
  embedding: number[];
  excerpt: string;
}

export interface SubmissionIndex {
  search(vector: number[], k: number, filter: SearchFilter): Promise<SearchResult>;
  add(entries: IndexEntry[]): Promise<void>;
}
