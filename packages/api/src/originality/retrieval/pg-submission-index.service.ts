import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Not, Repository } from 'typeorm';

import { errorMessage, SubsystemUnavailableError } from '../../common/errors/originality.errors';
import { loadOriginalityConfig, OriginalityConfig } from '../../config/originality.config';
import { IndexEntry, SearchFilter, SearchResult, SubmissionIndex } from '../collaborators';
import { SubmissionEmbedding } from '../entities/submission-embedding.entity';
import { cosineSimilarity } from './cosine-similarity';

/**
 * Submission index over the submission_embeddings table. Candidates are the
 * most recent rows matching the filter; ranking happens in process.
 */
@Injectable()
export class PgSubmissionIndexService implements SubmissionIndex {
  private readonly logger = new Logger(PgSubmissionIndexService.name);
  private readonly candidateLimit: number;

  constructor(
    @InjectRepository(SubmissionEmbedding)
    private readonly embeddingsRepo: Repository<SubmissionEmbedding>,
    configService: ConfigService,
  ) {
    const settings = configService.get<OriginalityConfig>('originality') ?? loadOriginalityConfig();
    this.candidateLimit = settings.indexCandidateLimit;
  }

  async search(vector: number[], k: number, filter: SearchFilter): Promise<SearchResult> {
    let candidates: SubmissionEmbedding[];
    try {
      candidates = await this.embeddingsRepo.find({
        where: {
          contentKind: filter.contentKind,
          authorId: Not(filter.excludeAuthorId),
          submissionId: Not(filter.excludeSubmissionId),
        },
        order: { createdAt: 'DESC' },
        take: this.candidateLimit,
      });
    } catch (err) {
      this.logger.error('Submission index query failed', err);
      throw new SubsystemUnavailableError('submission index', errorMessage(err));
    }

    const hits = candidates
      .map((candidate) => ({
        submissionId: candidate.submissionId,
        authorId: candidate.authorId,
        similarity: cosineSimilarity(vector, candidate.embedding),
        excerpt: candidate.excerpt,
      }))
      .sort((a, b) => b.similarity - a.similarity || a.submissionId.localeCompare(b.submissionId))
      .slice(0, k);

    return { hits, searched: candidates.length };
  }

  async add(entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;
    try {
      await this.embeddingsRepo.insert(
        entries.map((entry) =>
          this.embeddingsRepo.create({
            submissionId: entry.submissionId,
            authorId: entry.authorId,
            fileName: entry.fileName,
            contentKind: entry.contentKind,
            embedding: entry.embedding,
            excerpt: entry.excerpt,
          }),
        ),
      );
    } catch (err) {
      this.logger.error('Submission index insert failed', err);
      throw new SubsystemUnavailableError('submission index', errorMessage(err));
    }
  }
}
