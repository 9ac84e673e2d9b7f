import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import type { OriginalityReportPayload, ReportSummaryPayload } from '@originality/shared';

import { errorMessage } from '../common/errors/originality.errors';
import { loadOriginalityConfig, OriginalityConfig } from '../config/originality.config';
import { SUBMISSION_INDEX, SubmissionIndex } from './collaborators';
import { AnalyzeSubmissionDto } from './dto/analyze-submission.dto';
import { OriginalityReportRecord } from './entities/originality-report.entity';
import { OriginalityEngine } from './originality.engine';
import { toReportPayload } from './reports/report-payload';
import { renderReportMarkdown } from './reports/report-markdown';
import { UnitEmbedding } from './retrieval/cross-submission-retriever';

const INDEX_EXCERPT_CHARS = 2_000;

@Injectable()
export class OriginalityService {
  private readonly logger = new Logger(OriginalityService.name);
  private readonly settings: OriginalityConfig;

  constructor(
    private readonly engine: OriginalityEngine,
    @InjectRepository(OriginalityReportRecord)
    private readonly reportsRepo: Repository<OriginalityReportRecord>,
    @Inject(SUBMISSION_INDEX)
    private readonly submissionIndex: SubmissionIndex,
    configService: ConfigService,
  ) {
    this.settings = configService.get<OriginalityConfig>('originality') ?? loadOriginalityConfig();
  }

  /**
   * Runs the engine, stores the report and indexes the submission for later
   * cross-submission searches. Indexing failures are logged only.
   */
  async analyze(dto: AnalyzeSubmissionDto): Promise<OriginalityReportPayload> {
    const { report, embeddings } = await this.engine.analyze({
      submissionId: dto.submission_id,
      authorId: dto.author_id,
      createdAt: dto.created_at ? new Date(dto.created_at) : undefined,
      files: dto.files.map((file) => ({
        fileName: file.file_name,
        text: file.text,
        contentKind: file.content_kind ?? 'unknown',
      })),
    });

    const payload = toReportPayload(report);
    await this.reportsRepo.insert({
      id: report.reportId,
      submissionId: report.submissionId,
      authorId: report.authorId,
      originalityScore: report.originalityScore.toFixed(2),
      riskLevel: report.riskLevel,
      payload,
    });

    if (this.settings.indexSubmissions) {
      await this.indexSubmission(report.submissionId, report.authorId, embeddings);
    }

    return payload;
  }

  async getReport(reportId: string): Promise<OriginalityReportPayload> {
    const record = await this.reportsRepo.findOne({ where: { id: reportId } });
    if (!record) {
      throw new NotFoundException('Report not found.');
    }
    return record.payload;
  }

  async getReportMarkdown(reportId: string): Promise<string> {
    return renderReportMarkdown(await this.getReport(reportId));
  }

  async listForSubmission(submissionId: string): Promise<ReportSummaryPayload[]> {
    const records = await this.reportsRepo.find({
      where: { submissionId },
      order: { createdAt: 'DESC' },
    });
    return records.map((record) => ({
      report_id: record.id,
      submission_id: record.submissionId,
      originality_score: Number(record.originalityScore),
      risk_level: record.riskLevel,
      created_at: record.createdAt.toISOString(),
    }));
  }

  private async indexSubmission(
    submissionId: string,
    authorId: string,
    embeddings: UnitEmbedding[],
  ): Promise<void> {
    if (embeddings.length === 0) return;
    try {
      await this.submissionIndex.add(
        embeddings.map(({ unit, embedding }) => ({
          submissionId,
          authorId,
          fileName: unit.fileName,
          contentKind: unit.kind,
          embedding,
          excerpt: unit.normalizedText.slice(0, INDEX_EXCERPT_CHARS),
        })),
      );
    } catch (err) {
      this.logger.warn(`Could not index submission ${submissionId}: ${errorMessage(err)}`);
    }
  }
}
