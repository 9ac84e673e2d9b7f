import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { AzureModule } from '../integrations/azure/azure.module';
import { AzureOpenAiService } from '../integrations/azure/azure-openai.service';
import { EMBEDDING_CLIENT, SUBMISSION_INDEX, TEXT_GENERATION_CLIENT } from './collaborators';
import { OriginalityReportRecord } from './entities/originality-report.entity';
import { SubmissionEmbedding } from './entities/submission-embedding.entity';
import { OriginalityController } from './originality.controller';
import { OriginalityEngine } from './originality.engine';
import { OriginalityService } from './originality.service';
import { PgSubmissionIndexService } from './retrieval/pg-submission-index.service';

@Module({
  imports: [AzureModule, TypeOrmModule.forFeature([OriginalityReportRecord, SubmissionEmbedding])],
  controllers: [OriginalityController],
  providers: [
    { provide: TEXT_GENERATION_CLIENT, useExisting: AzureOpenAiService },
    { provide: EMBEDDING_CLIENT, useExisting: AzureOpenAiService },
    { provide: SUBMISSION_INDEX, useClass: PgSubmissionIndexService },
    OriginalityEngine,
    OriginalityService,
  ],
  exports: [OriginalityEngine],
})
export class OriginalityModule {}
