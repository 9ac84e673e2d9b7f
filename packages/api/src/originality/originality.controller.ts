import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  UnprocessableEntityException,
} from '@nestjs/common';

import type { OriginalityReportPayload, ReportSummaryPayload } from '@originality/shared';

import { NoAnalyzableContentError } from '../common/errors/originality.errors';
import { AnalyzeSubmissionDto } from './dto/analyze-submission.dto';
import { OriginalityService } from './originality.service';

@Controller('originality')
export class OriginalityController {
  constructor(private readonly originalityService: OriginalityService) {}

  @Post('analyze')
  @HttpCode(201)
  async analyze(@Body() dto: AnalyzeSubmissionDto): Promise<OriginalityReportPayload> {
    try {
      return await this.originalityService.analyze(dto);
    } catch (err) {
      if (err instanceof NoAnalyzableContentError) {
        throw new UnprocessableEntityException({
          message: err.message,
          unanalyzable_units: err.unanalyzable.map((unit) => ({
            file_name: unit.fileName,
            reason: unit.reason,
          })),
        });
      }
      throw err;
    }
  }

  @Get('reports/:id')
  getReport(@Param('id', ParseUUIDPipe) id: string): Promise<OriginalityReportPayload> {
    return this.originalityService.getReport(id);
  }

  @Get('reports/:id/markdown')
  @Header('Content-Type', 'text/markdown; charset=utf-8')
  getReportMarkdown(@Param('id', ParseUUIDPipe) id: string): Promise<string> {
    return this.originalityService.getReportMarkdown(id);
  }

  @Get('submissions/:submissionId/reports')
  listForSubmission(@Param('submissionId') submissionId: string): Promise<ReportSummaryPayload[]> {
    return this.originalityService.listForSubmission(submissionId);
  }
}
