import { Module } from '@nestjs/common';

import { AzureOpenAiService } from './azure-openai.service';

@Module({
  providers: [AzureOpenAiService],
  exports: [AzureOpenAiService],
})
export class AzureModule {}
