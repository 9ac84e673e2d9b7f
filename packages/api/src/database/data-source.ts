import 'reflect-metadata';

import { DataSource } from 'typeorm';

import { OriginalityReportRecord } from '../originality/entities/originality-report.entity';
import { SubmissionEmbedding } from '../originality/entities/submission-embedding.entity';

export const AppDataSource = new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL,
  synchronize: false,
  logging: false,
  entities: [OriginalityReportRecord, SubmissionEmbedding],
  migrations: [__dirname + '/migrations/*{.ts,.js}'],
});

export default AppDataSource;
