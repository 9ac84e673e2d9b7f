import { MigrationInterface, QueryRunner } from 'typeorm';

export class OriginalitySchema1760000000000 implements MigrationInterface {
  name = 'OriginalitySchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "pgcrypto";');

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS originality_reports (
        id uuid PRIMARY KEY,
        submission_id varchar NOT NULL,
        author_id varchar NOT NULL,
        originality_score numeric(5,2) NOT NULL,
        risk_level varchar NOT NULL,
        payload jsonb NOT NULL,
        created_at timestamptz NOT NULL DEFAULT now()
      );
    `);
    await queryRunner.query(
      'CREATE INDEX IF NOT EXISTS idx_originality_reports_submission_id ON originality_reports (submission_id);',
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS submission_embeddings (
        id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
        submission_id varchar NOT NULL,
        author_id varchar NOT NULL,
        file_name varchar NOT NULL,
        content_kind varchar NOT NULL,
        embedding jsonb NOT NULL,
        excerpt text NOT NULL,
        created_at timestamptz NOT NULL DEFAULT now()
      );
    `);
    await queryRunner.query(
      'CREATE INDEX IF NOT EXISTS idx_submission_embeddings_kind_author ON submission_embeddings (content_kind, author_id);',
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE IF EXISTS submission_embeddings;');
    await queryRunner.query('DROP TABLE IF EXISTS originality_reports;');
  }
}
