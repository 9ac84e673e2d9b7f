import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

import type { ContentKind } from '../originality.types';

@Entity('submission_embeddings')
@Index(['contentKind', 'authorId'])
export class SubmissionEmbedding {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'submission_id' })
  submissionId!: string;

  @Column({ name: 'author_id' })
  authorId!: string;

  @Column({ name: 'file_name' })
  fileName!: string;

  @Column({ name: 'content_kind' })
  contentKind!: ContentKind;

  @Column({ type: 'jsonb' })
  embedding!: number[];

  @Column({ type: 'text' })
  excerpt!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
