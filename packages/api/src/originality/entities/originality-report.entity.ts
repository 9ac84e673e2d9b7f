import { Column, CreateDateColumn, Entity, Index, PrimaryColumn } from 'typeorm';

import type { OriginalityReportPayload } from '@originality/shared';

/** One finished report. Rows are inserted once and never updated. */
@Entity('originality_reports')
export class OriginalityReportRecord {
  @PrimaryColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'submission_id' })
  submissionId!: string;

  @Column({ name: 'author_id' })
  authorId!: string;

  @Column({ name: 'originality_score', type: 'numeric', precision: 5, scale: 2 })
  originalityScore!: string;

  @Column({ name: 'risk_level' })
  riskLevel!: 'low' | 'medium' | 'high' | 'critical';

  @Column({ type: 'jsonb' })
  payload!: OriginalityReportPayload;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
