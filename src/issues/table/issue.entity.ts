import { Column, Entity, PrimaryColumn } from 'typeorm';
import type { LabelDescriptor, UserDescriptor } from '../types.js';
import { POSTGRES_ISSUE_TABLE } from './issue-table.js';

@Entity({ name: POSTGRES_ISSUE_TABLE })
export class IssueEntity {
  @PrimaryColumn({ name: 'issue_id', type: 'varchar' })
  issueId!: string;

  @Column({ name: 'issue_number', type: 'int' })
  issueNumber!: number;

  @Column({ name: 'repository_name', type: 'varchar' })
  repositoryName!: string;

  @Column({ type: 'text', default: '' })
  title!: string;

  @Column({ type: 'text', nullable: true })
  body!: string | null;

  @Column({ name: 'author_login', type: 'varchar', nullable: true })
  authorLogin!: string | null;

  @Column({ type: 'varchar', length: 16 })
  state!: 'open' | 'closed';

  @Column({ name: 'state_reason', type: 'varchar', nullable: true })
  stateReason!: string | null;

  @Column({ type: 'boolean', default: false })
  locked!: boolean;

  @Column({ name: 'html_url', type: 'varchar', nullable: true })
  htmlUrl!: string | null;

  @Column({ type: 'jsonb', default: () => "'[]'::jsonb" })
  labels!: LabelDescriptor[];

  @Column({ type: 'jsonb', default: () => "'[]'::jsonb" })
  assignees!: UserDescriptor[];

  @Column({ name: 'created_at', type: 'timestamptz', nullable: true })
  createdAt!: Date | null;

  @Column({ name: 'updated_at', type: 'timestamptz', nullable: true })
  updatedAt!: Date | null;

  @Column({ name: 'closed_at', type: 'timestamptz', nullable: true })
  closedAt!: Date | null;
}
