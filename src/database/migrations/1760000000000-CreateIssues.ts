import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateIssues1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'issues',
        columns: [
          { name: 'issue_id', type: 'varchar', isPrimary: true },
          { name: 'issue_number', type: 'int' },
          { name: 'repository_name', type: 'varchar' },
          { name: 'title', type: 'text', default: "''" },
          { name: 'body', type: 'text', isNullable: true },
          { name: 'author_login', type: 'varchar', isNullable: true },
          { name: 'state', type: 'varchar', length: '16' },
          { name: 'state_reason', type: 'varchar', isNullable: true },
          { name: 'locked', type: 'boolean', default: false },
          { name: 'html_url', type: 'varchar', isNullable: true },
          { name: 'labels', type: 'jsonb', default: "'[]'::jsonb" },
          { name: 'assignees', type: 'jsonb', default: "'[]'::jsonb" },
          { name: 'created_at', type: 'timestamptz', isNullable: true },
          { name: 'updated_at', type: 'timestamptz', isNullable: true },
          { name: 'closed_at', type: 'timestamptz', isNullable: true },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'issues',
      new TableIndex({
        name: 'IDX_ISSUES_REPOSITORY_NUMBER',
        columnNames: ['repository_name', 'issue_number'],
        isUnique: true,
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('issues');
  }
}
