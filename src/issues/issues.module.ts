import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { StorageDriver } from '../config/app.config.js';
import { ReconciliationService } from './reconciliation.service.js';
import { ReplyDecisionService } from './reply-decision.js';
import { IssueEntity } from './table/issue.entity.js';
import { ISSUE_TABLE_FACTORY } from './table/issue-table.js';
import { MemoryIssueTableFactory } from './table/issue.memory.table.js';
import { TypeOrmIssueTableFactory } from './table/issue.typeorm.table.js';

const TableBindings: Record<StorageDriver, Provider> = {
  postgres: { provide: ISSUE_TABLE_FACTORY, useClass: TypeOrmIssueTableFactory },
  memory: { provide: ISSUE_TABLE_FACTORY, useClass: MemoryIssueTableFactory },
};

@Module({})
export class IssuesModule {
  static forRoot(storage: StorageDriver): DynamicModule {
    return {
      module: IssuesModule,
      imports: storage === 'postgres' ? [TypeOrmModule.forFeature([IssueEntity])] : [],
      providers: [TableBindings[storage], ReplyDecisionService, ReconciliationService],
      exports: [ISSUE_TABLE_FACTORY, ReconciliationService],
    };
  }
}
