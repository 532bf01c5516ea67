// src/app.module.ts
import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';

import dataSource from './database/data-source.js';
import { AppController } from './app.controller.js';
import type { AppConfig } from './config/app.config.js';
import { ConfigModule } from './config/config.module.js';
import { IssueEntity } from './issues/table/issue.entity.js';
import { WebhookModule } from './webhook/webhook.module.js';

function pgConfig(config: AppConfig): TypeOrmModuleOptions {
  if (config.databaseUrl) {
    return {
      type: 'postgres',
      url: config.databaseUrl,
      ssl: config.environment === 'production' ? { rejectUnauthorized: false } : false,
      entities: [IssueEntity],
      synchronize: false,
    };
  }
  return {
    ...dataSource.options,
    entities: [IssueEntity],
    synchronize: false,
  };
}

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    const database = config.storageDriver === 'postgres' ? [TypeOrmModule.forRoot(pgConfig(config))] : [];

    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(config), ...database, WebhookModule.forRoot(config.storageDriver)],
      controllers: [AppController],
    };
  }
}
