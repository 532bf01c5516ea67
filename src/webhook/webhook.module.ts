import { DynamicModule, Module } from '@nestjs/common';
import type { StorageDriver } from '../config/app.config.js';
import { IssuesModule } from '../issues/issues.module.js';
import { NotificationsModule } from '../notifications/notifications.module.js';
import { SimilarityModule } from '../similarity/similarity.module.js';
import { WebhookController } from './webhook.controller.js';
import { WebhookSignatureGuard } from './webhook-signature.guard.js';
import { IssueWebhookService } from './webhook.service.js';

@Module({})
export class WebhookModule {
  static forRoot(storage: StorageDriver): DynamicModule {
    return {
      module: WebhookModule,
      imports: [IssuesModule.forRoot(storage), SimilarityModule, NotificationsModule],
      controllers: [WebhookController],
      providers: [IssueWebhookService, WebhookSignatureGuard],
      exports: [IssueWebhookService],
    };
  }
}
