import { Module } from '@nestjs/common';
import { GithubModule } from '../github/github.module.js';
import { CommentNotifier } from './comment-notifier.service.js';

@Module({
  imports: [GithubModule],
  providers: [CommentNotifier],
  exports: [CommentNotifier],
})
export class NotificationsModule {}
