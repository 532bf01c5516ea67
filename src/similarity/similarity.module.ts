import { Module } from '@nestjs/common';
import { GithubModule } from '../github/github.module.js';
import { SimilarityService } from './similarity.service.js';

@Module({
  imports: [GithubModule],
  providers: [SimilarityService],
  exports: [SimilarityService],
})
export class SimilarityModule {}
