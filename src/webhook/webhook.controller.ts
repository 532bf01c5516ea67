import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  Inject,
  InternalServerErrorException,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { IssueWebhookService } from './webhook.service.js';
import type { WebhookOutcome } from './webhook.service.js';
import { SIGNATURE_HEADER, WebhookSignatureGuard } from './webhook-signature.guard.js';

@ApiTags('github')
@Controller('github')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(@Inject(IssueWebhookService) private readonly issues: IssueWebhookService) {}

  // POST /github/webhook  (GitHub App / repository webhook, content type application/json)
  @Post('webhook')
  @HttpCode(200)
  @UseGuards(WebhookSignatureGuard)
  @ApiOperation({ summary: 'Receive a GitHub webhook delivery; only "issues" events are processed' })
  @ApiHeader({ name: 'x-github-event', required: true })
  @ApiHeader({ name: SIGNATURE_HEADER, required: false })
  async receive(
    @Headers('x-github-event') event: string | undefined,
    @Headers('x-github-delivery') delivery: string | undefined,
    @Body() body: unknown,
  ): Promise<WebhookOutcome> {
    this.logger.log(`Received GitHub ${event ?? 'unknown'} webhook (delivery ${delivery ?? 'n/a'})`);

    if (event === 'ping') {
      return { status: 'success', message: 'pong' };
    }
    if (event !== 'issues') {
      return { status: 'skipped', message: `Event "${event ?? 'unknown'}" is not handled` };
    }

    const outcome = await this.issues.handle(body);
    if (outcome.status !== 'error') return outcome;

    if (outcome.errorCode === 'MALFORMED_PAYLOAD') {
      throw new BadRequestException(outcome);
    }
    throw new InternalServerErrorException(outcome);
  }
}
