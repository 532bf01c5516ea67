import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  RawBodyRequest,
  UnauthorizedException,
} from '@nestjs/common';
import { createHmac, timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';

export const SIGNATURE_HEADER = 'x-hub-signature-256';

export function signPayload(secret: string, body: Buffer | string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

export function verifySignature(secret: string, body: Buffer | string, signature: string): boolean {
  const expected = Buffer.from(signPayload(secret, body));
  const given = Buffer.from(signature);
  return expected.length === given.length && timingSafeEqual(expected, given);
}

@Injectable()
export class WebhookSignatureGuard implements CanActivate {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const secret = this.config.webhookSecret;

    // Unsigned deliveries are accepted outside production
    if (!secret) {
      if (this.config.environment !== 'production') return true;
      throw new Error('GITHUB_WEBHOOK_SECRET environment variable is not configured');
    }

    const request = context.switchToHttp().getRequest<RawBodyRequest<FastifyRequest>>();
    const signature = this.extractSignature(request);
    if (!signature) {
      throw new UnauthorizedException('Missing webhook signature');
    }

    if (!request.rawBody || !verifySignature(secret, request.rawBody, signature)) {
      throw new UnauthorizedException('Invalid webhook signature');
    }

    return true;
  }

  private extractSignature(request: FastifyRequest): string | undefined {
    const header = request.headers[SIGNATURE_HEADER];
    const value = Array.isArray(header) ? header[0] : header;
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
  }
}
