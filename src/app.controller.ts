import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { APP_CONFIG } from './config/app.config.js';
import type { AppConfig } from './config/app.config.js';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  @Get('health')
  getHealth(): { status: 'ok'; storage: string; timestamp: string } {
    return { status: 'ok', storage: this.config.storageDriver, timestamp: new Date().toISOString() };
  }
}
