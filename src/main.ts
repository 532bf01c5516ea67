import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter } from '@nestjs/platform-fastify';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module.js';
import { loadAppConfig } from './config/app.config.js';

async function bootstrap() {
  const config = loadAppConfig();
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule.forRoot(config),
    new FastifyAdapter(),
    {
      rawBody: true, // read by WebhookSignatureGuard
      logger: ['error', 'warn', 'log', 'debug', 'verbose'],
    },
  );
  app.enableShutdownHooks();

  const docConfig = new DocumentBuilder()
    .setTitle('Issue Reply API')
    .setDescription('GitHub issues webhook receiver')
    .setVersion('1.0.0')
    .build();

  const doc = SwaggerModule.createDocument(app, docConfig);
  SwaggerModule.setup('docs', app, doc);

  await app.listen(config.port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`📚 Swagger documentation: http://localhost:${config.port}/docs`);
  logger.log(`🌍 Environment: ${config.environment}`);
  logger.log(`🗄️  Storage: ${config.storageDriver}`);
  logger.log(`🔐 Webhook signatures: ${config.webhookSecret ? 'verified' : 'not verified'}`);
  logger.log(`🏷️  Reply label: ${config.replyLabel}`);
}
bootstrap().catch((err) => {
  console.error('Application failed to start:', err);
  process.exit(1);
});
