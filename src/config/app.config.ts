import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { POSTGRES_ISSUE_TABLE } from '../issues/table/issue-table.js';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type StorageDriver = 'postgres' | 'memory';

export interface AppConfig {
  environment: string;
  port: number;
  storageDriver: StorageDriver;
  databaseUrl: string | undefined;
  issueTableName: string;
  replyLabel: string;
  githubToken: string | undefined;
  webhookSecret: string | undefined;
  similarityLimitPerField: number;
  commentWhenNoMatches: boolean;
  tableTimeoutMs: number;
  enrichmentTimeoutMs: number;
}

const logger = new Logger('AppConfig');

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(`${key}="${raw}" is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function flag(env: NodeJS.ProcessEnv, key: string): boolean {
  return ['1', 'true', 'yes'].includes((env[key] ?? '').trim().toLowerCase());
}

function storageDriver(env: NodeJS.ProcessEnv): StorageDriver {
  const raw = env.STORAGE_DRIVER?.trim().toLowerCase();
  if (raw === 'postgres' || raw === 'memory') return raw;
  if (raw) logger.warn(`Unknown STORAGE_DRIVER "${raw}", falling back`);
  return env.DATABASE_URL ? 'postgres' : 'memory';
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

// The postgres driver has a single mapped table.
function issueTableName(env: NodeJS.ProcessEnv, driver: StorageDriver): string {
  const requested = nonEmpty(env.ISSUE_TABLE_NAME);
  if (driver === 'postgres' && requested && requested !== POSTGRES_ISSUE_TABLE) {
    logger.warn(
      `ISSUE_TABLE_NAME="${requested}" is not supported with STORAGE_DRIVER=postgres, using "${POSTGRES_ISSUE_TABLE}"`,
    );
    return POSTGRES_ISSUE_TABLE;
  }
  return requested ?? POSTGRES_ISSUE_TABLE;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const driver = storageDriver(env);
  return {
    environment: env.NODE_ENV || 'development',
    port: positiveInt(env, 'PORT', 3000),
    storageDriver: driver,
    databaseUrl: nonEmpty(env.DATABASE_URL),
    issueTableName: issueTableName(env, driver),
    replyLabel: nonEmpty(env.REPLY_LABEL) ?? 'needs-reply',
    githubToken: nonEmpty(env.GITHUB_TOKEN),
    webhookSecret: nonEmpty(env.GITHUB_WEBHOOK_SECRET),
    similarityLimitPerField: positiveInt(env, 'SIMILARITY_LIMIT_PER_FIELD', 10),
    commentWhenNoMatches: flag(env, 'COMMENT_WHEN_NO_MATCHES'),
    tableTimeoutMs: positiveInt(env, 'TABLE_TIMEOUT_MS', 5000),
    enrichmentTimeoutMs: positiveInt(env, 'ENRICHMENT_TIMEOUT_MS', 10000),
  };
}
