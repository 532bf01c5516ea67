// src/database/data-source.ts
import 'reflect-metadata';
import 'dotenv/config';

import { DataSource } from 'typeorm';
import path from 'path';

const isProd = process.env.NODE_ENV === 'production';
const DATABASE_URL = process.env.DATABASE_URL;

const migrationsGlob = isProd
  ? path.join(__dirname, 'migrations', '*.js')
  : path.join(__dirname, 'migrations', '*.ts');

const entitiesArr: string[] = [
  path.join(__dirname, '..', 'issues', '**', '*.entity.{ts,js}'),
];

const dataSource = new DataSource({
  type: 'postgres',
  url: DATABASE_URL,
  ssl: isProd ? { rejectUnauthorized: false } : false,

  entities: entitiesArr,

  migrations: [migrationsGlob],
  migrationsTableName: 'typeorm_migrations',
  schema: 'public',
  logging: false,
});

export default dataSource;
