import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { Document } from './entities/document.entity';
import { Job } from './entities/job.entity';
import { Extraction } from './entities/extraction.entity';

/**
 * Load env vars from the project root .env file.
 * Supports both running from libs/database/ and from project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations
 * (`typeorm migration:run` / `migration:revert`).
 *
 * Credentials come from the environment with local dev defaults.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'sheetwise',
  password: process.env['POSTGRES_PASSWORD'] || 'sheetwise_dev',
  database: process.env['POSTGRES_DB'] || 'sheetwise',
  entities: [Document, Job, Extraction],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
