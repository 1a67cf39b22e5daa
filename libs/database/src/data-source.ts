import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { Document } from './entities/document.entity';

/**
 * Load env vars from the project root .env file.
 * Supports running both from source and from dist/.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource for CLI-driven migrations
 * (`typeorm migration:run -d dist/libs/database/src/data-source.js`).
 *
 * Dev defaults only; production must set the POSTGRES_* variables.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'papertrail',
  password: process.env['POSTGRES_PASSWORD'] || 'papertrail_secret',
  database: process.env['POSTGRES_DB'] || 'papertrail',
  entities: [Document],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
