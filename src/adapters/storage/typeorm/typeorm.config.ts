import { DataSource, DataSourceOptions } from 'typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { WebmentionEntity } from './entities';

/**
 * TypeORM configuration for the Webmention store (PostgreSQL)
 */
export const createTypeORMConfig = (
  options?: Partial<PostgresConnectionOptions>,
): PostgresConnectionOptions => {
  const defaultConfig: PostgresConnectionOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'webmentions',
    password: process.env.DB_PASSWORD || 'webmentions',
    database: process.env.DB_NAME || 'webmentions',
    entities: [WebmentionEntity],
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  return {
    ...defaultConfig,
    ...options,
  };
};

/**
 * Create a TypeORM DataSource holding the Webmention entity.
 * Without options, connects to PostgreSQL using the DB_* environment.
 */
export const createDataSource = (options?: DataSourceOptions): DataSource => {
  if (!options) {
    return new DataSource(createTypeORMConfig());
  }
  return new DataSource({ ...options, entities: [WebmentionEntity] });
};
