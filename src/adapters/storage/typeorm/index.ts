/**
 * TypeORM Storage Adapter (PostgreSQL in production)
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export { createDataSource, createTypeORMConfig } from './typeorm.config';
export * from './entities';
