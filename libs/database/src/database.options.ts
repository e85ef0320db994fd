import type { DataSourceOptions } from 'typeorm';
import { User } from './entities/user.entity';
import { InitialSchema1760000000000 } from './migrations/1760000000000-InitialSchema';

/** All entity classes registered in this database library */
export const ENTITIES = [User] as const;

/** Migrations in the order they must be applied */
export const MIGRATIONS = [InitialSchema1760000000000] as const;

export interface DatabaseSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  /** Log SQL statements (development only) */
  logging: boolean;
}

/**
 * Builds the PostgreSQL data source options shared by the API's TypeORM module.
 *
 * Schema changes go through migrations only; `synchronize` stays off.
 */
export function buildDataSourceOptions(
  settings: DatabaseSettings,
): DataSourceOptions {
  return {
    type: 'postgres',
    host: settings.host,
    port: settings.port,
    username: settings.username,
    password: settings.password,
    database: settings.database,
    entities: [...ENTITIES],
    migrations: [...MIGRATIONS],
    migrationsRun: true,
    synchronize: false,
    logging: settings.logging,
  };
}
