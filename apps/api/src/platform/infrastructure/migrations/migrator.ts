import { promises as fs } from 'fs';
import path from 'path';
import { Logger } from '@nestjs/common';
import {
  FileMigrationProvider,
  Kysely,
  Migrator,
  PostgresDialect,
  type MigrationResultSet,
} from 'kysely';
import { Pool } from 'pg';

const logger = new Logger('Migrations');

type MigratorConfig = {
  migrationsPath: string;
  connectionString: string;
  migrationTableName?: string;
  direction: 'up' | 'down';
};

export async function runMigrations<DB>({
  migrationsPath,
  connectionString,
  migrationTableName,
  direction,
}: MigratorConfig): Promise<boolean> {
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });

  const provider = new FileMigrationProvider({
    fs,
    path,
    migrationFolder: migrationsPath,
  });

  const migrator = new Migrator({
    db,
    provider,
    migrationTableName,
  });

  try {
    const migrationResult: MigrationResultSet =
      direction === 'down'
        ? await migrator.migrateDown()
        : await migrator.migrateToLatest();

    for (const result of migrationResult.results ?? []) {
      if (result.status === 'Success') {
        logger.log(`${result.migrationName} ${direction}`);
      } else if (result.status === 'Error') {
        logger.error(`${result.migrationName} failed`);
      }
    }

    if (migrationResult.error) {
      const { error } = migrationResult;
      logger.error(
        'Migration failed',
        error instanceof Error ? error.stack : String(error)
      );
      return false;
    }
    return true;
  } finally {
    await db.destroy();
  }
}

export function resolveConnectionString(envVar: string): string {
  const value = process.env[envVar];
  if (!value) {
    throw new Error(`Missing connection string for migrations (${envVar})`);
  }
  return value;
}
