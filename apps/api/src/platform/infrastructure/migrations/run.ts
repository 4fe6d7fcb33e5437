import path from 'path';
import { Logger } from '@nestjs/common';
import { config } from 'dotenv';
import { resolveConnectionString, runMigrations } from './migrator';
import type { WorkflowDatabase } from '../database/database.types';

config();

async function main(): Promise<void> {
  const connectionString = resolveConnectionString('DATABASE_URL');

  const succeeded = await runMigrations<WorkflowDatabase>({
    migrationsPath: path.join(__dirname, 'workflow'),
    connectionString,
    migrationTableName: 'workflow_migrations',
    direction: process.argv[2] === 'down' ? 'down' : 'up',
  });

  if (!succeeded) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  new Logger('Migrations').error(
    'Migration run failed',
    error instanceof Error ? error.stack : String(error)
  );
  process.exit(1);
});
