import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import { WorkflowDatabase } from './database.types';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly db: Kysely<WorkflowDatabase>;

  constructor(config: ConfigService) {
    const connectionString = config.get<string>('DATABASE_URL');

    if (!connectionString) {
      throw new Error('DATABASE_URL is required to start the workflow engine');
    }

    const dialect = new PostgresDialect({
      pool: new Pool({ connectionString }),
    });

    this.db = new Kysely<WorkflowDatabase>({ dialect });
  }

  getDb(): Kysely<WorkflowDatabase> {
    return this.db;
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.destroy();
  }
}
