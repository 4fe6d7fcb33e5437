import { Kysely } from 'kysely';
import type { WorkflowDatabase } from '@platform/infrastructure/database/database.types';
import {
  UserRepository,
  UserSummary,
} from '../application/ports/user-repository';

export class KyselyUserRepository extends UserRepository {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async findByUserNames(userNames: readonly string[]): Promise<UserSummary[]> {
    if (userNames.length === 0) return [];
    const rows = await this.db
      .selectFrom('workflow.users')
      .select(['id', 'user_name'])
      .where('user_name', 'in', [...userNames])
      .execute();
    return rows.map((row) => ({ id: row.id, userName: row.user_name }));
  }
}
