import { Kysely } from 'kysely';
import {
  parseSubmissionStatus,
  type SubmissionStatusHistoryEntry,
} from '@tasflow/domain';
import type { WorkflowDatabase } from '@platform/infrastructure/database/database.types';
import { StatusHistoryRepository } from '../application/ports/status-history-repository';

export class KyselyStatusHistoryRepository extends StatusHistoryRepository {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async append(entry: SubmissionStatusHistoryEntry): Promise<void> {
    await this.db
      .insertInto('workflow.submission_status_history')
      .values({
        submission_id: entry.submissionId,
        status: entry.status,
        created_at: entry.createdAt,
      })
      .execute();
  }

  async listFor(submissionId: number): Promise<SubmissionStatusHistoryEntry[]> {
    const rows = await this.db
      .selectFrom('workflow.submission_status_history')
      .select(['submission_id', 'status', 'created_at'])
      .where('submission_id', '=', submissionId)
      .orderBy('id', 'asc')
      .execute();
    return rows.map((row) => ({
      submissionId: row.submission_id,
      status: parseSubmissionStatus(row.status),
      createdAt: new Date(row.created_at),
    }));
  }
}
