import { Kysely, Selectable, sql } from 'kysely';
import type {
  OutboxTasksTable,
  WorkflowDatabase,
} from '@platform/infrastructure/database/database.types';
import { OutboxRepository } from '../application/ports/outbox-repository';
import {
  decodeOutboxPayload,
  encodeOutboxPayload,
  type OutboxTask,
  type OutboxTaskPayload,
} from '../domain/outbox-task';

const toTask = (row: Selectable<OutboxTasksTable>): OutboxTask => ({
  id: row.id,
  payload: decodeOutboxPayload(row.payload),
  state: row.state,
  attempts: row.attempts,
  lastError: row.last_error,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

const claimColumns = (claimedAt: Date) => ({
  state: 'running' as const,
  attempts: sql<number>`attempts + 1`,
  updated_at: claimedAt,
});

// RETURNING does not keep any order.
const byId = (tasks: OutboxTask[]): OutboxTask[] =>
  tasks.sort((a, b) => a.id - b.id);

export class KyselyOutboxRepository extends OutboxRepository {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async enqueue(payload: OutboxTaskPayload): Promise<number> {
    const { id } = await this.db
      .insertInto('workflow.outbox_tasks')
      .values({
        kind: payload.kind,
        payload: encodeOutboxPayload(payload),
        state: 'pending',
      })
      .returning('id')
      .executeTakeFirstOrThrow();
    return id;
  }

  async claim(ids: readonly number[], claimedAt: Date): Promise<OutboxTask[]> {
    if (ids.length === 0) return [];
    const rows = await this.db
      .updateTable('workflow.outbox_tasks')
      .set(claimColumns(claimedAt))
      .where('id', 'in', [...ids])
      .where('state', '=', 'pending')
      .returningAll()
      .execute();
    return byId(rows.map(toTask));
  }

  async claimPending(
    limit: number,
    claimedAt: Date,
    staleBefore: Date
  ): Promise<OutboxTask[]> {
    const claimable = this.db
      .selectFrom('workflow.outbox_tasks')
      .select('id')
      .where((eb) =>
        eb.or([
          eb('state', '=', 'pending'),
          eb.and([
            eb('state', '=', 'running'),
            eb('updated_at', '<', staleBefore),
          ]),
        ])
      )
      .orderBy('id', 'asc')
      .limit(limit)
      .forUpdate()
      .skipLocked();

    const rows = await this.db
      .updateTable('workflow.outbox_tasks')
      .set(claimColumns(claimedAt))
      .where('id', 'in', claimable)
      .returningAll()
      .execute();
    return byId(rows.map(toTask));
  }

  async markDone(id: number): Promise<void> {
    await this.db
      .updateTable('workflow.outbox_tasks')
      .set({ state: 'done', last_error: null, updated_at: new Date() })
      .where('id', '=', id)
      .where('state', '=', 'running')
      .execute();
  }

  async recordFailure(
    id: number,
    error: string,
    maxAttempts: number
  ): Promise<void> {
    // The claim already counted this attempt.
    await this.db
      .updateTable('workflow.outbox_tasks')
      .set({
        last_error: error,
        state: sql<'pending' | 'failed'>`case when attempts >= ${maxAttempts} then 'failed' else 'pending' end`,
        updated_at: new Date(),
      })
      .where('id', '=', id)
      .where('state', '=', 'running')
      .execute();
  }
}
