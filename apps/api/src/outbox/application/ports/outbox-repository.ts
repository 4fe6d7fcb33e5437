import type { OutboxTask, OutboxTaskPayload } from '../../domain/outbox-task';

export abstract class OutboxRepository {
  abstract enqueue(payload: OutboxTaskPayload): Promise<number>;

  /**
   * Atomically moves the given pending tasks to `running`, counting the
   * attempt, and returns only the tasks this call claimed.
   */
  abstract claim(ids: readonly number[], claimedAt: Date): Promise<OutboxTask[]>;

  /**
   * Claims up to `limit` of the oldest pending tasks, plus `running` tasks
   * last touched before `staleBefore` (their dispatcher died).
   */
  abstract claimPending(
    limit: number,
    claimedAt: Date,
    staleBefore: Date
  ): Promise<OutboxTask[]>;

  /** Completes a running task. */
  abstract markDone(id: number): Promise<void>;

  /**
   * Releases a running task after a failed attempt; it becomes `failed` once
   * `maxAttempts` attempts have been made.
   */
  abstract recordFailure(
    id: number,
    error: string,
    maxAttempts: number
  ): Promise<void>;
}
