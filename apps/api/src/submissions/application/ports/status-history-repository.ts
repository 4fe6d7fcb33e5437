import type { SubmissionStatusHistoryEntry } from '@tasflow/domain';

/** Append-only; there is deliberately no update or delete. */
export abstract class StatusHistoryRepository {
  abstract append(entry: SubmissionStatusHistoryEntry): Promise<void>;

  abstract listFor(
    submissionId: number
  ): Promise<SubmissionStatusHistoryEntry[]>;
}
