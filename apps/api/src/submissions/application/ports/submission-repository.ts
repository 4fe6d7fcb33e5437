import type { NewSubmission, Submission } from '@tasflow/domain';

export abstract class SubmissionRepository {
  abstract findById(id: number): Promise<Submission | null>;

  /** Inserts with version 1 and returns the stored record. */
  abstract insert(submission: NewSubmission): Promise<Submission>;

  /**
   * Writes the submission only if the stored version still equals
   * `expectedVersion`, bumping the version. Throws `ConcurrencyConflictError`
   * when nothing matched.
   */
  abstract update(
    submission: Submission,
    expectedVersion: number
  ): Promise<Submission>;
}
