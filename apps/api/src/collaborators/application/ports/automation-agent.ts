import type { SubmissionStatus } from '@tasflow/domain';

/** Posts automated announcements in submission discussion topics. */
export abstract class AutomationAgent {
  abstract postSubmissionPublished(
    submissionId: number,
    publicationId: number
  ): Promise<void>;

  abstract postSubmissionDormant(
    submissionId: number,
    status: SubmissionStatus
  ): Promise<void>;
}
