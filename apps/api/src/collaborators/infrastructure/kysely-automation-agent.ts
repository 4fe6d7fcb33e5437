import { Injectable, Logger } from '@nestjs/common';
import { statusDisplayName, type SubmissionStatus } from '@tasflow/domain';
import { DatabaseService } from '@platform/infrastructure/database/database.service';
import { AutomationAgent } from '../application/ports/automation-agent';

/** Posts into the submission's discussion topic without a poster. */
@Injectable()
export class KyselyAutomationAgent extends AutomationAgent {
  private readonly logger = new Logger(KyselyAutomationAgent.name);

  constructor(private readonly database: DatabaseService) {
    super();
  }

  async postSubmissionPublished(
    submissionId: number,
    publicationId: number
  ): Promise<void> {
    await this.post(
      submissionId,
      `This submission has been published as publication #${publicationId}.`
    );
  }

  async postSubmissionDormant(
    submissionId: number,
    status: SubmissionStatus
  ): Promise<void> {
    await this.post(
      submissionId,
      `This submission has been set to ${statusDisplayName(status)}.`
    );
  }

  private async post(submissionId: number, text: string): Promise<void> {
    const db = this.database.getDb();
    const submission = await db
      .selectFrom('workflow.submissions')
      .select('topic_id')
      .where('id', '=', submissionId)
      .executeTakeFirst();

    if (!submission?.topic_id) {
      this.logger.warn(
        `Submission ${submissionId} has no discussion topic; announcement skipped`
      );
      return;
    }

    await db
      .insertInto('workflow.forum_posts')
      .values({ topic_id: submission.topic_id, poster_id: null, text })
      .execute();
  }
}
