import { Injectable, Logger } from '@nestjs/common';
import {
  submissionWikiPageName,
  type Actor,
  type Permission,
  type Submission,
  type SubmissionStatus,
} from '@tasflow/domain';
import { Clock } from '@platform/application/clock';
import {
  NotFoundError,
  PreconditionFailedError,
} from '@platform/application/errors';
import {
  OperationResult,
  runOperation,
} from '@platform/application/operation-result';
import {
  WorkflowUnitOfWork,
  type WorkflowScope,
} from '@platform/application/workflow-unit-of-work';

export type ClaimOutcome = Readonly<{
  submissionId: number;
  title: string;
}>;

type ClaimTemplate = Readonly<{
  operation: string;
  permission: Permission;
  requiredStatus: SubmissionStatus;
  targetStatus: SubmissionStatus;
  assign: (submission: Submission, userId: number) => Submission;
  wikiNote: string;
  revisionMessage: string;
  watchTopic: boolean;
}>;

const judgingClaim: ClaimTemplate = {
  operation: 'ClaimForJudging',
  permission: 'judge_submissions',
  requiredStatus: 'new',
  targetStatus: 'judging_underway',
  assign: (submission, userId) => ({ ...submission, judgeId: userId }),
  wikiNote: 'Claiming for judging.',
  revisionMessage: 'Claimed for judging',
  watchTopic: true,
};

const publicationClaim: ClaimTemplate = {
  operation: 'ClaimForPublishing',
  permission: 'publish_movies',
  requiredStatus: 'accepted',
  targetStatus: 'publication_underway',
  assign: (submission, userId) => ({ ...submission, publisherId: userId }),
  wikiNote: 'Processing...',
  revisionMessage: 'Claimed for publication',
  watchTopic: false,
};

/**
 * Exclusive judge and publisher claims. The status precondition is checked
 * against the loaded row and the write is conditional on its version, so of
 * two racing claims exactly one commits. Claims are never retried.
 */
@Injectable()
export class SubmissionClaimService {
  private readonly logger = new Logger(SubmissionClaimService.name);

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly clock: Clock
  ) {}

  claimForJudging(
    submissionId: number,
    actor: Actor
  ): Promise<OperationResult<ClaimOutcome>> {
    return this.claim(judgingClaim, submissionId, actor);
  }

  claimForPublishing(
    submissionId: number,
    actor: Actor
  ): Promise<OperationResult<ClaimOutcome>> {
    return this.claim(publicationClaim, submissionId, actor);
  }

  private claim(
    template: ClaimTemplate,
    submissionId: number,
    actor: Actor
  ): Promise<OperationResult<ClaimOutcome>> {
    return runOperation(this.logger, template.operation, async () => {
      if (!actor.permissions.has(template.permission)) {
        throw new PreconditionFailedError(
          `Claiming requires the ${template.permission} permission`
        );
      }

      let outcome: ClaimOutcome;
      try {
        outcome = await this.unitOfWork.transaction((scope) =>
          this.applyClaim(scope, template, submissionId, actor)
        );
      } catch (error) {
        if (
          error instanceof NotFoundError ||
          error instanceof PreconditionFailedError
        ) {
          throw error;
        }
        throw new PreconditionFailedError('Unable to claim', error);
      }

      this.logger.log(
        `${actor.userName} claimed submission ${submissionId} (${template.targetStatus})`
      );
      return outcome;
    });
  }

  private async applyClaim(
    scope: WorkflowScope,
    template: ClaimTemplate,
    submissionId: number,
    actor: Actor
  ): Promise<ClaimOutcome> {
    const submission = await scope.submissions.findById(submissionId);
    if (!submission) {
      throw new NotFoundError('Submission not found');
    }
    if (submission.status !== template.requiredStatus) {
      throw new PreconditionFailedError('Submission can not be claimed');
    }

    const userId = actor.userId.unwrap();
    await scope.statusHistory.append({
      submissionId,
      status: submission.status,
      createdAt: this.clock.now(),
    });

    const claimed = template.assign(
      { ...submission, status: template.targetStatus },
      userId
    );
    await scope.submissions.update(claimed, submission.version);

    const pageName = submissionWikiPageName(submissionId);
    const page = await scope.wiki.page(pageName);
    await scope.wiki.add({
      pageName,
      markup: `${page?.markup ?? ''}\n----\n[user:${actor.userName}]: ${template.wikiNote}`,
      authorId: userId,
      revisionMessage: template.revisionMessage,
      minorEdit: false,
    });

    if (template.watchTopic && submission.topicId !== null) {
      await scope.topicWatcher.watchTopic(submission.topicId, userId, true);
    }

    return { submissionId, title: submission.title };
  }
}
