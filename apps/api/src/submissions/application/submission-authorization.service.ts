import { Injectable, Logger } from '@nestjs/common';
import {
  availableStatuses,
  hoursRemainingForJudging,
  isAuthorOrSubmitter,
  type Actor,
  type Permission,
  type Submission,
  type SubmissionStatus,
} from '@tasflow/domain';
import { Clock } from '@platform/application/clock';
import { NotFoundError } from '@platform/application/errors';
import {
  OperationResult,
  runOperation,
} from '@platform/application/operation-result';
import { WorkflowSettings } from '@platform/application/workflow-settings';
import { WorkflowUnitOfWork } from '@platform/application/workflow-unit-of-work';

export type StatusFacts = Readonly<{
  currentStatus: SubmissionStatus;
  permissions: ReadonlySet<Permission>;
  submitDate: Date;
  isAuthorOrSubmitter: boolean;
  isJudge: boolean;
  isPublisher: boolean;
}>;

/** Applies the status gate with the configured judging window and clock. */
@Injectable()
export class SubmissionAuthorizationService {
  private readonly logger = new Logger(SubmissionAuthorizationService.name);

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly clock: Clock,
    private readonly settings: WorkflowSettings
  ) {}

  availableStatuses(facts: StatusFacts): ReadonlySet<SubmissionStatus> {
    return availableStatuses({
      ...facts,
      now: this.clock.now(),
      minimumHoursBeforeJudgment: this.settings.minimumHoursBeforeJudgment,
    });
  }

  hoursRemainingForJudging(
    status: SubmissionStatus,
    submitDate: Date
  ): number {
    return hoursRemainingForJudging({
      status,
      submitDate,
      now: this.clock.now(),
      minimumHours: this.settings.minimumHoursBeforeJudgment,
    });
  }

  statusesFor(
    submission: Submission,
    actor: Actor
  ): ReadonlySet<SubmissionStatus> {
    const userId = actor.userId.unwrap();
    return this.availableStatuses({
      currentStatus: submission.status,
      permissions: actor.permissions,
      submitDate: submission.createdAt,
      isAuthorOrSubmitter: isAuthorOrSubmitter(submission, userId),
      isJudge: submission.judgeId === userId,
      isPublisher: submission.publisherId === userId,
    });
  }

  async availableStatusesForSubmission(
    submissionId: number,
    actor: Actor
  ): Promise<OperationResult<SubmissionStatus[]>> {
    return runOperation(this.logger, 'AvailableStatuses', async () => {
      const submission = await this.load(submissionId);
      return [...this.statusesFor(submission, actor)];
    });
  }

  async hoursRemainingForSubmission(
    submissionId: number
  ): Promise<OperationResult<number>> {
    return runOperation(this.logger, 'HoursRemainingForJudging', async () => {
      const submission = await this.load(submissionId);
      return this.hoursRemainingForJudging(
        submission.status,
        submission.createdAt
      );
    });
  }

  private async load(submissionId: number): Promise<Submission> {
    const submission = await this.unitOfWork
      .current()
      .submissions.findById(submissionId);
    if (!submission) {
      throw new NotFoundError('Submission not found');
    }
    return submission;
  }
}
