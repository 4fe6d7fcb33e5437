import type { Permission } from '../../identity/Permission';
import {
  submissionStatusValues,
  type SubmissionStatus,
} from '../SubmissionStatus';
import { isJudgingWindowOpen } from './judgingWindow';
import { statusGuards, type StatusContext } from './statusGuards';

export type AvailableStatusesInput = Readonly<{
  currentStatus: SubmissionStatus;
  permissions: ReadonlySet<Permission>;
  submitDate: Date;
  isAuthorOrSubmitter: boolean;
  isJudge: boolean;
  isPublisher: boolean;
  now: Date;
  minimumHoursBeforeJudgment: number;
}>;

/**
 * Statuses the actor may set a submission to, in canonical status order.
 *
 * Published is terminal and can only be reached through publishing, so it is
 * never offered to anyone, override holders included.
 */
export const availableStatuses = (
  input: AvailableStatusesInput
): ReadonlySet<SubmissionStatus> => {
  if (input.currentStatus === 'published') {
    return new Set<SubmissionStatus>(['published']);
  }

  if (input.permissions.has('override_submission_constraints')) {
    return new Set(
      submissionStatusValues.filter((status) => status !== 'published')
    );
  }

  const context: StatusContext = {
    currentStatus: input.currentStatus,
    permissions: input.permissions,
    isAuthorOrSubmitter: input.isAuthorOrSubmitter,
    isJudge: input.isJudge,
    isPublisher: input.isPublisher,
    judgingWindowOpen: isJudgingWindowOpen(
      input.submitDate,
      input.now,
      input.minimumHoursBeforeJudgment
    ),
  };

  const granted = new Set<SubmissionStatus>();
  for (const guard of statusGuards) {
    for (const status of guard.grant(context)) {
      granted.add(status);
    }
  }

  return new Set(submissionStatusValues.filter((status) => granted.has(status)));
};
