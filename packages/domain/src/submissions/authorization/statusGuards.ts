import type { Permission } from '../../identity/Permission';
import type { SubmissionStatus } from '../SubmissionStatus';

export type StatusContext = Readonly<{
  currentStatus: SubmissionStatus;
  permissions: ReadonlySet<Permission>;
  isAuthorOrSubmitter: boolean;
  /** The actor is the judge who claimed the submission. */
  isJudge: boolean;
  /** The actor is the publisher who claimed the submission. */
  isPublisher: boolean;
  judgingWindowOpen: boolean;
}>;

/**
 * A guard grants zero or more target statuses for a context. Guards are
 * independent; the available set is the union of every guard's grant.
 */
export type StatusGuard = Readonly<{
  name: string;
  grant: (context: StatusContext) => readonly SubmissionStatus[];
}>;

const when = (
  condition: boolean,
  statuses: readonly SubmissionStatus[]
): readonly SubmissionStatus[] => (condition ? statuses : []);

const isIn = (
  status: SubmissionStatus,
  statuses: readonly SubmissionStatus[]
): boolean => statuses.includes(status);

const judgeMayAct = (context: StatusContext): boolean =>
  context.isJudge && context.judgingWindowOpen;

export const keepCurrentStatusGuard: StatusGuard = {
  name: 'keepCurrentStatus',
  grant: (context) => [context.currentStatus],
};

export const claimForJudgingGuard: StatusGuard = {
  name: 'claimForJudging',
  grant: (context) =>
    when(
      context.currentStatus !== 'published' &&
        context.permissions.has('judge_submissions') &&
        !context.isAuthorOrSubmitter,
      ['judging_underway']
    ),
};

export const judgeFollowUpGuard: StatusGuard = {
  name: 'judgeFollowUp',
  grant: (context) =>
    when(
      judgeMayAct(context) &&
        isIn(context.currentStatus, [
          'judging_underway',
          'delayed',
          'needs_more_info',
          'accepted',
          'publication_underway',
        ]),
      ['judging_underway', 'delayed', 'needs_more_info']
    ),
};

export const deliverVerdictGuard: StatusGuard = {
  name: 'deliverVerdict',
  grant: (context) =>
    when(
      judgeMayAct(context) &&
        isIn(context.currentStatus, [
          'judging_underway',
          'delayed',
          'needs_more_info',
          'publication_underway',
        ]),
      ['accepted', 'rejected']
    ),
};

export const overruleAcceptanceGuard: StatusGuard = {
  name: 'overruleAcceptance',
  grant: (context) =>
    when(judgeMayAct(context) && context.currentStatus === 'accepted', [
      'rejected',
    ]),
};

export const judgeReturnsToNewGuard: StatusGuard = {
  name: 'judgeReturnsToNew',
  grant: (context) =>
    when(
      judgeMayAct(context) &&
        isIn(context.currentStatus, [
          'judging_underway',
          'delayed',
          'needs_more_info',
          'accepted',
          'publication_underway',
          'rejected',
          'cancelled',
          'playground',
        ]),
      ['new']
    ),
};

export const authorReopensCancelledGuard: StatusGuard = {
  name: 'authorReopensCancelled',
  grant: (context) =>
    when(
      context.isAuthorOrSubmitter && context.currentStatus === 'cancelled',
      ['new']
    ),
};

export const claimForPublicationGuard: StatusGuard = {
  name: 'claimForPublication',
  grant: (context) =>
    when(
      context.currentStatus === 'accepted' &&
        context.permissions.has('publish_movies'),
      ['publication_underway']
    ),
};

export const retractPublicationClaimGuard: StatusGuard = {
  name: 'retractPublicationClaim',
  grant: (context) =>
    when(
      context.currentStatus === 'publication_underway' && context.isPublisher,
      ['accepted']
    ),
};

export const cancelGuard: StatusGuard = {
  name: 'cancel',
  grant: (context) =>
    when(
      (context.isJudge || context.isAuthorOrSubmitter) &&
        isIn(context.currentStatus, [
          'new',
          'judging_underway',
          'delayed',
          'needs_more_info',
          'accepted',
          'publication_underway',
        ]),
      ['cancelled']
    ),
};

export const moveToPlaygroundGuard: StatusGuard = {
  name: 'moveToPlayground',
  grant: (context) =>
    when(
      judgeMayAct(context) &&
        isIn(context.currentStatus, [
          'judging_underway',
          'delayed',
          'needs_more_info',
        ]),
      ['playground']
    ),
};

export const statusGuards: readonly StatusGuard[] = [
  keepCurrentStatusGuard,
  claimForJudgingGuard,
  judgeFollowUpGuard,
  deliverVerdictGuard,
  overruleAcceptanceGuard,
  judgeReturnsToNewGuard,
  authorReopensCancelledGuard,
  claimForPublicationGuard,
  retractPublicationClaimGuard,
  cancelGuard,
  moveToPlaygroundGuard,
];
