export const submissionStatusValues = [
  'new',
  'delayed',
  'needs_more_info',
  'judging_underway',
  'accepted',
  'publication_underway',
  'published',
  'rejected',
  'cancelled',
  'playground',
] as const;

export type SubmissionStatus = (typeof submissionStatusValues)[number];

export const isSubmissionStatus = (value: string): value is SubmissionStatus =>
  submissionStatusValues.some((status) => status === value);

export const parseSubmissionStatus = (value: string): SubmissionStatus => {
  if (!isSubmissionStatus(value)) {
    throw new Error(
      `SubmissionStatus must be one of [${submissionStatusValues.join(', ')}], got: ${JSON.stringify(value)}`
    );
  }
  return value;
};

const displayNames: Record<SubmissionStatus, string> = {
  new: 'New',
  delayed: 'Delayed',
  needs_more_info: 'Needs More Info',
  judging_underway: 'Judging Underway',
  accepted: 'Accepted',
  publication_underway: 'Publication Underway',
  published: 'Published',
  rejected: 'Rejected',
  cancelled: 'Cancelled',
  playground: 'Playground',
};

export const statusDisplayName = (status: SubmissionStatus): string =>
  displayNames[status];

/** Statuses in which the judging countdown still applies. */
export const canBeJudged = (status: SubmissionStatus): boolean =>
  status === 'new' ||
  status === 'judging_underway' ||
  status === 'delayed' ||
  status === 'needs_more_info';

/** Statuses whose discussion topic belongs in the workbench forum. */
export const isWorkInProgress = (status: SubmissionStatus): boolean =>
  status === 'new' ||
  status === 'delayed' ||
  status === 'needs_more_info' ||
  status === 'judging_underway' ||
  status === 'accepted' ||
  status === 'publication_underway';

/** Rejected and cancelled submissions lie dormant until a judge reopens them. */
export const isDormant = (status: SubmissionStatus): boolean =>
  status === 'rejected' || status === 'cancelled';
