import type { SubmissionStatus } from './SubmissionStatus';

/** Moving into judging assigns the acting user as judge. */
export const judgeIsClaiming = (
  previous: SubmissionStatus,
  next: SubmissionStatus
): boolean => previous !== 'judging_underway' && next === 'judging_underway';

/** Returning to New releases the judge. */
export const judgeIsUnclaiming = (next: SubmissionStatus): boolean =>
  next === 'new';

export const publisherIsClaiming = (
  previous: SubmissionStatus,
  next: SubmissionStatus
): boolean =>
  previous !== 'publication_underway' && next === 'publication_underway';

export const publisherIsUnclaiming = (
  previous: SubmissionStatus,
  next: SubmissionStatus
): boolean => previous === 'publication_underway' && next === 'accepted';
