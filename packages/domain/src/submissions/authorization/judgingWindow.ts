import { canBeJudged, type SubmissionStatus } from '../SubmissionStatus';

const MILLIS_PER_HOUR = 60 * 60 * 1000;

/** The judging window opens `minimumHours` after submission. */
export const isJudgingWindowOpen = (
  submitDate: Date,
  now: Date,
  minimumHours: number
): boolean =>
  now.getTime() >= submitDate.getTime() + minimumHours * MILLIS_PER_HOUR;

/**
 * Whole hours left until the judging window opens; 0 once it is open or when
 * the submission is no longer in a judgeable status.
 */
export const hoursRemainingForJudging = (params: {
  status: SubmissionStatus;
  submitDate: Date;
  now: Date;
  minimumHours: number;
}): number => {
  const { status, submitDate, now, minimumHours } = params;
  if (!canBeJudged(status)) {
    return 0;
  }

  const hoursSince = Math.trunc(
    (now.getTime() - submitDate.getTime()) / MILLIS_PER_HOUR
  );
  return Math.max(0, minimumHours - hoursSince);
};
