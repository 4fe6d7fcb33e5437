import type { HashType, MovieStartType } from '../movies/ParseResult';
import type { SubmissionStatus } from './SubmissionStatus';

export type SubmissionAuthor = Readonly<{
  userId: number;
  userName: string;
  ordinal: number;
}>;

/**
 * A submitted movie as stored. `version` increases with every write and is
 * the token conditional writes are checked against.
 */
export type Submission = Readonly<{
  id: number;
  version: number;
  status: SubmissionStatus;
  title: string;
  submitterId: number;
  judgeId: number | null;
  publisherId: number | null;
  authors: readonly SubmissionAuthor[];
  additionalAuthors: string | null;
  gameName: string;
  submittedGameVersion: string | null;
  branch: string | null;
  romName: string | null;
  emulatorVersion: string | null;
  encodeEmbedLink: string | null;
  gameId: number | null;
  gameVersionId: number | null;
  gameGoalId: number | null;
  systemId: number | null;
  systemFrameRateId: number | null;
  intendedClassId: number | null;
  rejectionReasonId: number | null;
  movieFileId: number;
  movieExtension: string;
  movieStartType: MovieStartType;
  frames: number;
  rerecordCount: number;
  cycleCount: number | null;
  annotations: string | null;
  warnings: string | null;
  hashType: HashType | null;
  hash: string | null;
  topicId: number | null;
  isEventSubmission: boolean;
  createdAt: Date;
  updatedAt: Date;
}>;

/** A submission before its first save assigns id and version. */
export type NewSubmission = Omit<
  Submission,
  'id' | 'version' | 'createdAt' | 'updatedAt'
>;

export type SubmissionStatusHistoryEntry = Readonly<{
  submissionId: number;
  /** The status the submission held up to `createdAt`. */
  status: SubmissionStatus;
  createdAt: Date;
}>;

export const isAuthorOrSubmitter = (
  submission: Pick<Submission, 'submitterId' | 'authors'>,
  userId: number
): boolean =>
  submission.submitterId === userId ||
  submission.authors.some((author) => author.userId === userId);

/** A submission whose catalog references are all resolved. */
export type PublishableSubmission = Submission &
  Readonly<{
    systemId: number;
    systemFrameRateId: number;
    gameId: number;
    gameVersionId: number;
    gameGoalId: number;
    intendedClassId: number;
  }>;

/**
 * A submission can be published once a publisher claimed it and it has been
 * fully catalogued.
 */
export const canPublish = (
  submission: Submission
): submission is PublishableSubmission =>
  submission.status === 'publication_underway' &&
  submission.systemId !== null &&
  submission.systemFrameRateId !== null &&
  submission.gameId !== null &&
  submission.gameVersionId !== null &&
  submission.gameGoalId !== null &&
  submission.intendedClassId !== null;
