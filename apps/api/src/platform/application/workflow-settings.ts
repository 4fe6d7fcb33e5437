export const DEFAULT_MAX_DECOMPRESSED_MOVIE_BYTES = 100 * 1024 * 1024;

export type WorkflowSettingsValues = Readonly<{
  minimumHoursBeforeJudgment: number;
  maxDecompressedMovieBytes: number;
  workbenchForumId: number;
  playgroundForumId: number;
  outboxPollIntervalMs: number;
  outboxBatchSize: number;
  outboxMaxAttempts: number;
  outboxLeaseMs: number;
  youtubeApiUrl: string;
  youtubeAccessToken: string | null;
}>;

/** Typed view of the validated environment, injected into services. */
export class WorkflowSettings {
  readonly minimumHoursBeforeJudgment: number;
  readonly maxDecompressedMovieBytes: number;
  readonly workbenchForumId: number;
  readonly playgroundForumId: number;
  readonly outboxPollIntervalMs: number;
  readonly outboxBatchSize: number;
  readonly outboxMaxAttempts: number;
  /** A running task untouched for this long is claimable again. */
  readonly outboxLeaseMs: number;
  readonly youtubeApiUrl: string;
  readonly youtubeAccessToken: string | null;

  constructor(values: WorkflowSettingsValues) {
    this.minimumHoursBeforeJudgment = values.minimumHoursBeforeJudgment;
    this.maxDecompressedMovieBytes = values.maxDecompressedMovieBytes;
    this.workbenchForumId = values.workbenchForumId;
    this.playgroundForumId = values.playgroundForumId;
    this.outboxPollIntervalMs = values.outboxPollIntervalMs;
    this.outboxBatchSize = values.outboxBatchSize;
    this.outboxMaxAttempts = values.outboxMaxAttempts;
    this.outboxLeaseMs = values.outboxLeaseMs;
    this.youtubeApiUrl = values.youtubeApiUrl;
    this.youtubeAccessToken = values.youtubeAccessToken;
  }

  static defaults(overrides: Partial<WorkflowSettingsValues> = {}): WorkflowSettings {
    return new WorkflowSettings({
      minimumHoursBeforeJudgment: 72,
      maxDecompressedMovieBytes: DEFAULT_MAX_DECOMPRESSED_MOVIE_BYTES,
      workbenchForumId: 7,
      playgroundForumId: 23,
      outboxPollIntervalMs: 5000,
      outboxBatchSize: 25,
      outboxMaxAttempts: 5,
      outboxLeaseMs: 5 * 60 * 1000,
      youtubeApiUrl: 'https://www.googleapis.com/youtube/v3',
      youtubeAccessToken: null,
      ...overrides,
    });
  }
}
