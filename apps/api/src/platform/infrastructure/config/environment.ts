import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_MAX_DECOMPRESSED_MOVIE_BYTES,
  WorkflowSettings,
} from '../../application/workflow-settings';

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  MINIMUM_HOURS_BEFORE_JUDGMENT = 72;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  MAX_DECOMPRESSED_MOVIE_BYTES = DEFAULT_MAX_DECOMPRESSED_MOVIE_BYTES;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  WORKBENCH_FORUM_ID = 7;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  PLAYGROUND_FORUM_ID = 23;

  // 0 disables the outbox poller.
  @Type(() => Number)
  @IsInt()
  @Min(0)
  OUTBOX_POLL_INTERVAL_MS = 5000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  OUTBOX_BATCH_SIZE = 25;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  OUTBOX_MAX_ATTEMPTS = 5;

  @Type(() => Number)
  @IsInt()
  @Min(1000)
  OUTBOX_LEASE_MS = 300000;

  @IsUrl({ require_tld: false })
  YOUTUBE_API_URL = 'https://www.googleapis.com/youtube/v3';

  @IsOptional()
  @IsString()
  YOUTUBE_ACCESS_TOKEN?: string;
}

/** `validate` hook for `ConfigModule.forRoot`; throws on invalid input. */
export const validateEnvironment = (
  config: Record<string, unknown>
): EnvironmentVariables => {
  const parsed = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(parsed, { skipMissingProperties: false });
  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {})
    );
    throw new Error(`Invalid configuration: ${messages.join('; ')}`);
  }
  return parsed;
};

const readNumber = (config: ConfigService, key: string, fallback: number) => {
  const value = config.get<number | string>(key);
  if (value === undefined || value === '') return fallback;
  return Number(value);
};

export const workflowSettingsFromConfig = (
  config: ConfigService
): WorkflowSettings => {
  const defaults = WorkflowSettings.defaults();
  const token = config.get<string>('YOUTUBE_ACCESS_TOKEN');
  return new WorkflowSettings({
    minimumHoursBeforeJudgment: readNumber(
      config,
      'MINIMUM_HOURS_BEFORE_JUDGMENT',
      defaults.minimumHoursBeforeJudgment
    ),
    maxDecompressedMovieBytes: readNumber(
      config,
      'MAX_DECOMPRESSED_MOVIE_BYTES',
      defaults.maxDecompressedMovieBytes
    ),
    workbenchForumId: readNumber(
      config,
      'WORKBENCH_FORUM_ID',
      defaults.workbenchForumId
    ),
    playgroundForumId: readNumber(
      config,
      'PLAYGROUND_FORUM_ID',
      defaults.playgroundForumId
    ),
    outboxPollIntervalMs: readNumber(
      config,
      'OUTBOX_POLL_INTERVAL_MS',
      defaults.outboxPollIntervalMs
    ),
    outboxBatchSize: readNumber(
      config,
      'OUTBOX_BATCH_SIZE',
      defaults.outboxBatchSize
    ),
    outboxMaxAttempts: readNumber(
      config,
      'OUTBOX_MAX_ATTEMPTS',
      defaults.outboxMaxAttempts
    ),
    outboxLeaseMs: readNumber(
      config,
      'OUTBOX_LEASE_MS',
      defaults.outboxLeaseMs
    ),
    youtubeApiUrl:
      config.get<string>('YOUTUBE_API_URL') ?? defaults.youtubeApiUrl,
    youtubeAccessToken: token ? token : null,
  });
};
