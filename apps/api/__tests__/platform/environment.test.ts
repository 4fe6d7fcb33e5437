import { ConfigService } from '@nestjs/config';
import { describe, expect, it } from 'vitest';
import {
  validateEnvironment,
  workflowSettingsFromConfig,
} from '../../src/platform/infrastructure/config/environment';

describe('validateEnvironment', () => {
  it('fills in defaults and converts numbers', () => {
    const env = validateEnvironment({
      DATABASE_URL: 'postgres://localhost/tasflow',
      OUTBOX_BATCH_SIZE: '10',
    });

    expect(env.OUTBOX_BATCH_SIZE).toBe(10);
    expect(env.MINIMUM_HOURS_BEFORE_JUDGMENT).toBe(72);
    expect(env.WORKBENCH_FORUM_ID).toBe(7);
    expect(env.YOUTUBE_API_URL).toBe('https://www.googleapis.com/youtube/v3');
  });

  it('rejects out-of-range values', () => {
    expect(() => validateEnvironment({ WORKBENCH_FORUM_ID: '0' })).toThrow(
      'Invalid configuration: WORKBENCH_FORUM_ID must not be less than 1'
    );
  });

  it('rejects values that are not numbers', () => {
    expect(() => validateEnvironment({ OUTBOX_MAX_ATTEMPTS: 'many' })).toThrow(
      /OUTBOX_MAX_ATTEMPTS must be an integer number/
    );
  });
});

describe('workflowSettingsFromConfig', () => {
  it('reads overrides and falls back to defaults', () => {
    const settings = workflowSettingsFromConfig(
      new ConfigService({
        MINIMUM_HOURS_BEFORE_JUDGMENT: '48',
        OUTBOX_POLL_INTERVAL_MS: 0,
        YOUTUBE_ACCESS_TOKEN: '',
      })
    );

    expect(settings.minimumHoursBeforeJudgment).toBe(48);
    expect(settings.outboxPollIntervalMs).toBe(0);
    expect(settings.outboxBatchSize).toBe(25);
    expect(settings.playgroundForumId).toBe(23);
    expect(settings.youtubeAccessToken).toBeNull();
  });

  it('keeps a configured access token', () => {
    const settings = workflowSettingsFromConfig(
      new ConfigService({ YOUTUBE_ACCESS_TOKEN: 'test-secret' })
    );

    expect(settings.youtubeAccessToken).toBe('test-secret');
  });
});
