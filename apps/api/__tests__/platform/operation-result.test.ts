import { Logger } from '@nestjs/common';
import { describe, expect, it } from 'vitest';
import {
  NotFoundError,
  PreconditionFailedError,
  ValidationFailedError,
} from '../../src/platform/application/errors';
import { runOperation } from '../../src/platform/application/operation-result';

describe('runOperation', () => {
  const logger = new Logger('OperationResultTest');

  it('wraps the value of a successful operation', async () => {
    await expect(runOperation(logger, 'Claim', async () => 42)).resolves.toEqual({
      ok: true,
      value: 42,
    });
  });

  it('maps workflow errors to their code', async () => {
    const result = await runOperation(logger, 'Claim', async () => {
      throw new NotFoundError('Submission not found');
    });

    expect(result).toEqual({
      ok: false,
      code: 'not_found',
      errorMessage: 'Submission not found',
    });
  });

  it('carries validation details and error causes as detail', async () => {
    const validation = await runOperation(logger, 'Submit', async () => {
      throw new ValidationFailedError('Unknown authors', ['Dana', 'Eve']);
    });
    const precondition = await runOperation(logger, 'Publish', async () => {
      throw new PreconditionFailedError('Unable to publish', new Error('disk full'));
    });

    expect(validation).toEqual({
      ok: false,
      code: 'validation_failed',
      errorMessage: 'Unknown authors',
      detail: 'Dana, Eve',
    });
    expect(precondition).toEqual({
      ok: false,
      code: 'precondition_failed',
      errorMessage: 'Unable to publish',
      detail: 'disk full',
    });
  });

  it('reports anything else as unexpected', async () => {
    const result = await runOperation(logger, 'Publish', async () => {
      throw new TypeError('boom');
    });

    expect(result).toEqual({
      ok: false,
      code: 'unexpected',
      errorMessage: 'Publish failed',
      detail: 'boom',
    });
  });
});
