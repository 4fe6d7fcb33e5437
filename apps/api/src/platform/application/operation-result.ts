import type { Logger } from '@nestjs/common';
import {
  ValidationFailedError,
  WorkflowError,
  type WorkflowErrorCode,
} from './errors';

export type OperationFailureCode = WorkflowErrorCode | 'unexpected';

export type OperationResult<T> =
  | { readonly ok: true; readonly value: T }
  | {
      readonly ok: false;
      readonly code: OperationFailureCode;
      readonly errorMessage: string;
      readonly detail?: string;
    };

export const succeeded = <T>(value: T): OperationResult<T> => ({
  ok: true,
  value,
});

export const failed = (
  code: OperationFailureCode,
  errorMessage: string,
  detail?: string
): OperationResult<never> =>
  detail === undefined
    ? { ok: false, code, errorMessage }
    : { ok: false, code, errorMessage, detail };

const describeCause = (error: unknown): string | undefined => {
  if (error instanceof ValidationFailedError && error.details.length > 0) {
    return error.details.join(', ');
  }
  if (error instanceof WorkflowError) {
    if (error.cause instanceof Error) return error.cause.message;
    return undefined;
  }
  if (error instanceof Error) return error.message;
  return String(error);
};

/**
 * Outer boundary of every exposed operation: workflow errors become the
 * matching failure, anything else becomes an `unexpected` failure carrying the
 * error message as detail.
 */
export const runOperation = async <T>(
  logger: Logger,
  operation: string,
  work: () => Promise<T>
): Promise<OperationResult<T>> => {
  try {
    return succeeded(await work());
  } catch (error) {
    if (error instanceof WorkflowError) {
      logger.warn(`${operation} failed (${error.code}): ${error.message}`);
      return failed(error.code, error.message, describeCause(error));
    }
    logger.error(
      `${operation} failed unexpectedly`,
      error instanceof Error ? error.stack : String(error)
    );
    return failed('unexpected', `${operation} failed`, describeCause(error));
  }
};
