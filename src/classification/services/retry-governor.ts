import { Logger } from '@nestjs/common';
import { setTimeout as sleepFor } from 'timers/promises';
import { Result, err } from '../../utils/types/result.type';
import { ClassifierErrorKind } from '../domain/enums/classifier-error-kind.enum';
import {
  RetriesExhaustedError,
  TransientClassifierError,
} from '../domain/errors/classifier-error';
import { ClassifierCallError } from '../domain/ports/classifier-client.port';
import { RetryAttemptRecord } from '../domain/classification.types';
import {
  RetryPolicy,
  calculateBackoffDelay,
} from '../domain/utils/backoff.util';

export type GovernedError = ClassifierCallError | RetriesExhaustedError;

export type RetryableOperation<T> = (
  attempt: number,
) => Promise<Result<T, ClassifierCallError>>;

export interface RetryGovernorOptions {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * Bounded retry around a single classifier attempt.
 *
 * - Only TRANSIENT failures are retried
 * - UNAVAILABLE and MALFORMED_RESPONSE are returned after the attempt that
 *   produced them
 * - Waits grow exponentially, never decrease between attempts and never
 *   exceed `maxDelayMs`
 * - An exhausted budget yields RetriesExhaustedError with the last failure
 *   and the attempt history
 * - Once the caller's signal is aborted no further attempt starts
 */
export class RetryGovernor {
  private readonly logger = new Logger(RetryGovernor.name);
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly policy: RetryPolicy,
    options: RetryGovernorOptions = {},
  ) {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
      throw new Error(
        `Retry policy requires maxAttempts >= 1, got ${policy.maxAttempts}`,
      );
    }
    if (policy.maxDelayMs < policy.minDelayMs) {
      throw new Error(
        `Retry policy requires maxDelayMs (${policy.maxDelayMs}) >= minDelayMs (${policy.minDelayMs})`,
      );
    }

    this.sleep =
      options.sleep ??
      ((ms, signal) => sleepFor(ms, undefined, { signal }));
    this.random = options.random ?? Math.random;
  }

  getPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }

  async execute<T>(
    operation: RetryableOperation<T>,
    signal?: AbortSignal,
  ): Promise<Result<T, GovernedError>> {
    const history: RetryAttemptRecord[] = [];
    let waitedMs = 0;
    let previousDelay = 0;

    for (let attempt = 1; ; attempt++) {
      const startTime = Date.now();
      const result = await this.runAttempt(operation, attempt);
      const durationMs = Date.now() - startTime;

      if (result.ok) {
        history.push({ attempt, waitedMs, durationMs, outcome: 'success' });
        this.logger.debug(
          `[RETRY] Attempt ${attempt}/${this.policy.maxAttempts} succeeded | Waited: ${waitedMs}ms | Duration: ${durationMs}ms`,
        );
        return result;
      }

      const failure = result.error;
      history.push({ attempt, waitedMs, durationMs, outcome: failure.kind });

      if (failure.kind !== ClassifierErrorKind.TRANSIENT) {
        this.logger.warn(
          `[RETRY] Attempt ${attempt}/${this.policy.maxAttempts} failed with non-retryable ${failure.kind} | Waited: ${waitedMs}ms | Duration: ${durationMs}ms`,
        );
        return result;
      }

      if (attempt >= this.policy.maxAttempts) {
        this.logger.error(
          `[RETRY] Attempt ${attempt}/${this.policy.maxAttempts} failed with ${failure.kind}; retries exhausted`,
        );
        return err(new RetriesExhaustedError(failure, history));
      }

      if (signal?.aborted) {
        this.logger.warn(
          `[RETRY] Attempt ${attempt}/${this.policy.maxAttempts} failed and caller aborted; not retrying`,
        );
        return result;
      }

      const delay = Math.max(
        previousDelay,
        calculateBackoffDelay(attempt, this.policy, this.random),
      );
      previousDelay = delay;

      this.logger.warn(
        `[RETRY] Attempt ${attempt}/${this.policy.maxAttempts} failed with ${failure.kind} | Duration: ${durationMs}ms | Next attempt in ${delay}ms`,
      );

      try {
        await this.sleep(delay, signal);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `[RETRY] Backoff interrupted after attempt ${attempt}: ${reason}`,
        );
        return result;
      }
      waitedMs = delay;
    }
  }

  private async runAttempt<T>(
    operation: RetryableOperation<T>,
    attempt: number,
  ): Promise<Result<T, ClassifierCallError>> {
    try {
      return await operation(attempt);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`[RETRY] Attempt ${attempt} threw: ${reason}`);
      return err(
        new TransientClassifierError(`Attempt threw: ${reason}`, {
          cause: error,
        }),
      );
    }
  }
}
