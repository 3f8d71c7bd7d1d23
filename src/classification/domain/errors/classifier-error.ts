import { ClassifierErrorKind } from '../enums/classifier-error-kind.enum';
import {
  RemoteClassifierResponse,
  RetryAttemptRecord,
} from '../classification.types';
import { isRecord } from '../../../utils/types/is-record';

/**
 * HTTP statuses the classifier endpoint uses to signal it has no capacity
 * (model loading, overloaded, rate limited). These are never retried.
 */
export const UNAVAILABLE_STATUSES: ReadonlySet<number> = new Set([429, 503]);

/**
 * Base class for remote classifier failures.
 *
 * Instances are returned inside a Result rather than thrown; the
 * orchestrator turns every one of them into a degraded classification.
 * Messages never carry document text or credentials; upstream detail is
 * truncated to 200 characters.
 */
export abstract class ClassifierError extends Error {
  abstract readonly kind: ClassifierErrorKind;

  /**
   * HTTP status from the endpoint, null for network errors and timeouts
   */
  readonly status: number | null;

  /**
   * Correlation ID sent as X-Request-Id
   */
  readonly requestId: string | null;

  readonly timestamp: string;

  constructor(
    message: string,
    params: { status?: number; requestId?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: params.cause });
    this.name = new.target.name;
    this.status = params.status ?? null;
    this.requestId = params.requestId ?? null;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      requestId: this.requestId,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Network failure, timeout or non-capacity HTTP error. Worth retrying.
 */
export class TransientClassifierError extends ClassifierError {
  readonly kind = ClassifierErrorKind.TRANSIENT;
}

/**
 * Capacity signal from the endpoint. Fails fast.
 */
export class UnavailableClassifierError extends ClassifierError {
  readonly kind = ClassifierErrorKind.UNAVAILABLE;
}

/**
 * 2xx response whose body does not have the expected shape. Carries whatever
 * parts could still be decoded.
 */
export class MalformedResponseError extends ClassifierError {
  readonly kind = ClassifierErrorKind.MALFORMED_RESPONSE;
  readonly partial: Partial<RemoteClassifierResponse>;

  constructor(
    message: string,
    params: {
      status?: number;
      requestId?: string;
      partial?: Partial<RemoteClassifierResponse>;
    } = {},
  ) {
    super(message, params);
    this.partial = params.partial ?? {};
  }
}

export class RetriesExhaustedError extends ClassifierError {
  readonly kind = ClassifierErrorKind.RETRIES_EXHAUSTED;
  readonly lastError: ClassifierError;
  readonly attempts: number;
  readonly history: readonly RetryAttemptRecord[];

  constructor(
    lastError: ClassifierError,
    history: readonly RetryAttemptRecord[],
  ) {
    super(
      `Classifier retries exhausted after ${history.length} attempts: ${lastError.message}`,
      {
        status: lastError.status ?? undefined,
        requestId: lastError.requestId ?? undefined,
        cause: lastError,
      },
    );
    this.lastError = lastError;
    this.attempts = history.length;
    this.history = history;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
      lastError: this.lastError.toJSON(),
    };
  }
}

export type AnyClassifierError =
  | TransientClassifierError
  | UnavailableClassifierError
  | MalformedResponseError
  | RetriesExhaustedError;

/**
 * Map a non-2xx classifier response to the matching error.
 * Reads the body for an `error`/`message` field when it is JSON.
 */
export async function classifierErrorFromResponse(
  response: Response,
  requestId: string,
): Promise<TransientClassifierError | UnavailableClassifierError> {
  let message: string;
  try {
    const body: unknown = JSON.parse(await response.text());
    const detail = isRecord(body) ? (body.error ?? body.message) : undefined;
    message =
      typeof detail === 'string'
        ? `Classifier error ${response.status}: ${detail.substring(0, 200)}`
        : `Classifier error: ${response.status}`;
  } catch {
    message = `Classifier error: ${response.status} ${response.statusText}`;
  }

  const params = { status: response.status, requestId };
  return UNAVAILABLE_STATUSES.has(response.status)
    ? new UnavailableClassifierError(message, params)
    : new TransientClassifierError(message, params);
}

/**
 * Map a fetch rejection (network failure, timeout, abort) to a transient
 * error.
 */
export function classifierErrorFromNetwork(
  error: unknown,
  requestId: string,
): TransientClassifierError {
  // Abort reasons are DOMExceptions, which may come from another realm
  const name = isRecord(error) ? error.name : undefined;
  const message = isRecord(error) ? error.message : undefined;
  const reason =
    name === 'TimeoutError'
      ? 'request timed out'
      : name === 'AbortError'
        ? 'request aborted'
        : typeof message === 'string'
          ? message
          : String(error);
  return new TransientClassifierError(`Network error: ${reason}`, {
    requestId,
    cause: error,
  });
}
