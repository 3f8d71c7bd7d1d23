import { Result } from '../../../utils/types/result.type';
import {
  ClassificationRequest,
  RemoteClassifierResponse,
} from '../classification.types';
import {
  MalformedResponseError,
  TransientClassifierError,
  UnavailableClassifierError,
} from '../errors/classifier-error';

export type ClassifierCallError =
  | TransientClassifierError
  | UnavailableClassifierError
  | MalformedResponseError;

export type ClassifierCallResult = Result<
  RemoteClassifierResponse,
  ClassifierCallError
>;

export interface ClassifierClientPort {
  /**
   * Send one classification attempt to the remote endpoint.
   * Performs no retries and never rejects.
   *
   * @param signal - Caller cancellation, combined with the per-attempt timeout
   */
  call(
    request: ClassificationRequest,
    signal?: AbortSignal,
  ): Promise<ClassifierCallResult>;
}
