import { ClassificationStatus } from './enums/classification-status.enum';
import { ClassifierErrorKind } from './enums/classifier-error-kind.enum';
import { LabelSet } from './label-set';

export interface ClassificationRequest {
  /** Already truncated to the configured maximum length */
  text: string;
  labelSet: LabelSet;
}

/**
 * Decoded payload of the remote endpoint. `labels[i]` was scored `scores[i]`;
 * the sequences are not sorted by score.
 */
export interface RemoteClassifierResponse {
  labels: string[];
  scores: number[];
}

export interface ClassificationResult {
  label: string;
  confidence: number;
  status: ClassificationStatus;
}

export interface RetryAttemptRecord {
  attempt: number;
  /** Backoff slept before this attempt (0 for the first) */
  waitedMs: number;
  durationMs: number;
  outcome: 'success' | ClassifierErrorKind;
}
