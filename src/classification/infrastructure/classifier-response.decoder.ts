import { Result, err, ok } from '../../utils/types/result.type';
import { isRecord } from '../../utils/types/is-record';
import { RemoteClassifierResponse } from '../domain/classification.types';
import { LabelSet } from '../domain/label-set';

export interface DecodeFailure {
  message: string;
  partial: Partial<RemoteClassifierResponse>;
}

/**
 * Decode a zero-shot classification payload.
 *
 * Accepted shapes (they differ between endpoint versions):
 * - `{ labels: string[], scores: number[] }` (extra fields ignored)
 * - `[{ labels, scores }]`
 * - `[{ label, score }, ...]`
 *
 * Scores must be finite numbers in [0, 1], the sequences must have the same
 * length and every label must come from the requested label set. Empty
 * sequences are well-formed.
 */
export function decodeClassifierResponse(
  body: unknown,
  labelSet: LabelSet,
): Result<RemoteClassifierResponse, DecodeFailure> {
  let payload: unknown = body;

  if (Array.isArray(payload)) {
    if (payload.length === 0) {
      return ok({ labels: [], scores: [] });
    }
    if (payload.every(isLabelScoreEntry)) {
      payload = {
        labels: payload.map((entry) => entry.label),
        scores: payload.map((entry) => entry.score),
      };
    } else if (payload.length === 1) {
      payload = payload[0];
    }
  }

  if (!isRecord(payload)) {
    return err({ message: 'Response body is not an object', partial: {} });
  }

  const labels = decodeLabels(payload.labels);
  const scores = decodeScores(payload.scores);
  const partial: Partial<RemoteClassifierResponse> = {
    ...(labels ? { labels } : {}),
    ...(scores ? { scores } : {}),
  };

  if (!labels) {
    return err({
      message: 'Response is missing a valid "labels" array',
      partial,
    });
  }
  if (!scores) {
    return err({
      message: 'Response is missing a valid "scores" array',
      partial,
    });
  }
  if (labels.length !== scores.length) {
    return err({
      message: `Response has ${labels.length} labels but ${scores.length} scores`,
      partial,
    });
  }

  const unknownLabel = labels.find((label) => !labelSet.includes(label));
  if (unknownLabel !== undefined) {
    return err({
      message: 'Response contains a label outside the requested label set',
      partial,
    });
  }

  return ok({ labels, scores });
}

function isLabelScoreEntry(
  value: unknown,
): value is { label: string; score: number } {
  return (
    isRecord(value) &&
    typeof value.label === 'string' &&
    typeof value.score === 'number'
  );
}

function decodeLabels(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const labels: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      return undefined;
    }
    labels.push(item);
  }
  return labels;
}

function decodeScores(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const scores: number[] = [];
  for (const item of value) {
    if (
      typeof item !== 'number' ||
      !Number.isFinite(item) ||
      item < 0 ||
      item > 1
    ) {
      return undefined;
    }
    scores.push(item);
  }
  return scores;
}
