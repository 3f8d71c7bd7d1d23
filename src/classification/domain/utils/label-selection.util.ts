import { RemoteClassifierResponse } from '../classification.types';

export interface TopLabel {
  label: string;
  score: number;
  index: number;
}

/**
 * Pick the label with the highest score.
 *
 * Ties go to the first occurrence in the returned order, which keeps results
 * stable for clients that already depend on that choice.
 *
 * @returns null when the response holds no labels
 */
export function selectTopLabel(
  response: RemoteClassifierResponse,
): TopLabel | null {
  const count = Math.min(response.labels.length, response.scores.length);
  if (count === 0) {
    return null;
  }

  let best = 0;
  for (let i = 1; i < count; i++) {
    if (response.scores[i] > response.scores[best]) {
      best = i;
    }
  }

  return {
    label: response.labels[best],
    score: response.scores[best],
    index: best,
  };
}

/**
 * Round a score to 4 decimal places.
 */
export function roundConfidence(score: number): number {
  return Math.round(score * 10000) / 10000;
}
