/**
 * Candidate categories the remote classifier chooses from, in the order they
 * are sent. A label set is built once from configuration and never mutated.
 */
export type LabelSet = readonly string[];

export const DEFAULT_LABELS: LabelSet = [
  'ultrasound report',
  'blood test results',
  'urine analysis',
  'prenatal screening',
];

export const DEFAULT_FALLBACK_LABEL = 'unclassified document';

/**
 * Build a frozen label set.
 *
 * @throws Error when the set is empty, has blank or duplicate entries, or
 *   contains the fallback label (a degraded result would be
 *   indistinguishable from a real one).
 */
export function createLabelSet(
  labels: readonly string[],
  fallbackLabel: string,
): LabelSet {
  if (labels.length === 0) {
    throw new Error('Label set must contain at least one label');
  }

  const seen = new Set<string>();
  for (const label of labels) {
    if (label.trim().length === 0) {
      throw new Error('Label set must not contain blank labels');
    }
    if (seen.has(label)) {
      throw new Error(`Label set contains duplicate label: "${label}"`);
    }
    seen.add(label);
  }

  if (seen.has(fallbackLabel)) {
    throw new Error(
      `Fallback label "${fallbackLabel}" must not be part of the label set`,
    );
  }

  return Object.freeze([...labels]);
}
