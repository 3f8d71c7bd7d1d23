/**
 * Category segment of a storage key: lowercased, every space replaced by
 * an underscore. Applying it twice gives the same result.
 */
export function normalizeCategory(label: string): string {
  return label.toLowerCase().replace(/ /g, '_');
}

/**
 * {prefix}/{patientId}/{normalizedLabel}/{fileName}
 *
 * Deterministic: the same triple always yields the same key, so a repeated
 * upload overwrites the earlier object.
 */
export function buildStorageKey(
  prefix: string,
  patientId: string,
  label: string,
  fileName: string,
): string {
  return [prefix, patientId, normalizeCategory(label), fileName].join('/');
}
