export enum ClassificationStatus {
  SUCCESS = 'success', // Remote call succeeded with a well-formed response
  FALLBACK_USED = 'fallback_used', // Classifier unavailable or retries exhausted
  PARSE_ERROR = 'parse_error', // Response could not be turned into a label
}
