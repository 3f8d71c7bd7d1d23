export enum ClassifierErrorKind {
  TRANSIENT = 'TRANSIENT',
  UNAVAILABLE = 'UNAVAILABLE',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
}
