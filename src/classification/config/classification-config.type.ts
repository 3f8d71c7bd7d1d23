export type CandidateLabelsFormat = 'array' | 'delimited';

export type TruncationUnit = 'characters' | 'bytes';

export type ClassificationConfig = {
  apiUrl: string;
  apiToken: string;
  labels: readonly string[];
  labelsFormat: CandidateLabelsFormat;
  labelsDelimiter: string;
  fallbackLabel: string;
  maxTextLength: number;
  truncationUnit: TruncationUnit;
  timeoutMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    minDelayMs: number;
    maxDelayMs: number;
    jitterFraction: number;
  };
};
