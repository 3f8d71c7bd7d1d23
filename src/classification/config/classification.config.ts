import { registerAs } from '@nestjs/config';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import { ClassificationConfig } from './classification-config.type';
import validateConfig from '../../utils/validate-config';
import { DEFAULT_LABELS, DEFAULT_FALLBACK_LABEL } from '../domain/label-set';

class EnvironmentVariablesValidator {
  @IsUrl({ require_tld: false })
  CLASSIFIER_API_URL!: string;

  @IsString()
  @IsNotEmpty()
  CLASSIFIER_API_TOKEN!: string;

  @IsString()
  @IsOptional()
  CLASSIFIER_LABELS?: string;

  @IsIn(['array', 'delimited'])
  @IsOptional()
  CLASSIFIER_LABELS_FORMAT?: 'array' | 'delimited';

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  CLASSIFIER_LABELS_DELIMITER?: string;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  CLASSIFIER_FALLBACK_LABEL?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  CLASSIFIER_MAX_TEXT_LENGTH?: number;

  @IsIn(['characters', 'bytes'])
  @IsOptional()
  CLASSIFIER_TRUNCATE_UNIT?: 'characters' | 'bytes';

  @IsInt()
  @Min(1)
  @IsOptional()
  CLASSIFIER_TIMEOUT_MS?: number;

  @IsInt()
  @Min(1)
  @Max(10)
  @IsOptional()
  CLASSIFIER_RETRY_MAX_ATTEMPTS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  CLASSIFIER_RETRY_BASE_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  CLASSIFIER_RETRY_MIN_WAIT_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  CLASSIFIER_RETRY_MAX_WAIT_MS?: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  CLASSIFIER_RETRY_JITTER?: number;
}

function parseLabels(raw: string | undefined): string[] {
  if (!raw) {
    return [...DEFAULT_LABELS];
  }
  return raw
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  return raw ? parseInt(raw, 10) : fallback;
}

export default registerAs<ClassificationConfig>('classification', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  const minDelayMs = parseIntOr(process.env.CLASSIFIER_RETRY_MIN_WAIT_MS, 4000);
  const maxDelayMs = parseIntOr(
    process.env.CLASSIFIER_RETRY_MAX_WAIT_MS,
    10000,
  );

  if (maxDelayMs < minDelayMs) {
    throw new Error(
      `Classification config validation error: CLASSIFIER_RETRY_MAX_WAIT_MS (${maxDelayMs}) must be >= CLASSIFIER_RETRY_MIN_WAIT_MS (${minDelayMs})`,
    );
  }

  return {
    apiUrl: process.env.CLASSIFIER_API_URL ?? '',
    apiToken: process.env.CLASSIFIER_API_TOKEN ?? '',
    labels: parseLabels(process.env.CLASSIFIER_LABELS),
    labelsFormat:
      process.env.CLASSIFIER_LABELS_FORMAT === 'delimited'
        ? 'delimited'
        : 'array',
    labelsDelimiter: process.env.CLASSIFIER_LABELS_DELIMITER || ',',
    fallbackLabel:
      process.env.CLASSIFIER_FALLBACK_LABEL || DEFAULT_FALLBACK_LABEL,
    maxTextLength: parseIntOr(process.env.CLASSIFIER_MAX_TEXT_LENGTH, 5000),
    truncationUnit:
      process.env.CLASSIFIER_TRUNCATE_UNIT === 'bytes' ? 'bytes' : 'characters',
    timeoutMs: parseIntOr(process.env.CLASSIFIER_TIMEOUT_MS, 30000),
    retry: {
      maxAttempts: parseIntOr(process.env.CLASSIFIER_RETRY_MAX_ATTEMPTS, 3),
      baseDelayMs: parseIntOr(process.env.CLASSIFIER_RETRY_BASE_MS, 1000),
      minDelayMs,
      maxDelayMs,
      jitterFraction: process.env.CLASSIFIER_RETRY_JITTER
        ? parseFloat(process.env.CLASSIFIER_RETRY_JITTER)
        : 0.25,
    },
  };
});
