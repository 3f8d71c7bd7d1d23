import { registerAs } from '@nestjs/config';
import {
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { plainToClass } from 'class-transformer';
import { DocumentProcessingConfig } from './document-processing-config.type';

export const DEFAULT_ALLOWED_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg'];

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @Max(100)
  DOC_PROCESSING_MAX_FILE_SIZE_MB: number = 10;

  @IsString()
  @Matches(/^\s*\.?[A-Za-z0-9]+(\s*,\s*\.?[A-Za-z0-9]+)*\s*$/, {
    message:
      'DOC_PROCESSING_ALLOWED_EXTENSIONS must be a comma-separated list of extensions',
  })
  DOC_PROCESSING_ALLOWED_EXTENSIONS: string =
    DEFAULT_ALLOWED_EXTENSIONS.join(',');

  @IsString()
  @MinLength(3)
  DOC_PROCESSING_STORAGE_BUCKET!: string;

  @IsString()
  @IsOptional()
  DOC_PROCESSING_STORAGE_PROJECT_ID?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  DOC_PROCESSING_STORAGE_API_ENDPOINT?: string;

  @IsString()
  @Matches(/^[A-Za-z0-9_-]+$/, {
    message:
      'DOC_PROCESSING_STORAGE_KEY_PREFIX must be a single path segment',
  })
  DOC_PROCESSING_STORAGE_KEY_PREFIX: string = 'patients';

  @IsInt()
  @Min(1000)
  DOC_PROCESSING_OCR_TIMEOUT_MS: number = 60000;

  @IsInt()
  @Min(1)
  @Max(5)
  DOC_PROCESSING_OCR_MAX_PDF_PAGES: number = 5;
}

/**
 * Normalizes "PDF, .png" style lists to [".pdf", ".png"].
 */
export function parseExtensionList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`));
}

export default registerAs<DocumentProcessingConfig>(
  'documentProcessing',
  () => {
    const validatedConfig = plainToClass(
      EnvironmentVariablesValidator,
      {
        DOC_PROCESSING_MAX_FILE_SIZE_MB: process.env
          .DOC_PROCESSING_MAX_FILE_SIZE_MB
          ? parseInt(process.env.DOC_PROCESSING_MAX_FILE_SIZE_MB, 10)
          : 10,
        DOC_PROCESSING_ALLOWED_EXTENSIONS:
          process.env.DOC_PROCESSING_ALLOWED_EXTENSIONS ||
          DEFAULT_ALLOWED_EXTENSIONS.join(','),
        DOC_PROCESSING_STORAGE_BUCKET:
          process.env.DOC_PROCESSING_STORAGE_BUCKET,
        DOC_PROCESSING_STORAGE_PROJECT_ID:
          process.env.DOC_PROCESSING_STORAGE_PROJECT_ID || undefined,
        DOC_PROCESSING_STORAGE_API_ENDPOINT:
          process.env.DOC_PROCESSING_STORAGE_API_ENDPOINT || undefined,
        DOC_PROCESSING_STORAGE_KEY_PREFIX:
          process.env.DOC_PROCESSING_STORAGE_KEY_PREFIX || 'patients',
        DOC_PROCESSING_OCR_TIMEOUT_MS: process.env.DOC_PROCESSING_OCR_TIMEOUT_MS
          ? parseInt(process.env.DOC_PROCESSING_OCR_TIMEOUT_MS, 10)
          : 60000,
        DOC_PROCESSING_OCR_MAX_PDF_PAGES: process.env
          .DOC_PROCESSING_OCR_MAX_PDF_PAGES
          ? parseInt(process.env.DOC_PROCESSING_OCR_MAX_PDF_PAGES, 10)
          : 5,
      },
      { enableImplicitConversion: true },
    );

    const errors = validateSync(validatedConfig, {
      skipMissingProperties: false,
    });

    if (errors.length > 0) {
      throw new Error(
        `Document Processing config validation error: ${errors.toString()}`,
      );
    }

    return {
      maxFileSizeMb: validatedConfig.DOC_PROCESSING_MAX_FILE_SIZE_MB,
      allowedExtensions: parseExtensionList(
        validatedConfig.DOC_PROCESSING_ALLOWED_EXTENSIONS,
      ),
      storage: {
        bucket: validatedConfig.DOC_PROCESSING_STORAGE_BUCKET,
        projectId: validatedConfig.DOC_PROCESSING_STORAGE_PROJECT_ID,
        apiEndpoint: validatedConfig.DOC_PROCESSING_STORAGE_API_ENDPOINT,
        keyPrefix: validatedConfig.DOC_PROCESSING_STORAGE_KEY_PREFIX,
      },
      ocr: {
        timeoutMs: validatedConfig.DOC_PROCESSING_OCR_TIMEOUT_MS,
        maxPdfPages: validatedConfig.DOC_PROCESSING_OCR_MAX_PDF_PAGES,
      },
    };
  },
);
