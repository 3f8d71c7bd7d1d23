import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Storage, Bucket, File, StorageOptions } from '@google-cloud/storage';
import {
  StorageHealth,
  StorageServicePort,
} from '../../domain/ports/storage.service.port';
import { StorageError } from '../../domain/errors/document-processing.error';
import { AllConfigType } from '../../../config/config.type';
import { isRecord } from '../../../utils/types/is-record';

/**
 * GCP Cloud Storage Adapter
 *
 * HIPAA Compliance Notes:
 * - Server-side encryption: Google-managed keys by default
 * - Bucket should use Uniform Bucket-Level Access (UBLA)
 *
 * IAM Requirements:
 * - Service account needs: roles/storage.objectCreator, roles/storage.objectViewer
 * - Limit permissions to specific bucket(s) only
 *
 * Security:
 * - Never log object keys at INFO level (they contain patient IDs)
 * - Never log file contents
 *
 * Credentials come from GOOGLE_APPLICATION_CREDENTIALS or Application
 * Default Credentials. `apiEndpoint` points the client at an emulator or an
 * interoperable store.
 */
@Injectable()
export class GcpStorageAdapter implements StorageServicePort {
  private readonly logger = new Logger(GcpStorageAdapter.name);
  private readonly storage: Storage;
  private readonly bucket: Bucket;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    const storageConfig = this.configService.getOrThrow(
      'documentProcessing.storage',
      { infer: true },
    );

    const options: StorageOptions = {};
    if (storageConfig.projectId) {
      options.projectId = storageConfig.projectId;
    }
    if (storageConfig.apiEndpoint) {
      options.apiEndpoint = storageConfig.apiEndpoint;
      this.logger.log(
        `[GCP STORAGE] Using custom endpoint: ${storageConfig.apiEndpoint}`,
      );
    }

    this.storage = new Storage(options);
    this.bucket = this.storage.bucket(storageConfig.bucket);

    this.logger.log('GCP Storage adapter initialized');
  }

  async put(
    key: string,
    fileBuffer: Buffer,
    contentType: string,
  ): Promise<string> {
    try {
      const file: File = this.bucket.file(key);

      // Single request upload; a repeated key overwrites the previous object
      await file.save(fileBuffer, {
        contentType,
        resumable: false,
        metadata: {
          metadata: {
            uploadedAt: new Date().toISOString(),
          },
        },
      });

      // SECURITY: Only log at DEBUG level, no key
      this.logger.debug(
        `[GCP STORAGE] Uploaded object (${(fileBuffer.length / 1024).toFixed(2)} KB)`,
      );

      return `gs://${this.bucket.name}/${key}`;
    } catch (error) {
      const authError = this.detectAuthError(error);
      if (authError) {
        this.logger.error(`[GCP STORAGE] ${authError.message}`);
        this.logger.error(authError.remediation);
      } else {
        this.logger.error(
          `[GCP STORAGE] Upload failed: ${this.sanitizeError(error)}`,
        );
      }
      throw new StorageError('Failed to upload document to storage', {
        cause: error,
      });
    }
  }

  async healthCheck(): Promise<StorageHealth> {
    try {
      const [exists] = await this.bucket.exists();
      if (!exists) {
        return {
          status: 'unhealthy',
          bucket: this.bucket.name,
          accessible: false,
          error: 'Bucket does not exist',
        };
      }

      return {
        status: 'healthy',
        bucket: this.bucket.name,
        accessible: true,
      };
    } catch (error) {
      const authError = this.detectAuthError(error);
      this.logger.warn(
        `[GCP STORAGE] Health check failed: ${authError ? authError.message : this.sanitizeError(error)}`,
      );
      return {
        status: 'unhealthy',
        bucket: this.bucket.name,
        accessible: false,
        error: authError ? authError.message : 'Bucket is not accessible',
      };
    }
  }

  /**
   * Detect authentication errors and provide remediation guidance
   */
  private detectAuthError(
    error: unknown,
  ): { message: string; remediation: string } | null {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorCode = isRecord(error) ? error.code : undefined;

    if (
      errorMessage.includes('invalid_rapt') ||
      errorMessage.includes('reauth related error')
    ) {
      return {
        message: 'GCP authentication token expired (invalid_rapt)',
        remediation: `Application Default Credentials have expired. Re-authenticate:
   1. Run: gcloud auth application-default login
   2. Or set GOOGLE_APPLICATION_CREDENTIALS to a service account key file`,
      };
    }

    if (
      errorCode === 401 ||
      errorCode === 403 ||
      errorMessage.includes('Could not load the default credentials') ||
      errorMessage.includes('unauthorized') ||
      errorMessage.includes('permission denied')
    ) {
      return {
        message: 'GCP authentication failed',
        remediation: `Verify GCP authentication:
   1. Check GOOGLE_APPLICATION_CREDENTIALS env var (if using service account)
   2. Or run: gcloud auth application-default login (for local dev)
   3. Verify service account has roles/storage.objectCreator on the bucket`,
      };
    }

    return null;
  }

  /**
   * Sanitize error messages to avoid exposing sensitive info
   */
  private sanitizeError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    // Remove GCS URIs, object paths, project IDs
    return message
      .replace(/gs:\/\/[^\s]+/g, '[GCS_URI_REDACTED]')
      .replace(/\/o\/[^\s?]+/g, '/o/[OBJECT_REDACTED]')
      .replace(/projects\/[^/\s]+/g, 'projects/[PROJECT_REDACTED]')
      .substring(0, 200);
  }
}
