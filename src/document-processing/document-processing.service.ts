import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { AuditService, DocumentEventType } from '../audit/audit.service';
import { sanitizeErrorMessage } from '../audit/utils/phi-sanitizer.util';
import { ClassificationService } from '../classification/services/classification.service';
import { ClassificationResult } from '../classification/domain/classification.types';
import { ClassificationStatus } from '../classification/domain/enums/classification-status.enum';
import { OcrServicePort } from './domain/ports/ocr.service.port';
import { StorageServicePort } from './domain/ports/storage.service.port';
import { PipelineStage } from './domain/enums/pipeline-stage.enum';
import {
  DocumentProcessingError,
  DocumentValidationError,
  ExtractionError,
  ProcessingCancelledError,
  StorageError,
} from './domain/errors/document-processing.error';
import { PipelineTracker } from './domain/utils/pipeline-state-machine.util';
import { buildStorageKey } from './domain/utils/storage-key.util';
import {
  getFileExtension,
  resolveContentType,
  validateUpload,
} from './domain/utils/document-validation.util';
import {
  ProcessDocumentCommand,
  ProcessingResult,
} from './domain/document-processing.types';

/**
 * Document Pipeline
 *
 * RECEIVED → EXTRACTED → CLASSIFIED → STORED → DONE, strictly in sequence.
 *
 * - Validation and extraction failures stop the pipeline before anything is
 *   stored.
 * - A degraded classification (fallback or parse error) still reaches
 *   storage, under the fallback category.
 * - Storage failure is fatal for the request.
 * - The caller's signal is checked between stages and handed to the
 *   classifier. Completed stages are not rolled back.
 */
@Injectable()
export class DocumentProcessingService {
  private readonly logger = new Logger(DocumentProcessingService.name);
  private readonly allowedExtensions: readonly string[];
  private readonly keyPrefix: string;

  constructor(
    @Inject('OcrServicePort')
    private readonly ocrService: OcrServicePort,
    @Inject('StorageServicePort')
    private readonly storageService: StorageServicePort,
    private readonly classificationService: ClassificationService,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.allowedExtensions = this.configService.getOrThrow(
      'documentProcessing.allowedExtensions',
      { infer: true },
    );
    this.keyPrefix = this.configService.getOrThrow(
      'documentProcessing.storage.keyPrefix',
      { infer: true },
    );
  }

  getAllowedExtensions(): readonly string[] {
    return this.allowedExtensions;
  }

  async process(
    command: ProcessDocumentCommand,
    signal?: AbortSignal,
  ): Promise<ProcessingResult> {
    const { fileBuffer, fileName, patientId } = command;
    const tracker = new PipelineTracker();
    const metadata = {
      extension: getFileExtension(fileName),
      fileSize: fileBuffer.length,
    };

    this.auditService.logDocumentEvent({
      patientId,
      event: DocumentEventType.DOCUMENT_RECEIVED,
      success: true,
      metadata,
    });

    try {
      validateUpload(fileName, fileBuffer, this.allowedExtensions);

      this.logger.log(
        `[PIPELINE] Extracting text - Extension: ${metadata.extension}, Size: ${(fileBuffer.length / 1024).toFixed(2)} KB`,
      );
      const text = await this.extract(fileBuffer, fileName);
      tracker.advance(PipelineStage.EXTRACTED);
      this.ensureNotCancelled(signal, tracker);

      const classification = await this.classificationService.classify(
        text,
        signal,
      );
      tracker.advance(PipelineStage.CLASSIFIED);
      if (classification.status !== ClassificationStatus.SUCCESS) {
        this.auditDegraded(patientId, classification);
      }
      this.ensureNotCancelled(signal, tracker);

      const key = buildStorageKey(
        this.keyPrefix,
        patientId,
        classification.label,
        fileName,
      );
      const storageLocation = await this.store(
        key,
        fileBuffer,
        resolveContentType(fileName, command.mimeType),
      );
      tracker.advance(PipelineStage.STORED);
      tracker.advance(PipelineStage.DONE);

      const timings = tracker.getTimings();
      this.logger.log(
        `[PIPELINE] Document processed - Label: "${classification.label}", Status: ${classification.status}, ` +
          `Extract: ${timings.EXTRACTED ?? 0}ms, Classify: ${timings.CLASSIFIED ?? 0}ms, Store: ${timings.STORED ?? 0}ms`,
      );
      this.auditService.logDocumentEvent({
        patientId,
        event: DocumentEventType.DOCUMENT_PROCESSING_COMPLETED,
        success: true,
        metadata: {
          ...metadata,
          label: classification.label,
          classificationStatus: classification.status,
          confidence: classification.confidence,
        },
      });

      return {
        patientId,
        classification,
        storageLocation,
        status: 'processed',
        timings,
      };
    } catch (error) {
      this.handleFailure(error, tracker, patientId, metadata);
      throw error;
    }
  }

  private async extract(fileBuffer: Buffer, fileName: string): Promise<string> {
    try {
      return await this.ocrService.extractText(fileBuffer, fileName);
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      throw new ExtractionError('Text extraction failed', { cause: error });
    }
  }

  private async store(
    key: string,
    fileBuffer: Buffer,
    contentType: string,
  ): Promise<string> {
    try {
      return await this.storageService.put(key, fileBuffer, contentType);
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError('Failed to upload document to storage', {
        cause: error,
      });
    }
  }

  private ensureNotCancelled(
    signal: AbortSignal | undefined,
    tracker: PipelineTracker,
  ): void {
    if (signal?.aborted) {
      throw new ProcessingCancelledError(tracker.stage);
    }
  }

  private auditDegraded(
    patientId: string,
    classification: ClassificationResult,
  ): void {
    this.logger.warn(
      `[PIPELINE] Classification degraded (${classification.status}); storing under "${classification.label}"`,
    );
    this.auditService.logDocumentEvent({
      patientId,
      event: DocumentEventType.DOCUMENT_CLASSIFICATION_DEGRADED,
      success: false,
      metadata: {
        classificationStatus: classification.status,
        confidence: classification.confidence,
      },
    });
  }

  private handleFailure(
    error: unknown,
    tracker: PipelineTracker,
    patientId: string,
    metadata: Record<string, unknown>,
  ): void {
    if (!(error instanceof DocumentProcessingError)) {
      this.logger.error(
        `[PIPELINE] Unexpected failure at ${tracker.stage}: ${sanitizeErrorMessage(error instanceof Error ? error.message : String(error))}`,
      );
      return;
    }

    tracker.fail();

    if (error instanceof DocumentValidationError) {
      this.logger.warn(`[PIPELINE] Document rejected: ${error.message}`);
      this.auditService.logDocumentEvent({
        patientId,
        event: DocumentEventType.DOCUMENT_REJECTED,
        success: false,
        errorMessage: error.message,
        metadata,
      });
      return;
    }

    if (error instanceof ProcessingCancelledError) {
      this.logger.warn(`[PIPELINE] ${error.message}`);
    } else {
      this.logger.error(
        `[PIPELINE] Processing failed at ${error.stage}: ${error.message}`,
      );
    }
    this.auditService.logDocumentEvent({
      patientId,
      event: DocumentEventType.DOCUMENT_PROCESSING_FAILED,
      success: false,
      errorMessage: error.message,
      metadata: { ...metadata, stage: error.stage },
    });
  }
}
