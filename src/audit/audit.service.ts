import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import {
  sanitizeErrorMessage,
  sanitizeMetadata,
} from './utils/phi-sanitizer.util';

export const AUDIT_SERVICE_NAME = 'medical-document-classifier';

export enum DocumentEventType {
  DOCUMENT_RECEIVED = 'DOCUMENT_RECEIVED',
  DOCUMENT_REJECTED = 'DOCUMENT_REJECTED',
  DOCUMENT_CLASSIFICATION_DEGRADED = 'DOCUMENT_CLASSIFICATION_DEGRADED',
  DOCUMENT_PROCESSING_COMPLETED = 'DOCUMENT_PROCESSING_COMPLETED',
  DOCUMENT_PROCESSING_FAILED = 'DOCUMENT_PROCESSING_FAILED',
}

export interface DocumentEventData {
  patientId: string;
  event: DocumentEventType;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, unknown>; // Additional event-specific data
}

/**
 * Audit Service for HIPAA-compliant logging of document lifecycle events
 *
 * HIPAA Requirements:
 * - Logs must contain patient ID, timestamp, event type, and outcome
 * - NO PHI (Protected Health Information) should be logged
 * - NO document text, OCR output or credentials
 *
 * Entries are single-line JSON on stdout, picked up by the log collector.
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  /**
   * Log a document event
   *
   * Security Notes:
   * - Error messages are sanitized before they are written
   * - Metadata is stripped of content-bearing keys
   */
  logDocumentEvent(data: DocumentEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: AUDIT_SERVICE_NAME,
      component: 'document-processing',
      patientId: data.patientId,
      event: data.event,
      success: data.success,
      errorType: data.errorMessage
        ? sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: sanitizeMetadata(data.metadata) } : {}),
    };

    // Structured JSON logging for GCP Cloud Logging compatibility
    console.info(JSON.stringify(logEntry));
  }
}
