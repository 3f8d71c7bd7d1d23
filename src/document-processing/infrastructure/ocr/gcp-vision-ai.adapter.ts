import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ImageAnnotatorClient, protos } from '@google-cloud/vision';
import { OcrServicePort } from '../../domain/ports/ocr.service.port';
import { ExtractionError } from '../../domain/errors/document-processing.error';
import { isPdf } from '../../domain/utils/document-validation.util';
import { AllConfigType } from '../../../config/config.type';
import { sanitizeErrorMessage } from '../../../audit/utils/phi-sanitizer.util';

type AnnotateImageResponse =
  protos.google.cloud.vision.v1.IAnnotateImageResponse;

// Vision reads at most this many pages of an inline PDF; an empty page list
// means exactly these.
const INLINE_PDF_PAGE_LIMIT = 5;

/**
 * GCP Vision AI Adapter
 *
 * Inline (synchronous) processing only; bytes are sent with the request, so
 * nothing is staged in a bucket before classification:
 * - Images (PNG, JPG): batchAnnotateImages
 * - PDF: batchAnnotateFiles over the first N pages
 *
 * Uses DOCUMENT_TEXT_DETECTION feature for OCR.
 *
 * HIPAA Compliance:
 * - Google Vision AI is HIPAA-eligible (BAA required)
 * - Never log PHI or extracted text, only lengths and page counts
 *
 * IAM Requirements:
 * - Service account needs: roles/cloudvision.apiUser
 */
@Injectable()
export class GcpVisionAiAdapter implements OcrServicePort {
  private readonly logger = new Logger(GcpVisionAiAdapter.name);
  private readonly client: ImageAnnotatorClient;
  private readonly timeoutMs: number;
  private readonly maxPdfPages: number;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    const projectId = this.configService.get(
      'documentProcessing.storage.projectId',
      { infer: true },
    );
    this.client = new ImageAnnotatorClient(projectId ? { projectId } : {});

    this.timeoutMs = this.configService.getOrThrow(
      'documentProcessing.ocr.timeoutMs',
      { infer: true },
    );
    this.maxPdfPages = this.configService.getOrThrow(
      'documentProcessing.ocr.maxPdfPages',
      { infer: true },
    );

    this.logger.log(
      `[VISION AI] Adapter initialized - Timeout: ${this.timeoutMs}ms, Max PDF pages: ${this.maxPdfPages}`,
    );
  }

  async extractText(fileBuffer: Buffer, fileName: string): Promise<string> {
    const startTime = Date.now();
    const pdf = isPdf(fileName);

    this.logger.log(
      `[VISION AI] extractText called - Type: ${pdf ? 'pdf' : 'image'}, Size: ${(fileBuffer.length / 1024).toFixed(2)} KB`,
    );

    let pages: AnnotateImageResponse[];
    try {
      pages = pdf
        ? await this.annotatePdf(fileBuffer)
        : await this.annotateImage(fileBuffer);
    } catch (error) {
      this.logger.error(
        `[VISION AI] OCR request failed: ${this.sanitizeError(error)}`,
      );
      throw new ExtractionError('Vision AI OCR processing failed', {
        cause: error,
      });
    }

    const failedPage = pages.find((page) => page.error?.message);
    if (failedPage?.error?.message) {
      this.logger.error(
        `[VISION AI] OCR returned an error - Code: ${failedPage.error.code ?? 'unknown'}, Message: ${sanitizeErrorMessage(failedPage.error.message)}`,
      );
      throw new ExtractionError('Vision AI could not read the document');
    }

    const text = pages
      .map((page) => page.fullTextAnnotation?.text || '')
      .join('\n');

    this.logger.log(
      `[VISION AI] Text extracted - Pages: ${pages.length}, Text length: ${text.length}, Time: ${Date.now() - startTime}ms`,
    );

    return text;
  }

  private async annotateImage(
    fileBuffer: Buffer,
  ): Promise<AnnotateImageResponse[]> {
    const [response] = await this.client.batchAnnotateImages(
      {
        requests: [
          {
            image: { content: fileBuffer },
            features: [{ type: 'DOCUMENT_TEXT_DETECTION' as const }],
          },
        ],
      },
      { timeout: this.timeoutMs },
    );

    const result = response.responses?.[0];
    if (!result) {
      throw new Error('No response returned from Vision AI');
    }
    return [result];
  }

  private async annotatePdf(
    fileBuffer: Buffer,
  ): Promise<AnnotateImageResponse[]> {
    const pageNumbers =
      this.maxPdfPages < INLINE_PDF_PAGE_LIMIT
        ? Array.from({ length: this.maxPdfPages }, (_, index) => index + 1)
        : [];

    const [response] = await this.client.batchAnnotateFiles(
      {
        requests: [
          {
            inputConfig: { content: fileBuffer, mimeType: 'application/pdf' },
            features: [{ type: 'DOCUMENT_TEXT_DETECTION' as const }],
            pages: pageNumbers,
          },
        ],
      },
      { timeout: this.timeoutMs },
    );

    const fileResult = response.responses?.[0];
    if (!fileResult) {
      throw new Error('No response returned from Vision AI');
    }
    if (fileResult.error?.message) {
      throw new Error(fileResult.error.message);
    }
    return fileResult.responses || [];
  }

  /**
   * Sanitize error messages to avoid exposing sensitive info
   */
  private sanitizeError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    return sanitizeErrorMessage(
      message.replace(/projects\/[^/\s]+/g, 'projects/[PROJECT_REDACTED]'),
    ).substring(0, 200);
  }
}
