import {
  Controller,
  Post,
  Body,
  Res,
  UseInterceptors,
  UploadedFile,
  BadRequestException,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiTags,
  ApiOperation,
  ApiOkResponse,
  ApiConsumes,
  ApiBody,
  ApiBadRequestResponse,
  ApiPayloadTooLargeResponse,
  ApiTooManyRequestsResponse,
  ApiInternalServerErrorResponse,
} from '@nestjs/swagger';
import { Response } from 'express';
import { DocumentProcessingService } from './document-processing.service';
import { ClassifyDocumentDto } from './dto/classify-document.dto';
import { ClassifyDocumentResponseDto } from './dto/classify-document-response.dto';
import {
  DocumentProcessingError,
  DocumentValidationError,
  ProcessingCancelledError,
} from './domain/errors/document-processing.error';
import { decodeUploadFileName } from './domain/utils/document-validation.util';

// nginx convention; the socket is already closed when this is raised
const CLIENT_CLOSED_REQUEST = 499;

/**
 * Document Classification Controller
 *
 * HIPAA Compliance:
 * - Rate limiting to prevent abuse (global throttler guard)
 * - No document text in responses or logs
 * - All outcomes logged via AuditService
 *
 * Security:
 * - File validation (extension, size, name)
 * - Sanitized error messages: internal failures surface as a generic 500
 */
@ApiTags('Documents')
@Controller()
export class DocumentProcessingController {
  private readonly logger = new Logger(DocumentProcessingController.name);

  constructor(
    private readonly documentProcessingService: DocumentProcessingService,
  ) {}

  @Post('classify')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Classify and archive a medical document',
    description:
      'Extracts text from the uploaded document, classifies it and stores the original under ' +
      'patients/{patientId}/{category}/{filename}. An unavailable classifier does not fail the ' +
      'request; the document is stored under the fallback category instead.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        file: {
          type: 'string',
          format: 'binary',
          description: 'Document file (PDF, JPEG, PNG)',
        },
        patientId: {
          type: 'string',
          maxLength: 128,
          pattern: '^[A-Za-z0-9_-]+$',
        },
      },
      required: ['file', 'patientId'],
    },
  })
  @ApiOkResponse({
    description: 'Document classified and stored',
    type: ClassifyDocumentResponseDto,
  })
  @ApiBadRequestResponse({ description: 'Invalid file or parameters' })
  @ApiPayloadTooLargeResponse({ description: 'File exceeds the size limit' })
  @ApiTooManyRequestsResponse({ description: 'Too many requests' })
  @ApiInternalServerErrorResponse({ description: 'Extraction or storage failed' })
  @UseInterceptors(FileInterceptor('file'))
  async classify(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: ClassifyDocumentDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<ClassifyDocumentResponseDto> {
    this.logger.log(
      `[CLASSIFY] Request received: patientId=${dto.patientId}, fileSize=${file?.size || 0}`,
    );

    if (!file) {
      this.logger.warn('[CLASSIFY] No file provided');
      throw new BadRequestException('File is required');
    }

    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      const result = await this.documentProcessingService.process(
        {
          fileBuffer: file.buffer,
          fileName: decodeUploadFileName(file.originalname),
          mimeType: file.mimetype,
          patientId: dto.patientId,
        },
        controller.signal,
      );

      return {
        patientId: result.patientId,
        classification: result.classification,
        storageLocation: result.storageLocation,
        status: result.status,
      };
    } catch (error) {
      throw this.toHttpException(error);
    } finally {
      res.off('close', onClose);
    }
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof DocumentValidationError) {
      return new BadRequestException(error.message);
    }
    if (error instanceof ProcessingCancelledError) {
      return new HttpException('Client closed request', CLIENT_CLOSED_REQUEST);
    }
    if (error instanceof DocumentProcessingError) {
      this.logger.error(`[CLASSIFY] Failed at stage ${error.stage}`);
    } else {
      this.logger.error('[CLASSIFY] Unexpected error during processing');
    }
    return new InternalServerErrorException('Document processing failed');
  }
}
