import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { AllConfigType } from '../config/config.type';
import { DocumentProcessingController } from './document-processing.controller';
import { DocumentProcessingService } from './document-processing.service';
import { GcpStorageAdapter } from './infrastructure/storage/gcp-storage.adapter';
import { GcpVisionAiAdapter } from './infrastructure/ocr/gcp-vision-ai.adapter';
import { AuditModule } from '../audit/audit.module';
import { ClassificationModule } from '../classification/classification.module';

@Module({
  imports: [
    // File upload
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        limits: {
          fileSize:
            configService.getOrThrow('documentProcessing.maxFileSizeMb', {
              infer: true,
            }) *
            1024 *
            1024,
          files: 1,
        },
      }),
    }),

    // Audit logging
    AuditModule,

    ClassificationModule,
  ],
  controllers: [DocumentProcessingController],
  providers: [
    DocumentProcessingService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: 'StorageServicePort',
      useClass: GcpStorageAdapter,
    },
    {
      provide: 'OcrServicePort',
      useClass: GcpVisionAiAdapter,
    },
  ],
  exports: [DocumentProcessingService, 'StorageServicePort'],
})
export class DocumentProcessingModule {}
