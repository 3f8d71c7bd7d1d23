import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import classificationConfig from './classification/config/classification.config';
import documentProcessingConfig from './document-processing/config/document-processing.config';
import { AllConfigType } from './config/config.type';
import { AuditModule } from './audit/audit.module';
import { ClassificationModule } from './classification/classification.module';
import { DocumentProcessingModule } from './document-processing/document-processing.module';
import { HomeModule } from './home/home.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        appConfig,
        throttlerConfig,
        classificationConfig,
        documentProcessingConfig,
      ],
      envFilePath: ['.env'],
    }),
    // HIPAA Security: Rate limiting to prevent brute force and abuse
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    AuditModule,
    ClassificationModule,
    DocumentProcessingModule,
    HomeModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
