import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { RemoteClassifierClient } from './infrastructure/remote-classifier.client';
import { RetryGovernor } from './services/retry-governor';
import { ClassificationService } from './services/classification.service';

@Module({
  providers: [
    {
      provide: 'ClassifierClientPort',
      useClass: RemoteClassifierClient,
    },
    {
      provide: RetryGovernor,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) =>
        new RetryGovernor(
          configService.getOrThrow('classification.retry', { infer: true }),
        ),
    },
    ClassificationService,
  ],
  exports: [ClassificationService],
})
export class ClassificationModule {}
