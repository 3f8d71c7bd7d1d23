import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { ClassificationConfig } from '../classification/config/classification-config.type';
import { DocumentProcessingConfig } from '../document-processing/config/document-processing-config.type';

export type AllConfigType = {
  app: AppConfig;
  classification: ClassificationConfig;
  documentProcessing: DocumentProcessingConfig;
  throttler: ThrottlerConfig;
};
