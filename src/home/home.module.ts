import { Module } from '@nestjs/common';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { DocumentProcessingModule } from '../document-processing/document-processing.module';

@Module({
  imports: [
    // Provides the StorageServicePort checked by HealthService
    DocumentProcessingModule,
  ],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
})
export class HomeModule {}
