import { Inject, Injectable } from '@nestjs/common';
import {
  StorageHealth,
  StorageServicePort,
} from '../document-processing/domain/ports/storage.service.port';

/**
 * Health Check Service
 *
 * Readiness checks for infrastructure the pipeline cannot work without.
 * Used by monitoring systems and load balancers.
 */
@Injectable()
export class HealthService {
  constructor(
    @Inject('StorageServicePort')
    private readonly storageService: StorageServicePort,
  ) {}

  /**
   * Verifies that the object store bucket is reachable and authenticated
   */
  async checkStorageHealth(): Promise<StorageHealth> {
    return this.storageService.healthCheck();
  }
}
