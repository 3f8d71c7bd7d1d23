import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';

import { HomeService } from './home.service';
import { HealthService } from './health.service';

@ApiTags('Home')
@Controller()
@SkipThrottle()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Service banner',
    description: 'Static banner confirming the service is up. Public endpoint.',
  })
  @ApiOkResponse({
    description: 'Banner',
    schema: {
      type: 'object',
      properties: {
        message: {
          type: 'string',
          example: 'Medical Document Classifier - Up and running',
        },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health')
  @ApiOperation({
    summary: 'Liveness check',
    description: 'Static liveness payload; does not call any dependency.',
  })
  @ApiOkResponse({
    description: 'Service is alive',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        service: {
          type: 'string',
          example: 'Medical Document Classifier',
        },
      },
    },
  })
  health() {
    return this.service.health();
  }

  @Get('health/storage')
  @ApiOperation({
    summary: 'Object Store Health Check',
    description:
      'Check if the GCP Cloud Storage bucket is accessible and authenticated.',
  })
  @ApiOkResponse({
    description: 'Object store health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        bucket: { type: 'string', example: 'medical-documents' },
        accessible: { type: 'boolean', example: true },
        error: { type: 'string', nullable: true },
      },
    },
  })
  async storageHealth() {
    return this.healthService.checkStorageHealth();
  }
}
