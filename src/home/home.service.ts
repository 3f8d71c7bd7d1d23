import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class HomeService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  appInfo(): { message: string } {
    return {
      message: `${this.configService.getOrThrow('app.name', { infer: true })} - Up and running`,
    };
  }

  /**
   * Liveness only; touches no dependency
   */
  health(): { status: 'healthy'; service: string } {
    return {
      status: 'healthy',
      service: this.configService.getOrThrow('app.name', { infer: true }),
    };
  }
}
