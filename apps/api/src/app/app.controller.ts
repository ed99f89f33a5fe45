import { Controller, Get } from '@nestjs/common';
import { ServiceStatusResponse } from '@gsc-sync/shared-types';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  /**
   * GET /
   * Liveness message
   */
  @Get()
  getStatus(): ServiceStatusResponse {
    return this.appService.getStatus();
  }
}
