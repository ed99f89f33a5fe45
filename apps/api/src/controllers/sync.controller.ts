import {
  Controller,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
  Query,
} from '@nestjs/common';
import { SyncSuccessResponse } from '@gsc-sync/shared-types';
import { SyncPipelineService } from '../services/sync-pipeline.service';

@Controller()
export class SyncController {
  private readonly logger = new Logger(SyncController.name);

  constructor(private readonly syncPipelineService: SyncPipelineService) {}

  /**
   * POST /trigger-gsc-sync?days=N
   * Sync Search Console data for the day N days ago (default 2)
   */
  @Post('trigger-gsc-sync')
  @HttpCode(HttpStatus.OK)
  async triggerSync(@Query('days') days?: string): Promise<SyncSuccessResponse> {
    const result = await this.syncPipelineService.run(days);

    if (!result.ok) {
      throw new InternalServerErrorException(result.response);
    }

    this.logger.log(
      `Sync for ${result.response.date_processed} finished: ${result.response.message}`
    );
    return result.response;
  }
}
