import { Injectable } from '@nestjs/common';
import { ServiceStatusResponse } from '@gsc-sync/shared-types';

@Injectable()
export class AppService {
  getStatus(): ServiceStatusResponse {
    return { message: 'GSC API Sync Service is running' };
  }
}
