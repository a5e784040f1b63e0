import { Controller, Get, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type {
  CallbackName,
  CallbackStatistics,
  StorageStatistics,
  WebmentionsHandler,
} from '../../../core';
import { WEBMENTIONS_HANDLER } from '../constants';
import {
  ApiHealthCheck,
  ApiServiceStatistics,
} from '../../../_shared/swagger/decorators';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(WEBMENTIONS_HANDLER)
    private readonly handler: WebmentionsHandler,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async readiness(): Promise<{
    status: 'ready' | 'not_ready';
    timestamp: Date;
    checks: { storage: boolean };
  }> {
    const storageHealthy = await this.handler.isHealthy();

    return {
      status: storageHealthy ? 'ready' : 'not_ready',
      timestamp: new Date(),
      checks: { storage: storageHealthy },
    };
  }

  @Get('stats')
  @ApiServiceStatistics()
  async statistics(): Promise<{
    storage: StorageStatistics;
    callbacks: Record<CallbackName, CallbackStatistics>;
    uptime: number;
  }> {
    return {
      storage: await this.handler.storage.getStatistics(),
      callbacks: this.handler.dispatcher.getStatistics(),
      uptime: process.uptime(),
    };
  }
}
