import { Controller, Get, Inject, Res } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { APP_CONFIG, AppConfig, missingRequiredKeys } from '../config/app-config';
import { JobRunner } from '../jobs/job-runner.service';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  port: number;
  missing_env_vars: string[] | null;
  storage_provider: string;
  persistence: string;
  jobs: { running: number; waiting: number };
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly runner: JobRunner,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Liveness, plus degraded status when provider keys are missing' })
  check(@Res({ passthrough: true }) res: Response): HealthReport {
    const missing = missingRequiredKeys(this.config);
    const { running, waiting } = this.runner.stats;
    const report: HealthReport = {
      status: missing.length === 0 ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: this.config.version,
      port: this.config.port,
      missing_env_vars: missing.length > 0 ? missing : null,
      storage_provider: this.config.storage.provider,
      persistence: this.config.jobs.store,
      jobs: { running, waiting },
    };
    res.status(report.status === 'healthy' ? 200 : 503);
    return report;
  }
}
