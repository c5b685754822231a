import { Controller, Get, Inject } from '@nestjs/common';
import { PostgresService } from '../../shared/database/postgres.service';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { MetricsService } from '../../shared/observability/metrics.service';
import { CLOCK, Clock } from '../../shared/time/calendar-date';

export type HealthReport = {
  status: 'ok' | 'degraded';
  timestamp: string;
  db: 'up' | 'down';
  uptimeSeconds: number;
};

@Controller('health')
export class HealthController {
  constructor(
    private readonly db: PostgresService,
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  @Get()
  async check(): Promise<HealthReport> {
    let dbStatus: 'up' | 'down' = 'up';

    try {
      await this.db.query('select 1');
    } catch (error) {
      dbStatus = 'down';
      this.logger.warn(
        { type: 'health_db_unreachable', message: error instanceof Error ? error.message : String(error) },
        HealthController.name
      );
    }

    return {
      status: dbStatus === 'up' ? 'ok' : 'degraded',
      timestamp: this.clock.now().toISOString(),
      db: dbStatus,
      uptimeSeconds: this.metrics.snapshot().uptimeSeconds
    };
  }
}
