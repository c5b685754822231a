import { Controller, Get, Header, Inject } from '@nestjs/common';
import { MetricsService, MetricsSnapshot } from '../../shared/observability/metrics.service';
import { CampaignsService } from '../campaigns/campaigns.service';
import { DAILY_QUOTA_LEDGER, DailyQuotaLedger, QuotaUsage } from '../quota/daily-quota.ledger';

export type DispatchMetricsView = {
  today: string;
  quota: QuotaUsage;
  lastCycleDate: string | null;
  /** True when no cycle has run for today yet. */
  cycleBehind: boolean;
  totals: MetricsSnapshot['dispatch'];
  statusEvents: MetricsSnapshot['statusEvents'];
};

@Controller('metrics')
export class MetricsController {
  constructor(
    private readonly metrics: MetricsService,
    private readonly campaigns: CampaignsService,
    @Inject(DAILY_QUOTA_LEDGER) private readonly quota: DailyQuotaLedger
  ) {}

  @Get()
  @Header('Content-Type', 'text/plain; version=0.0.4')
  prometheus(): string {
    return this.metrics.toPrometheus();
  }

  @Get('dispatch')
  async dispatch(): Promise<DispatchMetricsView> {
    const today = this.campaigns.today();
    const snapshot = this.metrics.snapshot();
    const { lastCycleDate, ...totals } = snapshot.dispatch;

    return {
      today,
      quota: await this.quota.usage(today),
      lastCycleDate,
      cycleBehind: lastCycleDate === null || lastCycleDate < today,
      totals: { ...totals, lastCycleDate },
      statusEvents: snapshot.statusEvents
    };
  }
}
