import { Body, Controller, Get, HttpCode, HttpStatus, Inject, Post, Query } from '@nestjs/common';
import { parseInput } from '../../shared/validation/parse-input';
import { CampaignsService } from '../campaigns/campaigns.service';
import { DAILY_QUOTA_LEDGER, DailyQuotaLedger, QuotaUsage } from '../quota/daily-quota.ledger';
import { dispatchRunSchema, quotaQuerySchema } from './dispatch.schemas';
import { DispatchSummary } from './dispatch.types';
import { DispatcherService } from './dispatcher.service';

@Controller('dispatch')
export class DispatchController {
  constructor(
    private readonly dispatcher: DispatcherService,
    private readonly campaigns: CampaignsService,
    @Inject(DAILY_QUOTA_LEDGER) private readonly quota: DailyQuotaLedger
  ) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  run(@Body() body: unknown): Promise<DispatchSummary> {
    const input = parseInput(dispatchRunSchema, body);
    return this.dispatcher.processDay(input.date);
  }

  @Get('quota')
  quotaUsage(@Query() query: unknown): Promise<QuotaUsage> {
    const input = parseInput(quotaQuerySchema, query);
    return this.quota.usage(input.date ?? this.campaigns.today());
  }
}
