import { Inject, Injectable } from '@nestjs/common';
import { DISPATCH_CONFIG, DispatchConfig } from '../../shared/config/dispatch.config';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { CalendarDate } from '../../shared/time/calendar-date';
import { AUDIENCE_RESOLVER, AudienceResolver } from '../audience/audience-resolver';
import { Campaign } from '../campaigns/campaign.model';
import { RECIPIENTS_REPOSITORY, RecipientsRepository } from '../recipients/recipients.repository';
import { effectiveDailyCap, partitionByDay } from './schedule-partition';

export type ScheduleResult = {
  recipientsScheduled: number;
  dailyCap: number;
  days: number;
  firstDate: CalendarDate | null;
  lastDate: CalendarDate | null;
};

@Injectable()
export class CampaignSchedulerService {
  constructor(
    @Inject(AUDIENCE_RESOLVER) private readonly audience: AudienceResolver,
    @Inject(RECIPIENTS_REPOSITORY) private readonly recipients: RecipientsRepository,
    @Inject(DISPATCH_CONFIG) private readonly config: DispatchConfig,
    private readonly logger: StructuredLoggerService
  ) {}

  /** Must run inside the transaction that moved the campaign to active. */
  async schedule(campaign: Campaign, startDate: CalendarDate): Promise<ScheduleResult> {
    const phones = await this.audience.resolve(campaign.audienceFilter);
    const dailyCap = effectiveDailyCap(campaign.dailySendLimit, this.config.globalDailyCap);
    const partition = partitionByDay(phones, dailyCap, startDate);

    const inserted = await this.recipients.insertPending(campaign.id, partition.rows);

    this.logger.log(
      {
        type: 'campaign_scheduled',
        campaignId: campaign.id,
        resolved: phones.length,
        inserted,
        dailyCap,
        days: partition.days,
        firstDate: partition.firstDate,
        lastDate: partition.lastDate
      },
      CampaignSchedulerService.name
    );

    return {
      recipientsScheduled: inserted,
      dailyCap,
      days: partition.days,
      firstDate: partition.firstDate,
      lastDate: partition.lastDate
    };
  }
}
