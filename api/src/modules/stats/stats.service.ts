import { Inject, Injectable } from '@nestjs/common';
import { DISPATCH_CONFIG, DispatchConfig } from '../../shared/config/dispatch.config';
import { CampaignsService } from '../campaigns/campaigns.service';
import { RECIPIENTS_REPOSITORY, RecipientsRepository } from '../recipients/recipients.repository';
import { CampaignStats, projectStats } from './stats.projector';

@Injectable()
export class StatsService {
  constructor(
    @Inject(RECIPIENTS_REPOSITORY) private readonly recipients: RecipientsRepository,
    @Inject(DISPATCH_CONFIG) private readonly config: DispatchConfig,
    private readonly campaigns: CampaignsService
  ) {}

  async forCampaign(campaignId: string): Promise<CampaignStats> {
    const campaign = await this.campaigns.getOrThrow(campaignId);
    const tally = await this.recipients.tally(campaignId);
    return projectStats(campaign, tally, this.config.globalDailyCap, this.campaigns.today());
  }
}
