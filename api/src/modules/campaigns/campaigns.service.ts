import { Inject, Injectable } from '@nestjs/common';
import { DISPATCH_CONFIG, DispatchConfig } from '../../shared/config/dispatch.config';
import { TRANSACTION_RUNNER, TransactionRunner } from '../../shared/database/transaction-runner';
import { CampaignNotFoundError, LifecycleViolationError } from '../../shared/errors/dispatch-errors';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { addDays, calendarDateIn, CalendarDate, CLOCK, Clock } from '../../shared/time/calendar-date';
import { parseInput } from '../../shared/validation/parse-input';
import { Recipient } from '../recipients/recipient.model';
import { RECIPIENTS_REPOSITORY, RecipientsRepository } from '../recipients/recipients.repository';
import { CampaignSchedulerService } from '../scheduler/campaign-scheduler.service';
import { ratio } from '../stats/stats.projector';
import { canApply, canReschedule, LifecycleAction, lifecycleRule } from './campaign-lifecycle';
import { ActivationResult, Campaign, CampaignListItem, RescheduleResult } from './campaign.model';
import {
  activateCampaignSchema,
  createCampaignSchema,
  listCampaignsQuerySchema,
  listRecipientsQuerySchema
} from './campaign.schemas';
import { CAMPAIGNS_REPOSITORY, CampaignsRepository } from './campaigns.repository';

@Injectable()
export class CampaignsService {
  constructor(
    @Inject(CAMPAIGNS_REPOSITORY) private readonly campaigns: CampaignsRepository,
    @Inject(RECIPIENTS_REPOSITORY) private readonly recipients: RecipientsRepository,
    @Inject(TRANSACTION_RUNNER) private readonly transactions: TransactionRunner,
    @Inject(DISPATCH_CONFIG) private readonly config: DispatchConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly scheduler: CampaignSchedulerService,
    private readonly logger: StructuredLoggerService
  ) {}

  today(): CalendarDate {
    return calendarDateIn(this.clock.now(), this.config.timeZone);
  }

  async create(input: unknown): Promise<Campaign> {
    const body = parseInput(createCampaignSchema(this.config), input);

    const campaign = await this.campaigns.insert(
      {
        name: body.name,
        description: body.description ?? null,
        templateName: body.templateName,
        languageCode: body.languageCode,
        templateParameters: body.templateParameters,
        dailySendLimit: body.dailySendLimit,
        priority: body.priority,
        audienceFilter: body.audienceFilter,
        startDate: body.startDate ?? null
      },
      this.clock.now()
    );

    this.logger.log({ type: 'campaign_created', campaignId: campaign.id, priority: campaign.priority }, CampaignsService.name);
    return campaign;
  }

  async getOrThrow(campaignId: string): Promise<Campaign> {
    const campaign = await this.campaigns.findById(campaignId);
    if (!campaign) {
      throw new CampaignNotFoundError(campaignId);
    }
    return campaign;
  }

  async list(query: unknown): Promise<CampaignListItem[]> {
    const filter = parseInput(listCampaignsQuerySchema, query);
    const campaigns = await this.campaigns.list(filter);

    return Promise.all(
      campaigns.map(async (campaign) => {
        const tally = await this.recipients.tally(campaign.id);
        return {
          ...campaign,
          totalRecipients: tally.total,
          messagesSent: tally.everSent,
          progress: ratio(tally.everSent, tally.total) ?? 0
        };
      })
    );
  }

  /**
   * Moves a draft campaign to active and writes its recipient schedule in the same
   * transaction. A second activation fails at the status guard before the audience is resolved again.
   */
  async activate(campaignId: string, input: unknown): Promise<ActivationResult> {
    const body = parseInput(activateCampaignSchema, input);
    const current = await this.getOrThrow(campaignId);

    if (!canApply('activate', current.status)) {
      throw new LifecycleViolationError(campaignId, current.status, 'activate');
    }

    const startDate = body.startDate ?? current.startDate ?? addDays(this.today(), 1);

    const { campaign, schedule } = await this.transactions.runInTransaction(async () => {
      const activated = await this.applyLifecycle(campaignId, 'activate', startDate);
      const result = await this.scheduler.schedule(activated, startDate);
      return { campaign: activated, schedule: result };
    });

    this.logger.log(
      { type: 'campaign_activated', campaignId, startDate, recipients: schedule.recipientsScheduled, days: schedule.days },
      CampaignsService.name
    );

    const completed = await this.completeIfFinished(campaignId);

    return { campaign: completed ?? campaign, ...schedule };
  }

  pause(campaignId: string): Promise<Campaign> {
    return this.changeStatus(campaignId, 'pause');
  }

  resume(campaignId: string): Promise<Campaign> {
    return this.changeStatus(campaignId, 'resume');
  }

  cancel(campaignId: string): Promise<Campaign> {
    return this.changeStatus(campaignId, 'cancel');
  }

  /**
   * Makes every pending recipient due today. The daily caps still apply, so the backlog
   * drains at the usual rate starting with the next cycle.
   */
  async rescheduleToday(campaignId: string): Promise<RescheduleResult> {
    const campaign = await this.getOrThrow(campaignId);
    if (!canReschedule(campaign.status)) {
      throw new LifecycleViolationError(campaignId, campaign.status, 'reschedule');
    }

    const date = this.today();
    const recipientsRescheduled = await this.recipients.reschedulePending(campaignId, date);
    this.logger.log({ type: 'campaign_rescheduled', campaignId, date, recipientsRescheduled }, CampaignsService.name);

    return { campaignId, date, recipientsRescheduled };
  }

  /**
   * Completes an active campaign once nothing is left to send or to hear back about.
   * Returns the completed campaign, or `null` when it stays as it is.
   */
  async completeIfFinished(campaignId: string): Promise<Campaign | null> {
    const tally = await this.recipients.tally(campaignId);
    if (tally.pending > 0 || tally.sent > 0) {
      return null;
    }

    const rule = lifecycleRule('complete');
    const completed = await this.campaigns.transition(campaignId, {
      from: rule.from,
      to: rule.to,
      at: this.clock.now()
    });

    if (completed) {
      this.logger.log(
        { type: 'campaign_completed', campaignId, total: tally.total, failed: tally.failed },
        CampaignsService.name
      );
    }
    return completed;
  }

  async listRecipients(campaignId: string, query: unknown): Promise<Recipient[]> {
    const filter = parseInput(listRecipientsQuerySchema, query);
    await this.getOrThrow(campaignId);
    return this.recipients.list(campaignId, filter);
  }

  private async changeStatus(campaignId: string, action: LifecycleAction): Promise<Campaign> {
    const campaign = await this.applyLifecycle(campaignId, action);
    this.logger.log({ type: `campaign_${campaign.status}`, campaignId }, CampaignsService.name);
    return campaign;
  }

  private async applyLifecycle(campaignId: string, action: LifecycleAction, startDate?: CalendarDate): Promise<Campaign> {
    const rule = lifecycleRule(action);
    const updated = await this.campaigns.transition(campaignId, {
      from: rule.from,
      to: rule.to,
      at: this.clock.now(),
      startDate
    });

    if (updated) {
      return updated;
    }

    const current = await this.getOrThrow(campaignId);
    throw new LifecycleViolationError(campaignId, current.status, action);
  }
}
