import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { DISPATCH_CONFIG, DispatchConfig } from '../../shared/config/dispatch.config';
import { GatewaySendError, QuotaExceededError } from '../../shared/errors/dispatch-errors';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { MetricsService } from '../../shared/observability/metrics.service';
import { addDays, CalendarDate, CLOCK, Clock } from '../../shared/time/calendar-date';
import { AUDIENCE_RESOLVER, AudienceResolver } from '../audience/audience-resolver';
import { Campaign } from '../campaigns/campaign.model';
import { CAMPAIGNS_REPOSITORY, CampaignsRepository } from '../campaigns/campaigns.repository';
import { CampaignsService } from '../campaigns/campaigns.service';
import { SEND_GATEWAY, SendGateway } from '../gateway/send-gateway';
import { DAILY_QUOTA_LEDGER, DailyQuotaLedger } from '../quota/daily-quota.ledger';
import { Recipient } from '../recipients/recipient.model';
import { RECIPIENTS_REPOSITORY, RecipientsRepository } from '../recipients/recipients.repository';
import { StatusReconcilerService } from '../reconciler/status-reconciler.service';
import { effectiveDailyCap } from '../scheduler/schedule-partition';
import { DispatchSummary, RecipientOutcome } from './dispatch.types';

type CampaignPass = {
  quotaExhausted: boolean;
};

/**
 * Sends the messages due on one calendar day. Safe to run repeatedly or concurrently for
 * the same day: every recipient is claimed before sending and every send takes a slot from
 * the daily quota ledger first.
 */
@Injectable()
export class DispatcherService {
  constructor(
    @Inject(CAMPAIGNS_REPOSITORY) private readonly campaignsRepository: CampaignsRepository,
    @Inject(RECIPIENTS_REPOSITORY) private readonly recipients: RecipientsRepository,
    @Inject(DAILY_QUOTA_LEDGER) private readonly quota: DailyQuotaLedger,
    @Inject(SEND_GATEWAY) private readonly gateway: SendGateway,
    @Inject(AUDIENCE_RESOLVER) private readonly audience: AudienceResolver,
    @Inject(DISPATCH_CONFIG) private readonly config: DispatchConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly campaigns: CampaignsService,
    private readonly reconciler: StatusReconcilerService,
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService
  ) {}

  async processDay(date?: CalendarDate): Promise<DispatchSummary> {
    const today = date ?? this.campaigns.today();
    await this.reconciler.replayRecorded();
    const summary: DispatchSummary = {
      date: today,
      campaignsProcessed: 0,
      messagesSent: 0,
      messagesFailed: 0,
      messagesDeferred: 0,
      heldEventsExpired: await this.reconciler.expireHeld()
    };

    const active = await this.campaignsRepository.listActive();

    for (const campaign of active) {
      summary.campaignsProcessed += 1;
      const pass = await this.processCampaign(campaign, today, summary);
      await this.campaigns.completeIfFinished(campaign.id);

      if (pass.quotaExhausted) {
        this.logger.log(
          { type: 'dispatch_quota_exhausted', date: today, stoppedAt: campaign.id },
          DispatcherService.name
        );
        break;
      }
    }

    this.metrics.recordDispatch(summary);
    this.logger.log({ type: 'dispatch_cycle_completed', ...summary }, DispatcherService.name);
    return summary;
  }

  private async processCampaign(campaign: Campaign, today: CalendarDate, summary: DispatchSummary): Promise<CampaignPass> {
    const dailyCap = effectiveDailyCap(campaign.dailySendLimit, this.config.globalDailyCap);

    // a pass that ends below the cap (failures, retries backing off) is followed by another
    for (;;) {
      const remaining = dailyCap - (await this.recipients.countSentOn(campaign.id, today));
      if (remaining <= 0) {
        return { quotaExhausted: false };
      }

      const now = this.clock.now();
      const due = await this.recipients.findDue(campaign.id, {
        date: today,
        limit: remaining,
        now,
        staleBefore: new Date(now.getTime() - this.config.claimLeaseMs)
      });
      if (due.length === 0) {
        return { quotaExhausted: false };
      }

      let attempted = 0;

      for (const [index, recipient] of due.entries()) {
        let outcome: RecipientOutcome;
        try {
          outcome = await this.dispatchOne(campaign, recipient, today, dailyCap);
        } catch (error) {
          this.logger.error(
            {
              type: 'dispatch_recipient_error',
              campaignId: campaign.id,
              recipientId: recipient.id,
              message: error instanceof Error ? error.message : String(error)
            },
            error instanceof Error ? error.stack : undefined,
            DispatcherService.name
          );
          continue;
        }

        if (outcome === 'deferred') {
          summary.messagesDeferred += due.length - index;
          return { quotaExhausted: true };
        }
        if (outcome === 'skipped') {
          continue;
        }

        attempted += 1;
        if (outcome === 'sent') {
          summary.messagesSent += 1;
        } else if (outcome === 'failed') {
          summary.messagesFailed += 1;
        }
      }

      if (attempted === 0) {
        return { quotaExhausted: false };
      }
    }
  }

  private async dispatchOne(
    campaign: Campaign,
    recipient: Recipient,
    today: CalendarDate,
    dailyCap: number
  ): Promise<RecipientOutcome> {
    const token = randomUUID();
    const claimedAt = this.clock.now();
    const claimed = await this.recipients.claim(recipient.id, {
      token,
      claimedAt,
      staleBefore: new Date(claimedAt.getTime() - this.config.claimLeaseMs)
    });

    if (!claimed) {
      return 'skipped';
    }

    let subscribed: boolean;
    try {
      subscribed = await this.audience.isSubscribed(recipient.phone);
    } catch (error) {
      await this.recipients.release(recipient.id, token);
      throw error;
    }

    if (!subscribed) {
      await this.recipients.recordFailure(recipient.id, {
        token,
        retryCount: recipient.retryCount,
        reason: 'unsubscribed',
        at: this.clock.now(),
        rescheduleTo: null,
        retryAt: null
      });
      this.logger.warn(
        { type: 'dispatch_recipient_unsubscribed', campaignId: campaign.id, recipientId: recipient.id },
        DispatcherService.name
      );
      return 'failed';
    }

    try {
      await this.quota.reserveSlot(today);
    } catch (error) {
      await this.recipients.release(recipient.id, token);
      if (error instanceof QuotaExceededError) {
        return 'deferred';
      }
      throw error;
    }

    let providerMessageId: string;
    try {
      const receipt = await this.gateway.send({
        phone: recipient.phone,
        templateName: campaign.templateName,
        languageCode: campaign.languageCode,
        parameters: campaign.templateParameters
      });
      providerMessageId = receipt.providerMessageId;
    } catch (error) {
      return this.recordFailure(campaign, recipient, token, today, dailyCap, error);
    }

    const marked = await this.recipients.markSent(recipient.id, token, {
      providerMessageId,
      at: this.clock.now(),
      date: today
    });

    if (!marked) {
      this.logger.error(
        { type: 'dispatch_claim_lost', campaignId: campaign.id, recipientId: recipient.id, providerMessageId },
        undefined,
        DispatcherService.name
      );
      return 'skipped';
    }

    try {
      await this.reconciler.replayHeld(providerMessageId);
    } catch (error) {
      this.logger.error(
        {
          type: 'held_event_replay_failed',
          providerMessageId,
          message: error instanceof Error ? error.message : String(error)
        },
        error instanceof Error ? error.stack : undefined,
        DispatcherService.name
      );
    }

    return 'sent';
  }

  private async recordFailure(
    campaign: Campaign,
    recipient: Recipient,
    token: string,
    today: CalendarDate,
    dailyCap: number,
    error: unknown
  ): Promise<RecipientOutcome> {
    const failure =
      error instanceof GatewaySendError
        ? error
        : new GatewaySendError('transient_network', error instanceof Error ? error.message : String(error));

    const retryCount = recipient.retryCount + 1;
    const permanent = failure.kind === 'permanent' || retryCount >= this.config.maxRetries;
    const at = this.clock.now();
    let rescheduleTo: CalendarDate | null = null;
    let retryAt: Date | null = null;

    if (!permanent) {
      // a throttled provider gets no more attempts today
      if (failure.reason !== 'rate_limited' && (await this.hasCapacityLeft(campaign.id, today, dailyCap))) {
        rescheduleTo = recipient.scheduledDate;
        retryAt = new Date(at.getTime() + this.config.retryBackoffMs * 2 ** (retryCount - 1));
      } else {
        rescheduleTo = addDays(today, 1);
      }
    }

    await this.recipients.recordFailure(recipient.id, {
      token,
      retryCount,
      reason: failure.message,
      at,
      rescheduleTo,
      retryAt
    });

    this.logger.warn(
      {
        type: permanent ? 'dispatch_recipient_failed' : 'dispatch_recipient_retry',
        campaignId: campaign.id,
        recipientId: recipient.id,
        reason: failure.reason,
        retryCount,
        rescheduleTo,
        retryAt: retryAt?.toISOString() ?? null
      },
      DispatcherService.name
    );

    return permanent ? 'failed' : 'retry';
  }

  private async hasCapacityLeft(campaignId: string, today: CalendarDate, dailyCap: number): Promise<boolean> {
    const [sentToday, usage] = await Promise.all([
      this.recipients.countSentOn(campaignId, today),
      this.quota.usage(today)
    ]);
    return sentToday < dailyCap && usage.remaining > 0;
  }
}
