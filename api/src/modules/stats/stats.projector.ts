import { addDays, CalendarDate, laterDate } from '../../shared/time/calendar-date';
import { isOpenStatus } from '../campaigns/campaign-lifecycle';
import { Campaign, CampaignStatus } from '../campaigns/campaign.model';
import { RecipientTally } from '../recipients/recipient.model';
import { effectiveDailyCap } from '../scheduler/schedule-partition';

export type CampaignStats = {
  campaignId: string;
  status: CampaignStatus;
  counts: {
    total: number;
    pending: number;
    sent: number;
    delivered: number;
    read: number;
    failed: number;
  };
  /** Recipients that reached sent at any point, including those now delivered, read or failed afterwards. */
  messagesSent: number;
  /** Recipients that reached delivered at any point. */
  messagesDelivered: number;
  deliveryRate: number | null;
  readRate: number | null;
  progress: number | null;
  throughputPerDay: number;
  estimatedCompletionDate: CalendarDate | null;
};

export function ratio(numerator: number, denominator: number): number | null {
  if (denominator === 0) {
    return null;
  }
  return Math.round((numerator / denominator) * 10_000) / 10_000;
}

/**
 * Last calendar day on which the remaining pending recipients are expected to go out,
 * assuming the campaign gets its full throughput every day from `max(startDate, today)`.
 */
export function estimateCompletion(
  status: CampaignStatus,
  pending: number,
  throughputPerDay: number,
  startDate: CalendarDate | null,
  today: CalendarDate
): CalendarDate | null {
  if (pending === 0 || !isOpenStatus(status) || throughputPerDay < 1) {
    return null;
  }

  const base = laterDate(startDate ?? today, today);
  return addDays(base, Math.ceil(pending / throughputPerDay));
}

export function projectStats(
  campaign: Campaign,
  tally: RecipientTally,
  globalDailyCap: number,
  today: CalendarDate
): CampaignStats {
  const throughputPerDay = effectiveDailyCap(campaign.dailySendLimit, globalDailyCap);

  return {
    campaignId: campaign.id,
    status: campaign.status,
    counts: {
      total: tally.total,
      pending: tally.pending,
      sent: tally.sent,
      delivered: tally.delivered,
      read: tally.read,
      failed: tally.failed
    },
    messagesSent: tally.everSent,
    messagesDelivered: tally.everDelivered,
    deliveryRate: ratio(tally.everDelivered, tally.everSent),
    readRate: ratio(tally.read, tally.everDelivered),
    progress: ratio(tally.everSent, tally.total),
    throughputPerDay,
    estimatedCompletionDate: estimateCompletion(
      campaign.status,
      tally.pending,
      throughputPerDay,
      campaign.startDate,
      today
    )
  };
}
