import { AudienceFilter } from '../audience/audience-resolver';

export type CampaignStatus = 'draft' | 'active' | 'paused' | 'cancelled' | 'completed';

export const CAMPAIGN_STATUSES = ['draft', 'active', 'paused', 'cancelled', 'completed'] as const;

export type Campaign = {
  id: string;
  name: string;
  description: string | null;
  templateName: string;
  languageCode: string;
  templateParameters: string[];
  dailySendLimit: number;
  priority: number;
  audienceFilter: AudienceFilter;
  status: CampaignStatus;
  startDate: string | null;
  createdAt: string;
  activatedAt: string | null;
  completedAt: string | null;
  cancelledAt: string | null;
  updatedAt: string;
};

export type NewCampaign = Pick<
  Campaign,
  | 'name'
  | 'description'
  | 'templateName'
  | 'languageCode'
  | 'templateParameters'
  | 'dailySendLimit'
  | 'priority'
  | 'audienceFilter'
  | 'startDate'
>;

export type CampaignListItem = Campaign & {
  totalRecipients: number;
  messagesSent: number;
  progress: number;
};

export type ActivationResult = {
  campaign: Campaign;
  recipientsScheduled: number;
  dailyCap: number;
  days: number;
  firstDate: string | null;
  lastDate: string | null;
};

export type RescheduleResult = {
  campaignId: string;
  date: string;
  recipientsRescheduled: number;
};
