import { z } from 'zod';
import { isCalendarDate } from '../../shared/time/calendar-date';
import { CAMPAIGN_STATUSES } from './campaign.model';
import { RECIPIENT_STATUSES } from '../recipients/recipient.model';

export const calendarDate = z.string().refine(isCalendarDate, { message: 'must be a calendar date (YYYY-MM-DD)' });

const nonEmptyText = z.string().trim().min(1);

export const audienceFilterSchema = z.object({
  tier: nonEmptyText.optional(),
  city: nonEmptyText.optional(),
  state: nonEmptyText.optional(),
  tags: z.array(nonEmptyText).optional(),
  subscription: z.literal('subscribed').default('subscribed')
});

/** Template names follow the provider's rule: lowercase letters, digits and underscores. */
const templateName = z
  .string()
  .trim()
  .regex(/^[a-z0-9_]{1,512}$/, { message: 'must contain only lowercase letters, digits and underscores' });

export function createCampaignSchema(limits: { globalDailyCap: number; defaultDailySendLimit: number }) {
  return z.object({
    name: nonEmptyText.max(200),
    description: z.string().trim().max(2000).nullish(),
    templateName,
    languageCode: z
      .string()
      .trim()
      .regex(/^[a-z]{2,3}(_[A-Z]{2})?$/, { message: 'must look like en or pt_BR' })
      .default('en'),
    templateParameters: z.array(z.string()).max(20).default([]),
    dailySendLimit: z.number().int().min(1).max(limits.globalDailyCap).default(limits.defaultDailySendLimit),
    priority: z.number().int().min(1).max(10).default(5),
    audienceFilter: audienceFilterSchema.default({ subscription: 'subscribed' }),
    startDate: calendarDate.nullish()
  });
}

export const activateCampaignSchema = z
  .object({
    startDate: calendarDate.optional()
  })
  .default({});

export const listCampaignsQuerySchema = z.object({
  status: z.enum(CAMPAIGN_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export const listRecipientsQuerySchema = z.object({
  status: z.enum(RECIPIENT_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0)
});
