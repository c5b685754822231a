import { z } from 'zod';
import { calendarDate } from '../campaigns/campaign.schemas';

export const dispatchRunSchema = z
  .object({
    date: calendarDate.optional()
  })
  .default({});

export const quotaQuerySchema = z.object({
  date: calendarDate.optional()
});
