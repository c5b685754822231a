import { Inject, Injectable } from '@nestjs/common';
import { DISPATCH_CONFIG, DispatchConfig } from '../../shared/config/dispatch.config';
import { PostgresService } from '../../shared/database/postgres.service';
import { QuotaExceededError } from '../../shared/errors/dispatch-errors';

export type QuotaUsage = {
  date: string;
  used: number;
  cap: number;
  remaining: number;
};

/**
 * Global per-day send counter shared by every campaign. The counter for a date never passes
 * the cap, and a slot once reserved is never handed back.
 */
export interface DailyQuotaLedger {
  /** Takes one slot for `date` or throws QuotaExceededError. Returns the count after the reservation. */
  reserveSlot(date: string): Promise<number>;
  usage(date: string): Promise<QuotaUsage>;
}

export const DAILY_QUOTA_LEDGER = Symbol('DAILY_QUOTA_LEDGER');

export function quotaUsage(date: string, used: number, cap: number): QuotaUsage {
  return { date, used, cap, remaining: Math.max(cap - used, 0) };
}

@Injectable()
export class PgDailyQuotaLedger implements DailyQuotaLedger {
  constructor(
    private readonly db: PostgresService,
    @Inject(DISPATCH_CONFIG) private readonly config: DispatchConfig
  ) {}

  async reserveSlot(date: string): Promise<number> {
    // the row lock taken by the upsert serialises concurrent reservations for one date
    const res = await this.db.query<{ messages_sent: number }>(
      `insert into daily_quota (quota_date, messages_sent, updated_at)
       values ($1::date, 1, now())
       on conflict (quota_date)
       do update set messages_sent = daily_quota.messages_sent + 1, updated_at = now()
       where daily_quota.messages_sent < $2
       returning messages_sent`,
      [date, this.config.globalDailyCap]
    );

    const row = res.rows[0];
    if (!row) {
      throw new QuotaExceededError(date, this.config.globalDailyCap);
    }
    return row.messages_sent;
  }

  async usage(date: string): Promise<QuotaUsage> {
    const res = await this.db.query<{ messages_sent: number }>(
      `select messages_sent from daily_quota where quota_date = $1::date`,
      [date]
    );
    return quotaUsage(date, res.rows[0]?.messages_sent ?? 0, this.config.globalDailyCap);
  }
}
