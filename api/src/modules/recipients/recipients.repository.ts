import { Injectable } from '@nestjs/common';
import { PostgresService } from '../../shared/database/postgres.service';
import { NewRecipient, Recipient, RecipientStatus, RecipientTally } from './recipient.model';

export type ClaimLease = {
  token: string;
  claimedAt: Date;
  /** Claims taken before this instant are considered abandoned. */
  staleBefore: Date;
};

export type SentRecord = {
  providerMessageId: string;
  at: Date;
  date: string;
};

export type DispatchFailure = {
  token: string;
  retryCount: number;
  reason: string;
  at: Date;
  /** `null` marks the recipient permanently failed. */
  rescheduleTo: string | null;
  /** Backoff for a retry kept on the same day. */
  retryAt: Date | null;
};

export type DueQuery = {
  date: string;
  limit: number;
  now: Date;
  /** Rows claimed before this instant count as abandoned and are due again. */
  staleBefore: Date;
};

export type RecipientTransition = {
  from: RecipientStatus;
  to: RecipientStatus;
  at: Date;
  failureReason?: string;
};

export type RecipientQuery = {
  status?: RecipientStatus;
  limit: number;
  offset: number;
};

export interface RecipientsRepository {
  /** Inserts rows as pending; an existing (campaign, phone) pair is skipped. Returns rows written. */
  insertPending(campaignId: string, rows: NewRecipient[]): Promise<number>;
  tally(campaignId: string): Promise<RecipientTally>;
  countSentOn(campaignId: string, date: string): Promise<number>;
  /**
   * Pending recipients scheduled on or before `date`, oldest schedule first, then resolver order.
   * Rows under a live claim and retries still backing off are left out.
   */
  findDue(campaignId: string, query: DueQuery): Promise<Recipient[]>;
  claim(recipientId: string, lease: ClaimLease): Promise<boolean>;
  release(recipientId: string, token: string): Promise<void>;
  markSent(recipientId: string, token: string, sent: SentRecord): Promise<boolean>;
  recordFailure(recipientId: string, failure: DispatchFailure): Promise<boolean>;
  findByProviderMessageId(providerMessageId: string): Promise<Recipient | null>;
  /** Applies the change only while the recipient is still in `from`. */
  applyTransition(recipientId: string, change: RecipientTransition): Promise<boolean>;
  list(campaignId: string, query: RecipientQuery): Promise<Recipient[]>;
  /** Moves every pending recipient to `date` and clears retry backoff. Returns rows moved. */
  reschedulePending(campaignId: string, date: string): Promise<number>;
}

export const RECIPIENTS_REPOSITORY = Symbol('RECIPIENTS_REPOSITORY');

type DbRecipient = {
  id: string;
  campaign_id: string;
  phone: string;
  position: number;
  scheduled_date: string;
  status: RecipientStatus;
  sent_at: Date | null;
  sent_date: string | null;
  delivered_at: Date | null;
  read_at: Date | null;
  failed_at: Date | null;
  failure_reason: string | null;
  provider_message_id: string | null;
  retry_count: number;
  next_attempt_at: Date | null;
  created_at: Date;
};

type DbTally = {
  total: number;
  pending: number;
  sent: number;
  delivered: number;
  read: number;
  failed: number;
  ever_sent: number;
  ever_delivered: number;
};

const RECIPIENT_COLUMNS = `id, campaign_id, phone, position, scheduled_date::text as scheduled_date, status,
  sent_at, sent_date::text as sent_date, delivered_at, read_at, failed_at, failure_reason,
  provider_message_id, retry_count, next_attempt_at, created_at`;

const INSERT_CHUNK_SIZE = 1000;

@Injectable()
export class PgRecipientsRepository implements RecipientsRepository {
  constructor(private readonly db: PostgresService) {}

  async insertPending(campaignId: string, rows: NewRecipient[]): Promise<number> {
    let inserted = 0;

    for (let start = 0; start < rows.length; start += INSERT_CHUNK_SIZE) {
      const chunk = rows.slice(start, start + INSERT_CHUNK_SIZE);
      const res = await this.db.query(
        `insert into campaign_recipients (campaign_id, phone, position, scheduled_date, status)
         select $1, phone, position, scheduled_date, 'pending'
         from unnest($2::text[], $3::int[], $4::date[]) as t(phone, position, scheduled_date)
         on conflict (campaign_id, phone) do nothing`,
        [
          campaignId,
          chunk.map((row) => row.phone),
          chunk.map((row) => row.position),
          chunk.map((row) => row.scheduledDate)
        ]
      );
      inserted += res.rowCount ?? 0;
    }

    return inserted;
  }

  async tally(campaignId: string): Promise<RecipientTally> {
    const res = await this.db.query<DbTally>(
      `select
        count(*)::int as total,
        count(*) filter (where status = 'pending')::int as pending,
        count(*) filter (where status = 'sent')::int as sent,
        count(*) filter (where status = 'delivered')::int as delivered,
        count(*) filter (where status = 'read')::int as read,
        count(*) filter (where status = 'failed')::int as failed,
        count(sent_at)::int as ever_sent,
        count(delivered_at)::int as ever_delivered
      from campaign_recipients
      where campaign_id = $1`,
      [campaignId]
    );

    const row = res.rows[0];
    return {
      total: row?.total ?? 0,
      pending: row?.pending ?? 0,
      sent: row?.sent ?? 0,
      delivered: row?.delivered ?? 0,
      read: row?.read ?? 0,
      failed: row?.failed ?? 0,
      everSent: row?.ever_sent ?? 0,
      everDelivered: row?.ever_delivered ?? 0
    };
  }

  async countSentOn(campaignId: string, date: string): Promise<number> {
    const res = await this.db.query<{ sent: number }>(
      `select count(*)::int as sent
       from campaign_recipients
       where campaign_id = $1 and sent_date = $2::date`,
      [campaignId, date]
    );
    return res.rows[0]?.sent ?? 0;
  }

  async findDue(campaignId: string, query: DueQuery): Promise<Recipient[]> {
    const res = await this.db.query<DbRecipient>(
      `select ${RECIPIENT_COLUMNS}
       from campaign_recipients
       where campaign_id = $1
         and status = 'pending'
         and scheduled_date <= $2::date
         and (claim_token is null or claimed_at < $4)
         and (next_attempt_at is null or next_attempt_at <= $5)
       order by scheduled_date asc, position asc
       limit $3`,
      [campaignId, query.date, query.limit, query.staleBefore, query.now]
    );
    return res.rows.map((row) => this.toRecipient(row));
  }

  async claim(recipientId: string, lease: ClaimLease): Promise<boolean> {
    const res = await this.db.query(
      `update campaign_recipients
       set claim_token = $2, claimed_at = $3, updated_at = now()
       where id = $1
         and status = 'pending'
         and (claim_token is null or claimed_at < $4)`,
      [recipientId, lease.token, lease.claimedAt, lease.staleBefore]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async release(recipientId: string, token: string): Promise<void> {
    await this.db.query(
      `update campaign_recipients
       set claim_token = null, claimed_at = null, updated_at = now()
       where id = $1 and claim_token = $2`,
      [recipientId, token]
    );
  }

  async markSent(recipientId: string, token: string, sent: SentRecord): Promise<boolean> {
    const res = await this.db.query(
      `update campaign_recipients
       set status = 'sent',
           provider_message_id = $3,
           sent_at = $4,
           sent_date = $5::date,
           failure_reason = null,
           claim_token = null,
           claimed_at = null,
           updated_at = now()
       where id = $1 and claim_token = $2 and status = 'pending'`,
      [recipientId, token, sent.providerMessageId, sent.at, sent.date]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async recordFailure(recipientId: string, failure: DispatchFailure): Promise<boolean> {
    const res = await this.db.query(
      `update campaign_recipients
       set retry_count = $3,
           failure_reason = $4,
           status = case when $6::date is null then 'failed' else status end,
           failed_at = case when $6::date is null then $5 else failed_at end,
           scheduled_date = coalesce($6::date, scheduled_date),
           next_attempt_at = $7,
           claim_token = null,
           claimed_at = null,
           updated_at = now()
       where id = $1 and claim_token = $2 and status = 'pending'`,
      [
        recipientId,
        failure.token,
        failure.retryCount,
        failure.reason,
        failure.at,
        failure.rescheduleTo,
        failure.retryAt
      ]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async findByProviderMessageId(providerMessageId: string): Promise<Recipient | null> {
    const res = await this.db.query<DbRecipient>(
      `select ${RECIPIENT_COLUMNS}
       from campaign_recipients
       where provider_message_id = $1
       limit 1`,
      [providerMessageId]
    );
    const row = res.rows[0];
    return row ? this.toRecipient(row) : null;
  }

  async applyTransition(recipientId: string, change: RecipientTransition): Promise<boolean> {
    const res = await this.db.query(
      `update campaign_recipients
       set status = $3,
           delivered_at = case when $3 in ('delivered', 'read') then coalesce(delivered_at, $4) else delivered_at end,
           read_at = case when $3 = 'read' then $4 else read_at end,
           failed_at = case when $3 = 'failed' then $4 else failed_at end,
           failure_reason = case when $3 = 'failed' then $5 else failure_reason end,
           updated_at = now()
       where id = $1 and status = $2`,
      [recipientId, change.from, change.to, change.at, change.failureReason ?? null]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async list(campaignId: string, query: RecipientQuery): Promise<Recipient[]> {
    const res = await this.db.query<DbRecipient>(
      `select ${RECIPIENT_COLUMNS}
       from campaign_recipients
       where campaign_id = $1
         and ($2::text is null or status = $2)
       order by position asc
       limit $3 offset $4`,
      [campaignId, query.status ?? null, query.limit, query.offset]
    );
    return res.rows.map((row) => this.toRecipient(row));
  }

  async reschedulePending(campaignId: string, date: string): Promise<number> {
    const res = await this.db.query(
      `update campaign_recipients
       set scheduled_date = $2::date, next_attempt_at = null, updated_at = now()
       where campaign_id = $1 and status = 'pending'`,
      [campaignId, date]
    );
    return res.rowCount ?? 0;
  }

  private toRecipient(row: DbRecipient): Recipient {
    return {
      id: row.id,
      campaignId: row.campaign_id,
      phone: row.phone,
      position: row.position,
      scheduledDate: row.scheduled_date,
      status: row.status,
      sentAt: row.sent_at?.toISOString() ?? null,
      sentDate: row.sent_date,
      deliveredAt: row.delivered_at?.toISOString() ?? null,
      readAt: row.read_at?.toISOString() ?? null,
      failedAt: row.failed_at?.toISOString() ?? null,
      failureReason: row.failure_reason,
      providerMessageId: row.provider_message_id,
      retryCount: row.retry_count,
      nextAttemptAt: row.next_attempt_at?.toISOString() ?? null,
      createdAt: row.created_at.toISOString()
    };
  }
}
