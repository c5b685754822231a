import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { PostgresService } from '../../shared/database/postgres.service';
import { AudienceFilter } from '../audience/audience-resolver';
import { Campaign, CampaignStatus, NewCampaign } from './campaign.model';

export type CampaignStatusChange = {
  from: readonly CampaignStatus[];
  to: CampaignStatus;
  at: Date;
  /** Written only when the change succeeds; leaves the stored value alone when omitted. */
  startDate?: string;
};

export interface CampaignsRepository {
  insert(input: NewCampaign, at: Date): Promise<Campaign>;
  findById(campaignId: string): Promise<Campaign | null>;
  /** Ordered by priority, then creation time. */
  list(filter: { status?: CampaignStatus; limit: number }): Promise<Campaign[]>;
  listActive(): Promise<Campaign[]>;
  /** Atomic conditional update; `null` when the campaign was not in one of `change.from`. */
  transition(campaignId: string, change: CampaignStatusChange): Promise<Campaign | null>;
}

export const CAMPAIGNS_REPOSITORY = Symbol('CAMPAIGNS_REPOSITORY');

type DbCampaign = {
  id: string;
  name: string;
  description: string | null;
  template_name: string;
  language_code: string;
  template_parameters: string[];
  daily_send_limit: number;
  priority: number;
  audience_filter: AudienceFilter;
  status: CampaignStatus;
  start_date: string | null;
  created_at: Date;
  activated_at: Date | null;
  completed_at: Date | null;
  cancelled_at: Date | null;
  updated_at: Date;
};

const CAMPAIGN_COLUMNS = `id, name, description, template_name, language_code, template_parameters,
  daily_send_limit, priority, audience_filter, status, start_date::text as start_date,
  created_at, activated_at, completed_at, cancelled_at, updated_at`;

@Injectable()
export class PgCampaignsRepository implements CampaignsRepository {
  constructor(private readonly db: PostgresService) {}

  async insert(input: NewCampaign, at: Date): Promise<Campaign> {
    const res = await this.db.query<DbCampaign>(
      `insert into campaigns (
         id, name, description, template_name, language_code, template_parameters,
         daily_send_limit, priority, audience_filter, status, start_date, created_at, updated_at
       )
       values ($1, $2, $3, $4, $5, $6::jsonb, $7, $8, $9::jsonb, 'draft', $10::date, $11, $11)
       returning ${CAMPAIGN_COLUMNS}`,
      [
        randomUUID(),
        input.name,
        input.description,
        input.templateName,
        input.languageCode,
        JSON.stringify(input.templateParameters),
        input.dailySendLimit,
        input.priority,
        JSON.stringify(input.audienceFilter),
        input.startDate,
        at
      ]
    );

    const row = res.rows[0];
    if (!row) {
      throw new Error('campaign insert returned no row');
    }
    return this.toCampaign(row);
  }

  async findById(campaignId: string): Promise<Campaign | null> {
    const res = await this.db.query<DbCampaign>(
      `select ${CAMPAIGN_COLUMNS}
       from campaigns
       where id::text = $1`,
      [campaignId]
    );
    const row = res.rows[0];
    return row ? this.toCampaign(row) : null;
  }

  async list(filter: { status?: CampaignStatus; limit: number }): Promise<Campaign[]> {
    const res = await this.db.query<DbCampaign>(
      `select ${CAMPAIGN_COLUMNS}
       from campaigns
       where ($1::text is null or status = $1)
       order by priority asc, created_at asc
       limit $2`,
      [filter.status ?? null, filter.limit]
    );
    return res.rows.map((row) => this.toCampaign(row));
  }

  async listActive(): Promise<Campaign[]> {
    const res = await this.db.query<DbCampaign>(
      `select ${CAMPAIGN_COLUMNS}
       from campaigns
       where status = 'active'
       order by priority asc, created_at asc`
    );
    return res.rows.map((row) => this.toCampaign(row));
  }

  async transition(campaignId: string, change: CampaignStatusChange): Promise<Campaign | null> {
    const res = await this.db.query<DbCampaign>(
      `update campaigns
       set status = $2,
           start_date = coalesce($4::date, start_date),
           activated_at = case when $2 = 'active' then coalesce(activated_at, $3) else activated_at end,
           completed_at = case when $2 = 'completed' then $3 else completed_at end,
           cancelled_at = case when $2 = 'cancelled' then $3 else cancelled_at end,
           updated_at = $3
       where id::text = $1 and status = any($5::text[])
       returning ${CAMPAIGN_COLUMNS}`,
      [campaignId, change.to, change.at, change.startDate ?? null, [...change.from]]
    );
    const row = res.rows[0];
    return row ? this.toCampaign(row) : null;
  }

  private toCampaign(row: DbCampaign): Campaign {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      templateName: row.template_name,
      languageCode: row.language_code,
      templateParameters: row.template_parameters,
      dailySendLimit: row.daily_send_limit,
      priority: row.priority,
      audienceFilter: row.audience_filter,
      status: row.status,
      startDate: row.start_date,
      createdAt: row.created_at.toISOString(),
      activatedAt: row.activated_at?.toISOString() ?? null,
      completedAt: row.completed_at?.toISOString() ?? null,
      cancelledAt: row.cancelled_at?.toISOString() ?? null,
      updatedAt: row.updated_at.toISOString()
    };
  }
}
