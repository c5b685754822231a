import { Injectable } from '@nestjs/common';
import { PostgresService } from '../../shared/database/postgres.service';
import { DeliveryEvent, DeliveryEventType } from './status-transition';

export type HeldEvent = DeliveryEvent & {
  receivedAt: Date;
  expiresAt: Date;
};

/**
 * Delivery events whose provider message id has no recorded send yet. One row per
 * (message id, event type); holding the same event again keeps the first copy.
 */
export interface HeldEventsRepository {
  hold(event: HeldEvent): Promise<void>;
  /** Removes and returns the held events for a message id, oldest first. */
  take(providerMessageId: string): Promise<HeldEvent[]>;
  /** Message ids with held events whose send is already recorded. */
  findReplayable(): Promise<string[]>;
  /** Removes and returns events that expired before `now`. */
  expire(now: Date): Promise<HeldEvent[]>;
}

export const HELD_EVENTS_REPOSITORY = Symbol('HELD_EVENTS_REPOSITORY');

type DbHeldEvent = {
  provider_message_id: string;
  event_type: DeliveryEventType;
  event_at: Date;
  failure_reason: string | null;
  received_at: Date;
  expires_at: Date;
};

@Injectable()
export class PgHeldEventsRepository implements HeldEventsRepository {
  constructor(private readonly db: PostgresService) {}

  async hold(event: HeldEvent): Promise<void> {
    await this.db.query(
      `insert into held_status_events
         (provider_message_id, event_type, event_at, failure_reason, received_at, expires_at)
       values ($1, $2, $3, $4, $5, $6)
       on conflict (provider_message_id, event_type)
       do update set attempts = held_status_events.attempts + 1`,
      [
        event.providerMessageId,
        event.eventType,
        event.timestamp,
        event.failureReason ?? null,
        event.receivedAt,
        event.expiresAt
      ]
    );
  }

  async take(providerMessageId: string): Promise<HeldEvent[]> {
    const res = await this.db.query<DbHeldEvent>(
      `delete from held_status_events
       where provider_message_id = $1
       returning provider_message_id, event_type, event_at, failure_reason, received_at, expires_at`,
      [providerMessageId]
    );
    return this.toEvents(res.rows);
  }

  async findReplayable(): Promise<string[]> {
    const res = await this.db.query<{ provider_message_id: string }>(
      `select distinct h.provider_message_id
       from held_status_events h
       inner join campaign_recipients r on r.provider_message_id = h.provider_message_id
       where r.status <> 'pending'
       order by h.provider_message_id`
    );
    return res.rows.map((row) => row.provider_message_id);
  }

  async expire(now: Date): Promise<HeldEvent[]> {
    const res = await this.db.query<DbHeldEvent>(
      `delete from held_status_events
       where expires_at < $1
       returning provider_message_id, event_type, event_at, failure_reason, received_at, expires_at`,
      [now]
    );
    return this.toEvents(res.rows);
  }

  private toEvents(rows: DbHeldEvent[]): HeldEvent[] {
    return rows
      .map((row) => ({
        providerMessageId: row.provider_message_id,
        eventType: row.event_type,
        timestamp: row.event_at,
        failureReason: row.failure_reason ?? undefined,
        receivedAt: row.received_at,
        expiresAt: row.expires_at
      }))
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}
