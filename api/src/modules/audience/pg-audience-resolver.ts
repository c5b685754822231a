import { Injectable } from '@nestjs/common';
import { PostgresService } from '../../shared/database/postgres.service';
import { AudienceFilter, AudienceResolver, dedupePhones } from './audience-resolver';

@Injectable()
export class PgAudienceResolver implements AudienceResolver {
  constructor(private readonly db: PostgresService) {}

  async resolve(filter: AudienceFilter): Promise<string[]> {
    const res = await this.db.query<{ phone_e164: string }>(
      `select phone_e164
       from contacts
       where subscription = $1
         and deleted_at is null
         and ($2::text is null or tier = $2)
         and ($3::text is null or city = $3)
         and ($4::text is null or state = $4)
         and (cardinality($5::text[]) = 0 or tags @> $5::text[])
       order by created_at asc, id asc`,
      [filter.subscription, filter.tier ?? null, filter.city ?? null, filter.state ?? null, filter.tags ?? []]
    );

    return dedupePhones(res.rows.map((row) => row.phone_e164));
  }

  async isSubscribed(phone: string): Promise<boolean> {
    const res = await this.db.query<{ subscribed: boolean }>(
      `select exists (
         select 1
         from contacts
         where phone_e164 = $1
           and subscription = 'subscribed'
           and deleted_at is null
       ) as subscribed`,
      [phone]
    );
    return res.rows[0]?.subscribed ?? false;
  }
}
