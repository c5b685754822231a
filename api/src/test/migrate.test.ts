import assert from 'node:assert/strict';
import { readdirSync } from 'node:fs';
import { describe, it } from 'node:test';
import { MIGRATIONS_DIR, pendingMigrations } from '../scripts/migrate';

describe('pendingMigrations', () => {
  it('returns unapplied sql files in name order', () => {
    const pending = pendingMigrations(['002_b.sql', 'README.md', '001_a.sql', '003_c.sql'], new Set(['001_a.sql']));

    assert.deepEqual(pending, ['002_b.sql', '003_c.sql']);
  });

  it('applies the recipient backoff column after the base schema', () => {
    const pending = pendingMigrations(readdirSync(MIGRATIONS_DIR), new Set());

    assert.deepEqual(pending, ['001_campaign_dispatch.sql', '002_recipient_retry_backoff.sql']);
  });
});
