import { readdirSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { PostgresService } from '../shared/database/postgres.service';
import { StructuredLoggerService } from '../shared/logging/structured-logger.service';

export const MIGRATIONS_DIR = resolve(__dirname, '..', '..', '..', 'sql', 'migrations');

export function pendingMigrations(files: readonly string[], applied: ReadonlySet<string>): string[] {
  return files
    .filter((name) => name.endsWith('.sql'))
    .sort()
    .filter((name) => !applied.has(name));
}

async function main(): Promise<void> {
  const mode = process.argv.includes('--status') ? 'status' : 'apply';
  const logger = new StructuredLoggerService();
  const db = new PostgresService();

  try {
    await db.query(`
      create table if not exists schema_migrations (
        version varchar(120) primary key,
        applied_at timestamptz not null default now()
      )
    `);

    const files = readdirSync(MIGRATIONS_DIR);
    const appliedRes = await db.query<{ version: string }>('select version from schema_migrations');
    const applied = new Set(appliedRes.rows.map((row) => row.version));
    const pending = pendingMigrations(files, applied);

    if (mode === 'status') {
      for (const file of files.filter((name) => name.endsWith('.sql')).sort()) {
        logger.log({ type: 'migration_status', file, status: applied.has(file) ? 'applied' : 'pending' }, 'Migrate');
      }
      return;
    }

    for (const file of pending) {
      const sql = readFileSync(resolve(MIGRATIONS_DIR, file), 'utf8');
      await db.runInTransaction(async () => {
        await db.query(sql);
        await db.query('insert into schema_migrations (version) values ($1)', [file]);
      });
      logger.log({ type: 'migration_applied', file }, 'Migrate');
    }
  } finally {
    await db.onModuleDestroy();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
