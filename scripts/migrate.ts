/* eslint-disable no-console */
import 'dotenv/config';
import path from 'node:path';
import runner from 'node-pg-migrate';

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`${name} must be set`);
  return value;
}

function resolveDirection(argv: string[] = process.argv): 'up' | 'down' {
  return argv.includes('--down') ? 'down' : 'up';
}

async function main() {
  const direction = resolveDirection();
  const applied = await runner({
    databaseUrl: requiredEnv('DATABASE_URL'),
    dir: path.resolve(__dirname, '../src/migrations'),
    direction,
    migrationsTable: 'pgmigrations',
    count: direction === 'down' ? 1 : Infinity,
    log: (message) => console.log(`[migrate] ${message}`)
  });
  console.log(`[migrate] ${direction}: ${applied.length} migration(s) applied`);
}

main().catch((err) => {
  console.error('[migrate] Failed:', err);
  process.exit(1);
});
