import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('score_runs', {
    id: { type: 'uuid', primaryKey: true },
    status: { type: 'text', notNull: true },
    as_of: { type: 'bigint', notNull: true },
    notes: { type: 'text' },
    metrics_scored: { type: 'integer' },
    metrics_omitted: { type: 'integer' },
    pillars_scored: { type: 'integer' },
    overall_score: { type: 'double precision' },
    error_message: { type: 'text' },
    started_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    finished_at: { type: 'timestamptz' }
  });

  pgm.addConstraint(
    'score_runs',
    'chk_score_runs_status',
    "CHECK (status IN ('running', 'completed', 'failed'))"
  );
  pgm.createIndex('score_runs', 'started_at', { name: 'idx_score_runs_started_at' });

  pgm.createTable('meta_config', {
    key: { type: 'text', primaryKey: true },
    value: { type: 'text', notNull: true },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('meta_config');
  pgm.dropTable('score_runs');
}
