import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('percentile_snapshots', {
    metric_id: { type: 'text', notNull: true },
    window_days: { type: 'integer', notNull: true },
    ts: { type: 'bigint', notNull: true },
    p10: { type: 'double precision', notNull: true },
    p25: { type: 'double precision', notNull: true },
    p50: { type: 'double precision', notNull: true },
    p75: { type: 'double precision', notNull: true },
    p90: { type: 'double precision', notNull: true },
    min_val: { type: 'double precision', notNull: true },
    max_val: { type: 'double precision', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint(
    'percentile_snapshots',
    'pk_percentile_snapshots',
    'PRIMARY KEY (metric_id, window_days, ts)'
  );
  pgm.addConstraint('percentile_snapshots', 'chk_percentile_snapshots_window_positive', 'CHECK (window_days > 0)');
  pgm.addConstraint(
    'percentile_snapshots',
    'chk_percentile_snapshots_ordered',
    'CHECK (min_val <= p10 AND p10 <= p25 AND p25 <= p50 AND p50 <= p75 AND p75 <= p90 AND p90 <= max_val)'
  );
  pgm.createIndex('percentile_snapshots', ['metric_id', 'window_days', 'ts'], {
    name: 'idx_percentile_snapshots_latest'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('percentile_snapshots');
}
