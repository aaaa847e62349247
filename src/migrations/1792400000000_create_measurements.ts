import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('measurements', {
    metric_id: { type: 'text', notNull: true },
    ts: { type: 'bigint', notNull: true },
    value: { type: 'double precision', notNull: true },
    unit: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('measurements', 'pk_measurements', 'PRIMARY KEY (metric_id, ts)');
  pgm.createIndex('measurements', 'ts', { name: 'idx_measurements_ts' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('measurements');
}
