import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('scores', {
    kind: { type: 'text', notNull: true },
    id: { type: 'text', notNull: true },
    ts: { type: 'bigint', notNull: true },
    score: { type: 'double precision', notNull: true },
    trend_7d: { type: 'double precision' },
    trend_30d: { type: 'double precision' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('scores', 'pk_scores', 'PRIMARY KEY (kind, id, ts)');
  pgm.addConstraint('scores', 'chk_scores_kind', "CHECK (kind IN ('metric', 'pillar', 'overall'))");
  pgm.addConstraint('scores', 'chk_scores_range', 'CHECK (score >= 0)');
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('scores');
}
