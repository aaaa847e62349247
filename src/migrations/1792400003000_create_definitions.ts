import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('pillar_definitions', {
    pillar_id: { type: 'text', primaryKey: true },
    name: { type: 'text', notNull: true },
    description: { type: 'text' },
    weight: { type: 'double precision' },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
  pgm.addConstraint(
    'pillar_definitions',
    'chk_pillar_definitions_weight',
    'CHECK (weight IS NULL OR weight >= 0)'
  );

  pgm.createTable('metric_definitions', {
    metric_id: { type: 'text', primaryKey: true },
    pillar_id: {
      type: 'text',
      notNull: true,
      references: 'pillar_definitions',
      onDelete: 'RESTRICT'
    },
    name: { type: 'text' },
    description: { type: 'text' },
    direction: { type: 'text', notNull: true },
    target_min: { type: 'double precision' },
    target_max: { type: 'double precision' },
    weight: { type: 'double precision' },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint(
    'metric_definitions',
    'chk_metric_definitions_direction',
    "CHECK (direction IN ('higher_better', 'lower_better', 'target_band'))"
  );
  pgm.addConstraint(
    'metric_definitions',
    'chk_metric_definitions_target_band',
    `CHECK (
      (direction = 'target_band' AND target_min IS NOT NULL AND target_max IS NOT NULL AND target_min < target_max)
      OR (direction <> 'target_band' AND target_min IS NULL AND target_max IS NULL)
    )`
  );
  pgm.addConstraint(
    'metric_definitions',
    'chk_metric_definitions_weight',
    'CHECK (weight IS NULL OR weight >= 0)'
  );
  pgm.createIndex('metric_definitions', 'pillar_id', { name: 'idx_metric_definitions_pillar_id' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('metric_definitions');
  pgm.dropTable('pillar_definitions');
}
