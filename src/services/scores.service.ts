import { database, type Database, type Queryable } from '../db';
import { StoreError, wrapStoreCall } from '../domains/scoring/errors';
import type { ScoreStore } from '../domains/scoring/stores';
import type { ScoreKind, ScoreRecord } from '../domains/scoring/types';
import { toNullableNumber, toNumber } from '../lib/numbers';

type ScoreRow = {
  kind: string;
  id: string;
  ts: number | string;
  score: number | string;
  trend_7d: number | string | null;
  trend_30d: number | string | null;
};

const SCORE_KINDS: readonly ScoreKind[] = ['metric', 'pillar', 'overall'];

function isScoreKind(value: string): value is ScoreKind {
  const kinds: readonly string[] = SCORE_KINDS;
  return kinds.includes(value);
}

function mapScore(row: ScoreRow): ScoreRecord {
  if (!isScoreKind(row.kind)) {
    throw new StoreError('scores.read', new Error(`Unknown score kind ${row.kind}`));
  }
  return {
    kind: row.kind,
    id: row.id,
    ts: toNumber(row.ts),
    score: toNumber(row.score),
    trend7d: toNullableNumber(row.trend_7d),
    trend30d: toNullableNumber(row.trend_30d)
  };
}

const UPSERT_SCORE_SQL = `INSERT INTO scores (kind, id, ts, score, trend_7d, trend_30d)
     VALUES ($1, $2, $3, $4, $5, $6)
     ON CONFLICT (kind, id, ts)
     DO UPDATE SET score = EXCLUDED.score,
                   trend_7d = EXCLUDED.trend_7d,
                   trend_30d = EXCLUDED.trend_30d`;

async function writeScore(db: Queryable, record: ScoreRecord): Promise<void> {
  await db.query(UPSERT_SCORE_SQL, [
    record.kind,
    record.id,
    record.ts,
    record.score,
    record.trend7d,
    record.trend30d
  ]);
}

export class PgScoreStore implements ScoreStore {
  constructor(private readonly db: Database = database) {}

  async upsert(record: ScoreRecord): Promise<void> {
    await wrapStoreCall('scores.upsert', () => writeScore(this.db, record));
  }

  async upsertMany(records: ScoreRecord[]): Promise<void> {
    if (records.length === 0) return;
    await wrapStoreCall('scores.upsertMany', () =>
      this.db.withTransaction(async (client) => {
        for (const record of records) {
          await writeScore(client, record);
        }
      })
    );
  }

  async latest(kind: ScoreKind, id: string): Promise<ScoreRecord | null> {
    const { rows } = await wrapStoreCall('scores.latest', () =>
      this.db.query<ScoreRow>(
        `SELECT kind, id, ts, score, trend_7d, trend_30d
           FROM scores
          WHERE kind = $1 AND id = $2
          ORDER BY ts DESC
          LIMIT 1`,
        [kind, id]
      )
    );
    const row = rows[0];
    return row ? mapScore(row) : null;
  }

  async latestAtOrBefore(kind: ScoreKind, id: string, ts: number): Promise<ScoreRecord | null> {
    const { rows } = await wrapStoreCall('scores.latestAtOrBefore', () =>
      this.db.query<ScoreRow>(
        `SELECT kind, id, ts, score, trend_7d, trend_30d
           FROM scores
          WHERE kind = $1 AND id = $2 AND ts <= $3
          ORDER BY ts DESC
          LIMIT 1`,
        [kind, id, ts]
      )
    );
    const row = rows[0];
    return row ? mapScore(row) : null;
  }

  async range(kind: ScoreKind, id: string, sinceTs: number): Promise<ScoreRecord[]> {
    const { rows } = await wrapStoreCall('scores.range', () =>
      this.db.query<ScoreRow>(
        `SELECT kind, id, ts, score, trend_7d, trend_30d
           FROM scores
          WHERE kind = $1 AND id = $2 AND ts >= $3
          ORDER BY ts ASC`,
        [kind, id, sinceTs]
      )
    );
    return rows.map(mapScore);
  }
}
