/* eslint-disable no-console */
import 'dotenv/config';
import { closePool } from '../src/db';
import { recalculateScores } from '../src/jobs/scoreRecompute.job';
import { roundTo } from '../src/lib/numbers';

function parseAsOf(argv: string[] = process.argv): number | undefined {
  const found = argv.find((entry) => entry.startsWith('--as-of='));
  if (!found) return undefined;
  const raw = found.slice('--as-of='.length);
  const numeric = Number(raw);
  const ms = Number.isFinite(numeric) ? numeric * 1000 : Date.parse(raw);
  if (Number.isNaN(ms)) {
    throw new Error(`--as-of must be unix seconds or an ISO date, got "${raw}"`);
  }
  return Math.floor(ms / 1000);
}

async function main() {
  const summary = await recalculateScores(undefined, { asOf: parseAsOf(), notes: 'Manual score recompute' });
  if (!summary) return;

  const { scores } = summary;
  for (const [pillarId, score] of scores.pillarScores) {
    console.log(`[scores:compute] pillar ${pillarId}: ${roundTo(score, 2)}`);
  }
  for (const omission of scores.omissions) {
    console.log(`[scores:compute] omitted ${omission.kind} ${omission.id}: ${omission.reason}`);
  }
  console.log(
    `[scores:compute] overall: ${scores.overallScore === null ? 'unavailable' : roundTo(scores.overallScore, 2)}`
  );
}

main()
  .catch((err) => {
    console.error('[scores:compute] Failed:', err);
    process.exitCode = 1;
  })
  .finally(() => closePool());
