import 'dotenv/config';
import { getScoringConfig } from './config/scoring';
import { closePool } from './db';
import { recalculateScores } from './jobs/scoreRecompute.job';
import { registerJob, startScheduler, stopScheduler } from './jobs/scheduler';

const SCORE_RECOMPUTE_JOB = 'score-recompute';

console.log('\n🧵 Starting scoring worker...');

const config = getScoringConfig();

if (!config.scheduler.runInProcessJobs) {
  console.log('   RUN_INPROCESS_JOBS is off, nothing to schedule');
} else {
  registerJob(SCORE_RECOMPUTE_JOB, config.recomputeCron, () => recalculateScores(), config.scheduler.schedulerEnabled);
  startScheduler();
}

async function shutdown(signal: string): Promise<void> {
  console.log(`\n🛑 Worker ${signal} received, shutting down...`);
  stopScheduler();
  try {
    await closePool();
  } catch (error) {
    console.error('❌ Failed to close database pool:', error);
    process.exitCode = 1;
  }
  process.exit();
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
