import cron, { type ScheduledTask } from 'node-cron';

/**
 * In-process job scheduler on node-cron. Schedules run in UTC. Tasks are
 * created stopped and only fire once startScheduler() is called.
 */

type JobDefinition = {
  name: string;
  schedule: string; // Cron expression
  task: () => Promise<unknown>;
  enabled: boolean;
};

const jobs = new Map<string, ScheduledTask>();
const jobDefinitions: JobDefinition[] = [];

async function runJob(name: string, task: () => Promise<unknown>): Promise<void> {
  console.log(`🚀 Starting job: ${name}`);
  const startTime = Date.now();
  try {
    await task();
    console.log(`✅ Job "${name}" completed in ${Date.now() - startTime}ms`);
  } catch (error) {
    console.error(`❌ Job "${name}" failed:`, error);
  }
}

/**
 * Register a scheduled job
 *
 * @param name - Unique job identifier
 * @param schedule - Cron expression (runs in UTC)
 * @param enabled - Disabled jobs stay registered for triggerJob but never fire
 */
export function registerJob(
  name: string,
  schedule: string,
  task: () => Promise<unknown>,
  enabled: boolean = true
): void {
  if (jobDefinitions.some((def) => def.name === name)) {
    console.warn(`⚠️  Job "${name}" already registered, skipping`);
    return;
  }
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for job "${name}": ${schedule}`);
  }

  jobDefinitions.push({ name, schedule, enabled, task });

  if (!enabled) {
    console.log(`📅 Job "${name}" registered but disabled`);
    return;
  }

  const scheduledTask = cron.schedule(schedule, () => runJob(name, task), {
    scheduled: false,
    timezone: 'UTC'
  });
  jobs.set(name, scheduledTask);
  console.log(`📅 Job "${name}" scheduled: ${schedule} (UTC)`);
}

export function startScheduler(): void {
  console.log(`\n🕐 Starting job scheduler (${jobs.size} jobs)`);
  for (const task of jobs.values()) {
    task.start();
  }
  if (jobs.size === 0) {
    console.log('   No jobs registered');
  }
}

export function stopScheduler(): void {
  console.log('\n🛑 Stopping job scheduler');
  for (const [name, task] of jobs.entries()) {
    task.stop();
    console.log(`   Stopped: ${name}`);
  }
  jobs.clear();
  jobDefinitions.length = 0;
}

export function getJobDefinitions(): ReadonlyArray<Omit<JobDefinition, 'task'>> {
  return jobDefinitions.map(({ name, schedule, enabled }) => ({ name, schedule, enabled }));
}

/**
 * Manually trigger a job. Unlike scheduled runs, failures are rethrown.
 */
export async function triggerJob(name: string): Promise<void> {
  const def = jobDefinitions.find((j) => j.name === name);
  if (!def) {
    throw new Error(`Job "${name}" not found`);
  }

  console.log(`🔧 Manually triggering job: ${name}`);
  const startTime = Date.now();
  try {
    await def.task();
    console.log(`✅ Manual job "${name}" completed in ${Date.now() - startTime}ms`);
  } catch (error) {
    console.error(`❌ Manual job "${name}" failed:`, error);
    throw error;
  }
}
