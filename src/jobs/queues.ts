/**
 * The economy-maintenance queue.
 *
 * Every job on it is an idempotent sweep: running one twice finds nothing
 * left to do, so BullMQ's at-least-once delivery is enough.
 */

import { Queue, Worker, type Job, type JobsOptions, type RepeatOptions } from 'bullmq';
import Redis from 'ioredis';
import { config, type AppConfig } from '../config';

export const MAINTENANCE_QUEUE = 'economy-maintenance';

export type MaintenanceJobName = 'credibility_decay_sweep' | 'task_expiry_sweep' | 'outbox_dispatch';

export interface ScheduledSweep {
  name: MaintenanceJobName;
  repeat: Pick<RepeatOptions, 'pattern' | 'every'>;
}

/** Cron patterns and the dispatch interval come from config.jobs. */
export function maintenanceSchedule(jobs: AppConfig['jobs'] = config.jobs): ScheduledSweep[] {
  return [
    { name: 'credibility_decay_sweep', repeat: { pattern: jobs.decaySweepPattern } },
    { name: 'task_expiry_sweep', repeat: { pattern: jobs.expirySweepPattern } },
    { name: 'outbox_dispatch', repeat: { every: jobs.outboxDispatchEveryMs } },
  ];
}

const SWEEP_JOB_OPTIONS: JobsOptions = {
  attempts: 2,
  backoff: { type: 'fixed', delay: 60_000 },
  removeOnComplete: { age: 24 * 60 * 60, count: 100 },
  removeOnFail: { age: 7 * 24 * 60 * 60 },
};

const connections = new Set<Redis>();
let queue: Queue | null = null;

function connect(): Redis {
  if (!config.redis.url) {
    throw new Error('REDIS_URL is required for the maintenance queue');
  }
  // Blocking worker commands need maxRetriesPerRequest: null
  const redis = new Redis(config.redis.url, { maxRetriesPerRequest: null, lazyConnect: true });
  connections.add(redis);
  return redis;
}

export function getMaintenanceQueue(): Queue {
  queue ??= new Queue(MAINTENANCE_QUEUE, { connection: connect(), defaultJobOptions: SWEEP_JOB_OPTIONS });
  return queue;
}

/** Same name and repeat options dedupe across restarts. */
export async function scheduleSweeps(schedule: ScheduledSweep[] = maintenanceSchedule()): Promise<void> {
  const target = getMaintenanceQueue();
  for (const sweep of schedule) {
    await target.add(sweep.name, {}, { repeat: sweep.repeat });
  }
}

/** One sweep at a time; the worker process is the only consumer. */
export function createMaintenanceWorker(processor: (job: Job) => Promise<unknown>): Worker {
  return new Worker(MAINTENANCE_QUEUE, processor, {
    connection: connect(),
    concurrency: 1,
    maxStalledCount: 1,
  });
}

export async function closeQueues(): Promise<void> {
  if (queue) {
    await queue.close();
    queue = null;
  }
  await Promise.all([...connections].map(redis => redis.quit()));
  connections.clear();
}
