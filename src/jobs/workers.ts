/**
 * Worker Runtime v1.0.0
 *
 * Long-lived process: registers the maintenance worker and the repeatable
 * sweep schedules. Not part of the API server.
 *
 * Run with: `npm run start:workers` after `npm run build`
 */

import 'dotenv/config';
import type { Worker } from 'bullmq';
import { validateConfig } from '../config';
import { workerLogger } from '../logger';
import { GracefulShutdown } from '../lib/shutdown';
import { createRuntime } from '../runtime';
import { initSentry } from '../sentry';
import { closeQueues, createMaintenanceWorker, maintenanceSchedule, scheduleSweeps } from './queues';
import { processMaintenanceJob, type MaintenanceServices } from './maintenance-worker';

const log = workerLogger.child({ process: 'workers' });

export function registerWorkers(services: MaintenanceServices): Worker {
  const worker = createMaintenanceWorker(job => processMaintenanceJob(job, services));

  worker.on('failed', (job, error) => {
    log.error({ jobId: job?.id, jobName: job?.name, err: error }, 'Maintenance job failed');
  });

  return worker;
}

async function startWorkers(): Promise<void> {
  const { valid, errors } = validateConfig();
  if (!valid) {
    throw new Error(`Invalid configuration: ${errors.join(', ')}`);
  }
  initSentry('workers');

  // No subscribers here: outbox_dispatch passes leave rows pending for the API process
  const { db, economy } = createRuntime({ dispatchAfterCommit: false });
  const worker = registerWorkers(economy);
  const schedule = maintenanceSchedule();
  await scheduleSweeps(schedule);
  log.info({ jobs: schedule.map(sweep => sweep.name) }, 'Maintenance sweeps scheduled');

  const shutdown = new GracefulShutdown();
  shutdown
    .register('work', 'maintenance-worker', () => worker.close())
    .register('connections', 'queues', closeQueues)
    .register('connections', 'database', () => db.close());
  shutdown.listen();

  log.info('Worker runtime started');
}

if (require.main === module) {
  startWorkers().catch((error: unknown) => {
    log.fatal({ err: error }, 'Fatal error starting workers');
    process.exit(1);
  });
}

export { startWorkers };
