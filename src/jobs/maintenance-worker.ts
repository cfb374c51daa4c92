/**
 * Maintenance Worker v1.0.0
 *
 * Periodic economy sweeps:
 * - credibility_decay_sweep: partial/full downvote decay, expired redemption bonuses
 * - task_expiry_sweep:       assigned / in-progress work past its due date
 * - outbox_dispatch:         delivers outbox rows a crashed post-commit flush left pending
 */

import type { Job } from 'bullmq';
import type { CredibilityService, DecaySweepResult } from '../services/CredibilityService';
import type { TaskReviewService } from '../services/TaskReviewService';
import type { OutboxDispatcher, OutboxDispatchResult } from './outbox-worker';
import { workerLogger } from '../logger';

const log = workerLogger.child({ worker: 'maintenance' });

export interface MaintenanceServices {
  credibility: Pick<CredibilityService, 'applyDecay'>;
  tasks: Pick<TaskReviewService, 'expireSweep'>;
  outbox: Pick<OutboxDispatcher, 'dispatchPending'>;
}

export type MaintenanceJobResult =
  | { job: 'credibility_decay_sweep'; result: DecaySweepResult }
  | { job: 'task_expiry_sweep'; expired: string[] }
  | { job: 'outbox_dispatch'; result: OutboxDispatchResult };

export async function processMaintenanceJob(
  job: Pick<Job, 'name' | 'id'>,
  services: MaintenanceServices
): Promise<MaintenanceJobResult> {
  switch (job.name) {
    case 'credibility_decay_sweep': {
      const result = await services.credibility.applyDecay();
      log.info({ jobId: job.id, ...result }, 'Credibility decay sweep complete');
      return { job: 'credibility_decay_sweep', result };
    }

    case 'task_expiry_sweep': {
      const expired = await services.tasks.expireSweep();
      log.info({ jobId: job.id, expiredCount: expired.length }, 'Task expiry sweep complete');
      return { job: 'task_expiry_sweep', expired };
    }

    case 'outbox_dispatch': {
      const result = await services.outbox.dispatchPending();
      if (result.failed > 0) {
        log.warn({ jobId: job.id, processed: result.processed, failed: result.failed }, 'Outbox dispatch had failures');
      }
      return { job: 'outbox_dispatch', result };
    }

    default:
      throw new Error(`Unknown maintenance job type: ${job.name}`);
  }
}
