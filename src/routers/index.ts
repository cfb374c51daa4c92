/**
 * Household XP App Router v1.0.0
 */

import { router } from '../trpc';
import { ledgerRouter } from './ledger';
import { credibilityRouter } from './credibility';
import { tasksRouter } from './tasks';
import { badgesRouter } from './badges';

export const appRouter = router({
  ledger: ledgerRouter,
  credibility: credibilityRouter,
  tasks: tasksRouter,
  badges: badgesRouter,
});

export type AppRouter = typeof appRouter;
