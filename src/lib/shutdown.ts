import { logger } from '../logger';

const log = logger.child({ component: 'shutdown' });

/** Ordered stages: stop accepting work, drain it, then release connections. */
export type ShutdownStage = 'ingress' | 'work' | 'connections';

const STAGE_ORDER: readonly ShutdownStage[] = ['ingress', 'work', 'connections'];

export interface ShutdownOptions {
  exit?: (code: number) => void;
  /** Hard deadline for the whole sequence. */
  deadlineMs?: number;
}

export interface ShutdownReport {
  closed: string[];
  failed: string[];
}

type Closer = { name: string; close: () => Promise<void> };

/**
 * Closes process resources stage by stage on SIGINT/SIGTERM. Closers in the
 * same stage run together; a failing closer marks the exit code but does not
 * stop later stages.
 */
export class GracefulShutdown {
  private readonly stages = new Map<ShutdownStage, Closer[]>();
  private running: Promise<ShutdownReport> | null = null;
  private readonly exit: (code: number) => void;
  private readonly deadlineMs: number;

  constructor(options: ShutdownOptions = {}) {
    this.exit = options.exit ?? (code => process.exit(code));
    this.deadlineMs = options.deadlineMs ?? 45_000;
  }

  register(stage: ShutdownStage, name: string, close: () => Promise<void>): this {
    const closers = this.stages.get(stage) ?? [];
    closers.push({ name, close });
    this.stages.set(stage, closers);
    return this;
  }

  shutdown(): Promise<ShutdownReport> {
    this.running ??= this.run();
    return this.running;
  }

  private async run(): Promise<ShutdownReport> {
    log.info('Shutting down');
    const deadline = setTimeout(() => {
      log.error({ deadlineMs: this.deadlineMs }, 'Shutdown deadline passed, forcing exit');
      this.exit(1);
    }, this.deadlineMs);

    const report: ShutdownReport = { closed: [], failed: [] };
    for (const stage of STAGE_ORDER) {
      const closers = this.stages.get(stage) ?? [];
      const results = await Promise.allSettled(closers.map(c => c.close()));
      results.forEach((result, i) => {
        const { name } = closers[i];
        if (result.status === 'fulfilled') {
          report.closed.push(name);
        } else {
          report.failed.push(name);
          log.error({ err: result.reason, stage, closer: name }, 'Closer failed');
        }
      });
    }

    clearTimeout(deadline);
    log.info(report, 'Shutdown finished');
    this.exit(report.failed.length > 0 ? 1 : 0);
    return report;
  }

  listen(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      process.once(signal, () => {
        log.info({ signal }, 'Signal received');
        this.shutdown().catch((error: unknown) => {
          log.fatal({ err: error }, 'Shutdown sequence threw');
          this.exit(1);
        });
      });
    }
  }
}
