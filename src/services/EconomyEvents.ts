/**
 * EconomyEvents: typed in-process pub/sub for the economy's domain events.
 *
 * Events are never emitted directly by services: they are written to the
 * outbox inside the transaction and published here by the OutboxDispatcher
 * after commit. Payload shapes are zod schemas so rows read back from the
 * outbox are validated before they reach a handler.
 *
 * Handler execution:
 * - Handlers run in registration order, each awaited.
 * - A failing handler does not stop the others; failures are returned to
 *   the caller (the dispatcher marks the outbox row failed).
 */

import { z } from 'zod';

const isoDate = z.string().datetime();

const schemas = {
  'badge.earned': z.object({
    childId: z.string(),
    badgeType: z.string(),
    displayName: z.string(),
    bonusXP: z.number().int(),
    earnedAt: isoDate,
  }),
  'task.approved': z.object({
    assignmentId: z.string(),
    childId: z.string(),
    reviewerId: z.string(),
    decision: z.enum(['approved', 'approved_edited']),
    xpAwarded: z.number().int(),
    newScore: z.number().int(),
  }),
  'task.declined': z.object({
    assignmentId: z.string(),
    childId: z.string(),
    reviewerId: z.string(),
    reason: z.string(),
    penalty: z.number().int(),
    newScore: z.number().int(),
    appealDeadline: isoDate.nullable(),
  }),
  'task.appealed': z.object({
    assignmentId: z.string(),
    childId: z.string(),
    appealedAt: isoDate,
  }),
  'task.expired': z.object({
    assignmentId: z.string(),
    childId: z.string(),
    dueDate: isoDate,
  }),
  'redemption_bonus.activated': z.object({
    userId: z.string(),
    expiresAt: isoDate,
  }),
  'redemption_bonus.expired': z.object({
    userId: z.string(),
  }),
} as const;

export type EconomyEventName = keyof typeof schemas;

export type EconomyEventPayload<K extends EconomyEventName> = z.infer<(typeof schemas)[K]>;

type EconomyEventSchemaMap = {
  [K in EconomyEventName]: z.ZodType<EconomyEventPayload<K>, z.ZodTypeDef, unknown>;
};

export const economyEventSchemas: EconomyEventSchemaMap = schemas;

export type EconomyEventHandler<K extends EconomyEventName> = (
  payload: EconomyEventPayload<K>
) => void | Promise<void>;

export function isEconomyEventName(name: string): name is EconomyEventName {
  return Object.prototype.hasOwnProperty.call(schemas, name);
}

type HandlerMap = {
  [K in EconomyEventName]: Set<EconomyEventHandler<K>>;
};

export interface EmitOutcome {
  delivered: number;
  failures: Error[];
}

export class EconomyEvents {
  private readonly handlers: HandlerMap = {
    'badge.earned': new Set(),
    'task.approved': new Set(),
    'task.declined': new Set(),
    'task.appealed': new Set(),
    'task.expired': new Set(),
    'redemption_bonus.activated': new Set(),
    'redemption_bonus.expired': new Set(),
  };

  /**
   * Register a handler. Returns the matching unsubscribe function.
   */
  on<K extends EconomyEventName>(name: K, handler: EconomyEventHandler<K>): () => void {
    this.handlersFor(name).add(handler);
    return () => this.off(name, handler);
  }

  off<K extends EconomyEventName>(name: K, handler: EconomyEventHandler<K>): void {
    this.handlersFor(name).delete(handler);
  }

  async emit<K extends EconomyEventName>(name: K, payload: EconomyEventPayload<K>): Promise<EmitOutcome> {
    const failures: Error[] = [];
    let delivered = 0;

    for (const handler of [...this.handlersFor(name)]) {
      try {
        await handler(payload);
        delivered++;
      } catch (err) {
        failures.push(err instanceof Error ? err : new Error(String(err)));
      }
    }

    return { delivered, failures };
  }

  /**
   * Validate an untyped outbox payload and emit it.
   */
  async emitRaw(name: string, payload: unknown): Promise<EmitOutcome> {
    if (!isEconomyEventName(name)) {
      return { delivered: 0, failures: [new Error(`Unknown economy event: ${name}`)] };
    }
    return this.emitParsed(name, payload);
  }

  get handlerCount(): number {
    return Object.values(this.handlers).reduce((sum, set) => sum + set.size, 0);
  }

  removeAllHandlers(): void {
    for (const set of Object.values(this.handlers)) {
      set.clear();
    }
  }

  private async emitParsed<K extends EconomyEventName>(name: K, payload: unknown): Promise<EmitOutcome> {
    const parsed = economyEventSchemas[name].safeParse(payload);
    if (!parsed.success) {
      return { delivered: 0, failures: [new Error(`Invalid ${name} payload: ${parsed.error.message}`)] };
    }
    return this.emit(name, parsed.data);
  }

  private handlersFor<K extends EconomyEventName>(name: K): Set<EconomyEventHandler<K>> {
    return this.handlers[name];
  }
}

export interface EventLogSink {
  info(fields: object, message: string): void;
}

/**
 * Subscribe one activity log line per delivered economy event.
 * Returns a function that removes every subscription it made.
 */
export function logEconomyEvents(events: EconomyEvents, log: EventLogSink): () => void {
  const unsubscribes = Object.keys(schemas)
    .filter(isEconomyEventName)
    .map(name =>
      events.on(name, payload => {
        log.info({ event: name, payload }, 'Economy event');
      })
    );
  return () => {
    for (const unsubscribe of unsubscribes) {
      unsubscribe();
    }
  };
}
