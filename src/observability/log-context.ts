import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields attached to every log line written while the request
 * is in flight. Auth fills in the actor, the transfer engine the entry it
 * committed.
 */
export interface LogContext {
  correlationId: string;
  actorId?: string;
  entryId?: number;
}

const storage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => storage.getStore()?.correlationId;

/**
 * No-op outside a request
 */
export const addLogContext = (fields: Omit<Partial<LogContext>, 'correlationId'>): void => {
  const context = storage.getStore();
  if (context) {
    Object.assign(context, fields);
  }
};

export const runWithLogContext = <T>(context: LogContext, fn: () => T): T =>
  storage.run(context, fn);

/**
 * Fields for the pino mixin; only the ones that are set
 */
export const logContextFields = (): Partial<LogContext> => {
  const context = storage.getStore();
  if (!context) {
    return {};
  }

  const fields: Partial<LogContext> = { correlationId: context.correlationId };
  if (context.actorId) fields.actorId = context.actorId;
  if (context.entryId !== undefined) fields.entryId = context.entryId;
  return fields;
};
