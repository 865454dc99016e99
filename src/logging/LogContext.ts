import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  /** Sequencer phase the current work belongs to. */
  phase: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();
