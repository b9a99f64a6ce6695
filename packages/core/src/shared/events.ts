/**
 * Ledger event log and subscriber fan-out
 *
 * Each ledger instance keeps an append-only log; sequences start at 1 and
 * are dense. Events are appended inside the operation's transaction and
 * handed to subscribers only after it commits.
 */

import { logger as defaultLogger, type Logger } from '@trading-ledger/observability';

export interface LedgerEventEnvelope {
  sequence: number;
  ledger: string;
  timestamp: number;
}

export type LedgerEvent<D extends { type: string }> = LedgerEventEnvelope & D;

/**
 * Append an event to a ledger's log and return it
 */
export function appendLedgerEvent<D extends { type: string }>(
  log: LedgerEvent<D>[],
  ledger: string,
  timestamp: number,
  data: D
): LedgerEvent<D> {
  const event = { sequence: log.length + 1, ledger, timestamp, ...data };
  log.push(event);
  return event;
}

/**
 * Events with a sequence greater than `afterSequence`
 */
export function eventsAfter<E extends LedgerEventEnvelope>(log: readonly E[], afterSequence: number): E[] {
  return log.slice(Math.max(0, afterSequence));
}

export type LedgerEventHandler<E> = (event: E) => void | Promise<void>;

export class LedgerEventEmitter<E extends { type: string }> {
  private handlers: LedgerEventHandler<E>[] = [];

  constructor(private logger: Logger = defaultLogger.child({ module: 'ledger-events' })) {}

  /**
   * Subscribe to committed events
   *
   * @returns Function that removes the handler
   */
  on(handler: LedgerEventHandler<E>): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  /**
   * Deliver committed events to every handler, in order
   *
   * A failing handler is logged and does not stop delivery to the others;
   * the returned promise never rejects.
   */
  async publish(events: readonly E[]): Promise<void> {
    for (const event of events) {
      const results = await Promise.allSettled(
        this.handlers.map((handler) => Promise.resolve().then(() => handler(event)))
      );
      for (const result of results) {
        if (result.status === 'rejected') {
          this.logger.error({ err: result.reason, eventType: event.type }, 'Ledger event handler error');
        }
      }
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }
}
