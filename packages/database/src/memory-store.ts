/**
 * Memory Store
 *
 * Keyed records with atomic, serialized transactions.
 * A transaction clones a record the first time it reads it and writes the
 * touched records back only when the callback resolves; a rejection discards
 * them. A transaction therefore costs the size of the records it touches,
 * not of the whole store. A record is cloned whole, so one that keeps an
 * unbounded history still grows that cost with its history.
 */

export interface StoreView<R> {
  get(key: string): R | undefined;
}

export interface StoreDraft<R> extends StoreView<R> {
  set(key: string, record: R): void;
}

export type TransactionCallback<R, T> = (tx: StoreDraft<R>) => T | Promise<T>;

export type CloneRecord<R> = (record: R) => R;

export class MemoryStore<R extends object> {
  private records = new Map<string, R>();
  private queue: Promise<void> = Promise.resolve();
  private commits = 0;
  private clones = 0;

  constructor(
    initialRecords: Iterable<readonly [string, R]> = [],
    private cloneRecord: CloneRecord<R> = (record) => structuredClone(record)
  ) {
    for (const [key, record] of initialRecords) {
      this.records.set(key, this.cloneRecord(record));
    }
  }

  /**
   * Number of committed transactions
   */
  get version(): number {
    return this.commits;
  }

  /**
   * Number of records cloned by transactions so far
   */
  get clonedRecords(): number {
    return this.clones;
  }

  /**
   * Read committed records
   *
   * Committed records are never mutated after a commit, so the callback
   * sees a consistent snapshot even while a transaction is in flight.
   */
  read<T>(fn: (state: StoreView<R>) => T): T {
    return fn({ get: (key) => this.records.get(key) });
  }

  /**
   * Run a transaction
   *
   * Transactions are applied one at a time in submission order.
   *
   * @param fn - Callback receiving a draft that clones records on first read
   * @returns The callback's result once the touched records are committed
   */
  transaction<T>(fn: TransactionCallback<R, T>): Promise<T> {
    const run = async (): Promise<T> => {
      const touched = new Map<string, R>();
      const draft: StoreDraft<R> = {
        get: (key) => {
          const pending = touched.get(key);
          if (pending) {
            return pending;
          }
          const committed = this.records.get(key);
          if (!committed) {
            return undefined;
          }
          const copy = this.cloneRecord(committed);
          this.clones += 1;
          touched.set(key, copy);
          return copy;
        },
        set: (key, record) => {
          touched.set(key, record);
        },
      };

      const result = await fn(draft);
      for (const [key, record] of touched) {
        this.records.set(key, record);
      }
      this.commits += 1;
      return result;
    };

    const next = this.queue.then(run);
    // The rejection reaches the caller through `next`; the queue itself only
    // tracks completion so later transactions still run.
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
