/**
 * Transfer Registry
 *
 * Owns the transfer records of one role (sender or receiver). Records are
 * only reachable through closures passed to `read` and `update`, which run
 * synchronously while the registry is locked; the record reference never
 * leaves the registry. A closure that calls back into the same registry,
 * or that returns a promise, is rejected.
 *
 * Every record receives a generation number when it is created. Code that
 * decides under the lock and acts after an `await` re-checks the
 * generation before touching the record again, so a transfer that was
 * replaced or removed in the meantime is left alone.
 *
 * @module engine/transfer/registry
 */

import { RegistryLockError } from '../types.js';

// =============================================================================
// Types
// =============================================================================

interface RegistryEntry<T> {
  generation: number;
  record: T;
}

/**
 * Closure run against a record under the registry lock.
 */
export type RecordFn<T, R> = (record: T, generation: number) => R;

// =============================================================================
// TransferRegistry Class
// =============================================================================

/**
 * Lock-guarded map from transfer id to transfer record.
 *
 * @example
 * ```typescript
 * const registry = new TransferRegistry<ReceiverRecord>('receiver');
 * const generation = registry.create('!a1b2c3d4', record);
 *
 * const missing = registry.read('!a1b2c3d4', (r) => [...r.missing]);
 * registry.update('!a1b2c3d4', (r) => { r.lastActivityAt = Date.now(); });
 * ```
 */
export class TransferRegistry<T> {
  // ===========================================================================
  // Private Properties
  // ===========================================================================

  private readonly entries = new Map<string, RegistryEntry<T>>();

  private nextGeneration = 1;

  private locked = false;

  // ===========================================================================
  // Constructor
  // ===========================================================================

  /**
   * @param name - Role name used in error messages
   */
  constructor(private readonly name: string) {}

  // ===========================================================================
  // Public Properties
  // ===========================================================================

  /** Number of live transfers */
  get size(): number {
    return this.withLock(() => this.entries.size);
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Stores a record, replacing any existing record with the same id.
   *
   * @returns The generation assigned to the new record
   */
  create(id: string, record: T): number {
    return this.withLock(() => {
      const generation = this.nextGeneration++;
      this.entries.set(id, { generation, record });
      return generation;
    });
  }

  /**
   * Returns true if a record exists for the id.
   */
  has(id: string): boolean {
    return this.withLock(() => this.entries.has(id));
  }

  /**
   * Returns true if the record for `id` is still the one created with
   * `generation`.
   */
  isCurrent(id: string, generation: number): boolean {
    return this.withLock(() => this.entries.get(id)?.generation === generation);
  }

  /**
   * Runs a read-only closure against a record.
   *
   * @returns The closure's result, or undefined if no record exists
   */
  read<R>(id: string, fn: RecordFn<Readonly<T>, R>): R | undefined {
    return this.withLock(() => {
      const entry = this.entries.get(id);
      return entry ? fn(entry.record, entry.generation) : undefined;
    });
  }

  /**
   * Runs a mutating closure against a record.
   *
   * @returns The closure's result, or undefined if no record exists
   */
  update<R>(id: string, fn: RecordFn<T, R>): R | undefined {
    return this.withLock(() => {
      const entry = this.entries.get(id);
      return entry ? fn(entry.record, entry.generation) : undefined;
    });
  }

  /**
   * Runs a mutating closure only if the record still has `generation`.
   *
   * @returns The closure's result, or undefined if the record is gone or replaced
   */
  updateIfCurrent<R>(id: string, generation: number, fn: (record: T) => R): R | undefined {
    return this.withLock(() => {
      const entry = this.entries.get(id);
      return entry && entry.generation === generation ? fn(entry.record) : undefined;
    });
  }

  /**
   * Removes a record.
   *
   * @param generation - When given, only removes the record if it still has it
   * @returns true if a record was removed
   */
  remove(id: string, generation?: number): boolean {
    return this.withLock(() => {
      const entry = this.entries.get(id);
      if (!entry || (generation !== undefined && entry.generation !== generation)) {
        return false;
      }
      return this.entries.delete(id);
    });
  }

  /**
   * Ids of all live transfers, in insertion order.
   */
  ids(): string[] {
    return this.withLock(() => [...this.entries.keys()]);
  }

  /**
   * Maps every record through a read-only closure.
   */
  map<R>(fn: (id: string, record: Readonly<T>) => R): R[] {
    return this.withLock(() =>
      [...this.entries].map(([id, entry]) => fn(id, entry.record))
    );
  }

  /**
   * Removes every record.
   */
  clear(): void {
    this.withLock(() => this.entries.clear());
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private withLock<R>(fn: () => R): R {
    if (this.locked) {
      throw new RegistryLockError(this.name);
    }

    this.locked = true;
    try {
      const result = fn();
      if (isThenable(result)) {
        throw new TypeError(`${this.name} registry closures must be synchronous`);
      }
      return result;
    } finally {
      this.locked = false;
    }
  }
}

function isThenable(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
