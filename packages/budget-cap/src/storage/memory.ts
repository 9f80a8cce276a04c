// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { LedgerStoreError } from '../errors.js';
import type { CostLedger, NotificationRecord } from '../types.js';
import type { CostLedgerStore } from './interface.js';

interface MemoryCollection {
  ledger: CostLedger | undefined;
  readonly records: NotificationRecord[];
}

/**
 * In-process ledger store for local runs and tests. All state is lost when
 * the process exits.
 *
 * `failNextPersist()` makes the next `persist()` reject before anything is
 * written, which is how a failed batch commit looks to the caller.
 */
export class MemoryCostLedgerStore implements CostLedgerStore {
  readonly #collections = new Map<string, MemoryCollection>();
  #pendingFailure: Error | undefined;

  async getLedger(collection: string): Promise<CostLedger> {
    const ledger = this.#collections.get(collection)?.ledger;
    return ledger === undefined ? {} : { ...ledger };
  }

  async persist(
    collection: string,
    ledger: Readonly<CostLedger>,
    record: NotificationRecord,
  ): Promise<void> {
    const failure = this.#pendingFailure;
    if (failure !== undefined) {
      this.#pendingFailure = undefined;
      throw new LedgerStoreError(collection, failure.message, { cause: failure });
    }

    let entry = this.#collections.get(collection);
    if (entry === undefined) {
      entry = { ledger: undefined, records: [] };
      this.#collections.set(collection, entry);
    }
    entry.ledger = { ...ledger };
    entry.records.push({ ...record });
  }

  /** Notification records written to `collection`, oldest first. */
  listRecords(collection: string): readonly NotificationRecord[] {
    return (this.#collections.get(collection)?.records ?? []).map((record) => ({ ...record }));
  }

  /** Whether a ledger document has ever been written to `collection`. */
  hasLedger(collection: string): boolean {
    return this.#collections.get(collection)?.ledger !== undefined;
  }

  failNextPersist(error: Error = new Error('simulated commit failure')): void {
    this.#pendingFailure = error;
  }
}
