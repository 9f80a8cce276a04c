// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { CostLedger, NotificationRecord } from '../types.js';

/**
 * Persistence contract for per-project cost ledgers.
 *
 * Each project owns one collection holding a single ledger document and an
 * append-only log of received notifications. The handler never writes to
 * the backend directly; it goes through `persist()`.
 *
 * There is no locking between `getLedger()` and `persist()`. Two
 * invocations for the same project running at once can each read the same
 * ledger, and the second commit replaces the first one's interval update.
 */
export interface CostLedgerStore {
  /** Returns the collection's ledger, or an empty ledger when none exists. */
  getLedger(collection: string): Promise<CostLedger>;

  /**
   * Replace the ledger document and append `record` as a new document.
   * Both writes are applied together or not at all.
   */
  persist(collection: string, ledger: Readonly<CostLedger>, record: NotificationRecord): Promise<void>;
}
