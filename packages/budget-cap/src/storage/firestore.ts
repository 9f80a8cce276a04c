// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Firestore } from 'firebase-admin/firestore';
import { LedgerStoreError, describeError, formatIssues } from '../errors.js';
import { CostLedgerSchema, type CostLedger, type NotificationRecord } from '../types.js';
import type { CostLedgerStore } from './interface.js';

/**
 * Id of the ledger document inside each project collection. The `0-` prefix
 * lists it ahead of the auto-id notification documents in the console.
 */
export const LEDGER_DOCUMENT_ID = '0-costs-per-interval-starts';

/**
 * Firestore-backed ledger store.
 *
 * Collection layout:
 *   {collection}/0-costs-per-interval-starts  — { [costIntervalStart]: costAmount }
 *   {collection}/{auto-id}                    — one NotificationRecord per event
 */
export class FirestoreCostLedgerStore implements CostLedgerStore {
  readonly #db: Firestore;

  constructor(db: Firestore) {
    this.#db = db;
  }

  async getLedger(collection: string): Promise<CostLedger> {
    let data: unknown;
    try {
      const snapshot = await this.#db.collection(collection).doc(LEDGER_DOCUMENT_ID).get();
      data = snapshot.data();
    } catch (err) {
      throw new LedgerStoreError(collection, `read failed: ${describeError(err)}`, { cause: err });
    }

    if (data === undefined) return {};

    const parsed = CostLedgerSchema.safeParse(data);
    if (!parsed.success) {
      throw new LedgerStoreError(
        collection,
        `stored ledger is not a map of interval start to cost: ${formatIssues(parsed.error).join('; ')}`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  async persist(
    collection: string,
    ledger: Readonly<CostLedger>,
    record: NotificationRecord,
  ): Promise<void> {
    // batch.set() validates document data synchronously, so it can throw too.
    try {
      const ref = this.#db.collection(collection);
      const batch = this.#db.batch();
      batch.set(ref.doc(LEDGER_DOCUMENT_ID), { ...ledger });
      batch.set(ref.doc(), { ...record });
      await batch.commit();
    } catch (err) {
      throw new LedgerStoreError(collection, `batch write failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}
