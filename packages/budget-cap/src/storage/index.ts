// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { CostLedgerStore } from './interface.js';
export { MemoryCostLedgerStore } from './memory.js';
export { FirestoreCostLedgerStore, LEDGER_DOCUMENT_ID } from './firestore.js';
