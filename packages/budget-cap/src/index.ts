// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// ─── Handler ─────────────────────────────────────────────────────────────────
export { BudgetNotificationHandler } from './handler.js';
export type { BudgetNotificationHandlerOptions } from './handler.js';
export { createCloudEventHandler } from './function.js';
export type { CloudEventLike, CloudEventHandler } from './function.js';

// ─── Types & schemas ─────────────────────────────────────────────────────────
export type {
  BudgetNotification,
  NotificationRecord,
  CostLedger,
  PubSubMessage,
  MessagePublishedData,
  BudgetAction,
  HandleOutcome,
} from './types.js';
export {
  BudgetNotificationSchema,
  CostLedgerSchema,
  PubSubMessageSchema,
  MessagePublishedDataSchema,
} from './types.js';

// ─── Notification helpers ────────────────────────────────────────────────────
export {
  decodeNotification,
  encodeNotification,
  collectionName,
  stampNotification,
  applyToLedger,
  ledgerTotal,
} from './notification.js';

// ─── Storage ─────────────────────────────────────────────────────────────────
export type { CostLedgerStore } from './storage/index.js';
export { MemoryCostLedgerStore, FirestoreCostLedgerStore, LEDGER_DOCUMENT_ID } from './storage/index.js';

// ─── Billing ─────────────────────────────────────────────────────────────────
export type { BillingControl } from './billing/index.js';
export { CloudBillingControl, projectResourceName } from './billing/index.js';

// ─── Config, logging, errors ─────────────────────────────────────────────────
export { loadConfig, BudgetCapEnvSchema, DEFAULT_COLLECTION_NAME_PREFIX } from './config.js';
export type { BudgetCapConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export {
  BudgetCapError,
  MalformedNotificationError,
  BillingAlreadyDisabledError,
  LedgerStoreError,
  BillingControlError,
  InvalidConfigError,
  formatIssues,
  describeError,
} from './errors.js';
export type { BudgetCapErrorCode } from './errors.js';
