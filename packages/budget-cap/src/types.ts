// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

// ─── Budget notification ────────────────────────────────────────────────────

/**
 * Payload the billing service publishes for a budget.
 *
 * The budget display name must be the id of the project to cap. Fields
 * beyond the four the handler reads are kept so the stored record is a
 * faithful copy of what was received.
 */
export const BudgetNotificationSchema = z
  .object({
    budgetDisplayName: z.string().min(1),
    budgetAmount: z.number().finite(),
    costAmount: z.number().finite(),
    costIntervalStart: z.string().min(1),
  })
  .passthrough();
export type BudgetNotification = z.infer<typeof BudgetNotificationSchema>;

/** A received notification as written to the project's audit collection. */
export type NotificationRecord = BudgetNotification & { readonly addedAt: string };

// ─── Ledger ─────────────────────────────────────────────────────────────────

/** costIntervalStart -> latest costAmount seen for that interval. */
export const CostLedgerSchema = z.record(z.string(), z.number().finite());
export type CostLedger = z.infer<typeof CostLedgerSchema>;

// ─── Transport ──────────────────────────────────────────────────────────────

/** A Pub/Sub message as carried inside a CloudEvent. */
export const PubSubMessageSchema = z.object({
  data: z.string().min(1),
  attributes: z.record(z.string(), z.string()).optional(),
  messageId: z.string().optional(),
  publishTime: z.string().optional(),
});
export type PubSubMessage = z.infer<typeof PubSubMessageSchema>;

/** `google.events.cloud.pubsub.v1.MessagePublishedData` */
export const MessagePublishedDataSchema = z.object({
  message: PubSubMessageSchema,
  subscription: z.string().optional(),
});
export type MessagePublishedData = z.infer<typeof MessagePublishedDataSchema>;

// ─── Outcome ────────────────────────────────────────────────────────────────

export type BudgetAction = 'none' | 'billing_disabled';

export interface HandleOutcome {
  readonly projectId: string;
  readonly collection: string;
  readonly ledger: Readonly<CostLedger>;
  readonly total: number;
  readonly budgetAmount: number;
  readonly action: BudgetAction;
}
