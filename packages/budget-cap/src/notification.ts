// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { MalformedNotificationError, describeError, formatIssues } from './errors.js';
import {
  BudgetNotificationSchema,
  type BudgetNotification,
  type CostLedger,
  type NotificationRecord,
  type PubSubMessage,
} from './types.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a Pub/Sub message body (base64-encoded JSON) into a validated
 * budget notification.
 *
 * @throws MalformedNotificationError when the body is not base64, not JSON,
 *   or lacks one of the required fields.
 */
export function decodeNotification(message: Pick<PubSubMessage, 'data'>): BudgetNotification {
  const encoded = message.data.replace(/\s+/g, '');
  if (encoded.length === 0 || !BASE64_PATTERN.test(encoded)) {
    throw new MalformedNotificationError(['data: not a base64 string']);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (err) {
    throw new MalformedNotificationError([`data: not valid JSON (${describeError(err)})`], {
      cause: err,
    });
  }

  const result = BudgetNotificationSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedNotificationError(formatIssues(result.error), { cause: result.error });
  }
  return result.data;
}

/** Inverse of decodeNotification; used to publish test and replay messages. */
export function encodeNotification(notification: BudgetNotification): PubSubMessage {
  return { data: Buffer.from(JSON.stringify(notification), 'utf-8').toString('base64') };
}

/** `{prefix}-{projectId}` */
export function collectionName(prefix: string, projectId: string): string {
  return `${prefix}-${projectId}`;
}

export function stampNotification(notification: BudgetNotification, at: Date): NotificationRecord {
  return { ...notification, addedAt: at.toISOString() };
}

/**
 * Returns a copy of `ledger` with the notification's interval set to its
 * cost. An existing entry for the interval is replaced, not added to.
 */
export function applyToLedger(
  ledger: Readonly<CostLedger>,
  notification: Pick<BudgetNotification, 'costIntervalStart' | 'costAmount'>,
): CostLedger {
  return { ...ledger, [notification.costIntervalStart]: notification.costAmount };
}

/** Sum of the latest cost of every interval in the ledger. */
export function ledgerTotal(ledger: Readonly<CostLedger>): number {
  return Object.values(ledger).reduce((sum, cost) => sum + cost, 0);
}
