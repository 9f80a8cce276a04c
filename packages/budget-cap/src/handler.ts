// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { BillingControl } from './billing/interface.js';
import { DEFAULT_COLLECTION_NAME_PREFIX } from './config.js';
import { BillingAlreadyDisabledError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import {
  applyToLedger,
  collectionName,
  decodeNotification,
  ledgerTotal,
  stampNotification,
} from './notification.js';
import type { CostLedgerStore } from './storage/interface.js';
import type { BudgetNotification, HandleOutcome, PubSubMessage } from './types.js';

export interface BudgetNotificationHandlerOptions {
  store: CostLedgerStore;
  billing: BillingControl;
  /** Defaults to "budget-notifications". */
  collectionNamePrefix?: string;
  logger?: Logger;
  /** Source of the `addedAt` stamp. Defaults to the wall clock. */
  now?: () => Date;
}

/**
 * Caps a project's spend from its budget notifications.
 *
 * Per notification:
 *  1. Refuse to go on unless billing is confirmed enabled for the project.
 *  2. Overwrite the ledger entry for the notification's cost interval.
 *  3. Commit the ledger and a copy of the notification in one batch.
 *  4. Sum every interval in the ledger and, once the sum reaches the
 *     budget amount, unlink the project's billing account.
 *
 * Every failure propagates; nothing is retried here.
 */
export class BudgetNotificationHandler {
  readonly #store: CostLedgerStore;
  readonly #billing: BillingControl;
  readonly #prefix: string;
  readonly #logger: Logger;
  readonly #now: () => Date;

  constructor(options: BudgetNotificationHandlerOptions) {
    this.#store = options.store;
    this.#billing = options.billing;
    this.#prefix = options.collectionNamePrefix ?? DEFAULT_COLLECTION_NAME_PREFIX;
    this.#logger = options.logger ?? createLogger();
    this.#now = options.now ?? (() => new Date());
  }

  /** Decode a Pub/Sub message and handle the notification it carries. */
  async handleMessage(message: Pick<PubSubMessage, 'data'>): Promise<HandleOutcome> {
    return this.handle(decodeNotification(message));
  }

  async handle(notification: BudgetNotification): Promise<HandleOutcome> {
    const projectId = notification.budgetDisplayName;
    const budgetAmount = notification.budgetAmount;
    const log = this.#logger.child({ projectId });

    log.info(
      {
        budgetAmount,
        costAmount: notification.costAmount,
        costIntervalStart: notification.costIntervalStart,
      },
      'Handling budget notification',
    );

    const collection = collectionName(this.#prefix, projectId);

    const enabled = await this.#billing.isBillingEnabled(projectId);
    log.info({ billingEnabled: enabled }, 'Checked billing status');
    if (!enabled) {
      throw new BillingAlreadyDisabledError(projectId);
    }

    const record = stampNotification(notification, this.#now());
    const ledger = applyToLedger(await this.#store.getLedger(collection), notification);
    log.info({ collection, ledger }, 'Updated costs per interval start');

    await this.#store.persist(collection, ledger, record);

    const total = ledgerTotal(ledger);
    log.info({ total }, 'Computed total cost amount');

    if (total < budgetAmount) {
      log.info({ total, budgetAmount }, 'Total is below budget; no action taken');
      return { projectId, collection, ledger, total, budgetAmount, action: 'none' };
    }

    log.warn({ total, budgetAmount }, 'Total reached budget; disabling billing');
    await this.#billing.disableBilling(projectId);
    log.info('Billing disabled');
    return { projectId, collection, ledger, total, budgetAmount, action: 'billing_disabled' };
  }
}
