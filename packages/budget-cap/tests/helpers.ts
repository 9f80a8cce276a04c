// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { BillingControl } from '../src/billing/interface.js';
import { BillingControlError } from '../src/errors.js';
import { createLogger, type Logger } from '../src/logger.js';
import type { BudgetNotification, PubSubMessage } from '../src/types.js';

/** Records every call; projects are disabled unless marked enabled. */
export class FakeBillingControl implements BillingControl {
  readonly enabled = new Map<string, boolean>();
  readonly statusChecks: string[] = [];
  readonly disableCalls: string[] = [];
  disableFailure: string | undefined;

  constructor(enabledProjects: readonly string[] = []) {
    for (const projectId of enabledProjects) this.enabled.set(projectId, true);
  }

  async isBillingEnabled(projectId: string): Promise<boolean> {
    this.statusChecks.push(projectId);
    return this.enabled.get(projectId) ?? false;
  }

  async disableBilling(projectId: string): Promise<void> {
    this.disableCalls.push(projectId);
    if (this.disableFailure !== undefined) {
      throw new BillingControlError(projectId, this.disableFailure);
    }
    this.enabled.set(projectId, false);
  }
}

export function notification(
  projectId: string,
  budgetAmount: number,
  costAmount: number,
  costIntervalStart: string,
): BudgetNotification {
  return { budgetDisplayName: projectId, budgetAmount, costAmount, costIntervalStart };
}

export function base64Json(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf-8').toString('base64');
}

export function messageFor(value: unknown): PubSubMessage {
  return { data: base64Json(value) };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

/** A logger whose JSON lines are parsed into `lines`. */
export function captureLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  });
  return { logger, lines };
}
