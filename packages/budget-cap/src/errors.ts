// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ZodError } from 'zod';

export type BudgetCapErrorCode =
  | 'MALFORMED_NOTIFICATION'
  | 'BILLING_ALREADY_DISABLED'
  | 'LEDGER_STORE_FAILURE'
  | 'BILLING_CONTROL_FAILURE'
  | 'INVALID_CONFIG';

/**
 * Base class for every error raised while handling a budget notification.
 *
 * None of these are retried internally. They propagate to the function
 * boundary so the platform records the failed invocation.
 */
export class BudgetCapError extends Error {
  /** Machine-readable error code. */
  readonly code: BudgetCapErrorCode;

  constructor(code: BudgetCapErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BudgetCapError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The inbound payload could not be decoded into a budget notification.
 * `issues` holds one `path: message` entry per problem found.
 */
export class MalformedNotificationError extends BudgetCapError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: { cause?: unknown }) {
    super('MALFORMED_NOTIFICATION', `Budget notification is malformed: ${issues.join('; ')}`, options);
    this.name = 'MalformedNotificationError';
    this.issues = issues;
  }
}

/**
 * Billing was not confirmed enabled when the notification arrived.
 *
 * Raised instead of returning quietly, so every delivery after the cap has
 * been applied shows up as a failed invocation.
 */
export class BillingAlreadyDisabledError extends BudgetCapError {
  readonly projectId: string;

  constructor(projectId: string) {
    super('BILLING_ALREADY_DISABLED', `Billing already in disabled state for project "${projectId}".`);
    this.name = 'BillingAlreadyDisabledError';
    this.projectId = projectId;
  }
}

/** Reading or writing a project's cost ledger failed. */
export class LedgerStoreError extends BudgetCapError {
  readonly collection: string;

  constructor(collection: string, message: string, options?: { cause?: unknown }) {
    super('LEDGER_STORE_FAILURE', `Ledger store failure for collection "${collection}": ${message}`, options);
    this.name = 'LedgerStoreError';
    this.collection = collection;
  }
}

/**
 * A billing API call failed, or billing was still linked to an account
 * after the disable request returned.
 */
export class BillingControlError extends BudgetCapError {
  readonly projectId: string;

  constructor(projectId: string, message: string, options?: { cause?: unknown }) {
    super('BILLING_CONTROL_FAILURE', `Billing control failure for project "${projectId}": ${message}`, options);
    this.name = 'BillingControlError';
    this.projectId = projectId;
  }
}

/** Environment configuration is invalid. */
export class InvalidConfigError extends BudgetCapError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}

/** One `path: message` line per zod issue; `(root)` for the top-level value. */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/** Renders an unknown thrown value as a message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
