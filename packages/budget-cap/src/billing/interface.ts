// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Reads and cuts the billing link of a cloud project. */
export interface BillingControl {
  /**
   * True only when the billing API reports billing as enabled. A project
   * whose status is missing or unknown counts as not enabled.
   */
  isBillingEnabled(projectId: string): Promise<boolean>;

  /**
   * Unlink the project's billing account.
   * Rejects with BillingControlError unless the account is observed unlinked
   * afterwards.
   */
  disableBilling(projectId: string): Promise<void>;
}
