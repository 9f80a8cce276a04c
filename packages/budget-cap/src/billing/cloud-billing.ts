// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { CloudBillingClient } from '@google-cloud/billing';
import { BillingControlError, describeError } from '../errors.js';
import type { BillingControl } from './interface.js';

/** `projects/{projectId}` */
export function projectResourceName(projectId: string): string {
  return `projects/${projectId}`;
}

/**
 * BillingControl over the Cloud Billing API.
 *
 * The runtime service account needs `billing.resourceAssociations.delete`
 * on the billing account, usually through the Billing Account
 * Administrator or Project Billing Manager role.
 */
export class CloudBillingControl implements BillingControl {
  readonly #client: CloudBillingClient;

  constructor(client: CloudBillingClient) {
    this.#client = client;
  }

  async isBillingEnabled(projectId: string): Promise<boolean> {
    try {
      const [info] = await this.#client.getProjectBillingInfo({
        name: projectResourceName(projectId),
      });
      return info.billingEnabled === true;
    } catch (err) {
      throw new BillingControlError(projectId, `getProjectBillingInfo failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async disableBilling(projectId: string): Promise<void> {
    let billingAccountName: string | null | undefined;
    try {
      const [info] = await this.#client.updateProjectBillingInfo({
        name: projectResourceName(projectId),
        projectBillingInfo: { billingAccountName: '' },
      });
      billingAccountName = info.billingAccountName;
    } catch (err) {
      throw new BillingControlError(
        projectId,
        `updateProjectBillingInfo failed: ${describeError(err)}`,
        { cause: err },
      );
    }

    // The API answers with the post-update info; an empty name means unlinked.
    if (billingAccountName !== undefined && billingAccountName !== null && billingAccountName !== '') {
      throw new BillingControlError(
        projectId,
        `billing account "${billingAccountName}" is still linked after the disable request`,
      );
    }
  }
}
