// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { BillingControl } from './interface.js';
export { CloudBillingControl, projectResourceName } from './cloud-billing.js';
