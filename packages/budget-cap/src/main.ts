// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// Function entry point, loaded through package.json "main". `npm run deploy`
// builds and deploys it with a trigger on the budgets-notifications topic.

import { CloudBillingClient } from '@google-cloud/billing';
import { cloudEvent } from '@google-cloud/functions-framework';
import { initializeApp } from 'firebase-admin/app';
import { getFirestore } from 'firebase-admin/firestore';
import { CloudBillingControl } from './billing/cloud-billing.js';
import { loadConfig } from './config.js';
import { createCloudEventHandler } from './function.js';
import { BudgetNotificationHandler } from './handler.js';
import { createLogger } from './logger.js';
import { FirestoreCostLedgerStore } from './storage/firestore.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const handler = new BudgetNotificationHandler({
  store: new FirestoreCostLedgerStore(getFirestore(initializeApp())),
  billing: new CloudBillingControl(new CloudBillingClient()),
  collectionNamePrefix: config.collectionNamePrefix,
  logger,
});

cloudEvent('handleBudgetNotification', createCloudEventHandler(handler, logger));
