// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError, formatIssues } from './errors.js';

export const DEFAULT_COLLECTION_NAME_PREFIX = 'budget-notifications';

/**
 * Zod schema for the function's environment.
 *
 * Unknown variables are ignored; the whole of `process.env` can be passed.
 */
export const BudgetCapEnvSchema = z.object({
  /**
   * Prefix of the per-project collection name: `{prefix}-{projectId}`.
   * Must be non-empty; an empty prefix would yield names like `-my-project`.
   */
  COLLECTION_NAME_PREFIX: z.string().min(1).default(DEFAULT_COLLECTION_NAME_PREFIX),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface BudgetCapConfig {
  readonly collectionNamePrefix: string;
  readonly logLevel: z.infer<typeof BudgetCapEnvSchema>['LOG_LEVEL'];
}

/**
 * Parse and validate the environment, throwing InvalidConfigError with one
 * entry per failing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BudgetCapConfig {
  const result = BudgetCapEnvSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return {
    collectionNamePrefix: result.data.COLLECTION_NAME_PREFIX,
    logLevel: result.data.LOG_LEVEL,
  };
}
