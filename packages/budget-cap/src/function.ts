// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { BudgetCapError, MalformedNotificationError, formatIssues } from './errors.js';
import type { BudgetNotificationHandler } from './handler.js';
import type { Logger } from './logger.js';
import { MessagePublishedDataSchema } from './types.js';

/** The part of a CloudEvent the function reads. */
export interface CloudEventLike {
  readonly id?: string;
  readonly type?: string;
  readonly data?: unknown;
}

export type CloudEventHandler = (event: CloudEventLike) => Promise<void>;

/**
 * Adapts the handler to a Pub/Sub-triggered CloudEvent function.
 *
 * Failures are logged with their code and rethrown, so the invocation is
 * reported as failed and the platform's redelivery policy applies.
 */
export function createCloudEventHandler(
  handler: BudgetNotificationHandler,
  logger: Logger,
): CloudEventHandler {
  return async (event) => {
    const log = logger.child({ eventId: event.id });
    try {
      const parsed = MessagePublishedDataSchema.safeParse(event.data);
      if (!parsed.success) {
        throw new MalformedNotificationError(formatIssues(parsed.error), { cause: parsed.error });
      }
      const outcome = await handler.handleMessage(parsed.data.message);
      log.info(
        { projectId: outcome.projectId, total: outcome.total, action: outcome.action },
        'Budget notification handled',
      );
    } catch (err) {
      const code = err instanceof BudgetCapError ? err.code : 'UNEXPECTED';
      log.error({ err, code }, 'Budget notification failed');
      throw err;
    }
  };
}
