// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * JSON-lines logger. The level is written as an upper-case `severity` field,
 * which Cloud Logging reads to classify entries.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    level: options.level ?? 'info',
    messageKey: 'message',
    base: { service: 'budget-cap' },
    formatters: {
      level: (label: string) => ({ severity: label.toUpperCase() }),
    },
  };
  return options.destination !== undefined
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
}
