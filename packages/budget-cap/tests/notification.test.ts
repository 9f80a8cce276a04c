// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { MalformedNotificationError } from '../src/errors.js';
import {
  applyToLedger,
  collectionName,
  decodeNotification,
  encodeNotification,
  ledgerTotal,
  stampNotification,
} from '../src/notification.js';
import { base64Json, notification } from './helpers.js';

function decodeFailure(data: string): MalformedNotificationError {
  try {
    decodeNotification({ data });
  } catch (err) {
    if (err instanceof MalformedNotificationError) return err;
    throw err;
  }
  throw new Error('expected decodeNotification to throw');
}

describe('decodeNotification', () => {
  it('decodes a base64 JSON budget notification', () => {
    const decoded = decodeNotification({
      data: base64Json({
        budgetDisplayName: 'p1',
        budgetAmount: 100,
        costAmount: 40.5,
        costIntervalStart: '2024-01-01T00:00:00Z',
      }),
    });
    expect(decoded).toEqual({
      budgetDisplayName: 'p1',
      budgetAmount: 100,
      costAmount: 40.5,
      costIntervalStart: '2024-01-01T00:00:00Z',
    });
  });

  it('keeps fields it does not read', () => {
    const decoded = decodeNotification({
      data: base64Json({
        ...notification('p1', 100, 40, '2024-01'),
        currencyCode: 'EUR',
        alertThresholdExceeded: 0.5,
      }),
    });
    expect(decoded['currencyCode']).toBe('EUR');
    expect(decoded['alertThresholdExceeded']).toBe(0.5);
  });

  it('ignores line breaks inside the base64 body', () => {
    const data = base64Json(notification('p1', 100, 40, '2024-01'));
    const wrapped = `${data.slice(0, 20)}\n${data.slice(20)}`;
    expect(decodeNotification({ data: wrapped }).costAmount).toBe(40);
  });

  it('rejects a body that is not base64', () => {
    expect(decodeFailure('%%% not base64 %%%').issues).toEqual(['data: not a base64 string']);
  });

  it('rejects an empty body', () => {
    expect(decodeFailure('').issues).toEqual(['data: not a base64 string']);
  });

  it('rejects a body that is not JSON', () => {
    const error = decodeFailure(Buffer.from('not json', 'utf-8').toString('base64'));
    expect(error.code).toBe('MALFORMED_NOTIFICATION');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^data: not valid JSON/);
  });

  it('names a missing costIntervalStart', () => {
    const error = decodeFailure(
      base64Json({ budgetDisplayName: 'p1', budgetAmount: 100, costAmount: 40 }),
    );
    expect(error.issues).toEqual(['costIntervalStart: Required']);
  });

  it('rejects a budget amount sent as a string', () => {
    const error = decodeFailure(
      base64Json({ ...notification('p1', 100, 40, '2024-01'), budgetAmount: '100' }),
    );
    expect(error.issues).toEqual(['budgetAmount: Expected number, received string']);
  });

  it('rejects an empty project id', () => {
    const error = decodeFailure(base64Json(notification('', 100, 40, '2024-01')));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^budgetDisplayName: /);
  });

  it('rejects a JSON value that is not an object', () => {
    expect(decodeFailure(base64Json([1, 2])).issues).toEqual([
      '(root): Expected object, received array',
    ]);
  });

  it('reads what encodeNotification writes', () => {
    const original = notification('p1', 100, 40, '2024-01');
    expect(decodeNotification(encodeNotification(original))).toEqual(original);
  });
});

describe('collectionName', () => {
  it('joins prefix and project id with a dash', () => {
    expect(collectionName('budget-notifications', 'my-project')).toBe(
      'budget-notifications-my-project',
    );
  });
});

describe('stampNotification', () => {
  it('adds addedAt as an ISO timestamp without changing the input', () => {
    const input = notification('p1', 100, 40, '2024-01');
    const record = stampNotification(input, new Date('2024-02-01T08:30:00.000Z'));
    expect(record.addedAt).toBe('2024-02-01T08:30:00.000Z');
    expect(record.costAmount).toBe(40);
    expect('addedAt' in input).toBe(false);
  });
});

describe('applyToLedger', () => {
  it('adds a new interval', () => {
    expect(applyToLedger({ '2024-01': 70 }, { costIntervalStart: '2024-02', costAmount: 30 })).toEqual({
      '2024-01': 70,
      '2024-02': 30,
    });
  });

  it('replaces the cost of a known interval instead of adding to it', () => {
    expect(applyToLedger({ '2024-01': 40 }, { costIntervalStart: '2024-01', costAmount: 70 })).toEqual({
      '2024-01': 70,
    });
  });

  it('does not mutate the given ledger', () => {
    const ledger = { '2024-01': 40 };
    applyToLedger(ledger, { costIntervalStart: '2024-01', costAmount: 70 });
    expect(ledger).toEqual({ '2024-01': 40 });
  });
});

describe('ledgerTotal', () => {
  it('is 0 for an empty ledger', () => {
    expect(ledgerTotal({})).toBe(0);
  });

  it('sums every interval', () => {
    expect(ledgerTotal({ '2024-01': 70, '2024-02': 30, '2024-03': 12.5 })).toBe(112.5);
  });
});
