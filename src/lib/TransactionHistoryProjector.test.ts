import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TransactionHistoryProjector } from './TransactionHistoryProjector.js';
import { BankAccount } from '../domain/BankAccount.js';
import { ValidationError } from '../domain/errors.js';
import config from '../config/env.js';

const T1 = new Date('2024-07-01T09:00:00.000Z');
const T2 = new Date('2024-07-02T09:00:00.000Z');
const T3 = new Date('2024-07-03T09:00:00.000Z');

function history(): BankAccount {
  vi.setSystemTime(new Date('2024-07-01T08:00:00.000Z'));
  const account = BankAccount.create('acc-1', 'Ada', 1000);
  vi.setSystemTime(T1);
  account.deposit(500, 'Salary');
  vi.setSystemTime(T2);
  account.withdraw(300, 'Rent');
  vi.setSystemTime(T3);
  account.deposit(20, '');
  return account;
}

describe('TransactionHistoryProjector', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('lists deposits and withdrawals newest first, one page at a time', () => {
    const account = history();
    const events = account.getUncommittedChanges();
    const projector = new TransactionHistoryProjector();
    projector.rebuild(events);

    const first = projector.getPage('acc-1', 1, 2);
    expect(first).toMatchObject({ currentPage: 1, pageSize: 2, totalPages: 2, totalCount: 3 });
    expect(first.items).toEqual([
      {
        transactionId: events[3]?.eventId,
        accountId: 'acc-1',
        type: 'DEPOSIT',
        amount: '20',
        description: 'Deposit',
        timestamp: T3,
        version: 4,
      },
      {
        transactionId: events[2]?.eventId,
        accountId: 'acc-1',
        type: 'WITHDRAWAL',
        amount: '300',
        description: 'Rent',
        timestamp: T2,
        version: 3,
      },
    ]);

    const second = projector.getPage('acc-1', 2, 2);
    expect(second.items.map((item) => [item.type, item.amount, item.description])).toEqual([
      ['DEPOSIT', '500', 'Salary'],
    ]);
  });

  it('uses the configured page size by default', () => {
    const projector = new TransactionHistoryProjector();
    projector.rebuild(history().getUncommittedChanges());

    expect(projector.getPage('acc-1').pageSize).toBe(config.transactionPageSize);
  });

  it('returns an empty page for an account without transactions', () => {
    const projector = new TransactionHistoryProjector();
    expect(projector.getPage('nobody')).toEqual({
      currentPage: 1,
      pageSize: config.transactionPageSize,
      totalPages: 0,
      totalCount: 0,
      items: [],
    });
  });

  it.each([
    [0, 10],
    [1.5, 10],
    [1, 0],
    [1, -2],
  ])('rejects page %s with size %s', (page, pageSize) => {
    const projector = new TransactionHistoryProjector();
    expect(() => projector.getPage('acc-1', page, pageSize)).toThrow(ValidationError);
  });

  it('records each event once', () => {
    const events = history().getUncommittedChanges();
    const projector = new TransactionHistoryProjector();

    for (const event of [...events, ...events]) {
      projector.project(event);
    }

    expect(projector.getPage('acc-1').totalCount).toBe(3);
    expect(projector.processedCount()).toBe(3);
  });

  it('starts from scratch on every rebuild', () => {
    const projector = new TransactionHistoryProjector();
    projector.rebuild(history().getUncommittedChanges());

    projector.rebuild([]);

    expect(projector.getPage('acc-1').totalCount).toBe(0);
    expect(projector.processedCount()).toBe(0);
  });
});
