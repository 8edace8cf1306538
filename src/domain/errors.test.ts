import { describe, expect, it } from 'vitest';
import {
  BusinessRuleError,
  ConcurrencyConflict,
  DomainError,
  InsufficientFundsError,
  InvalidStateError,
  ValidationError,
} from './errors.js';

describe('domain errors', () => {
  it('keeps the class name and the prototype chain', () => {
    const err = new ValidationError('Deposit amount must be positive', { amount: 0 });

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ValidationError');
    expect(err.metadata).toEqual({ amount: 0 });
  });

  it('treats insufficient funds as a business-rule violation', () => {
    const err = new InsufficientFundsError('1200', '10000', { accountId: 'acc-1' });

    expect(err).toBeInstanceOf(BusinessRuleError);
    expect(err).not.toBeInstanceOf(InvalidStateError);
    expect(err.message).toBe('Insufficient funds. Balance: 1200, Requested: 10000');
    expect(err.metadata).toEqual({ accountId: 'acc-1', balance: '1200', requested: '10000' });
  });

  it('reports both versions on a concurrency conflict', () => {
    const err = new ConcurrencyConflict('acc-1', 2, 3);

    expect(err.name).toBe('ConcurrencyConflict');
    expect(err.expectedVersion).toBe(2);
    expect(err.actualVersion).toBe(3);
    expect(err.message).toBe('Concurrency conflict on stream acc-1: expected version 2, but current version is 3');
  });
});
