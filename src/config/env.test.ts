import { describe, expect, it } from 'vitest';
import { loadConfig } from './env.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      logEvents: false,
      defaultCurrency: 'USD',
      transactionPageSize: 10,
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadConfig({ EVENT_LOG: 'true', DEFAULT_CURRENCY: 'EUR', TRANSACTION_PAGE_SIZE: '25' }),
    ).toEqual({
      logEvents: true,
      defaultCurrency: 'EUR',
      transactionPageSize: 25,
    });
  });

  it.each(['abc', '0', '-3'])('ignores page size %s', (raw) => {
    expect(loadConfig({ TRANSACTION_PAGE_SIZE: raw }).transactionPageSize).toBe(10);
  });
});
