import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
  /** Print stored/replayed events to the console. */
  logEvents: boolean;
  defaultCurrency: string;
  transactionPageSize: number;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    logEvents: env.EVENT_LOG === 'true',
    defaultCurrency: env.DEFAULT_CURRENCY || 'USD',
    transactionPageSize: parsePositiveInt(env.TRANSACTION_PAGE_SIZE, 10),
  };
}

const config = loadConfig();

export default config;
