export * from './types.js';
export * from './domain/errors.js';
export { BankAccount } from './domain/BankAccount.js';
export { InMemoryEventStore } from './lib/EventStore.js';
export type { EventStore, EventStoreOptions } from './lib/EventStore.js';
export { Mutex } from './lib/Mutex.js';
export { BankAccountRepository } from './lib/BankAccountRepository.js';
export type { RepositoryOptions } from './lib/BankAccountRepository.js';
export { AccountSummaryProjector } from './lib/Projector.js';
export { TransactionHistoryProjector } from './lib/TransactionHistoryProjector.js';
export { AccountService } from './services/AccountService.js';
export type {
  AccountServiceDeps,
  BalanceAt,
  OpenAccountInput,
  ProjectionProgress,
  ProjectionStatus,
} from './services/AccountService.js';
export { default as config, loadConfig } from './config/env.js';
export type { AppConfig } from './config/env.js';
