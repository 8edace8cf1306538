import type { Decimal } from 'decimal.js';
import config from '../config/env.js';
import { BankAccount } from '../domain/BankAccount.js';
import { InvalidStateError, NotFoundError } from '../domain/errors.js';
import { BankAccountRepository } from '../lib/BankAccountRepository.js';
import type { EventStore } from '../lib/EventStore.js';
import { AccountSummaryProjector } from '../lib/Projector.js';
import { TransactionHistoryProjector } from '../lib/TransactionHistoryProjector.js';
import {
  EventType,
  type AccountSummary,
  type DomainEvent,
  type Page,
  type TransactionRecord,
} from '../types.js';

export interface OpenAccountInput {
  accountId: string;
  holderName: string;
  initialBalance: Decimal.Value;
  currency?: string;
}

export interface BalanceAt {
  accountId: string;
  /** Decimal string. */
  balanceAt: string;
  timestamp: Date;
}

export interface ProjectionProgress {
  name: string;
  processedEvents: number;
  lag: number;
}

export interface ProjectionStatus {
  totalEventsInStore: number;
  projections: ProjectionProgress[];
}

export interface AccountServiceDeps {
  repository?: BankAccountRepository;
  summaries?: AccountSummaryProjector;
  history?: TransactionHistoryProjector;
}

/**
 * Command and query entry point. Commands load, run, save, then feed the
 * committed events to both read models. A ConcurrencyConflict from save
 * reaches the caller as is.
 */
export class AccountService {
  private readonly repository: BankAccountRepository;
  private readonly summaries: AccountSummaryProjector;
  private readonly history: TransactionHistoryProjector;

  constructor(private readonly eventStore: EventStore, deps: AccountServiceDeps = {}) {
    this.repository = deps.repository ?? new BankAccountRepository(eventStore);
    this.summaries = deps.summaries ?? new AccountSummaryProjector();
    this.history = deps.history ?? new TransactionHistoryProjector();
  }

  // --- Commands ---

  async openAccount(input: OpenAccountInput): Promise<BankAccount> {
    const existing = await this.repository.load(input.accountId);
    if (existing) {
      throw new InvalidStateError('Account already exists', { accountId: input.accountId });
    }

    const account = BankAccount.create(
      input.accountId,
      input.holderName,
      input.initialBalance,
      input.currency ?? config.defaultCurrency,
    );
    await this.commit(account);
    return account;
  }

  async deposit(accountId: string, amount: Decimal.Value, description: string): Promise<BankAccount> {
    const account = await this.loadExisting(accountId);
    account.deposit(amount, description);
    await this.commit(account);
    return account;
  }

  async withdraw(accountId: string, amount: Decimal.Value, description: string): Promise<BankAccount> {
    const account = await this.loadExisting(accountId);
    account.withdraw(amount, description);
    await this.commit(account);
    return account;
  }

  async closeAccount(accountId: string, reason: string): Promise<BankAccount> {
    const account = await this.loadExisting(accountId);
    account.close(reason);
    await this.commit(account);
    return account;
  }

  // --- Queries ---

  getAccount(accountId: string): AccountSummary | undefined {
    return this.summaries.get(accountId);
  }

  listAccounts(): AccountSummary[] {
    return this.summaries.getAll();
  }

  getEvents(accountId: string): Promise<DomainEvent[]> {
    return this.eventStore.readStream(accountId);
  }

  getTransactions(accountId: string, page?: number, pageSize?: number): Page<TransactionRecord> {
    return this.history.getPage(accountId, page, pageSize);
  }

  async getBalanceAt(accountId: string, at: Date): Promise<BalanceAt> {
    const account = await this.repository.loadAsOf(accountId, at);
    if (!account) {
      throw new NotFoundError('No history found for this account at given time', { accountId, at });
    }
    return { accountId, balanceAt: account.getBalance().toFixed(), timestamp: at };
  }

  // --- Maintenance ---

  async rebuildProjections(): Promise<void> {
    const events = await this.eventStore.readAll();
    this.summaries.rebuild(events);
    this.history.rebuild(events);
  }

  async getProjectionStatus(): Promise<ProjectionStatus> {
    const events = await this.eventStore.readAll();
    const transactionEvents = events.filter(
      (e) => e.eventType === EventType.MoneyDeposited || e.eventType === EventType.MoneyWithdrawn,
    ).length;
    const summaryCount = this.summaries.processedCount();
    const historyCount = this.history.processedCount();

    return {
      totalEventsInStore: events.length,
      projections: [
        { name: 'AccountSummaries', processedEvents: summaryCount, lag: events.length - summaryCount },
        { name: 'TransactionHistory', processedEvents: historyCount, lag: transactionEvents - historyCount },
      ],
    };
  }

  private async loadExisting(accountId: string): Promise<BankAccount> {
    const account = await this.repository.load(accountId);
    if (!account) {
      throw new NotFoundError('Account not found', { accountId });
    }
    return account;
  }

  private async commit(account: BankAccount): Promise<void> {
    const committed = await this.repository.save(account);
    for (const event of committed) {
      this.summaries.project(event);
      this.history.project(event);
    }
  }
}
