import config from '../config/env.js';
import { BankAccount } from '../domain/BankAccount.js';
import type { DomainEvent } from '../types.js';
import type { EventStore } from './EventStore.js';

export interface RepositoryOptions {
  logEvents?: boolean;
}

/**
 * Loads accounts by replaying their streams and saves the events they
 * produced since the last save.
 */
export class BankAccountRepository {
  private readonly logEvents: boolean;

  constructor(private readonly eventStore: EventStore, options: RepositoryOptions = {}) {
    this.logEvents = options.logEvents ?? config.logEvents;
  }

  /** Resolves to `undefined` when the account has no events. */
  async load(accountId: string): Promise<BankAccount | undefined> {
    const events = await this.eventStore.readStream(accountId);
    if (events.length === 0) {
      return undefined;
    }
    return this.replay(accountId, events);
  }

  /** State of the account as it stood at `asOf`, from the events recorded up to that instant. */
  async loadAsOf(accountId: string, asOf: Date): Promise<BankAccount | undefined> {
    const events = await this.eventStore.readStream(accountId);
    const relevantEvents = events.filter((e) => e.timestamp.getTime() <= asOf.getTime());
    if (relevantEvents.length === 0) {
      return undefined;
    }
    return this.replay(accountId, relevantEvents);
  }

  /**
   * Appends the account's uncommitted events and returns them.
   * A ConcurrencyConflict leaves the account untouched; reload and retry.
   */
  async save(account: BankAccount): Promise<DomainEvent[]> {
    const uncommitted = account.getUncommittedChanges();
    if (uncommitted.length === 0) {
      return [];
    }

    // Version the stream was at before these events were applied.
    const expectedVersion = account.getVersion() - uncommitted.length;
    await this.eventStore.append(account.getId(), uncommitted, expectedVersion);
    account.markChangesAsCommitted();
    return uncommitted;
  }

  private replay(accountId: string, events: readonly DomainEvent[]): BankAccount {
    if (this.logEvents) {
      console.log(`[REPLAYING] Loading account ${accountId} from ${events.length} events`);
    }
    const account = BankAccount.hydrate(events);
    if (this.logEvents) {
      console.log(`[REPLAYED] Account restored - Balance: ${account.getBalance().toFixed()}, Version: ${account.getVersion()}`);
    }
    return account;
  }
}
