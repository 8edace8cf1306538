import { Decimal } from 'decimal.js';
import {
  EventType,
  orderForReplay,
  type AccountClosedEvent,
  type AccountCreatedEvent,
  type AccountSummary,
  type DomainEvent,
  type MoneyDepositedEvent,
  type MoneyWithdrawnEvent,
} from '../types.js';

/**
 * Account summaries folded from the global event stream. A cache only:
 * never consulted for concurrency checks.
 */
export class AccountSummaryProjector {
  private summaries = new Map<string, AccountSummary>();
  private examined = new Set<string>();

  /** Drops the current read model and folds `events` from scratch. */
  rebuild(events: readonly DomainEvent[]): void {
    this.summaries.clear();
    this.examined.clear();

    for (const event of orderForReplay(events)) {
      this.project(event);
    }
  }

  project(event: DomainEvent): void {
    this.examined.add(event.eventId);
    const summary = this.summaries.get(event.aggregateId);

    // Idempotency check: only process if event version > current projection version
    if (summary && event.version <= summary.version) {
      return;
    }

    switch (event.eventType) {
      case EventType.AccountCreated:
        if (!summary) {
          this.projectAccountCreated(event);
        }
        break;
      case EventType.MoneyDeposited:
        if (summary) {
          this.projectMoneyDeposited(summary, event);
        }
        break;
      case EventType.MoneyWithdrawn:
        if (summary) {
          this.projectMoneyWithdrawn(summary, event);
        }
        break;
      case EventType.AccountClosed:
        if (summary) {
          this.projectAccountClosed(summary, event);
        }
        break;
      default:
        break;
    }
  }

  get(accountId: string): AccountSummary | undefined {
    const summary = this.summaries.get(accountId);
    return summary ? { ...summary } : undefined;
  }

  getAll(): AccountSummary[] {
    return Array.from(this.summaries.values(), (summary) => ({ ...summary }));
  }

  /** Distinct events seen since the last rebuild, folded or skipped. */
  processedCount(): number {
    return this.examined.size;
  }

  private projectAccountCreated(event: AccountCreatedEvent): void {
    this.summaries.set(event.aggregateId, {
      accountId: event.aggregateId,
      holderName: event.eventData.holderName,
      currency: event.eventData.currency,
      balance: new Decimal(event.eventData.initialBalance).toFixed(),
      status: 'OPEN',
      transactionCount: 0,
      version: event.version,
      createdAt: event.timestamp,
      lastActivityAt: event.timestamp,
    });
  }

  private projectMoneyDeposited(summary: AccountSummary, event: MoneyDepositedEvent): void {
    summary.balance = new Decimal(summary.balance).plus(event.eventData.amount).toFixed();
    summary.transactionCount++;
    summary.version = event.version;
    summary.lastActivityAt = event.timestamp;
  }

  private projectMoneyWithdrawn(summary: AccountSummary, event: MoneyWithdrawnEvent): void {
    summary.balance = new Decimal(summary.balance).minus(event.eventData.amount).toFixed();
    summary.transactionCount++;
    summary.version = event.version;
    summary.lastActivityAt = event.timestamp;
  }

  private projectAccountClosed(summary: AccountSummary, event: AccountClosedEvent): void {
    summary.status = 'CLOSED';
    summary.closedAt = event.timestamp;
    summary.version = event.version;
    summary.lastActivityAt = event.timestamp;
  }
}
