import config from '../config/env.js';
import { ValidationError } from '../domain/errors.js';
import {
  EventType,
  orderForReplay,
  type DomainEvent,
  type MoneyDepositedEvent,
  type MoneyWithdrawnEvent,
  type Page,
  type TransactionRecord,
  type TransactionType,
} from '../types.js';

export class TransactionHistoryProjector {
  private byAccount = new Map<string, TransactionRecord[]>();
  private seen = new Set<string>();

  rebuild(events: readonly DomainEvent[]): void {
    this.byAccount.clear();
    this.seen.clear();
    for (const event of orderForReplay(events)) {
      this.project(event);
    }
  }

  project(event: DomainEvent): void {
    switch (event.eventType) {
      case EventType.MoneyDeposited:
        this.addTransaction(event, 'DEPOSIT');
        break;
      case EventType.MoneyWithdrawn:
        this.addTransaction(event, 'WITHDRAWAL');
        break;
      default:
        break;
    }
  }

  /** Newest first. */
  getPage(accountId: string, page: number = 1, pageSize: number = config.transactionPageSize): Page<TransactionRecord> {
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('Page must be a positive integer', { page });
    }
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new ValidationError('Page size must be a positive integer', { pageSize });
    }

    const records = this.byAccount.get(accountId) ?? [];
    const newestFirst = [...records].sort(
      (a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.version - a.version,
    );
    const offset = (page - 1) * pageSize;

    return {
      currentPage: page,
      pageSize,
      totalPages: Math.ceil(records.length / pageSize),
      totalCount: records.length,
      items: newestFirst.slice(offset, offset + pageSize).map((record) => ({ ...record })),
    };
  }

  /** Transactions recorded since the last rebuild. */
  processedCount(): number {
    return this.seen.size;
  }

  private addTransaction(event: MoneyDepositedEvent | MoneyWithdrawnEvent, type: TransactionType): void {
    if (this.seen.has(event.eventId)) return;
    this.seen.add(event.eventId);

    const records = this.byAccount.get(event.aggregateId) ?? [];
    records.push({
      transactionId: event.eventId,
      accountId: event.aggregateId,
      type,
      amount: event.eventData.amount,
      description: event.eventData.description || (type === 'DEPOSIT' ? 'Deposit' : 'Withdrawal'),
      timestamp: event.timestamp,
      version: event.version,
    });
    this.byAccount.set(event.aggregateId, records);
  }
}
