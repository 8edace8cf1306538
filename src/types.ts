import type { Decimal } from 'decimal.js';

export enum EventType {
  AccountCreated = 'AccountCreated',
  MoneyDeposited = 'MoneyDeposited',
  MoneyWithdrawn = 'MoneyWithdrawn',
  AccountClosed = 'AccountClosed',
}

export const AGGREGATE_TYPE = 'BankAccount';

// Amounts travel in payloads as decimal strings in plain notation.
export interface AccountCreatedData {
  holderName: string;
  initialBalance: string;
  currency: string;
}

export interface MoneyDepositedData {
  amount: string;
  description: string;
}

export interface MoneyWithdrawnData {
  amount: string;
  description: string;
}

export interface AccountClosedData {
  reason: string;
}

interface EventEnvelope<T extends EventType, D> {
  readonly eventId: string;
  readonly aggregateId: string;
  readonly aggregateType: typeof AGGREGATE_TYPE;
  readonly eventType: T;
  readonly eventData: Readonly<D>;
  /** Version of the aggregate after this event is applied. */
  readonly version: number;
  readonly timestamp: Date;
}

export type AccountCreatedEvent = EventEnvelope<EventType.AccountCreated, AccountCreatedData>;
export type MoneyDepositedEvent = EventEnvelope<EventType.MoneyDeposited, MoneyDepositedData>;
export type MoneyWithdrawnEvent = EventEnvelope<EventType.MoneyWithdrawn, MoneyWithdrawnData>;
export type AccountClosedEvent = EventEnvelope<EventType.AccountClosed, AccountClosedData>;

export type DomainEvent =
  | AccountCreatedEvent
  | MoneyDepositedEvent
  | MoneyWithdrawnEvent
  | AccountClosedEvent;

export type AccountStatus = 'OPEN' | 'CLOSED';

export interface BankAccountState {
  accountId: string;
  holderName: string;
  balance: Decimal;
  currency: string;
  status: AccountStatus;
}

export interface AccountSummary {
  accountId: string;
  holderName: string;
  currency: string;
  balance: string;
  status: AccountStatus;
  /** Deposits plus withdrawals. */
  transactionCount: number;
  version: number;
  createdAt: Date;
  closedAt?: Date;
  lastActivityAt: Date;
}

export type TransactionType = 'DEPOSIT' | 'WITHDRAWAL';

export interface TransactionRecord {
  transactionId: string;
  accountId: string;
  type: TransactionType;
  amount: string;
  description: string;
  timestamp: Date;
  version: number;
}

export interface Page<T> {
  currentPage: number;
  pageSize: number;
  totalPages: number;
  totalCount: number;
  items: T[];
}

// Approximate global order: wall-clock first, per-stream version on ties.
export function compareGlobalOrder(a: DomainEvent, b: DomainEvent): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.version - b.version;
}

/**
 * Global order for folding into read models. Streams interleave by
 * {@link compareGlobalOrder}, but each stream's events fill its slots in
 * version order, so a clock that stepped back never reorders a stream.
 */
export function orderForReplay(events: readonly DomainEvent[]): DomainEvent[] {
  const ordered = [...events].sort(compareGlobalOrder);
  const streams = new Map<string, DomainEvent[]>();
  for (const event of ordered) {
    const stream = streams.get(event.aggregateId) ?? [];
    stream.push(event);
    streams.set(event.aggregateId, stream);
  }
  for (const stream of streams.values()) {
    stream.sort((a, b) => a.version - b.version);
  }
  return ordered.map((slot) => streams.get(slot.aggregateId)?.shift() ?? slot);
}
