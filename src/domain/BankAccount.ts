import {
  AGGREGATE_TYPE,
  EventType,
  type AccountClosedEvent,
  type AccountCreatedEvent,
  type BankAccountState,
  type DomainEvent,
  type MoneyDepositedEvent,
  type MoneyWithdrawnEvent,
} from '../types.js';
import { InsufficientFundsError, InvalidStateError, ValidationError } from './errors.js';
import { Decimal } from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';

type EventEnvelope = Omit<AccountCreatedEvent, 'eventType' | 'eventData'>;

const CURRENCY_CODE = /^[A-Z]{3}$/;

function freezeEvent<E extends DomainEvent>(event: E): E {
  Object.freeze(event.eventData);
  Object.freeze(event);
  return event;
}

function toDecimal(value: Decimal.Value, field: string): Decimal {
  try {
    return new Decimal(value);
  } catch (error) {
    throw new ValidationError(`${field} is not a number`, { [field]: String(value), cause: error });
  }
}

function toPositiveAmount(value: Decimal.Value, label: string): Decimal {
  const amount = toDecimal(value, 'amount');
  if (!amount.isFinite() || !amount.gt(0)) {
    throw new ValidationError(`${label} amount must be positive`, { amount: amount.toString() });
  }
  return amount;
}

export class BankAccount {
  private _state: BankAccountState;
  private changes: DomainEvent[] = [];
  private version: number = 0;

  private constructor() {
    this._state = {
      accountId: '',
      holderName: '',
      balance: new Decimal(0),
      currency: '',
      status: 'OPEN',
    };
  }

  // --- Factory Method ---
  static create(id: string, holderName: string, initialBalance: Decimal.Value, currency: string = 'USD'): BankAccount {
    if (!id || !id.trim()) throw new ValidationError('Account id is required');
    if (!holderName || !holderName.trim()) throw new ValidationError('Account holder name is required');
    const opening = toDecimal(initialBalance, 'initialBalance');
    if (!opening.isFinite() || opening.lt(0)) {
      throw new ValidationError('Initial balance cannot be negative', { initialBalance: opening.toString() });
    }
    if (!CURRENCY_CODE.test(currency)) {
      throw new ValidationError('Currency must be a three-letter ISO code', { currency });
    }

    const account = new BankAccount();
    const event: AccountCreatedEvent = {
      ...account.envelope(id, 1),
      eventType: EventType.AccountCreated,
      eventData: { holderName, initialBalance: opening.toFixed(), currency },
    };
    account.record(event);
    return account;
  }

  // --- Command Handlers ---
  deposit(value: Decimal.Value, description: string): void {
    if (this._state.status === 'CLOSED') {
      throw new InvalidStateError('Cannot deposit into a closed account', { accountId: this._state.accountId });
    }
    const amount = toPositiveAmount(value, 'Deposit');

    const event: MoneyDepositedEvent = {
      ...this.envelope(this._state.accountId, this.version + 1),
      eventType: EventType.MoneyDeposited,
      eventData: { amount: amount.toFixed(), description },
    };
    this.record(event);
  }

  withdraw(value: Decimal.Value, description: string): void {
    if (this._state.status === 'CLOSED') {
      throw new InvalidStateError('Cannot withdraw from a closed account', { accountId: this._state.accountId });
    }
    const amount = toPositiveAmount(value, 'Withdrawal');
    if (this._state.balance.lt(amount)) {
      throw new InsufficientFundsError(this._state.balance.toFixed(), amount.toFixed(), {
        accountId: this._state.accountId,
      });
    }

    const event: MoneyWithdrawnEvent = {
      ...this.envelope(this._state.accountId, this.version + 1),
      eventType: EventType.MoneyWithdrawn,
      eventData: { amount: amount.toFixed(), description },
    };
    this.record(event);
  }

  close(reason: string): void {
    if (this._state.status === 'CLOSED') {
      throw new InvalidStateError('Account is already closed', { accountId: this._state.accountId });
    }
    if (!this._state.balance.isZero()) {
      throw new InvalidStateError('Cannot close account with non-zero balance', {
        accountId: this._state.accountId,
        balance: this._state.balance.toFixed(),
      });
    }

    const event: AccountClosedEvent = {
      ...this.envelope(this._state.accountId, this.version + 1),
      eventType: EventType.AccountClosed,
      eventData: { reason },
    };
    this.record(event);
  }

  private envelope(aggregateId: string, version: number): EventEnvelope {
    return {
      eventId: uuidv4(),
      aggregateId,
      aggregateType: AGGREGATE_TYPE,
      version,
      timestamp: new Date(),
    };
  }

  private record(event: DomainEvent): void {
    const frozen = freezeEvent(event);
    this.apply(frozen);
    this.changes.push(frozen);
  }

  // --- Event Applier ---
  // Only place where state changes, for live commands and replay alike.
  private apply(event: DomainEvent): void {
    switch (event.eventType) {
      case EventType.AccountCreated:
        this._state.accountId = event.aggregateId;
        this._state.holderName = event.eventData.holderName;
        this._state.balance = new Decimal(event.eventData.initialBalance);
        this._state.currency = event.eventData.currency;
        this._state.status = 'OPEN';
        break;
      case EventType.MoneyDeposited:
        this._state.balance = this._state.balance.plus(event.eventData.amount);
        break;
      case EventType.MoneyWithdrawn:
        this._state.balance = this._state.balance.minus(event.eventData.amount);
        break;
      case EventType.AccountClosed:
        this._state.status = 'CLOSED';
        break;
      default:
        // Kinds written by a newer schema carry no state for this version.
        break;
    }
    this.version = event.version;
  }

  // --- Hydration ---
  // Replay trusts the log: no business rule is re-checked here.
  static hydrate(events: readonly DomainEvent[]): BankAccount {
    const account = new BankAccount();
    const ordered = [...events].sort((a, b) => a.version - b.version);
    for (const event of ordered) {
      account.apply(event);
    }
    return account;
  }

  get state(): Readonly<BankAccountState> {
    return { ...this._state };
  }

  public getUncommittedChanges(): DomainEvent[] {
    return [...this.changes];
  }

  public markChangesAsCommitted(): void {
    this.changes = [];
  }

  public getVersion(): number {
    return this.version;
  }

  public getId(): string {
    return this._state.accountId;
  }

  public getBalance(): Decimal {
    return this._state.balance;
  }

  public isClosed(): boolean {
    return this._state.status === 'CLOSED';
  }
}
