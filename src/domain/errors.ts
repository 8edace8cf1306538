/**
 * Error taxonomy for accounts, the event store and the service layer.
 */

export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed command input: non-positive amount, empty name, bad currency. */
export class ValidationError extends DomainError {}

/** A command that the account's business rules reject. */
export class BusinessRuleError extends DomainError {}

/** The command does not fit the account's current state. */
export class InvalidStateError extends BusinessRuleError {}

/** Balance and requested amount are decimal strings. */
export class InsufficientFundsError extends BusinessRuleError {
  readonly balance: string;
  readonly requested: string;

  constructor(balance: string, requested: string, metadata?: ErrorMetadata) {
    super(`Insufficient funds. Balance: ${balance}, Requested: ${requested}`, {
      ...metadata,
      balance,
      requested,
    });
    this.balance = balance;
    this.requested = requested;
  }
}

/**
 * The stream moved on since the writer loaded it.
 * Recovery is up to the caller: reload, re-run the command, save again.
 */
export class ConcurrencyConflict extends DomainError {
  readonly streamId: string;
  readonly expectedVersion: number;
  readonly actualVersion: number;

  constructor(streamId: string, expectedVersion: number, actualVersion: number) {
    super(
      `Concurrency conflict on stream ${streamId}: expected version ${expectedVersion}, but current version is ${actualVersion}`,
      { streamId, expectedVersion, actualVersion },
    );
    this.streamId = streamId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/** Store-level assertion failure. Signals a programming error. */
export class InvariantViolation extends DomainError {}

export class NotFoundError extends DomainError {}
