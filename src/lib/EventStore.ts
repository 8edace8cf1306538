import config from '../config/env.js';
import { ConcurrencyConflict, InvariantViolation } from '../domain/errors.js';
import { compareGlobalOrder, type DomainEvent } from '../types.js';
import { Mutex } from './Mutex.js';

/** Append-only, per-stream event storage with optimistic concurrency. */
export interface EventStore {
  append(streamId: string, events: readonly DomainEvent[], expectedVersion: number): Promise<void>;
  readStream(streamId: string, fromVersion?: number): Promise<DomainEvent[]>;
  readAll(): Promise<DomainEvent[]>;
  getCurrentVersion(streamId: string): Promise<number>;
  countEvents(): Promise<number>;
}

export interface EventStoreOptions {
  logEvents?: boolean;
}

interface StoredEvent {
  event: DomainEvent;
  /** Append order across all streams, starting at 1. */
  position: number;
}

// Events enter and leave the store as frozen copies, each with its own Date.
function detach<E extends DomainEvent>(event: E): E {
  const copy = { ...event, timestamp: new Date(event.timestamp.getTime()) };
  Object.freeze(copy);
  return copy;
}

export class InMemoryEventStore implements EventStore {
  private readonly streams = new Map<string, StoredEvent[]>();
  private readonly mutex = new Mutex();
  private readonly logEvents: boolean;
  private lastPosition = 0;

  constructor(options: EventStoreOptions = {}) {
    this.logEvents = options.logEvents ?? config.logEvents;
  }

  append(streamId: string, events: readonly DomainEvent[], expectedVersion: number): Promise<void> {
    return this.mutex.runExclusive(() => {
      const stream = this.streams.get(streamId) ?? [];
      const currentVersion = this.versionOf(stream);
      if (currentVersion !== expectedVersion) {
        throw new ConcurrencyConflict(streamId, expectedVersion, currentVersion);
      }

      events.forEach((event, index) => {
        const wantedVersion = expectedVersion + index + 1;
        if (event.aggregateId !== streamId) {
          throw new InvariantViolation(`Event ${event.eventId} belongs to stream ${event.aggregateId}, not ${streamId}`, {
            streamId,
            eventId: event.eventId,
            aggregateId: event.aggregateId,
          });
        }
        if (event.version !== wantedVersion) {
          throw new InvariantViolation(`Non-contiguous version on stream ${streamId}: expected ${wantedVersion}, got ${event.version}`, {
            streamId,
            eventId: event.eventId,
            expectedVersion: wantedVersion,
            actualVersion: event.version,
          });
        }
      });

      if (events.length === 0) return;

      const stored = events.map((event) => ({ event: detach(event), position: ++this.lastPosition }));
      this.streams.set(streamId, stream.concat(stored));

      if (this.logEvents) {
        for (const event of events) {
          console.log(`[EVENT STORED] ${event.eventType} v${event.version} for aggregate ${streamId}`);
        }
      }
    });
  }

  readStream(streamId: string, fromVersion: number = 0): Promise<DomainEvent[]> {
    return this.mutex.runExclusive(() => {
      const stream = this.streams.get(streamId) ?? [];
      return stream
        .filter((stored) => stored.event.version > fromVersion)
        .sort((a, b) => a.event.version - b.event.version)
        .map((stored) => detach(stored.event));
    });
  }

  readAll(): Promise<DomainEvent[]> {
    return this.mutex.runExclusive(() => {
      const all: StoredEvent[] = [];
      for (const stream of this.streams.values()) {
        all.push(...stream);
      }
      // Wall-clock order, then the append position so equal keys across streams stay deterministic.
      all.sort((a, b) => compareGlobalOrder(a.event, b.event) || a.position - b.position);
      return all.map((stored) => detach(stored.event));
    });
  }

  getCurrentVersion(streamId: string): Promise<number> {
    return this.mutex.runExclusive(() => this.versionOf(this.streams.get(streamId) ?? []));
  }

  countEvents(): Promise<number> {
    return this.mutex.runExclusive(() => this.lastPosition);
  }

  /** Reset for tests. Not on EventStore interface. */
  clear(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.streams.clear();
      this.lastPosition = 0;
    });
  }

  private versionOf(stream: readonly StoredEvent[]): number {
    const last = stream[stream.length - 1];
    return last ? last.event.version : 0;
  }
}
