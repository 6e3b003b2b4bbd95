/**
 * Stablecoin Engine - Event Log
 *
 * Append-only record for indexers and auditors; the engine never reads it
 * back. Entries are frozen once logged. Entries from a rolled-back call
 * vanish with the rollback, and listeners only hear about committed entries.
 */

import { normalizeAddress } from "./address";
import { StateJournal } from "./journal";
import { moduleLogger } from "./logger";

const log = moduleLogger("events");

export interface CollateralDepositedEvent {
  name: "CollateralDeposited";
  user: string;
  token: string;
  amount: bigint;
}

export interface CollateralRedeemedEvent {
  name: "CollateralRedeemed";
  redeemedFrom: string;
  redeemedTo: string;
  token: string;
  amount: bigint;
}

export type EngineEvent = CollateralDepositedEvent | CollateralRedeemedEvent;
export type EngineEventName = EngineEvent["name"];

export type LoggedEvent<E extends EngineEvent = EngineEvent> = Readonly<E & { sequence: number }>;

type EventOfName<N extends EngineEventName> = Extract<EngineEvent, { name: N }>;
type Listener<N extends EngineEventName> = (event: LoggedEvent<EventOfName<N>>) => void;

export interface EventFilter {
  name?: EngineEventName;
  /** Matches any account field of the event */
  account?: string;
}

function hasName<N extends EngineEventName>(
  event: LoggedEvent,
  name: N,
): event is LoggedEvent<EventOfName<N>> {
  return event.name === name;
}

function involves(event: EngineEvent, account: string): boolean {
  switch (event.name) {
    case "CollateralDeposited":
      return event.user === account;
    case "CollateralRedeemed":
      return event.redeemedFrom === account || event.redeemedTo === account;
  }
}

export class EventLog {
  private readonly entries: LoggedEvent[] = [];
  private readonly listeners = new Map<EngineEventName, Set<(event: LoggedEvent) => void>>();

  constructor(private readonly journal: StateJournal) {}

  emit(event: EngineEvent): void {
    const sequence = this.entries.length;
    const entry: LoggedEvent = Object.freeze({ ...event, sequence });
    this.entries.push(entry);
    this.journal.recordUndo(() => {
      this.entries.length = sequence;
    });
    log.debug(`${event.name} #${entry.sequence}`);
    this.journal.onCommit(() => this.dispatch(entry));
  }

  query(filter: EventFilter = {}): LoggedEvent[] {
    const account = filter.account === undefined ? undefined : normalizeAddress(filter.account, "account");
    return this.entries.filter(
      (entry) =>
        (filter.name === undefined || entry.name === filter.name) &&
        (account === undefined || involves(entry, account)),
    );
  }

  /** Subscribe to committed events; returns an unsubscribe function */
  on<N extends EngineEventName>(name: N, listener: Listener<N>): () => void {
    const wrapped = (event: LoggedEvent) => {
      if (hasName(event, name)) listener(event);
    };
    let set = this.listeners.get(name);
    if (!set) {
      set = new Set();
      this.listeners.set(name, set);
    }
    set.add(wrapped);
    return () => {
      set?.delete(wrapped);
    };
  }

  get length(): number {
    return this.entries.length;
  }

  private dispatch(entry: LoggedEvent): void {
    for (const listener of this.listeners.get(entry.name) ?? []) {
      try {
        listener(entry);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        log.error(`Listener for ${entry.name} failed: ${msg}`);
      }
    }
  }
}
