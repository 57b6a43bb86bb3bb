import type { Logger } from "./logging.js";
import { createConsoleLogger } from "./logging.js";
import type { TriggerRejectionReason } from "./errors.js";

export type TokenCategory =
  | "role"
  | "filter"
  | "age_group"
  | "person_set"
  | "predicate"
  | "relation"
  | "selection"
  | "environment"
  | "tone"
  | "domain"
  | "trigger_kind";

/** Logged, never thrown. `origin` is the event or trigger id that referenced the token. */
export interface UnknownTokenWarning {
  type: "unknown_token";
  category: TokenCategory;
  token: string;
  origin: string;
}

export interface CycleRecord {
  type: "cycle";
  eventId: string;
  date: string | null;
  status: "completed" | "unavailable" | "no_interaction" | "rejected";
  participants: string[];
  interaction: string | null;
  tier: string | null;
  effects: number;
  triggers: string[];
}

export interface TriggerAcceptedRecord {
  type: "trigger_accepted";
  kind: string;
  source: string;
  subjects: string[];
}

export interface TriggerRejectedRecord {
  type: "trigger_rejected";
  kind: string;
  source: string;
  reason: TriggerRejectionReason;
  message: string;
}

export interface DayAdvancedRecord {
  type: "day_advanced";
  expiredFlags: number;
}

export type EventLogRecord =
  | UnknownTokenWarning
  | CycleRecord
  | TriggerAcceptedRecord
  | TriggerRejectedRecord
  | DayAdvancedRecord;

export interface EventLogEntry {
  seq: number;
  record: EventLogRecord;
}

export type EventLogObserver = (entry: EventLogEntry) => void;

export interface EventLog {
  append(record: EventLogRecord): EventLogEntry;
  entries(): readonly EventLogEntry[];
  subscribe(observer: EventLogObserver): () => void;
}

export interface MemoryEventLogOptions {
  /** Most entries kept in memory; older ones are dropped. Observers still see every entry. */
  capacity?: number;
}

export class MemoryEventLog implements EventLog {
  private log: EventLogEntry[] = [];
  private observers = new Set<EventLogObserver>();
  private seq = 0;
  private readonly logger: Logger;
  private readonly capacity: number;

  constructor(logger: Logger = createConsoleLogger("event-log"), options: MemoryEventLogOptions = {}) {
    this.logger = logger;
    const capacity = options.capacity ?? Number.POSITIVE_INFINITY;
    if (!(capacity >= 0)) throw new RangeError(`event log capacity must be non-negative, got ${capacity}`);
    this.capacity = capacity;
  }

  append(record: EventLogRecord): EventLogEntry {
    this.seq += 1;
    const entry: EventLogEntry = { seq: this.seq, record };
    if (this.capacity > 0) {
      this.log.push(entry);
      if (this.log.length > this.capacity) this.log.splice(0, this.log.length - this.capacity);
    }
    for (const observer of this.observers) {
      try {
        observer(entry);
      } catch (err) {
        // observer failures are logged; the producing operation continues
        this.logger.error("observer failed", { seq: entry.seq, error: String(err) });
      }
    }
    return entry;
  }

  entries(): readonly EventLogEntry[] {
    return this.log;
  }

  subscribe(observer: EventLogObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  ofType<T extends EventLogRecord["type"]>(type: T): Extract<EventLogRecord, { type: T }>[] {
    const out: Extract<EventLogRecord, { type: T }>[] = [];
    for (const { record } of this.log) {
      if (isRecordOfType(record, type)) out.push(record);
    }
    return out;
  }
}

function isRecordOfType<T extends EventLogRecord["type"]>(
  record: EventLogRecord,
  type: T,
): record is Extract<EventLogRecord, { type: T }> {
  return record.type === type;
}

/**
 * Collects unknown-token warnings for a single operation. Each distinct
 * (category, token) pair is reported once per operation.
 */
export class TokenReporter {
  private seen = new Set<string>();
  private collected: UnknownTokenWarning[] = [];

  constructor(
    readonly origin: string,
    private readonly sink: (warning: UnknownTokenWarning) => void = () => {},
  ) {}

  unknown(category: TokenCategory, token: string): void {
    const key = `${category}:${token}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    const warning: UnknownTokenWarning = { type: "unknown_token", category, token, origin: this.origin };
    this.collected.push(warning);
    this.sink(warning);
  }

  get warnings(): readonly UnknownTokenWarning[] {
    return this.collected;
  }
}

export function reportTo(log: EventLog, logger: Logger): (warning: UnknownTokenWarning) => void {
  return (warning) => {
    logger.warn(`unknown ${warning.category} '${warning.token}'`, { origin: warning.origin });
    log.append(warning);
  };
}
