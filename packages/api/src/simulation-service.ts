import { MemoryEventLog, SimulationEngine, createConsoleLogger, dueOn, rosterOf } from "@muster/simulation";
import type {
  AvailabilityResult,
  CycleOptions,
  CycleResult,
  CycleRecord,
  EventLogEntry,
  Logger,
  RelationshipSummary,
  Roster,
  SimulationConfig,
  SubmitResult,
} from "@muster/simulation";
import type { IRosterRepository } from "@muster/roster";
import type { CycleQuery, ICycleStore, SnapshotInfo, StoredCycle } from "./cycle-store/types.js";
import { SqliteScheduleStore } from "./schedule-store/sqlite-schedule-store.js";
import type { IScheduleStore, ScheduledEvent, ScheduledEventInput } from "./schedule-store/types.js";

/** Source name the API uses when it submits triggers on a caller's behalf. */
export const HOST_SOURCE = "host";

export interface SimulationServiceOptions {
  config: SimulationConfig;
  startDate: string;
  seed?: string;
  logger?: Logger;
  /** Clock for `recordedAt` and snapshot timestamps. */
  now?: () => number;
  /** Scheduled events; an in-memory store owned by the service when left out. */
  schedule?: IScheduleStore;
  /** Event log entries kept in memory. Cycles are persisted to the cycle store regardless. */
  eventLogCapacity?: number;
}

export const DEFAULT_EVENT_LOG_CAPACITY = 1000;

export interface EventSummary {
  id: string;
  name: string;
  domain: string;
  weight: number;
  available: boolean;
  reasons: string[];
}

export interface ScheduledRun {
  scheduleId: number;
  eventId: string;
  date: string;
  status: CycleRecord["status"];
}

export interface AdvanceDayResult {
  date: string;
  expiredFlags: number;
  scheduled: ScheduledRun[];
}

export type CycleSettings = Omit<CycleOptions, "date">;

export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/**
 * Hosts one simulation engine over the roster repository. Calls are
 * queued so that each engine operation sees the roster and calendar as
 * they stood when it started; completed cycles land in the cycle store.
 */
export class SimulationService {
  private readonly engine: SimulationEngine;
  private readonly roster: IRosterRepository;
  private readonly store: ICycleStore;
  private readonly schedule: IScheduleStore;
  private readonly ownsSchedule: boolean;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly unsubscribe: () => void;
  private date: string;
  private tail: Promise<void> = Promise.resolve();

  constructor(roster: IRosterRepository, store: ICycleStore, options: SimulationServiceOptions) {
    this.roster = roster;
    this.store = store;
    this.logger = options.logger ?? createConsoleLogger("simulation-service");
    this.now = options.now ?? Date.now;
    this.date = options.startDate;
    this.schedule = options.schedule ?? new SqliteScheduleStore();
    this.ownsSchedule = options.schedule === undefined;
    this.engine = new SimulationEngine({
      config: options.config,
      seed: options.seed,
      logger: options.logger,
      eventLog: new MemoryEventLog(this.logger, {
        capacity: options.eventLogCapacity ?? DEFAULT_EVENT_LOG_CAPACITY,
      }),
    });

    this.unsubscribe = this.engine.eventLog.subscribe(({ record }) => {
      if (record.type !== "cycle") return;
      this.store.append([
        {
          recordedAt: this.now(),
          date: record.date,
          eventId: record.eventId,
          status: record.status,
          participants: record.participants,
          interaction: record.interaction,
          tier: record.tier,
          effects: record.effects,
          triggers: record.triggers,
        },
      ]);
    });
  }

  get currentDate(): string {
    return this.date;
  }

  hasEvent(eventId: string): boolean {
    return this.engine.catalog.kind(eventId).tag === "defined";
  }

  async listEvents(): Promise<EventSummary[]> {
    return this.exclusive(async () => {
      const roster = await this.loadRoster();
      return this.engine.catalog.ids().map((id) => {
        const event = this.engine.catalog.get(id);
        const availability = this.engine.checkAvailability(id, roster);
        return {
          id,
          name: event.name,
          domain: event.domain,
          weight: event.weight,
          available: availability.available,
          reasons: availability.reasons,
        };
      });
    });
  }

  async checkAvailability(eventId: string): Promise<AvailabilityResult> {
    return this.exclusive(async () => this.engine.checkAvailability(eventId, await this.loadRoster()));
  }

  async selectParticipants(eventId: string): Promise<string[]> {
    return this.exclusive(async () => this.engine.selectParticipants(eventId, await this.loadRoster(), this.date));
  }

  async eligibleCandidates(eventId: string): Promise<string[]> {
    return this.exclusive(async () => this.engine.getEligibleCandidates(eventId, await this.loadRoster(), this.date));
  }

  async runEventCycle(eventId: string, settings: CycleSettings = {}): Promise<CycleResult> {
    return this.exclusive(async () =>
      this.engine.runEventCycle(eventId, await this.loadRoster(), { ...settings, date: this.date }),
    );
  }

  async injectRandomEvent(settings: CycleSettings = {}): Promise<CycleResult | null> {
    return this.exclusive(async () =>
      this.engine.injectRandomEvent(await this.loadRoster(), { ...settings, date: this.date }),
    );
  }

  /**
   * Moves the calendar forward. Each day entered runs the scheduled
   * events due on it, in schedule order; days with nothing due are
   * skipped over in a single step.
   */
  async advanceDay(days = 1): Promise<AdvanceDayResult> {
    return this.exclusive(async () => {
      const entries = this.schedule.getAll();
      const scheduled: ScheduledRun[] = [];
      let expiredFlags = 0;
      let pending = 0;
      let roster: Roster | null = null;

      for (let day = 1; day <= days; day++) {
        pending += 1;
        const date = addDays(this.date, pending);
        const due = dueOn(entries, date);
        if (due.length === 0) continue;

        expiredFlags += this.engine.advanceDay(pending);
        this.date = date;
        pending = 0;
        if (roster === null) roster = await this.loadRoster();
        const current = roster;
        for (const entry of due) {
          const result = this.engine.runEventCycle(entry.eventId, current, { date });
          scheduled.push({ scheduleId: entry.id, eventId: entry.eventId, date, status: result.status });
        }
      }
      if (pending > 0) {
        expiredFlags += this.engine.advanceDay(pending);
        this.date = addDays(this.date, pending);
      }

      this.logger.info(`advanced to ${this.date}`, { days, expiredFlags, scheduled: scheduled.length });
      return { date: this.date, expiredFlags, scheduled };
    });
  }

  listSchedule(): ScheduledEvent[] {
    return this.schedule.getAll();
  }

  scheduleEvent(entry: ScheduledEventInput): ScheduledEvent {
    const added = this.schedule.add(entry);
    this.logger.info(`scheduled event ${entry.eventId}`, { id: added.id, recurrence: entry.recurrence });
    return added;
  }

  updateSchedule(id: number, entry: ScheduledEventInput): ScheduledEvent | null {
    return this.schedule.update(id, entry);
  }

  removeSchedule(id: number): boolean {
    return this.schedule.remove(id);
  }

  /** Scheduled entries that fire on `date`. */
  scheduledFor(date: string): ScheduledEvent[] {
    return dueOn(this.schedule.getAll(), date);
  }

  /** Submits a trigger under the host source; the caller supplies kind, subjects and params. */
  async submitTrigger(trigger: { kind: string; subjects?: string[]; params?: unknown }): Promise<SubmitResult> {
    return this.exclusive(async () => this.engine.submitTrigger({ ...trigger, source: HOST_SOURCE }));
  }

  triggerKinds(): string[] {
    return this.engine.triggerKinds();
  }

  triggerCharacterIds(trigger: { kind: string; subjects?: string[]; params?: unknown }): string[] {
    return this.engine.triggerCharacterIds({ ...trigger, source: HOST_SOURCE });
  }

  /** Entries the in-memory event log still holds. */
  recentEvents(): readonly EventLogEntry[] {
    return this.engine.eventLog.entries();
  }

  getAxisState(subject: string | readonly [string, string], axis: string): number {
    return this.engine.getAxisState(subject, axis);
  }

  getRelationship(a: string, b: string): RelationshipSummary {
    return this.engine.query.getSummary(a, b);
  }

  getRelationshipsOf(characterId: string): RelationshipSummary[] {
    return this.engine.query.relationshipsOf(characterId);
  }

  getCycleLog(filter: CycleQuery = {}): StoredCycle[] {
    return this.store.query(filter);
  }

  async saveSnapshot(name: string): Promise<SnapshotInfo> {
    return this.exclusive(async () => {
      const info = { name, date: this.date, createdAt: this.now() };
      this.store.saveSnapshot({ ...info, payload: this.engine.serializeSnapshot() });
      this.logger.info(`saved snapshot '${name}'`, { date: this.date });
      return info;
    });
  }

  listSnapshots(): SnapshotInfo[] {
    return this.store.listSnapshots();
  }

  /** Restores engine state and calendar from a saved snapshot; `null` when no such snapshot exists. */
  async loadSnapshot(name: string): Promise<SnapshotInfo | null> {
    return this.exclusive(async () => {
      const stored = this.store.getSnapshot(name);
      if (!stored) return null;
      this.engine.restoreSerialized(stored.payload);
      this.date = stored.date;
      this.logger.info(`restored snapshot '${name}'`, { date: stored.date });
      return { name: stored.name, date: stored.date, createdAt: stored.createdAt };
    });
  }

  close(): void {
    this.unsubscribe();
    if (this.ownsSchedule) this.schedule.close();
  }

  private async loadRoster(): Promise<Roster> {
    return rosterOf(await this.roster.getAllCharacters());
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    // the caller sees failures through `result`; the queue moves on either way
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
