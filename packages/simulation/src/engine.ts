import seedrandom from "seedrandom";
import { AxisRegistry, axisDefinitionsFrom } from "./axes/axis-registry.js";
import type { SimulationConfig } from "./config/loader.js";
import { ConfigurationError } from "./errors.js";
import type { TriggerValidationError } from "./errors.js";
import type { EventLog } from "./event-log.js";
import { MemoryEventLog, TokenReporter, reportTo } from "./event-log.js";
import { EventCatalog } from "./injector/event-catalog.js";
import { EventInjector } from "./injector/event-injector.js";
import type { AvailabilityResult, EventInstance } from "./injector/event-injector.js";
import type { Logger } from "./logging.js";
import { createConsoleLogger } from "./logging.js";
import { OutcomeApplier } from "./outcomes/outcome-applier.js";
import type { AppliedOutcome } from "./outcomes/outcome-applier.js";
import { PAIR_SEPARATOR, pairKey } from "./pair.js";
import type { EngineSnapshot } from "./persistence/snapshot.js";
import { SNAPSHOT_VERSION, parseSnapshot, serializeSnapshot } from "./persistence/snapshot.js";
import { RelationshipEngine } from "./relationships/relationship-engine.js";
import { RelationshipStateQuery } from "./relationships/state-query.js";
import { InteractionResolver } from "./resolution/interaction-resolver.js";
import type { ResolutionResult } from "./resolution/interaction-resolver.js";
import { DiceSkillCheck } from "./resolution/skill-check.js";
import type { SkillCheck } from "./resolution/skill-check.js";
import { ParticipantResolver } from "./resolvers/participant-resolver.js";
import type { FilterHook } from "./resolvers/participant-resolver.js";
import { DEFAULT_FILTER_HOOKS } from "./resolvers/participant-resolver.js";
import { RelationshipResolver } from "./resolvers/relationship-resolver.js";
import { InteractionSelector } from "./selector/interaction-selector.js";
import type { SelectedInteraction } from "./selector/interaction-selector.js";
import { TriggerIntake } from "./triggers/trigger-intake.js";
import type { SubmitResult } from "./triggers/trigger-intake.js";
import { TriggerLedger } from "./triggers/trigger-ledger.js";
import type { Roster, SimDate } from "./types.js";

export const CALENDAR_SOURCE = "calendar";

export interface SimulationEngineOptions {
  config: SimulationConfig;
  logger?: Logger;
  eventLog?: EventLog;
  skillCheck?: SkillCheck;
  /** Uniform draw in [0, 1) used for interaction and random-event picks. */
  random?: () => number;
  /** Seeds the default random source and dice when `random` is not given. */
  seed?: string;
  filterHooks?: Readonly<Record<string, FilterHook>>;
}

export interface CycleOptions {
  date: SimDate | null;
  /** Overrides the event's own environment, tone or domain. */
  environment?: string | null;
  tone?: string | null;
  domain?: string;
}

export type CycleResult =
  | { status: "unavailable"; eventId: string; reasons: string[] }
  | { status: "no_interaction"; eventId: string; instance: EventInstance }
  | {
      status: "completed";
      eventId: string;
      instance: EventInstance;
      interaction: SelectedInteraction;
      resolution: ResolutionResult;
      outcome: Extract<AppliedOutcome, { status: "applied" }>;
    }
  | {
      status: "rejected";
      eventId: string;
      instance: EventInstance;
      interaction: SelectedInteraction;
      resolution: ResolutionResult;
      error: TriggerValidationError;
    };

/**
 * Entry point for the hosting application. Wires the axis registry,
 * resolvers, the four event layers, the trigger intake and the
 * relationship engine from one configuration bundle. Every call runs to
 * completion synchronously; the host serializes concurrent callers.
 */
export class SimulationEngine {
  readonly config: SimulationConfig;
  readonly eventLog: EventLog;
  readonly query: RelationshipStateQuery;
  readonly catalog: EventCatalog;

  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly registry: AxisRegistry;
  private readonly relationships: RelationshipEngine;
  private readonly intake: TriggerIntake;
  private readonly injector: EventInjector;
  private readonly selector: InteractionSelector;
  private readonly resolver: InteractionResolver;
  private readonly applier: OutcomeApplier;

  constructor(options: SimulationEngineOptions) {
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? createConsoleLogger("simulation");
    this.eventLog = options.eventLog ?? new MemoryEventLog(this.logger);
    this.random = options.random ?? (options.seed === undefined ? Math.random : seedrandom(options.seed));
    const random = this.random;

    this.registry = new AxisRegistry(axisDefinitionsFrom(config.axes));
    const ledger = new TriggerLedger();
    this.relationships = new RelationshipEngine({
      registry: this.registry,
      rules: config.relationshipRules,
      ledger,
      eventLog: this.eventLog,
      logger: options.logger,
    });
    this.query = new RelationshipStateQuery(this.relationships);
    this.intake = new TriggerIntake({
      triggers: config.triggers,
      ledger,
      engine: this.relationships,
      eventLog: this.eventLog,
      logger: options.logger,
    });

    const participants = new ParticipantResolver(config.resolverMaps, {
      ...DEFAULT_FILTER_HOOKS,
      ...options.filterHooks,
    });
    this.catalog = new EventCatalog(config.events);
    this.injector = new EventInjector({
      catalog: this.catalog,
      participants,
      relationships: new RelationshipResolver(config.resolverMaps, this.query, participants),
      reporterFor: (origin) => this.reporter(origin),
    });
    this.selector = new InteractionSelector({ interactions: config.interactions, query: this.query, random });
    this.resolver = new InteractionResolver({
      resolution: config.resolution,
      skillCheck: options.skillCheck ?? new DiceSkillCheck(() => 1 + Math.floor(random() * 6)),
    });
    this.applier = new OutcomeApplier({
      outcomes: config.outcomes,
      axes: config.axes,
      registry: this.registry,
      intake: this.intake,
      logger: options.logger,
    });
  }

  checkAvailability(eventId: string, roster: Roster): AvailabilityResult {
    checkRoster(roster);
    return this.injector.checkAvailability(eventId, roster);
  }

  selectParticipants(eventId: string, roster: Roster, date?: SimDate): string[] {
    checkRoster(roster);
    return this.injector.selectParticipants(eventId, roster, date);
  }

  getEligibleCandidates(eventId: string, roster: Roster, date?: SimDate): string[] {
    checkRoster(roster);
    return this.injector.getEligibleCandidates(eventId, roster, date);
  }

  resolveDerivedParticipants(eventId: string, primary: readonly string[], roster: Roster): string[] {
    checkRoster(roster);
    return this.injector.resolveDerivedParticipants(eventId, primary, roster);
  }

  availableEvents(roster: Roster): string[] {
    checkRoster(roster);
    return this.injector.availableEvents(roster);
  }

  /** Runs one event through injection, interaction choice, resolution and outcome. */
  runEventCycle(eventId: string, roster: Roster, options: CycleOptions): CycleResult {
    checkRoster(roster);
    const result = this.cycle(eventId, roster, options);
    this.record(result, options.date);
    return result;
  }

  /** Picks an available event by weight and runs it; `null` when nothing is available. */
  injectRandomEvent(roster: Roster, options: CycleOptions): CycleResult | null {
    const pool = this.availableEvents(roster)
      .map((id) => ({ id, weight: this.catalog.get(id).weight }))
      .filter((e) => e.weight > 0);
    const total = pool.reduce((sum, e) => sum + e.weight, 0);
    if (pool.length === 0 || total <= 0) {
      this.logger.info("no event available", { date: options.date });
      return null;
    }

    const roll = this.random() * total;
    let acc = 0;
    let chosen = pool[pool.length - 1].id;
    for (const e of pool) {
      acc += e.weight;
      if (roll < acc) {
        chosen = e.id;
        break;
      }
    }
    return this.runEventCycle(chosen, roster, options);
  }

  /** Advances the calendar through the trigger intake; returns the number of flags that expired. */
  advanceDay(days = 1): number {
    const submitted = this.intake.submit({
      kind: "TIME_SKIP",
      source: CALENDAR_SOURCE,
      subjects: [],
      params: { days_skipped: days },
    });
    if (submitted.status === "rejected") throw submitted.error;
    return submitted.result.expiredFlags;
  }

  /** Hands a host-built trigger to the intake. */
  submitTrigger(trigger: unknown): SubmitResult {
    return this.intake.submit(trigger);
  }

  triggerKinds(): string[] {
    return this.intake.kinds();
  }

  /** Character ids a host trigger names, for checking them before submission. */
  triggerCharacterIds(trigger: unknown): string[] {
    return this.intake.characterIds(trigger);
  }

  /** A character axis for one id, or a relationship axis for a pair. */
  getAxisState(subject: string | readonly [string, string], axis: string): number {
    const key = typeof subject === "string" ? subject : pairKey(subject[0], subject[1]);
    return this.registry.get(key, axis);
  }

  snapshot(): EngineSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      axes: this.registry.snapshot(),
      relationships: this.relationships.snapshot(),
    };
  }

  /** Replaces all axis and relationship state; on failure the previous state stays in place. */
  restore(snapshot: EngineSnapshot): void {
    const previous = this.registry.snapshot();
    this.registry.restore(snapshot.axes);
    try {
      this.relationships.restore(snapshot.relationships);
    } catch (err) {
      this.registry.restore(previous);
      throw err;
    }
  }

  serializeSnapshot(): string {
    return serializeSnapshot(this.snapshot());
  }

  restoreSerialized(text: string): void {
    this.restore(parseSnapshot(text));
  }

  private cycle(eventId: string, roster: Roster, options: CycleOptions): CycleResult {
    const injected = this.injector.inject(eventId, roster, options.date);
    if (injected.status === "unavailable") {
      this.logger.debug(`event ${eventId} unavailable`, { reasons: injected.reasons });
      return { status: "unavailable", eventId, reasons: injected.reasons };
    }
    const { instance } = injected;

    const interaction = this.selector.select(
      {
        domain: options.domain ?? instance.domain,
        participants: instance.participants,
        environment: options.environment === undefined ? instance.environment : options.environment,
        tone: options.tone === undefined ? instance.tone : options.tone,
        allowed: this.catalog.get(eventId).interactions,
      },
      this.reporter(eventId),
    );
    if (!interaction) return { status: "no_interaction", eventId, instance };

    const resolution = this.resolver.resolve(interaction, roster);
    const outcome = this.applier.apply({
      interaction: interaction.name,
      tier: resolution.tier,
      participants: interaction.participants,
      date: options.date,
      eventId,
    });
    if (outcome.status === "rejected") {
      return { status: "rejected", eventId, instance, interaction, resolution, error: outcome.error };
    }
    return { status: "completed", eventId, instance, interaction, resolution, outcome };
  }

  private record(result: CycleResult, date: SimDate | null): void {
    const instance = result.status === "unavailable" ? null : result.instance;
    const ran = result.status === "completed" || result.status === "rejected" ? result : null;
    this.eventLog.append({
      type: "cycle",
      eventId: result.eventId,
      date,
      status: result.status,
      participants: instance ? [...instance.participants] : [],
      interaction: ran ? ran.interaction.name : null,
      tier: ran ? ran.resolution.tier : null,
      effects: result.status === "completed" ? result.outcome.axisChanges.length : 0,
      triggers: result.status === "completed" ? result.outcome.triggers.map((t) => t.kind) : [],
    });
    this.logger.info(`cycle ${result.eventId}: ${result.status}`, ran ? { interaction: ran.interaction.name } : {});
  }

  private reporter(origin: string): TokenReporter {
    return new TokenReporter(origin, reportTo(this.eventLog, this.logger));
  }
}

/** Refuses roster ids that cannot form a pair key. */
function checkRoster(roster: Roster): void {
  for (const [key, character] of roster) {
    for (const id of new Set([key, character.id])) {
      if (id.length === 0 || id.includes(PAIR_SEPARATOR)) {
        throw new ConfigurationError(`character id '${id}' cannot be used`, { file: "roster", key: id });
      }
    }
  }
}
