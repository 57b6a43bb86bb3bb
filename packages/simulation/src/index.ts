export { SimulationEngine, CALENDAR_SOURCE } from "./engine.js";
export type { SimulationEngineOptions, CycleOptions, CycleResult } from "./engine.js";

export {
  MusterError,
  ConfigurationError,
  TriggerValidationError,
  RuntimeInvariantError,
} from "./errors.js";
export type { MusterErrorCode, TriggerRejectionReason } from "./errors.js";

export { createConsoleLogger, silentLogger } from "./logging.js";
export type { Logger, LogContext } from "./logging.js";

export { MemoryEventLog, TokenReporter, reportTo } from "./event-log.js";
export type {
  EventLog,
  EventLogEntry,
  EventLogRecord,
  EventLogObserver,
  CycleRecord,
  TokenCategory,
  UnknownTokenWarning,
  MemoryEventLogOptions,
} from "./event-log.js";

export { rosterOf } from "./types.js";
export type { Character, Roster, SimDate, Trigger, TriggerValue } from "./types.js";
export { pairKey, pairMembers, isPairKey, allPairs, PAIR_SEPARATOR } from "./pair.js";
export type { PairKey } from "./pair.js";

export {
  CONFIG_FILES,
  BUILTIN_TRIGGER_FIELDS,
  defaultConfigDir,
  loadSimulationConfig,
  buildSimulationConfig,
} from "./config/loader.js";
export type { SimulationConfig, RawConfigSources, ConfigSection } from "./config/loader.js";
export { parseLenientJson, readLenientJson } from "./config/lenient-json.js";

export { AxisRegistry, axisDefinitionsFrom, clamp } from "./axes/axis-registry.js";
export type { AxisDefinition, AxisChange, AxisSnapshot, AxisWriter, AxisOwner } from "./axes/axis-registry.js";

export { ParticipantResolver, DEFAULT_FILTER_HOOKS } from "./resolvers/participant-resolver.js";
export type { FilterHook, CandidateCriteria } from "./resolvers/participant-resolver.js";
export { RelationshipResolver } from "./resolvers/relationship-resolver.js";
export type { PredicateExpr, DerivedRelation } from "./resolvers/dsl.js";

export { EventCatalog } from "./injector/event-catalog.js";
export { EventInjector } from "./injector/event-injector.js";
export type { AvailabilityResult, EventInstance, InjectionResult } from "./injector/event-injector.js";
export { seededShuffle, selectionSeed } from "./injector/seeded-shuffle.js";

export { InteractionSelector } from "./selector/interaction-selector.js";
export type { SelectedInteraction, InteractionContext } from "./selector/interaction-selector.js";

export { InteractionResolver } from "./resolution/interaction-resolver.js";
export type { OutcomeTier, ResolutionResult, StageResult } from "./resolution/interaction-resolver.js";
export { DiceSkillCheck, scriptedDice } from "./resolution/skill-check.js";
export type { SkillCheck, SkillCheckRequest, SkillCheckResult } from "./resolution/skill-check.js";

export { OutcomeApplier, OUTCOME_SOURCE } from "./outcomes/outcome-applier.js";
export type { AppliedOutcome, OutcomeContext } from "./outcomes/outcome-applier.js";

export { TriggerIntake } from "./triggers/trigger-intake.js";
export type { SubmitResult, TriggerKind, ValidationResult } from "./triggers/trigger-intake.js";
export { TriggerLedger } from "./triggers/trigger-ledger.js";

export { RelationshipEngine } from "./relationships/relationship-engine.js";
export type { ProcessResult, RelationshipSnapshot, Sentiment } from "./relationships/relationship-engine.js";
export { RelationshipStateQuery, QUERY_THRESHOLDS } from "./relationships/state-query.js";
export type { RelationshipSummary } from "./relationships/state-query.js";

export { RECURRENCES, occursOn, dueOn } from "./schedule/recurrence.js";
export type { Recurrence, RecurrenceRule } from "./schedule/recurrence.js";

export { serializeSnapshot, parseSnapshot, engineSnapshotSchema, SNAPSHOT_VERSION } from "./persistence/snapshot.js";
export type { EngineSnapshot } from "./persistence/snapshot.js";
