import { join } from "node:path";
import { AxisRegistry, axisDefinitionsFrom } from "../axes/axis-registry.js";
import { CONFIG_FILES, buildSimulationConfig, defaultConfigDir } from "../config/loader.js";
import type { RawConfigSources, SimulationConfig } from "../config/loader.js";
import { readLenientJson } from "../config/lenient-json.js";
import { MemoryEventLog, TokenReporter } from "../event-log.js";
import { silentLogger } from "../logging.js";
import { RelationshipEngine } from "../relationships/relationship-engine.js";
import { RelationshipStateQuery } from "../relationships/state-query.js";
import { TriggerIntake } from "../triggers/trigger-intake.js";
import { TriggerLedger } from "../triggers/trigger-ledger.js";
import type { Character } from "../types.js";
import { rosterOf } from "../types.js";

/** The shipped configuration files, parsed but not validated. */
export function rawConfig(): RawConfigSources {
  const dir = defaultConfigDir();
  const read = (section: keyof typeof CONFIG_FILES): unknown =>
    readLenientJson(join(dir, CONFIG_FILES[section]), CONFIG_FILES[section]);
  return {
    axes: read("axes"),
    resolverMaps: read("resolverMaps"),
    events: read("events"),
    interactions: read("interactions"),
    resolution: read("resolution"),
    outcomes: read("outcomes"),
    triggers: read("triggers"),
    relationshipRules: read("relationshipRules"),
  };
}

export function defaultConfig(overrides: Partial<RawConfigSources> = {}): SimulationConfig {
  return buildSimulationConfig({ ...rawConfig(), ...overrides });
}

export function person(id: string, profession: string, extra: Partial<Character> = {}): Character {
  return { id, name: id, profession, status: "ACTIVE", age: 30, ...extra };
}

/** Four mechwarriors, a tech pair, a doctor and a child. */
export function smallRoster() {
  return rosterOf([
    person("mw1", "MECHWARRIOR", { unit: "alpha", skills: { "Gunnery/Mek": 4 }, attributes: { CHA: 5 } }),
    person("mw2", "MECHWARRIOR", { unit: "alpha", skills: { "Gunnery/Mek": 3 }, attributes: { CHA: 3 } }),
    person("mw3", "MECHWARRIOR", { unit: "bravo", age: 24 }),
    person("mw4", "MECHWARRIOR", { unit: "bravo", status: "WOUNDED" }),
    person("tech1", "MECH_TECH", { unit: "support" }),
    person("tech2", "ASTECH", { unit: "support", age: 19 }),
    person("doc", "DOCTOR"),
    person("kid", "DEPENDENT", { age: 8 }),
  ]);
}

export function reporterFor(origin = "test"): TokenReporter {
  return new TokenReporter(origin);
}

/** Registry, intake and relationship engine wired the way the engine wires them. */
export function relationshipStack(config: SimulationConfig = defaultConfig()) {
  const registry = new AxisRegistry(axisDefinitionsFrom(config.axes));
  const ledger = new TriggerLedger();
  const eventLog = new MemoryEventLog(silentLogger);
  const engine = new RelationshipEngine({
    registry,
    rules: config.relationshipRules,
    ledger,
    eventLog,
    logger: silentLogger,
  });
  const intake = new TriggerIntake({
    triggers: config.triggers,
    ledger,
    engine,
    eventLog,
    logger: silentLogger,
  });
  return { config, registry, ledger, eventLog, engine, intake, query: new RelationshipStateQuery(engine) };
}
