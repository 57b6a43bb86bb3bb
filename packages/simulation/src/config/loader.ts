import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../errors.js";
import { parseConfig, readLenientJson } from "./lenient-json.js";
import {
  axesFileSchema,
  eventsFileSchema,
  interactionsFileSchema,
  outcomesFileSchema,
  relationshipRulesFileSchema,
  resolutionFileSchema,
  resolverMapsFileSchema,
  triggersFileSchema,
} from "./schemas.js";
import type {
  AxesFile,
  EventsFile,
  InteractionsFile,
  OutcomesFile,
  PayloadFieldType,
  RelationshipRulesFile,
  ResolutionFile,
  ResolverMapsFile,
  TriggersFile,
} from "./schemas.js";

export const CONFIG_FILES = {
  axes: "axes.json",
  resolverMaps: "resolver_maps.json",
  events: "events.json",
  interactions: "interactions.json",
  resolution: "resolution.json",
  outcomes: "outcomes.json",
  triggers: "triggers.json",
  relationshipRules: "relationship_rules.json",
} as const;

export type ConfigSection = keyof typeof CONFIG_FILES;

export type RawConfigSources = Record<ConfigSection, unknown>;

export interface SimulationConfig {
  axes: AxesFile;
  resolverMaps: ResolverMapsFile;
  events: EventsFile;
  interactions: InteractionsFile;
  resolution: ResolutionFile;
  outcomes: OutcomesFile;
  triggers: TriggersFile;
  relationshipRules: RelationshipRulesFile;
}

/** Trigger kinds handled by the relationship engine itself, with the payload fields it reads. */
export const BUILTIN_TRIGGER_FIELDS: Record<string, Record<string, PayloadFieldType>> = {
  TIME_SKIP: { days_skipped: "integer" },
  RELATIONSHIP_FLAG_SET: { a: "character_id", b: "character_id", flag: "string", days: "integer" },
};

export function defaultConfigDir(): string {
  return fileURLToPath(new URL("../../config/", import.meta.url));
}

export function loadSimulationConfig(dir: string = defaultConfigDir()): SimulationConfig {
  const read = (section: ConfigSection): unknown =>
    readLenientJson(join(dir, CONFIG_FILES[section]), CONFIG_FILES[section]);
  return buildSimulationConfig({
    axes: read("axes"),
    resolverMaps: read("resolverMaps"),
    events: read("events"),
    interactions: read("interactions"),
    resolution: read("resolution"),
    outcomes: read("outcomes"),
    triggers: read("triggers"),
    relationshipRules: read("relationshipRules"),
  });
}

/** Validates already-parsed configuration objects; used by the loader and by tests. */
export function buildSimulationConfig(sources: RawConfigSources): SimulationConfig {
  const config: SimulationConfig = {
    axes: parseConfig(axesFileSchema, sources.axes, CONFIG_FILES.axes),
    resolverMaps: parseConfig(resolverMapsFileSchema, sources.resolverMaps, CONFIG_FILES.resolverMaps),
    events: parseConfig(eventsFileSchema, sources.events, CONFIG_FILES.events),
    interactions: parseConfig(interactionsFileSchema, sources.interactions, CONFIG_FILES.interactions),
    resolution: parseConfig(resolutionFileSchema, sources.resolution, CONFIG_FILES.resolution),
    outcomes: parseConfig(outcomesFileSchema, sources.outcomes, CONFIG_FILES.outcomes),
    triggers: parseConfig(triggersFileSchema, sources.triggers, CONFIG_FILES.triggers),
    relationshipRules: parseConfig(
      relationshipRulesFileSchema,
      sources.relationshipRules,
      CONFIG_FILES.relationshipRules,
    ),
  };
  checkEffectAxes(config);
  checkInteractionNames(config);
  checkDifficultyLabels(config);
  checkBuiltinTriggers(config);
  checkRelationshipRules(config);
  return config;
}

function checkEffectAxes(config: SimulationConfig): void {
  for (const [effect, axis] of Object.entries(config.axes.effect_axes)) {
    const def = config.axes.axes[axis];
    if (!def || def.scope !== "character") {
      throw new ConfigurationError(`'${effect}' must map to a character axis, got '${axis}'`, {
        file: CONFIG_FILES.axes,
        key: `effect_axes.${effect}`,
      });
    }
  }
}

function checkInteractionNames(config: SimulationConfig): void {
  const seen = new Map<string, string>();
  for (const [domain, { interactions }] of Object.entries(config.interactions.domains)) {
    for (const name of Object.keys(interactions)) {
      const other = seen.get(name);
      if (other !== undefined) {
        throw new ConfigurationError(`interaction '${name}' is declared in both '${other}' and '${domain}'`, {
          file: CONFIG_FILES.interactions,
          key: `domains.${domain}.interactions.${name}`,
        });
      }
      seen.set(name, domain);
    }
  }
}

function checkDifficultyLabels(config: SimulationConfig): void {
  for (const [name, { stages }] of Object.entries(config.resolution.interaction_resolutions)) {
    stages.forEach((stage, i) => {
      if (stage.difficulty !== undefined && !(stage.difficulty in config.resolution.difficulty_labels)) {
        throw new ConfigurationError(`unknown difficulty label '${stage.difficulty}'`, {
          file: CONFIG_FILES.resolution,
          key: `interaction_resolutions.${name}.stages.${i}.difficulty`,
        });
      }
    });
  }
}

function checkBuiltinTriggers(config: SimulationConfig): void {
  for (const [kind, fields] of Object.entries(BUILTIN_TRIGGER_FIELDS)) {
    const def = config.triggers.triggers[kind];
    if (!def) {
      throw new ConfigurationError(`built-in trigger '${kind}' is not registered`, {
        file: CONFIG_FILES.triggers,
        key: `triggers.${kind}`,
      });
    }
    for (const [field, type] of Object.entries(fields)) {
      const declared = def.payload_schema[field];
      if (!declared || declared.type !== type || declared.optional) {
        throw new ConfigurationError(`'${kind}' needs a required '${field}' field of type ${type}`, {
          file: CONFIG_FILES.triggers,
          key: `triggers.${kind}.payload_schema.${field}`,
        });
      }
    }
  }
}

function checkRelationshipRules(config: SimulationConfig): void {
  const file = CONFIG_FILES.relationshipRules;
  for (const [kind, rule] of Object.entries(config.relationshipRules.rules)) {
    const at = `rules.${kind}`;
    if (kind in BUILTIN_TRIGGER_FIELDS) {
      throw new ConfigurationError(`'${kind}' is handled by the engine and cannot be redefined`, { file, key: at });
    }
    const trigger = config.triggers.triggers[kind];
    if (!trigger) {
      throw new ConfigurationError(`rule for unregistered trigger '${kind}'`, { file, key: at });
    }
    const expect = (param: string, type: PayloadFieldType, key: string): void => {
      const field = trigger.payload_schema[param];
      if (!field || field.type !== type || field.optional) {
        throw new ConfigurationError(`'${param}' must be a required ${type} field of '${kind}'`, {
          file,
          key: `${at}.${key}`,
        });
      }
    };

    const bound: string[] = [];
    if (rule.pair) {
      expect(rule.pair[0], "character_id", "pair.0");
      expect(rule.pair[1], "character_id", "pair.1");
      bound.push(...rule.pair);
    }
    if (rule.fan_out) {
      expect(rule.fan_out.from, "character_id", "fan_out.from");
      expect(rule.fan_out.to, "character_id[]", "fan_out.to");
      bound.push(rule.fan_out.from, rule.fan_out.to);
    }

    for (const axis of Object.keys(rule.effects.axis_delta)) {
      if (config.axes.axes[axis]?.scope !== "relationship") {
        throw new ConfigurationError(`'${axis}' is not a relationship axis`, {
          file,
          key: `${at}.effects.axis_delta.${axis}`,
        });
      }
    }
    rule.effects.sentiments.forEach((s, i) => {
      if (rule.direction === "one_sided" && s.holder === undefined) {
        throw new ConfigurationError("one-sided rules name a holder for each sentiment", {
          file,
          key: `${at}.effects.sentiments.${i}.holder`,
        });
      }
      if (s.holder !== undefined && !bound.includes(s.holder)) {
        throw new ConfigurationError(`holder '${s.holder}' is not bound by the rule`, {
          file,
          key: `${at}.effects.sentiments.${i}.holder`,
        });
      }
      if (s.set_from) expect(s.set_from.param, "integer", `effects.sentiments.${i}.set_from.param`);
    });
    for (const [role, param] of Object.entries(rule.effects.assign_roles)) {
      if (!rule.pair || !rule.pair.includes(param)) {
        throw new ConfigurationError(`role '${role}' must be assigned to one of the pair`, {
          file,
          key: `${at}.effects.assign_roles.${role}`,
        });
      }
    }
  }
}
