import type { AxisChange, AxisRegistry, AxisWrite, AxisWriter } from "../axes/axis-registry.js";
import type { RelationshipRule, RelationshipRulesFile, SentimentEffect } from "../config/schemas.js";
import { ConfigurationError, RuntimeInvariantError } from "../errors.js";
import type { EventLog } from "../event-log.js";
import type { Logger } from "../logging.js";
import { createConsoleLogger } from "../logging.js";
import { isPairKey, pairKey, pairMembers } from "../pair.js";
import type { PairKey } from "../pair.js";
import type { TriggerLedger } from "../triggers/trigger-ledger.js";
import type { Trigger } from "../types.js";

export interface Sentiment {
  strength: number;
  /** The character who feels it; `null` when it is mutual. */
  holder: string | null;
}

export interface RelationshipSnapshot {
  a: string;
  b: string;
  sentiments: Record<string, Sentiment>;
  flags: Record<string, number>;
  roles: Record<string, string>;
}

export interface ProcessResult {
  kind: string;
  pairs: PairKey[];
  axisChanges: AxisChange[];
  expiredFlags: number;
}

interface RelationshipRecord {
  a: string;
  b: string;
  sentiments: Map<string, Sentiment>;
  flags: Map<string, number>;
  roles: Map<string, string>;
}

interface BoundPair {
  a: string;
  b: string;
  /** For fan-out rules, the list member this pair was produced for. */
  target: string | null;
}

export interface RelationshipEngineOptions {
  registry: AxisRegistry;
  rules: RelationshipRulesFile;
  ledger: TriggerLedger;
  eventLog?: EventLog;
  logger?: Logger;
}

/**
 * Sole owner of relationship state. Relationship axes are written through
 * the registry's relationship-engine writer; sentiments, flags and roles
 * live here. Every mutation starts from a trigger the intake accepted.
 */
export class RelationshipEngine {
  private relationships = new Map<PairKey, RelationshipRecord>();
  private readonly registry: AxisRegistry;
  private readonly axes: AxisWriter;
  private readonly rules: RelationshipRulesFile;
  private readonly ledger: TriggerLedger;
  private readonly eventLog: EventLog | undefined;
  private readonly logger: Logger;
  private processing = false;

  constructor(options: RelationshipEngineOptions) {
    this.registry = options.registry;
    this.axes = options.registry.claimWriter("relationship-engine");
    this.rules = options.rules;
    this.ledger = options.ledger;
    this.eventLog = options.eventLog;
    this.logger = options.logger ?? createConsoleLogger("relationship-engine");
  }

  process(trigger: Trigger): ProcessResult {
    if (!this.ledger.consume(trigger)) {
      throw new RuntimeInvariantError(`trigger '${trigger.kind}' reached the relationship engine without intake`);
    }
    if (this.processing) {
      throw new RuntimeInvariantError(`trigger '${trigger.kind}' submitted while another trigger was being processed`);
    }
    this.processing = true;
    try {
      switch (trigger.kind) {
        case "TIME_SKIP":
          return this.timeSkip(trigger);
        case "RELATIONSHIP_FLAG_SET":
          return this.flagSet(trigger);
        default:
          return this.applyRule(trigger);
      }
    } finally {
      this.processing = false;
    }
  }

  /** One day passes: flags already at zero expire, every other flag counts down by one. */
  advanceDay(): number {
    let expired = 0;
    for (const rel of this.relationships.values()) {
      for (const [flag, remaining] of [...rel.flags]) {
        if (remaining <= 0) {
          rel.flags.delete(flag);
          expired++;
        } else {
          rel.flags.set(flag, remaining - 1);
        }
      }
    }
    this.eventLog?.append({ type: "day_advanced", expiredFlags: expired });
    return expired;
  }

  // ── read accessors ────────────────────────────────────────

  hasAxis(axis: string): boolean {
    return this.registry.hasAxis(axis) && this.registry.definition(axis).scope === "relationship";
  }

  getAxis(a: string, b: string, axis: string): number {
    return this.registry.get(pairKey(a, b), axis);
  }

  getAxes(a: string, b: string): Record<string, number> {
    const key = pairKey(a, b);
    const out: Record<string, number> = {};
    for (const def of this.registry.definitions()) {
      if (def.scope === "relationship") out[def.name] = this.registry.get(key, def.name);
    }
    return out;
  }

  getFlags(a: string, b: string): Record<string, number> {
    return sortedRecord(this.relationships.get(pairKey(a, b))?.flags);
  }

  getSentiments(a: string, b: string): Record<string, Sentiment> {
    const rel = this.relationships.get(pairKey(a, b));
    const out: Record<string, Sentiment> = {};
    if (!rel) return out;
    for (const name of [...rel.sentiments.keys()].sort()) {
      const s = rel.sentiments.get(name);
      if (s) out[name] = { ...s };
    }
    return out;
  }

  getRoles(a: string, b: string): Record<string, string> {
    return sortedRecord(this.relationships.get(pairKey(a, b))?.roles);
  }

  derivedStates(a: string, b: string): string[] {
    const labels: string[] = [];
    for (const [axis, states] of Object.entries(this.rules.derived_states)) {
      if (!this.hasAxis(axis)) continue;
      const value = this.getAxis(a, b, axis);
      for (const s of states) {
        if ((s.at_least === undefined || value >= s.at_least) && (s.at_most === undefined || value <= s.at_most)) {
          labels.push(s.label);
        }
      }
    }
    return labels;
  }

  relationshipExists(a: string, b: string): boolean {
    const key = pairKey(a, b);
    return this.relationships.has(key) || this.registry.hasSubject(key);
  }

  /** Every pair with stored state, sorted by canonical key. */
  pairs(): [string, string][] {
    const keys = new Set<PairKey>(this.relationships.keys());
    for (const subject of this.registry.subjects()) {
      if (isPairKey(subject)) keys.add(subject);
    }
    return [...keys].sort().map((key) => pairMembers(key));
  }

  snapshot(): Record<string, RelationshipSnapshot> {
    const out: Record<string, RelationshipSnapshot> = {};
    for (const key of [...this.relationships.keys()].sort()) {
      const rel = this.relationships.get(key);
      if (!rel) continue;
      out[key] = {
        a: rel.a,
        b: rel.b,
        sentiments: this.getSentiments(rel.a, rel.b),
        flags: sortedRecord(rel.flags),
        roles: sortedRecord(rel.roles),
      };
    }
    return out;
  }

  restore(snapshot: Record<string, RelationshipSnapshot>): void {
    const next = new Map<PairKey, RelationshipRecord>();
    for (const [key, rel] of Object.entries(snapshot)) {
      const canonical = pairKey(rel.a, rel.b);
      if (canonical !== key) {
        throw new ConfigurationError(`relationship key '${key}' does not match its pair`, { file: "snapshot", key });
      }
      for (const [flag, days] of Object.entries(rel.flags)) {
        if (!Number.isInteger(days) || days < 0) {
          throw new ConfigurationError(`flag duration must be a non-negative integer`, {
            file: "snapshot",
            key: `${key}.flags.${flag}`,
          });
        }
      }
      const [a, b] = pairMembers(canonical);
      next.set(canonical, {
        a,
        b,
        sentiments: new Map(Object.entries(rel.sentiments).map(([n, s]) => [n, { ...s }])),
        flags: new Map(Object.entries(rel.flags)),
        roles: new Map(Object.entries(rel.roles)),
      });
    }
    this.relationships = next;
  }

  // ── handlers ──────────────────────────────────────────────

  private timeSkip(trigger: Trigger): ProcessResult {
    const days = intParam(trigger, "days_skipped");
    let expired = 0;
    for (let i = 0; i < days; i++) expired += this.advanceDay();
    return { kind: trigger.kind, pairs: [], axisChanges: [], expiredFlags: expired };
  }

  private flagSet(trigger: Trigger): ProcessResult {
    const a = stringParam(trigger, "a");
    const b = stringParam(trigger, "b");
    const flag = stringParam(trigger, "flag");
    const days = intParam(trigger, "days");
    if (a === b) return this.skipSelfPair(trigger, a);
    const rel = this.record(a, b);
    if (days > 0) rel.flags.set(flag, days);
    else rel.flags.delete(flag);
    return { kind: trigger.kind, pairs: [pairKey(a, b)], axisChanges: [], expiredFlags: 0 };
  }

  private applyRule(trigger: Trigger): ProcessResult {
    const rule = this.rules.rules[trigger.kind];
    if (!rule) {
      this.logger.info(`no relationship rule for '${trigger.kind}'`, { source: trigger.source });
      return { kind: trigger.kind, pairs: [], axisChanges: [], expiredFlags: 0 };
    }

    const pairs = this.bindPairs(rule, trigger);
    const writes: AxisWrite[] = [];
    for (const p of pairs) {
      for (const [axis, delta] of Object.entries(rule.effects.axis_delta)) {
        if (delta !== 0) writes.push({ subject: pairKey(p.a, p.b), axis, delta });
      }
    }
    // Axis writes are the only step that can reject; everything after is in-memory bookkeeping.
    const axisChanges = this.axes.applyBatch(writes);

    for (const p of pairs) {
      const rel = this.record(p.a, p.b);
      for (const effect of rule.effects.sentiments) {
        this.applySentiment(rel, effect, rule, trigger, p);
      }
      for (const [flag, days] of Object.entries(rule.effects.set_flags)) rel.flags.set(flag, days);
      for (const flag of rule.effects.clear_flags) rel.flags.delete(flag);
      for (const [role, param] of Object.entries(rule.effects.assign_roles)) {
        rel.roles.set(role, stringParam(trigger, param));
      }
      for (const role of rule.effects.remove_roles) rel.roles.delete(role);
    }

    return { kind: trigger.kind, pairs: pairs.map((p) => pairKey(p.a, p.b)), axisChanges, expiredFlags: 0 };
  }

  private bindPairs(rule: RelationshipRule, trigger: Trigger): BoundPair[] {
    const bound: BoundPair[] = [];
    if (rule.pair) {
      const a = stringParam(trigger, rule.pair[0]);
      const b = stringParam(trigger, rule.pair[1]);
      if (a === b) this.skipSelfPair(trigger, a);
      else bound.push({ a, b, target: null });
    }
    if (rule.fan_out) {
      const from = stringParam(trigger, rule.fan_out.from);
      for (const to of new Set(listParam(trigger, rule.fan_out.to))) {
        if (to !== from) bound.push({ a: from, b: to, target: to });
      }
    }
    return bound;
  }

  private applySentiment(
    rel: RelationshipRecord,
    effect: SentimentEffect,
    rule: RelationshipRule,
    trigger: Trigger,
    pair: BoundPair,
  ): void {
    let holder: string | null = null;
    if (rule.direction === "one_sided" && effect.holder !== undefined) {
      holder = effect.holder === rule.fan_out?.to && pair.target !== null ? pair.target : stringParam(trigger, effect.holder);
    }

    const current = rel.sentiments.get(effect.name);
    let strength: number;
    if (effect.set !== undefined) {
      strength = effect.set;
    } else if (effect.delta !== undefined) {
      strength = (current?.strength ?? 0) + effect.delta;
    } else if (effect.set_from) {
      const raw = intParam(trigger, effect.set_from.param) + effect.set_from.offset;
      strength = effect.set_from.max === undefined ? raw : Math.min(effect.set_from.max, raw);
    } else {
      return;
    }

    if (strength <= 0) rel.sentiments.delete(effect.name);
    else rel.sentiments.set(effect.name, { strength, holder: effect.delta !== undefined && current ? current.holder : holder });
  }

  private record(a: string, b: string): RelationshipRecord {
    const key = pairKey(a, b);
    let rel = this.relationships.get(key);
    if (!rel) {
      const [lo, hi] = pairMembers(key);
      rel = { a: lo, b: hi, sentiments: new Map(), flags: new Map(), roles: new Map() };
      this.relationships.set(key, rel);
    }
    return rel;
  }

  private skipSelfPair(trigger: Trigger, id: string): ProcessResult {
    this.logger.warn(`'${trigger.kind}' names '${id}' on both sides; ignored`);
    return { kind: trigger.kind, pairs: [], axisChanges: [], expiredFlags: 0 };
  }
}

function sortedRecord<V>(map: ReadonlyMap<string, V> | undefined): Record<string, V> {
  const out: Record<string, V> = {};
  if (!map) return out;
  for (const key of [...map.keys()].sort()) {
    const value = map.get(key);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

// The intake has already checked payload types; these only narrow.

function stringParam(trigger: Trigger, name: string): string {
  const value = trigger.params[name];
  if (typeof value !== "string") throw new RuntimeInvariantError(`'${trigger.kind}.${name}' is not a string`);
  return value;
}

function intParam(trigger: Trigger, name: string): number {
  const value = trigger.params[name];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new RuntimeInvariantError(`'${trigger.kind}.${name}' is not an integer`);
  }
  return value;
}

function listParam(trigger: Trigger, name: string): string[] {
  const value = trigger.params[name];
  if (!Array.isArray(value)) throw new RuntimeInvariantError(`'${trigger.kind}.${name}' is not a list`);
  return value;
}
