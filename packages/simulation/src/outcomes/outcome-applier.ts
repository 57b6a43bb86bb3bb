import type { AxisChange, AxisRegistry, AxisWrite, AxisWriter } from "../axes/axis-registry.js";
import { CONFIG_FILES } from "../config/loader.js";
import type { AxesFile, OutcomeEffects, OutcomesFile, TriggerTemplate } from "../config/schemas.js";
import { ConfigurationError, RuntimeInvariantError } from "../errors.js";
import type { TriggerValidationError } from "../errors.js";
import type { Logger } from "../logging.js";
import { createConsoleLogger } from "../logging.js";
import { allPairs, pairKey } from "../pair.js";
import type { ProcessResult } from "../relationships/relationship-engine.js";
import type { OutcomeTier } from "../resolution/interaction-resolver.js";
import type { TriggerIntake } from "../triggers/trigger-intake.js";
import type { SimDate, Trigger, TriggerValue } from "../types.js";

export const OUTCOME_SOURCE = "outcome_applier";

type EffectKey = keyof AxesFile["effect_axes"];

const EFFECT_KEYS: readonly EffectKey[] = ["xp_delta", "fatigue_delta", "confidence_delta", "reputation_pool_delta"];

export interface OutcomeContext {
  interaction: string;
  tier: OutcomeTier;
  /** Initiator first, then responder, then everyone else. */
  participants: readonly string[];
  date: SimDate | null;
  eventId: string | null;
}

export type AppliedOutcome =
  | {
      status: "applied";
      interaction: string;
      tier: OutcomeTier;
      axisChanges: AxisChange[];
      triggers: Trigger[];
      relationshipResults: ProcessResult[];
    }
  | { status: "rejected"; interaction: string; tier: OutcomeTier; error: TriggerValidationError };

interface Plan {
  writes: AxisWrite[];
  triggers: Trigger[];
}

export interface OutcomeApplierOptions {
  outcomes: OutcomesFile;
  axes: AxesFile;
  registry: AxisRegistry;
  intake: TriggerIntake;
  logger?: Logger;
}

/**
 * Layer 4: turns a classified interaction into state changes. Axis writes
 * go through the registry's outcome-applier writer; flags and any other
 * relationship change leave as triggers through the intake.
 */
export class OutcomeApplier {
  private readonly outcomes: OutcomesFile;
  private readonly effectAxes: AxesFile["effect_axes"];
  private readonly registry: AxisRegistry;
  private readonly writer: AxisWriter;
  private readonly intake: TriggerIntake;
  private readonly logger: Logger;

  constructor(options: OutcomeApplierOptions) {
    this.outcomes = options.outcomes;
    this.effectAxes = options.axes.effect_axes;
    this.registry = options.registry;
    this.writer = options.registry.claimWriter("outcome-applier");
    this.intake = options.intake;
    this.logger = options.logger ?? createConsoleLogger("outcome-applier");
  }

  effectsFor(interaction: string, tier: OutcomeTier): OutcomeEffects | null {
    return this.outcomes.interaction_outcomes[interaction]?.[tier] ?? null;
  }

  apply(context: OutcomeContext): AppliedOutcome {
    const { interaction, tier } = context;
    const effects = this.effectsFor(interaction, tier);
    if (!effects) {
      this.logger.debug(`no effects for '${interaction}' ${tier}`);
      return { status: "applied", interaction, tier, axisChanges: [], triggers: [], relationshipResults: [] };
    }

    const plan = this.plan(effects, context);

    for (const trigger of plan.triggers) {
      const check = this.intake.check(trigger);
      if (!check.ok) {
        this.logger.warn(`'${interaction}' ${tier} emits an invalid trigger; nothing applied`, {
          kind: check.error.kind,
          reason: check.error.reason,
        });
        return { status: "rejected", interaction, tier, error: check.error };
      }
    }

    const axisChanges = this.writer.applyBatch(plan.writes);
    const relationshipResults: ProcessResult[] = [];
    for (const trigger of plan.triggers) {
      const submitted = this.intake.submit(trigger);
      if (submitted.status === "rejected") {
        throw new RuntimeInvariantError(`trigger '${trigger.kind}' passed pre-validation but was rejected on submit`);
      }
      relationshipResults.push(submitted.result);
    }

    return { status: "applied", interaction, tier, axisChanges, triggers: plan.triggers, relationshipResults };
  }

  private plan(effects: OutcomeEffects, context: OutcomeContext): Plan {
    const at = `interaction_outcomes.${context.interaction}.${context.tier}`;
    const participants = [...new Set(context.participants)];
    const pairs = allPairs(participants);
    const writes: AxisWrite[] = [];

    for (const [axis, delta] of Object.entries(effects.axis_delta ?? {})) {
      if (!this.registry.hasAxis(axis)) {
        throw new ConfigurationError(`outcome references unregistered axis '${axis}'`, {
          file: CONFIG_FILES.outcomes,
          key: `${at}.axis_delta.${axis}`,
        });
      }
      if (delta === 0) continue;
      if (this.registry.definition(axis).scope === "relationship") {
        for (const [a, b] of pairs) writes.push({ subject: pairKey(a, b), axis, delta });
      } else {
        for (const id of participants) writes.push({ subject: id, axis, delta });
      }
    }

    for (const key of EFFECT_KEYS) {
      const delta = effects[key];
      if (delta === undefined || delta === 0) continue;
      const axis = this.effectAxes[key];
      if (axis === undefined) {
        throw new ConfigurationError(`'${key}' has no axis mapping`, {
          file: CONFIG_FILES.axes,
          key: `effect_axes.${key}`,
        });
      }
      for (const id of participants) writes.push({ subject: id, axis, delta });
    }

    const triggers: Trigger[] = [];
    for (const [flag, days] of Object.entries(effects.set_flags ?? {})) {
      for (const [a, b] of pairs) {
        triggers.push({
          kind: "RELATIONSHIP_FLAG_SET",
          source: OUTCOME_SOURCE,
          subjects: [a, b],
          params: { a, b, flag, days },
        });
      }
    }
    (effects.emit_triggers ?? []).forEach((template, i) => {
      triggers.push(this.bindTemplate(template, context, participants, `${at}.emit_triggers.${i}`));
    });

    return { writes, triggers };
  }

  private bindTemplate(
    template: TriggerTemplate,
    context: OutcomeContext,
    participants: readonly string[],
    at: string,
  ): Trigger {
    const params: Record<string, TriggerValue> = {};
    for (const [name, value] of Object.entries(template.params)) {
      params[name] =
        typeof value === "string" && value.startsWith("$")
          ? bind(value, context, participants, `${at}.params.${name}`)
          : value;
    }
    return { kind: template.kind, source: OUTCOME_SOURCE, subjects: [...participants], params };
  }
}

function bind(token: string, context: OutcomeContext, participants: readonly string[], key: string): TriggerValue {
  const missing = (what: string): never => {
    throw new ConfigurationError(`'${token}' needs ${what}`, { file: CONFIG_FILES.outcomes, key });
  };
  switch (token) {
    case "$initiator":
      return participants[0] ?? missing("a participant");
    case "$responder":
      return participants[1] ?? missing("a second participant");
    case "$participants":
      return [...participants];
    case "$others":
      return participants.slice(1);
    case "$date":
      return context.date ?? missing("a dated cycle");
    case "$event":
      return context.eventId ?? missing("an event");
    default:
      throw new ConfigurationError(`unknown parameter binding '${token}'`, { file: CONFIG_FILES.outcomes, key });
  }
}
