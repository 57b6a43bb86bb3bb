import { z } from "zod";
import { derivedRelationSchema, predicateSchema } from "../resolvers/dsl.js";

// ── axes.json ──────────────────────────────────────────────

export const axisDefinitionSchema = z
  .object({
    scope: z.enum(["character", "relationship"]),
    min: z.number(),
    max: z.number(),
    initial: z.number().default(0),
    description: z.string().default(""),
  })
  .refine((d) => d.min <= d.max, { message: "min must not exceed max" })
  .refine((d) => d.initial >= d.min && d.initial <= d.max, { message: "initial must lie within [min, max]" });

export const effectAxesSchema = z
  .object({
    xp_delta: z.string(),
    fatigue_delta: z.string(),
    confidence_delta: z.string(),
    reputation_pool_delta: z.string(),
  })
  .partial()
  .strict();

export const axesFileSchema = z.object({
  axes: z.record(axisDefinitionSchema),
  effect_axes: effectAxesSchema.default({}),
});

// ── resolver_maps.json ─────────────────────────────────────

export const filterDefinitionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("status_in"),
    field: z.enum(["status", "profession", "unit"]).default("status"),
    values: z.array(z.string()).min(1),
  }),
  z.object({ type: z.literal("alias_of"), target: z.string().min(1) }),
  z.object({ type: z.literal("hook"), hook: z.string().min(1) }),
]);

export const ageGroupSchema = z
  .object({
    min: z.number().int().min(0).default(0),
    max: z.number().int().min(0).optional(),
  })
  .refine((g) => g.max === undefined || g.min <= g.max, { message: "min must not exceed max" });

export const personSetSchema = z.object({
  role: z.string().optional(),
  exclude_roles: z.array(z.string()).default([]),
  filters: z.array(z.string()).default([]),
  age_group: z.string().optional(),
});

export const resolverMapsFileSchema = z.object({
  roles: z.record(z.array(z.string().min(1))).default({}),
  filters: z.record(filterDefinitionSchema).default({}),
  age_groups: z.record(ageGroupSchema).default({}),
  person_sets: z.record(personSetSchema).default({}),
  pair_predicates: z.record(predicateSchema).default({}),
  derived_relations: z.record(derivedRelationSchema).default({}),
});

// ── events.json ────────────────────────────────────────────

export const selectionRuleSchema = z
  .object({
    type: z.string().min(1),
    role: z.string().optional(),
    person_set: z.string().optional(),
    exclude_roles: z.array(z.string()).default([]),
    filters: z.array(z.string()).default([]),
    age_group: z.string().optional(),
    count: z.number().int().min(1).optional(),
    min: z.number().int().min(1).optional(),
    max: z.number().int().min(1).optional(),
    pair_predicate: predicateSchema.optional(),
  })
  .refine((s) => s.min === undefined || s.max === undefined || s.min <= s.max, {
    message: "min must not exceed max",
  });

export const availabilityRequirementSchema = z.object({
  role: z.string().optional(),
  any_person: z.boolean().default(false),
  filters: z.array(z.string()).default([]),
  exclude_roles: z.array(z.string()).default([]),
  age_group: z.string().optional(),
  min_count: z.number().int().min(1).default(1),
});

export const derivedRuleSchema = z.object({
  relation: derivedRelationSchema,
  filters: z.array(z.string()).default([]),
  max: z.number().int().min(1).optional(),
});

export const eventDefinitionSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  domain: z.string().min(1).default("social"),
  environment: z.string().optional(),
  tone: z.string().optional(),
  interactions: z.array(z.string()).optional(),
  weight: z.number().min(0).default(1),
  availability: z
    .object({
      requires: z.array(availabilityRequirementSchema).default([]),
      pair_predicate: predicateSchema.optional(),
    })
    .default({}),
  selection: selectionRuleSchema,
  derived: derivedRuleSchema.optional(),
});

export const eventsFileSchema = z.object({
  events: z.record(eventDefinitionSchema),
});

// ── interactions.json ──────────────────────────────────────

export const relationshipKindSchema = z.enum(["romantic", "friendly", "professional", "bonding"]);

export const interactionDefinitionSchema = z.object({
  description: z.string().default(""),
  base_weight: z.number().min(0).default(1),
  relationship_kind: relationshipKindSchema.optional(),
  min_participants: z.number().int().min(1).default(1),
});

export const contextModifierSchema = z.object({
  description: z.string().default(""),
  domains: z.array(z.string()).default([]),
  interaction_weight_modifiers: z.record(z.number()).default({}),
  check_modifiers: z.object({ difficulty: z.number().int().default(0) }).default({}),
});

export const interactionsFileSchema = z.object({
  domains: z.record(z.object({ interactions: z.record(interactionDefinitionSchema) })),
  environments: z.record(contextModifierSchema).default({}),
  tones: z.record(contextModifierSchema).default({}),
});

// ── resolution.json ────────────────────────────────────────

export const resolutionStageSchema = z.object({
  id: z.string().min(1),
  actor: z.enum(["initiator", "responder"]).default("initiator"),
  skill: z.string().optional(),
  fallback_attribute: z.string().optional(),
  attribute: z.string().optional(),
  target: z.number().int().optional(),
  difficulty: z.string().optional(),
  difficulty_source: z.enum(["none", "tone", "environment", "tone_and_environment"]).default("none"),
  on_failure: z.enum(["continue", "stop"]).default("continue"),
});

export const resolutionFileSchema = z.object({
  base_target: z.number().int().default(8),
  aggregate: z.enum(["sum", "min"]).default("sum"),
  thresholds: z
    .object({
      success_margin: z.number().int().default(0),
      great_success_margin: z.number().int().default(4),
    })
    .default({})
    .refine((t) => t.great_success_margin >= t.success_margin, {
      message: "great_success_margin must not be below success_margin",
    }),
  difficulty_labels: z.record(z.number().int()).default({
    very_easy: 3,
    easy: 1,
    average: 0,
    hard: -1,
    very_hard: -3,
    extreme: -5,
  }),
  interaction_resolutions: z.record(z.object({ stages: z.array(resolutionStageSchema).min(1) })).default({}),
});

// ── outcomes.json ──────────────────────────────────────────

export const triggerValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

export const triggerTemplateSchema = z.object({
  kind: z.string().min(1),
  params: z.record(triggerValueSchema).default({}),
});

export const outcomeEffectsSchema = z
  .object({
    axis_delta: z.record(z.number()),
    xp_delta: z.number().int(),
    fatigue_delta: z.number().int(),
    confidence_delta: z.number().int(),
    reputation_pool_delta: z.number().int(),
    set_flags: z.record(z.number().int().min(0)),
    emit_triggers: z.array(triggerTemplateSchema),
  })
  .partial()
  .strict();

export const outcomeDefinitionSchema = z
  .object({
    on_great_success: outcomeEffectsSchema,
    on_success: outcomeEffectsSchema,
    on_failure: outcomeEffectsSchema,
  })
  .partial()
  .strict();

export const outcomesFileSchema = z.object({
  interaction_outcomes: z.record(outcomeDefinitionSchema),
});

// ── triggers.json ──────────────────────────────────────────

export const payloadFieldTypeSchema = z.enum([
  "integer",
  "number",
  "string",
  "boolean",
  "character_id",
  "character_id[]",
]);

export const payloadFieldSchema = z.union([
  payloadFieldTypeSchema.transform((type) => ({ type, optional: false })),
  z.object({ type: payloadFieldTypeSchema, optional: z.boolean().default(false) }).strict(),
]);

export const triggerDefinitionSchema = z.object({
  description: z.string().default(""),
  payload_schema: z.record(payloadFieldSchema).default({}),
  allowed_sources: z.array(z.string().min(1)).min(1),
});

export const triggersFileSchema = z.object({
  triggers: z.record(triggerDefinitionSchema),
});

// ── relationship_rules.json ────────────────────────────────

export const sentimentEffectSchema = z
  .object({
    name: z.string().min(1),
    holder: z.string().optional(),
    set: z.number().int().min(0).optional(),
    delta: z.number().int().optional(),
    set_from: z
      .object({
        param: z.string().min(1),
        offset: z.number().int().default(0),
        max: z.number().int().optional(),
      })
      .optional(),
  })
  .refine((s) => [s.set, s.delta, s.set_from].filter((v) => v !== undefined).length === 1, {
    message: "exactly one of set, delta or set_from is required",
  });

export const relationshipRuleSchema = z
  .object({
    description: z.string().default(""),
    pair: z.tuple([z.string().min(1), z.string().min(1)]).optional(),
    fan_out: z.object({ from: z.string().min(1), to: z.string().min(1) }).optional(),
    direction: z.enum(["mutual", "one_sided"]).default("mutual"),
    effects: z.object({
      axis_delta: z.record(z.number()).default({}),
      sentiments: z.array(sentimentEffectSchema).default([]),
      set_flags: z.record(z.number().int().min(1)).default({}),
      clear_flags: z.array(z.string()).default([]),
      assign_roles: z.record(z.string()).default({}),
      remove_roles: z.array(z.string()).default([]),
    }),
  })
  .refine((r) => (r.pair === undefined) !== (r.fan_out === undefined), {
    message: "a rule binds either a pair or a fan_out",
  });

export const derivedStateSchema = z
  .object({
    label: z.string().min(1),
    at_least: z.number().optional(),
    at_most: z.number().optional(),
  })
  .refine((d) => d.at_least !== undefined || d.at_most !== undefined, {
    message: "a derived state needs at_least or at_most",
  });

export const relationshipRulesFileSchema = z.object({
  derived_states: z.record(z.array(derivedStateSchema)).default({}),
  rules: z.record(relationshipRuleSchema).default({}),
});

export type AxesFile = z.infer<typeof axesFileSchema>;
export type ResolverMapsFile = z.infer<typeof resolverMapsFileSchema>;
export type FilterDefinition = z.infer<typeof filterDefinitionSchema>;
export type AgeGroup = z.infer<typeof ageGroupSchema>;
export type PersonSet = z.infer<typeof personSetSchema>;
export type EventsFile = z.infer<typeof eventsFileSchema>;
export type EventDefinition = z.infer<typeof eventDefinitionSchema>;
export type SelectionRule = z.infer<typeof selectionRuleSchema>;
export type AvailabilityRequirement = z.infer<typeof availabilityRequirementSchema>;
export type DerivedRule = z.infer<typeof derivedRuleSchema>;
export type InteractionsFile = z.infer<typeof interactionsFileSchema>;
export type InteractionDefinition = z.infer<typeof interactionDefinitionSchema>;
export type ContextModifier = z.infer<typeof contextModifierSchema>;
export type RelationshipKind = z.infer<typeof relationshipKindSchema>;
export type ResolutionFile = z.infer<typeof resolutionFileSchema>;
export type ResolutionStage = z.infer<typeof resolutionStageSchema>;
export type OutcomesFile = z.infer<typeof outcomesFileSchema>;
export type OutcomeEffects = z.infer<typeof outcomeEffectsSchema>;
export type OutcomeDefinition = z.infer<typeof outcomeDefinitionSchema>;
export type TriggerTemplate = z.infer<typeof triggerTemplateSchema>;
export type TriggersFile = z.infer<typeof triggersFileSchema>;
export type TriggerDefinition = z.infer<typeof triggerDefinitionSchema>;
export type PayloadFieldType = z.infer<typeof payloadFieldTypeSchema>;
export type RelationshipRulesFile = z.infer<typeof relationshipRulesFileSchema>;
export type RelationshipRule = z.infer<typeof relationshipRuleSchema>;
export type SentimentEffect = z.infer<typeof sentimentEffectSchema>;
export type DerivedState = z.infer<typeof derivedStateSchema>;
