import { z } from "zod";

/**
 * Pair predicate expression. A bare string refers to a named predicate in
 * the resolver maps. Node types the loader does not know are kept as
 * `unsupported` so evaluation can log them and answer `false`.
 */
export type PredicateExpr =
  | { type: "ref"; name: string }
  | { type: "has_flag"; flag: string }
  | { type: "has_any_flag"; flags: string[] }
  | { type: "has_sentiment"; sentiment: string; min: number }
  | { type: "has_role"; role: string }
  | { type: "relationship_exists" }
  | { type: "axis_at_least"; axis: string; value: number }
  | { type: "axis_at_most"; axis: string; value: number }
  | { type: "not"; expr: PredicateExpr }
  | { type: "and"; all: PredicateExpr[] }
  | { type: "or"; any: PredicateExpr[] }
  | { type: "unsupported"; token: string };

/** Rule producing derived participants relative to a primary participant. */
export type DerivedRelation =
  | { type: "ref"; name: string }
  | { type: "role_group_pick"; role: string; pick: "one" | "all" }
  | { type: "person_set"; set: string }
  | { type: "unit_of_primary" }
  | { type: "role_of_primary"; role: string }
  | { type: "composite_first_supported"; order: DerivedRelation[] }
  | { type: "unsupported"; token: string };

const PREDICATE_TYPES = new Set([
  "has_flag",
  "has_any_flag",
  "has_sentiment",
  "has_role",
  "relationship_exists",
  "axis_at_least",
  "axis_at_most",
  "not",
  "and",
  "or",
]);

const RELATION_TYPES = new Set([
  "role_group_pick",
  "person_set",
  "unit_of_primary",
  "role_of_primary",
  "composite_first_supported",
]);

export const predicateSchema: z.ZodType<PredicateExpr, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string().min(1).transform((name) => ({ type: "ref" as const, name })),
    z.object({ type: z.literal("has_flag"), flag: z.string().min(1) }),
    z.object({ type: z.literal("has_any_flag"), flags: z.array(z.string().min(1)).min(1) }),
    z.object({ type: z.literal("has_sentiment"), sentiment: z.string().min(1), min: z.number().int().default(1) }),
    z.object({ type: z.literal("has_role"), role: z.string().min(1) }),
    z.object({ type: z.literal("relationship_exists") }),
    z.object({ type: z.literal("axis_at_least"), axis: z.string().min(1), value: z.number() }),
    z.object({ type: z.literal("axis_at_most"), axis: z.string().min(1), value: z.number() }),
    z.object({ type: z.literal("not"), expr: predicateSchema }),
    z.object({ type: z.literal("and"), all: z.array(predicateSchema) }),
    z.object({ type: z.literal("or"), any: z.array(predicateSchema) }),
    z
      .object({ type: z.string().min(1) })
      .passthrough()
      .refine((node) => !PREDICATE_TYPES.has(node.type), (node) => ({
        message: `malformed '${node.type}' predicate`,
      }))
      .transform((node) => ({ type: "unsupported" as const, token: node.type })),
  ]),
);

export const derivedRelationSchema: z.ZodType<DerivedRelation, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string().min(1).transform((name) => ({ type: "ref" as const, name })),
    z.object({
      type: z.literal("role_group_pick"),
      role: z.string().min(1),
      pick: z.enum(["one", "all"]).default("one"),
    }),
    z.object({ type: z.literal("person_set"), set: z.string().min(1) }),
    z.object({ type: z.literal("unit_of_primary") }),
    z.object({ type: z.literal("role_of_primary"), role: z.string().min(1) }),
    z.object({ type: z.literal("composite_first_supported"), order: z.array(derivedRelationSchema).min(1) }),
    z
      .object({ type: z.string().min(1) })
      .passthrough()
      .refine((node) => !RELATION_TYPES.has(node.type), (node) => ({
        message: `malformed '${node.type}' relation`,
      }))
      .transform((node) => ({ type: "unsupported" as const, token: node.type })),
  ]),
);
