import type {
  ContextModifier,
  InteractionDefinition,
  InteractionsFile,
  RelationshipKind,
} from "../config/schemas.js";
import type { TokenReporter } from "../event-log.js";
import type { RelationshipStateQuery } from "../relationships/state-query.js";

export interface SelectedInteraction {
  name: string;
  domain: string;
  description: string;
  participants: string[];
  environment: string | null;
  tone: string | null;
  relationshipKind: RelationshipKind | null;
  weight: number;
  /** Check modifiers contributed by the context, applied by the resolver. */
  modifiers: { environment: number; tone: number };
}

export interface InteractionContext {
  domain: string;
  participants: readonly string[];
  environment?: string | null;
  tone?: string | null;
  /** Restricts the catalogue to these interaction names. */
  allowed?: readonly string[];
}

export interface WeightedInteraction {
  name: string;
  definition: InteractionDefinition;
  weight: number;
}

export interface InteractionSelectorOptions {
  interactions: InteractionsFile;
  query: RelationshipStateQuery;
  /** Uniform draw in [0, 1). */
  random?: () => number;
}

/**
 * Layer 2: picks one interaction from a domain's catalogue by weighted
 * draw. Weight is the base weight plus environment and tone modifiers,
 * floored at zero, then scaled by the relationship of the first two
 * participants when the interaction declares a relationship kind.
 */
export class InteractionSelector {
  private readonly catalog: InteractionsFile;
  private readonly query: RelationshipStateQuery;
  private readonly random: () => number;

  constructor(options: InteractionSelectorOptions) {
    this.catalog = options.interactions;
    this.query = options.query;
    this.random = options.random ?? Math.random;
  }

  candidates(context: InteractionContext, reporter: TokenReporter): WeightedInteraction[] {
    const domain = this.catalog.domains[context.domain];
    if (!domain) {
      reporter.unknown("domain", context.domain);
      return [];
    }
    const environment = this.context("environment", context.environment, reporter);
    const tone = this.context("tone", context.tone, reporter);
    if (environment && environment.domains.length > 0 && !environment.domains.includes(context.domain)) {
      return [];
    }

    const out: WeightedInteraction[] = [];
    for (const [name, definition] of Object.entries(domain.interactions)) {
      if (context.allowed && !context.allowed.includes(name)) continue;
      if (context.participants.length < definition.min_participants) continue;
      const weight = this.weigh(name, definition, context.participants, environment, tone);
      out.push({ name, definition, weight });
    }
    return out;
  }

  select(context: InteractionContext, reporter: TokenReporter): SelectedInteraction | null {
    const pool = this.candidates(context, reporter).filter((c) => c.weight > 0);
    const total = pool.reduce((sum, c) => sum + c.weight, 0);
    if (pool.length === 0 || total <= 0) return null;

    const roll = this.random() * total;
    let acc = 0;
    let chosen = pool[pool.length - 1];
    for (const c of pool) {
      acc += c.weight;
      if (roll < acc) {
        chosen = c;
        break;
      }
    }

    const environment = this.context("environment", context.environment, reporter);
    const tone = this.context("tone", context.tone, reporter);
    return {
      name: chosen.name,
      domain: context.domain,
      description: chosen.definition.description,
      participants: [...context.participants],
      environment: environment ? (context.environment ?? null) : null,
      tone: tone ? (context.tone ?? null) : null,
      relationshipKind: chosen.definition.relationship_kind ?? null,
      weight: chosen.weight,
      modifiers: {
        environment: environment?.check_modifiers.difficulty ?? 0,
        tone: tone?.check_modifiers.difficulty ?? 0,
      },
    };
  }

  private weigh(
    name: string,
    definition: InteractionDefinition,
    participants: readonly string[],
    environment: ContextModifier | null,
    tone: ContextModifier | null,
  ): number {
    let weight = definition.base_weight;
    weight += environment?.interaction_weight_modifiers[name] ?? 0;
    weight += tone?.interaction_weight_modifiers[name] ?? 0;
    weight = Math.max(0, weight);

    const [a, b] = participants;
    if (definition.relationship_kind && a !== undefined && b !== undefined && a !== b) {
      weight *= this.query.interactionWeightModifier(a, b, definition.relationship_kind);
    }
    return weight;
  }

  private context(
    kind: "environment" | "tone",
    name: string | null | undefined,
    reporter: TokenReporter,
  ): ContextModifier | null {
    if (name === undefined || name === null) return null;
    const table = kind === "environment" ? this.catalog.environments : this.catalog.tones;
    const found = table[name];
    if (!found) {
      reporter.unknown(kind, name);
      return null;
    }
    return found;
  }
}
