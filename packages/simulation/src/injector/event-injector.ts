import type { AvailabilityRequirement, EventDefinition, SelectionRule } from "../config/schemas.js";
import type { TokenReporter } from "../event-log.js";
import { allPairs } from "../pair.js";
import type { PredicateExpr } from "../resolvers/dsl.js";
import type { ParticipantResolver } from "../resolvers/participant-resolver.js";
import type { RelationshipResolver } from "../resolvers/relationship-resolver.js";
import type { Roster, SimDate } from "../types.js";
import type { EventCatalog } from "./event-catalog.js";
import { seededShuffle, selectionSeed } from "./seeded-shuffle.js";

export interface AvailabilityResult {
  available: boolean;
  reasons: string[];
}

export interface EventInstance {
  eventId: string;
  name: string;
  category: string;
  domain: string;
  date: SimDate | null;
  environment: string | null;
  tone: string | null;
  primary: string[];
  derived: string[];
  /** Primary participants first, then derived ones, without duplicates. */
  participants: string[];
}

export type InjectionResult =
  | { status: "injected"; instance: EventInstance }
  | { status: "unavailable"; eventId: string; reasons: string[] };

interface SelectionShape {
  /** Fewest primary participants the event can run with. */
  min: number;
  /** Most primary participants to take; `null` takes every candidate. */
  take: number | null;
}

export interface EventInjectorOptions {
  catalog: EventCatalog;
  participants: ParticipantResolver;
  relationships: RelationshipResolver;
  /** Creates the warning reporter for one operation on one event. */
  reporterFor: (origin: string) => TokenReporter;
}

/**
 * Layer 1: decides whether an event can occur and who takes part. Reads
 * the roster and relationship state; writes nothing.
 */
export class EventInjector {
  private readonly catalog: EventCatalog;
  private readonly participants: ParticipantResolver;
  private readonly relationships: RelationshipResolver;
  private readonly reporterFor: (origin: string) => TokenReporter;

  constructor(options: EventInjectorOptions) {
    this.catalog = options.catalog;
    this.participants = options.participants;
    this.relationships = options.relationships;
    this.reporterFor = options.reporterFor;
  }

  checkAvailability(eventId: string, roster: Roster): AvailabilityResult {
    const event = this.catalog.get(eventId);
    return this.availability(event, roster, this.reporterFor(eventId));
  }

  getEligibleCandidates(eventId: string, roster: Roster, date?: SimDate): string[] {
    const event = this.catalog.get(eventId);
    const candidates = this.eligible(event.selection, roster, this.reporterFor(eventId));
    return date === undefined ? candidates : seededShuffle(candidates, selectionSeed(date, eventId));
  }

  selectParticipants(eventId: string, roster: Roster, date?: SimDate): string[] {
    const event = this.catalog.get(eventId);
    return this.select(eventId, event, roster, date, this.reporterFor(eventId));
  }

  resolveDerivedParticipants(eventId: string, primary: readonly string[], roster: Roster): string[] {
    const event = this.catalog.get(eventId);
    return this.derived(event, primary, roster, this.reporterFor(eventId));
  }

  inject(eventId: string, roster: Roster, date: SimDate | null): InjectionResult {
    const event = this.catalog.get(eventId);
    const reporter = this.reporterFor(eventId);

    const availability = this.availability(event, roster, reporter);
    if (!availability.available) return { status: "unavailable", eventId, reasons: availability.reasons };

    const primary = this.select(eventId, event, roster, date ?? undefined, reporter);
    const shape = this.shapeOf(event.selection, reporter);
    if (shape === null || primary.length < shape.min) {
      return { status: "unavailable", eventId, reasons: ["No participant combination satisfies the selection rule"] };
    }
    const derived = this.derived(event, primary, roster, reporter);
    return {
      status: "injected",
      instance: {
        eventId,
        name: event.name,
        category: event.category,
        domain: event.domain,
        date,
        environment: event.environment ?? null,
        tone: event.tone ?? null,
        primary,
        derived,
        participants: [...primary, ...derived],
      },
    };
  }

  /** Ids of every event currently available for the roster, in catalog order. */
  availableEvents(roster: Roster): string[] {
    return this.catalog.ids().filter((id) => this.checkAvailability(id, roster).available);
  }

  private availability(event: EventDefinition, roster: Roster, reporter: TokenReporter): AvailabilityResult {
    const reasons: string[] = [];
    const shape = this.shapeOf(event.selection, reporter);
    if (shape === null) {
      return { available: false, reasons: [`Unsupported selection type '${event.selection.type}'`] };
    }

    if (event.availability.requires.length > 0) {
      for (const req of event.availability.requires) {
        const found = this.countFor(req, roster, reporter);
        if (found < req.min_count) reasons.push(`Requires ${req.min_count} ${requirementLabel(req)}(s), found ${found}`);
      }
    } else {
      const found = this.eligible(event.selection, roster, reporter).length;
      if (found < shape.min) reasons.push(`Requires ${shape.min} eligible participant(s), found ${found}`);
    }

    const predicate = event.availability.pair_predicate;
    if (predicate && reasons.length === 0) {
      const candidates = this.eligible(event.selection, roster, reporter);
      const satisfied = allPairs(candidates).some(([a, b]) =>
        this.relationships.evaluatePairPredicate(predicate, a, b, reporter),
      );
      if (!satisfied) reasons.push(`Requires a pair satisfying '${describePredicate(predicate)}'`);
    }

    return { available: reasons.length === 0, reasons };
  }

  private countFor(req: AvailabilityRequirement, roster: Roster, reporter: TokenReporter): number {
    return this.participants.select(
      roster,
      {
        role: req.any_person ? undefined : req.role,
        exclude_roles: req.exclude_roles,
        filters: req.filters,
        age_group: req.age_group,
      },
      reporter,
    ).length;
  }

  private eligible(rule: SelectionRule, roster: Roster, reporter: TokenReporter): string[] {
    return this.participants
      .select(
        roster,
        {
          role: rule.role,
          exclude_roles: rule.exclude_roles,
          filters: rule.filters,
          age_group: rule.age_group,
          person_set: rule.person_set,
        },
        reporter,
      )
      .map((c) => c.id);
  }

  private select(
    eventId: string,
    event: EventDefinition,
    roster: Roster,
    date: SimDate | undefined,
    reporter: TokenReporter,
  ): string[] {
    const rule = event.selection;
    const shape = this.shapeOf(rule, reporter);
    if (shape === null || shape.take === 0) return [];

    const eligible = this.eligible(rule, roster, reporter);
    const ordered = date === undefined ? eligible : seededShuffle(eligible, selectionSeed(date, eventId));
    if (ordered.length < shape.min) return [];

    if (rule.type === "pair" && rule.pair_predicate) {
      const predicate = rule.pair_predicate;
      const match = allPairs(ordered).find(([a, b]) =>
        this.relationships.evaluatePairPredicate(predicate, a, b, reporter),
      );
      return match ? [...match] : [];
    }
    return shape.take === null ? ordered : ordered.slice(0, shape.take);
  }

  private derived(
    event: EventDefinition,
    primary: readonly string[],
    roster: Roster,
    reporter: TokenReporter,
  ): string[] {
    if (!event.derived) return [];
    const ids = this.relationships.resolveDerivedRule(event.derived, primary[0] ?? null, roster, reporter, new Set(primary));
    return [...new Set(ids)];
  }

  private shapeOf(rule: SelectionRule, reporter: TokenReporter): SelectionShape | null {
    switch (rule.type) {
      case "none":
        return { min: 0, take: 0 };
      case "single_person":
        return { min: 1, take: 1 };
      case "pair":
        return { min: 2, take: 2 };
      case "multiple_persons": {
        const min = rule.count ?? rule.min ?? 1;
        return { min, take: rule.count ?? rule.max ?? null };
      }
      default:
        reporter.unknown("selection", rule.type);
        return null;
    }
  }
}

function requirementLabel(req: AvailabilityRequirement): string {
  const base = req.any_person || req.role === undefined ? "person" : req.role;
  return req.age_group ? `${req.age_group} ${base}` : base;
}

function describePredicate(expr: PredicateExpr): string {
  switch (expr.type) {
    case "ref":
      return expr.name;
    case "unsupported":
      return expr.token;
    default:
      return expr.type;
  }
}
