import type { DerivedRule, ResolverMapsFile } from "../config/schemas.js";
import type { TokenReporter } from "../event-log.js";
import type { RelationshipStateQuery } from "../relationships/state-query.js";
import type { Roster } from "../types.js";
import type { DerivedRelation, PredicateExpr } from "./dsl.js";
import type { ParticipantResolver } from "./participant-resolver.js";

const MAX_REF_DEPTH = 16;

/**
 * Evaluates pair predicates and derived-participant relations. Reads
 * relationship state only through the state query.
 */
export class RelationshipResolver {
  constructor(
    private readonly maps: ResolverMapsFile,
    private readonly query: RelationshipStateQuery,
    private readonly participants: ParticipantResolver,
  ) {}

  /** `false` whenever any part of the expression is unknown. */
  evaluatePairPredicate(expr: PredicateExpr, a: string, b: string, reporter: TokenReporter): boolean {
    if (a === b) return false;
    return this.evaluate(expr, a, b, reporter, 0) === true;
  }

  /**
   * Derived participants for `primary`, never including anyone in
   * `exclude`. Unknown relations resolve to an empty list.
   */
  resolveDerived(
    relation: DerivedRelation,
    primary: string | null,
    roster: Roster,
    reporter: TokenReporter,
    exclude: ReadonlySet<string> = new Set(),
  ): string[] {
    return this.derive(relation, primary, roster, reporter, exclude, 0) ?? [];
  }

  /** Applies a derived rule: relation, then the rule's own filters, then its cap. */
  resolveDerivedRule(
    rule: DerivedRule,
    primary: string | null,
    roster: Roster,
    reporter: TokenReporter,
    exclude: ReadonlySet<string>,
  ): string[] {
    const ids = this.resolveDerived(rule.relation, primary, roster, reporter, exclude);
    const characters = ids.flatMap((id) => {
      const c = roster.get(id);
      return c ? [c] : [];
    });
    const filtered = this.participants.filterByFilters(characters, rule.filters, reporter).map((c) => c.id);
    return rule.max === undefined ? filtered : filtered.slice(0, rule.max);
  }

  /** Whether a relation, after following references, has an implementation. */
  isSupported(relation: DerivedRelation, depth = 0): boolean {
    if (depth > MAX_REF_DEPTH) return false;
    switch (relation.type) {
      case "unsupported":
        return false;
      case "ref": {
        const target = this.maps.derived_relations[relation.name];
        return target !== undefined && this.isSupported(target, depth + 1);
      }
      default:
        return true;
    }
  }

  // null means "could not be evaluated"; it propagates to the top.
  private evaluate(expr: PredicateExpr, a: string, b: string, reporter: TokenReporter, depth: number): boolean | null {
    switch (expr.type) {
      case "ref": {
        const target = this.maps.pair_predicates[expr.name];
        if (!target || depth > MAX_REF_DEPTH) {
          reporter.unknown("predicate", expr.name);
          return null;
        }
        return this.evaluate(target, a, b, reporter, depth + 1);
      }
      case "has_flag":
        return this.query.hasFlag(a, b, expr.flag);
      case "has_any_flag":
        return expr.flags.some((f) => this.query.hasFlag(a, b, f));
      case "has_sentiment":
        return this.query.hasSentiment(a, b, expr.sentiment, expr.min);
      case "has_role":
        return this.query.hasRole(a, b, expr.role);
      case "relationship_exists":
        return this.query.relationshipExists(a, b);
      case "axis_at_least":
      case "axis_at_most": {
        if (!this.query.hasAxis(expr.axis)) {
          reporter.unknown("predicate", `${expr.type}(${expr.axis})`);
          return null;
        }
        const value = this.query.getAxis(a, b, expr.axis);
        return expr.type === "axis_at_least" ? value >= expr.value : value <= expr.value;
      }
      case "not": {
        const inner = this.evaluate(expr.expr, a, b, reporter, depth + 1);
        return inner === null ? null : !inner;
      }
      case "and":
      case "or": {
        const parts = (expr.type === "and" ? expr.all : expr.any).map((e) =>
          this.evaluate(e, a, b, reporter, depth + 1),
        );
        if (parts.includes(null)) return null;
        return expr.type === "and" ? parts.every(Boolean) : parts.some(Boolean);
      }
      case "unsupported":
        reporter.unknown("predicate", expr.token);
        return null;
    }
  }

  private derive(
    relation: DerivedRelation,
    primary: string | null,
    roster: Roster,
    reporter: TokenReporter,
    exclude: ReadonlySet<string>,
    depth: number,
  ): string[] | null {
    const keep = (id: string): boolean => !exclude.has(id) && id !== primary;

    switch (relation.type) {
      case "ref": {
        const target = this.maps.derived_relations[relation.name];
        if (!target || depth > MAX_REF_DEPTH) {
          reporter.unknown("relation", relation.name);
          return null;
        }
        return this.derive(target, primary, roster, reporter, exclude, depth + 1);
      }
      case "role_group_pick": {
        const ids = this.participants
          .select(roster, { role: relation.role }, reporter)
          .map((c) => c.id)
          .filter(keep);
        return relation.pick === "one" ? ids.slice(0, 1) : ids;
      }
      case "person_set":
        return this.participants
          .resolvePersonSet(relation.set, roster, reporter)
          .map((c) => c.id)
          .filter(keep);
      case "unit_of_primary": {
        const unit = primary === null ? undefined : roster.get(primary)?.unit;
        if (unit === undefined) return [];
        return [...roster.values()].filter((c) => c.unit === unit).map((c) => c.id).filter(keep);
      }
      case "role_of_primary": {
        if (primary === null) return [];
        for (const c of roster.values()) {
          if (keep(c.id) && this.query.roleHolder(c.id, primary, relation.role) === c.id) return [c.id];
        }
        return [];
      }
      case "composite_first_supported": {
        for (const option of relation.order) {
          if (!this.isSupported(option)) {
            reporter.unknown("relation", option.type === "unsupported" ? option.token : relationName(option));
            continue;
          }
          const ids = this.derive(option, primary, roster, reporter, exclude, depth + 1);
          if (ids && ids.length > 0) return ids;
        }
        return [];
      }
      case "unsupported":
        reporter.unknown("relation", relation.token);
        return null;
    }
  }
}

function relationName(relation: DerivedRelation): string {
  return relation.type === "ref" ? relation.name : relation.type;
}
