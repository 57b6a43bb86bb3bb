import type { FilterDefinition, ResolverMapsFile } from "../config/schemas.js";
import type { TokenReporter } from "../event-log.js";
import type { Character, Roster } from "../types.js";

export type CharacterPredicate = (character: Character) => boolean;

export type FilterHook = CharacterPredicate;

/**
 * Placeholder hooks. Both answer from personnel status alone; hosts that
 * track deployment or deaths pass their own through `filterHooks`.
 */
export const DEFAULT_FILTER_HOOKS: Readonly<Record<string, FilterHook>> = {
  // TODO: read deployment state instead of status once characters carry a location.
  present: (c) => c.status?.toUpperCase() === "ACTIVE",
  // TODO: use the death record once the roster import carries one; MIA counts as alive until then.
  alive: (c) => c.status?.toUpperCase() !== "KIA",
};

/** Candidate criteria shared by selection rules, requirements and person sets. */
export interface CandidateCriteria {
  role?: string;
  exclude_roles?: readonly string[];
  filters?: readonly string[];
  age_group?: string;
  person_set?: string;
}

/**
 * Interprets roles, filters, age groups and person sets against a roster.
 * Any token missing from the resolver maps is reported once and the
 * lookup answers with an empty result.
 */
export class ParticipantResolver {
  constructor(
    private readonly maps: ResolverMapsFile,
    private readonly hooks: Readonly<Record<string, FilterHook>> = DEFAULT_FILTER_HOOKS,
  ) {}

  /** Concrete profession tags for an abstract role, or `null` if the role is unknown. */
  resolveRole(role: string, reporter: TokenReporter): string[] | null {
    const tags = this.maps.roles[role];
    if (!tags) {
      reporter.unknown("role", role);
      return null;
    }
    return tags.map((t) => t.toUpperCase());
  }

  matchesRole(character: Character, role: string, reporter: TokenReporter): boolean {
    const tags = this.resolveRole(role, reporter);
    return tags !== null && hasAnyTag(character, tags);
  }

  filterByRole(characters: Iterable<Character>, role: string, reporter: TokenReporter): Character[] {
    const tags = this.resolveRole(role, reporter);
    if (tags === null) return [];
    return [...characters].filter((c) => hasAnyTag(c, tags));
  }

  /** Compiles a named filter, following aliases. */
  compileFilter(name: string, reporter: TokenReporter): CharacterPredicate | null {
    const visited = new Set<string>();
    let current = name;
    for (;;) {
      const def: FilterDefinition | undefined = this.maps.filters[current];
      if (!def || visited.has(current)) {
        reporter.unknown("filter", current);
        return null;
      }
      visited.add(current);
      switch (def.type) {
        case "alias_of":
          current = def.target;
          continue;
        case "status_in": {
          const allowed = new Set(def.values.map((v) => v.toUpperCase()));
          const field = def.field;
          return (c) => {
            const value = c[field];
            return value !== undefined && allowed.has(value.toUpperCase());
          };
        }
        case "hook": {
          const hook = this.hooks[def.hook];
          if (!hook) {
            reporter.unknown("filter", `${current} (hook '${def.hook}')`);
            return null;
          }
          return hook;
        }
      }
    }
  }

  applyFilter(character: Character, name: string, reporter: TokenReporter): boolean {
    return this.compileFilter(name, reporter)?.(character) ?? false;
  }

  filterByFilters(characters: Iterable<Character>, names: readonly string[], reporter: TokenReporter): Character[] {
    const predicates = this.compileFilters(names, reporter);
    if (predicates === null) return [];
    return [...characters].filter((c) => predicates.every((p) => p(c)));
  }

  /** First configured age group containing the character's age. */
  ageGroupOf(character: Character): string | null {
    if (character.age === undefined) return null;
    for (const [name, group] of Object.entries(this.maps.age_groups)) {
      if (character.age >= group.min && (group.max === undefined || character.age <= group.max)) return name;
    }
    return null;
  }

  compileAgeGroup(name: string, reporter: TokenReporter): CharacterPredicate | null {
    const group = this.maps.age_groups[name];
    if (!group) {
      reporter.unknown("age_group", name);
      return null;
    }
    return (c) => c.age !== undefined && c.age >= group.min && (group.max === undefined || c.age <= group.max);
  }

  filterByAgeGroup(characters: Iterable<Character>, name: string, reporter: TokenReporter): Character[] {
    const inGroup = this.compileAgeGroup(name, reporter);
    if (inGroup === null) return [];
    return [...characters].filter(inGroup);
  }

  resolvePersonSet(name: string, roster: Roster, reporter: TokenReporter): Character[] {
    const set = this.maps.person_sets[name];
    if (!set) {
      reporter.unknown("person_set", name);
      return [];
    }
    return this.select(roster, set, reporter);
  }

  /**
   * Characters meeting every criterion, in roster order. All tokens are
   * resolved before the roster is scanned, so an unknown token is reported
   * even when the roster is empty.
   */
  select(roster: Roster, criteria: CandidateCriteria, reporter: TokenReporter): Character[] {
    const checks: CharacterPredicate[] = [];
    let resolved = true;

    if (criteria.role !== undefined) {
      const tags = this.resolveRole(criteria.role, reporter);
      if (tags === null) resolved = false;
      else checks.push((c) => hasAnyTag(c, tags));
    }
    for (const role of criteria.exclude_roles ?? []) {
      const tags = this.resolveRole(role, reporter);
      if (tags === null) resolved = false;
      else checks.push((c) => !hasAnyTag(c, tags));
    }
    const filters = this.compileFilters(criteria.filters ?? [], reporter);
    if (filters === null) resolved = false;
    else checks.push(...filters);
    if (criteria.age_group !== undefined) {
      const inGroup = this.compileAgeGroup(criteria.age_group, reporter);
      if (inGroup === null) resolved = false;
      else checks.push(inGroup);
    }
    let pool: Iterable<Character> = roster.values();
    if (criteria.person_set !== undefined) {
      if (this.maps.person_sets[criteria.person_set]) {
        pool = this.resolvePersonSet(criteria.person_set, roster, reporter);
      } else {
        reporter.unknown("person_set", criteria.person_set);
        resolved = false;
      }
    }

    if (!resolved) return [];
    return [...pool].filter((c) => checks.every((check) => check(c)));
  }

  private compileFilters(names: readonly string[], reporter: TokenReporter): CharacterPredicate[] | null {
    const out: CharacterPredicate[] = [];
    let resolved = true;
    for (const name of names) {
      const p = this.compileFilter(name, reporter);
      if (p === null) resolved = false;
      else out.push(p);
    }
    return resolved ? out : null;
  }
}

function hasAnyTag(character: Character, tags: readonly string[]): boolean {
  const own = [character.profession, character.secondaryProfession];
  return own.some((p) => p !== undefined && tags.includes(p.toUpperCase()));
}
