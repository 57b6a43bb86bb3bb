import { describe, it, expect } from "vitest";
import { resolverMapsFileSchema } from "../config/schemas.js";
import { DEFAULT_FILTER_HOOKS, ParticipantResolver } from "../resolvers/participant-resolver.js";
import { rosterOf } from "../types.js";
import { defaultConfig, person, reporterFor, smallRoster } from "./fixtures.js";

const maps = defaultConfig().resolverMaps;

function ids(list: { id: string }[]): string[] {
  return list.map((c) => c.id);
}

describe("ParticipantResolver", () => {
  const resolver = new ParticipantResolver(maps);
  const roster = smallRoster();

  it("matches roles against primary and secondary profession", () => {
    const reporter = reporterFor();
    const commander = person("cmd", "COMMANDER", { secondaryProfession: "MechWarrior" });
    expect(resolver.matchesRole(commander, "MEKWARRIOR", reporter)).toBe(true);
    expect(resolver.matchesRole(commander, "COMMAND", reporter)).toBe(true);
    expect(resolver.matchesRole(commander, "TECHNICIAN", reporter)).toBe(false);
  });

  it("combines role and filters", () => {
    const picked = resolver.select(roster, { role: "MEKWARRIOR", filters: ["present"] }, reporterFor());
    expect(ids(picked)).toEqual(["mw1", "mw2", "mw3"]);
  });

  it("follows filter aliases", () => {
    const reporter = reporterFor();
    expect(ids(resolver.filterByFilters(roster.values(), ["on_duty"], reporter))).toEqual(
      ids(resolver.filterByFilters(roster.values(), ["present"], reporter)),
    );
    expect(ids(resolver.filterByFilters(roster.values(), ["injured"], reporter))).toEqual(["mw4"]);
  });

  it("resolves person sets", () => {
    const crew = resolver.resolvePersonSet("active_crew", roster, reporterFor());
    expect(ids(crew)).toEqual(["mw1", "mw2", "mw3", "tech1", "tech2", "doc"]);
    expect(ids(resolver.resolvePersonSet("kids", roster, reporterFor()))).toEqual(["kid"]);
  });

  it("classifies ages into groups", () => {
    expect(resolver.ageGroupOf(person("a", "ASTECH", { age: 19 }))).toBe("TEEN");
    expect(resolver.ageGroupOf(person("b", "ASTECH", { age: 61 }))).toBe("SENIOR");
    expect(resolver.ageGroupOf(person("c", "ASTECH", { age: undefined }))).toBeNull();
    expect(ids(resolver.filterByAgeGroup(roster.values(), "YOUNG_ADULT", reporterFor()))).toEqual(["mw3"]);
  });

  it("excludes the fallen through the alive hook", () => {
    const withFallen = rosterOf([person("kid1", "DEPENDENT", { age: 7 }), person("kid2", "DEPENDENT", { age: 9, status: "KIA" })]);
    expect(ids(resolver.resolvePersonSet("kids", withFallen, reporterFor()))).toEqual(["kid1"]);
  });

  it("treats only active personnel as present by default", () => {
    const mixed = rosterOf([
      person("a", "MECHWARRIOR"),
      person("b", "MECHWARRIOR", { status: "ON_LEAVE" }),
      person("c", "MECHWARRIOR", { status: "active" }),
      person("d", "MECHWARRIOR", { status: undefined }),
    ]);
    expect(ids(resolver.filterByFilters(mixed.values(), ["present"], reporterFor()))).toEqual(["a", "c"]);
  });

  it("lets the host replace the present hook", () => {
    const deployed = new ParticipantResolver(maps, { ...DEFAULT_FILTER_HOOKS, present: (c) => c.unit === "alpha" });
    const picked = deployed.select(roster, { role: "MEKWARRIOR", filters: ["on_duty"] }, reporterFor());
    expect(ids(picked)).toEqual(["mw1", "mw2"]);
  });

  it("takes host filter hooks", () => {
    const custom = new ParticipantResolver(maps, { alive: (c) => c.id !== "kid" });
    expect(ids(custom.resolvePersonSet("kids", roster, reporterFor()))).toEqual([]);
  });

  it("answers empty for an unknown role and reports it once", () => {
    const reporter = reporterFor("1003");
    expect(resolver.select(roster, { role: "HR" }, reporter)).toEqual([]);
    expect(resolver.filterByRole(roster.values(), "HR", reporter)).toEqual([]);
    expect(reporter.warnings).toEqual([{ type: "unknown_token", category: "role", token: "HR", origin: "1003" }]);
  });

  it("reports unknown tokens even for an empty roster", () => {
    const reporter = reporterFor();
    const picked = resolver.select(
      rosterOf([]),
      { role: "MEKWARRIOR", filters: ["caffeinated"], age_group: "ANCIENT", person_set: "night_shift" },
      reporter,
    );
    expect(picked).toEqual([]);
    expect(reporter.warnings.map((w) => `${w.category}:${w.token}`)).toEqual([
      "filter:caffeinated",
      "age_group:ANCIENT",
      "person_set:night_shift",
    ]);
  });

  it("stops on alias cycles", () => {
    const looping = new ParticipantResolver(
      resolverMapsFileSchema.parse({
        filters: {
          ready: { type: "alias_of", target: "set" },
          set: { type: "alias_of", target: "ready" },
        },
      }),
    );
    const reporter = reporterFor();
    expect(looping.filterByFilters(roster.values(), ["ready"], reporter)).toEqual([]);
    expect(reporter.warnings.map((w) => w.token)).toEqual(["ready"]);
  });

  it("reports a filter whose hook is missing", () => {
    const hookless = new ParticipantResolver(maps, {});
    const reporter = reporterFor();
    expect(hookless.applyFilter(person("x", "DEPENDENT"), "alive", reporter)).toBe(false);
    expect(reporter.warnings[0].token).toBe("alive (hook 'alive')");
  });
});
