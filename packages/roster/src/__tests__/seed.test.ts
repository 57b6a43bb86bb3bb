import { describe, it, expect } from "vitest";
import { InMemoryRosterRepository } from "../memory/in-memory-repository.js";
import { loadRosterSeed, parseRosterSeed, seedData } from "../seed.js";

describe("roster seed", () => {
  it("loads the shipped company", () => {
    const seed = loadRosterSeed();
    expect(seed.characters).toHaveLength(15);
    expect(seed.units.map((u) => u.id)).toEqual(["hq", "alpha", "bravo", "support"]);
    expect(seed.characters.filter((c) => c.profession === "MECHWARRIOR")).toHaveLength(5);
  });

  it("seeds a repository", async () => {
    const repo = new InMemoryRosterRepository();
    await seedData(repo);
    expect(await repo.getCharacter("c01")).toMatchObject({ name: "Mara Okafor", profession: "COMMANDER" });
    expect((await repo.getUnitMembers("alpha")).map((c) => c.id)).toEqual(["c02", "c03", "c04"]);
  });

  it("defaults missing skill and attribute tables", () => {
    const seed = parseRosterSeed({
      characters: [{ id: "x", name: "X", profession: "ASTECH", status: "ACTIVE", age: 20 }],
    });
    expect(seed.characters[0].skills).toEqual({});
    expect(seed.units).toEqual([]);
  });

  it("rejects duplicate ids", () => {
    const c = { id: "x", name: "X", profession: "ASTECH", status: "ACTIVE", age: 20 };
    expect(() => parseRosterSeed({ characters: [c, c] })).toThrow("invalid roster seed at characters.1.id: duplicate id 'x'");
  });

  it("rejects characters in undeclared units", () => {
    expect(() =>
      parseRosterSeed({
        characters: [{ id: "x", name: "X", profession: "ASTECH", status: "ACTIVE", age: 20, unit: "zulu" }],
      }),
    ).toThrow("unknown unit 'zulu'");
  });

  it("rejects unknown statuses", () => {
    expect(() =>
      parseRosterSeed({ characters: [{ id: "x", name: "X", profession: "ASTECH", status: "ASLEEP", age: 20 }] }),
    ).toThrow("invalid roster seed at characters.0.status");
  });
});
