import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { rosterSeedSchema } from "./schema.js";
import type { IRosterRepository } from "./types/repository.js";
import type { RosterSeed } from "./types/roster.js";

export const DEFAULT_SEED_PATH = fileURLToPath(new URL("../data/seed-roster.json", import.meta.url));

export function parseRosterSeed(raw: unknown): RosterSeed {
  const result = rosterSeedSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`invalid roster seed at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
  }
  return result.data;
}

export function loadRosterSeed(path: string = DEFAULT_SEED_PATH): RosterSeed {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseRosterSeed(raw);
}

export async function seedData(repo: IRosterRepository, seed: RosterSeed = loadRosterSeed()): Promise<void> {
  for (const unit of seed.units) {
    await repo.createUnit(unit);
  }
  for (const character of seed.characters) {
    await repo.createCharacter(character);
  }
}
