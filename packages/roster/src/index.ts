export type { IRosterRepository } from "./types/repository.js";
export type { CharacterRecord, Unit, RosterSeed, PersonnelStatus } from "./types/roster.js";
export { InMemoryRosterRepository } from "./memory/in-memory-repository.js";
export { characterRecordSchema, unitSchema, rosterSeedSchema } from "./schema.js";
export { seedData, loadRosterSeed, parseRosterSeed, DEFAULT_SEED_PATH } from "./seed.js";
