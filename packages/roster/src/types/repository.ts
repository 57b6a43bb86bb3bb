import type { CharacterRecord, Unit } from "./roster.js";

/**
 * Abstract interface for roster data access. The hosting application reads
 * the company from here and hands the simulation an id-indexed snapshot.
 */
export interface IRosterRepository {
  // Character operations
  createCharacter(character: CharacterRecord): Promise<void>;
  getCharacter(id: string): Promise<CharacterRecord | null>;
  getAllCharacters(): Promise<CharacterRecord[]>;
  updateCharacter(id: string, updates: Partial<Omit<CharacterRecord, "id">>): Promise<void>;

  // Unit operations
  createUnit(unit: Unit): Promise<void>;
  getUnit(id: string): Promise<Unit | null>;
  getAllUnits(): Promise<Unit[]>;
  getUnitMembers(unitId: string): Promise<CharacterRecord[]>;

  // Lifecycle
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}
