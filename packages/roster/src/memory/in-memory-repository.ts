import type { IRosterRepository } from "../types/repository.js";
import type { CharacterRecord, Unit } from "../types/roster.js";

function copyCharacter(c: CharacterRecord): CharacterRecord {
  return { ...c, skills: { ...c.skills }, attributes: { ...c.attributes } };
}

export class InMemoryRosterRepository implements IRosterRepository {
  private characters = new Map<string, CharacterRecord>();
  private units = new Map<string, Unit>();

  async connect(): Promise<void> {
    // no-op for in-memory
  }

  async disconnect(): Promise<void> {
    this.characters.clear();
    this.units.clear();
  }

  async createCharacter(character: CharacterRecord): Promise<void> {
    this.characters.set(character.id, copyCharacter(character));
  }

  async getCharacter(id: string): Promise<CharacterRecord | null> {
    const c = this.characters.get(id);
    return c ? copyCharacter(c) : null;
  }

  /** Insertion order, which is the simulation's candidate order. */
  async getAllCharacters(): Promise<CharacterRecord[]> {
    return [...this.characters.values()].map(copyCharacter);
  }

  async updateCharacter(id: string, updates: Partial<Omit<CharacterRecord, "id">>): Promise<void> {
    const character = this.characters.get(id);
    if (character) {
      this.characters.set(id, copyCharacter({ ...character, ...updates, id }));
    }
  }

  // Unit operations
  async createUnit(unit: Unit): Promise<void> {
    this.units.set(unit.id, { ...unit });
  }

  async getUnit(id: string): Promise<Unit | null> {
    const unit = this.units.get(id);
    return unit ? { ...unit } : null;
  }

  async getAllUnits(): Promise<Unit[]> {
    return [...this.units.values()].map((u) => ({ ...u }));
  }

  async getUnitMembers(unitId: string): Promise<CharacterRecord[]> {
    return [...this.characters.values()].filter((c) => c.unit === unitId).map(copyCharacter);
  }
}
