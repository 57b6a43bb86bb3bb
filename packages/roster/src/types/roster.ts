export type PersonnelStatus = "ACTIVE" | "WOUNDED" | "ON_LEAVE" | "MIA" | "KIA" | "RETIRED";

export interface CharacterRecord {
  id: string;
  name: string;
  callsign?: string;
  profession: string;
  secondaryProfession?: string;
  rank?: string;
  status: PersonnelStatus;
  age: number;
  unit?: string;
  skills: Record<string, number>;
  attributes: Record<string, number>;
}

export interface Unit {
  id: string;
  name: string;
  parentId?: string;
}

export interface RosterSeed {
  units: Unit[];
  characters: CharacterRecord[];
}
