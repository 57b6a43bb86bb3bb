/**
 * A campaign character as the host supplies it. The core reads these
 * fields and never writes them.
 */
export interface Character {
  id: string;
  name?: string;
  profession?: string;
  secondaryProfession?: string;
  status?: string;
  age?: number;
  unit?: string;
  skills?: Readonly<Record<string, number>>;
  attributes?: Readonly<Record<string, number>>;
}

/** Id-indexed roster; iteration order is the candidate order. */
export type Roster = ReadonlyMap<string, Character>;

/** In-story date, `YYYY-MM-DD`. */
export type SimDate = string;

export type TriggerValue = string | number | boolean | string[];

export interface Trigger {
  kind: string;
  source: string;
  subjects: readonly string[];
  params: Readonly<Record<string, TriggerValue>>;
}

export function rosterOf(characters: Iterable<Character>): Roster {
  const roster = new Map<string, Character>();
  for (const c of characters) roster.set(c.id, c);
  return roster;
}
