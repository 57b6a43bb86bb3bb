import { RuntimeInvariantError } from "./errors.js";

export type PairKey = `${string}::${string}`;

export const PAIR_SEPARATOR = "::";

/** Canonical key of an unordered pair; `pairKey(a, b) === pairKey(b, a)`. */
export function pairKey(a: string, b: string): PairKey {
  if (a === b) throw new RuntimeInvariantError(`a relationship needs two distinct characters, got '${a}' twice`);
  for (const id of [a, b]) {
    if (id.includes(PAIR_SEPARATOR)) throw new RuntimeInvariantError(`character id '${id}' contains '${PAIR_SEPARATOR}'`);
  }
  const [lo, hi] = a < b ? [a, b] : [b, a];
  return `${lo}${PAIR_SEPARATOR}${hi}`;
}

export function isPairKey(subject: string): subject is PairKey {
  return subject.includes(PAIR_SEPARATOR);
}

export function pairMembers(key: PairKey): [string, string] {
  const at = key.indexOf(PAIR_SEPARATOR);
  return [key.slice(0, at), key.slice(at + PAIR_SEPARATOR.length)];
}

/** Every unordered pair of the given ids, in list order. */
export function allPairs(ids: readonly string[]): [string, string][] {
  const pairs: [string, string][] = [];
  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      if (ids[i] !== ids[j]) pairs.push([ids[i], ids[j]]);
    }
  }
  return pairs;
}
