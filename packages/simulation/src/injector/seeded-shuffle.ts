import seedrandom from "seedrandom";

/** Fisher–Yates shuffle driven by a seeded PRNG; the input is left untouched. */
export function seededShuffle<T>(items: readonly T[], seed: string): T[] {
  const rng = seedrandom(seed);
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function selectionSeed(date: string, eventId: string): string {
  return `${date}#${eventId}`;
}
