import type { RelationshipKind } from "../config/schemas.js";
import type { RelationshipEngine, Sentiment } from "./relationship-engine.js";

export interface RelationshipSummary {
  a: string;
  b: string;
  exists: boolean;
  axes: Record<string, number>;
  sentiments: Record<string, Sentiment>;
  flags: Record<string, number>;
  roles: Record<string, string>;
  states: string[];
  awkward: boolean;
}

/** Gating and weighting thresholds applied to relationship axes. */
export const QUERY_THRESHOLDS = {
  romanticSuppressRomance: -30,
  romanticSuppressBetrayal: 3,
  friendlySuppressFriendship: -50,
  warm: 30,
  fond: 10,
  cold: -10,
  hostile: -30,
  strained: -20,
} as const;

/**
 * Read-only view of relationship state for the event pipeline. Built on
 * the engine's read accessors; every returned object is a copy.
 */
export class RelationshipStateQuery {
  constructor(private readonly engine: RelationshipEngine) {}

  getAxis(a: string, b: string, axis: string): number {
    return this.engine.getAxis(a, b, axis);
  }

  hasAxis(axis: string): boolean {
    return this.engine.hasAxis(axis);
  }

  getFlags(a: string, b: string): Record<string, number> {
    return this.engine.getFlags(a, b);
  }

  getSentiments(a: string, b: string): Record<string, Sentiment> {
    return this.engine.getSentiments(a, b);
  }

  getRoles(a: string, b: string): Record<string, string> {
    return this.engine.getRoles(a, b);
  }

  hasFlag(a: string, b: string, flag: string): boolean {
    return flag in this.engine.getFlags(a, b);
  }

  hasSentiment(a: string, b: string, name: string, minStrength = 1): boolean {
    const s = this.engine.getSentiments(a, b)[name];
    return s !== undefined && s.strength >= minStrength;
  }

  sentimentStrength(a: string, b: string, name: string): number {
    return this.engine.getSentiments(a, b)[name]?.strength ?? 0;
  }

  /** The character holding `role` in the pair's relationship, if any. */
  roleHolder(a: string, b: string, role: string): string | null {
    return this.engine.getRoles(a, b)[role] ?? null;
  }

  hasRole(a: string, b: string, role: string): boolean {
    return this.roleHolder(a, b, role) !== null;
  }

  relationshipExists(a: string, b: string): boolean {
    return a !== b && this.engine.relationshipExists(a, b);
  }

  derivedStates(a: string, b: string): string[] {
    return this.engine.derivedStates(a, b);
  }

  isAwkward(a: string, b: string): boolean {
    return (
      (this.hasSentiment(a, b, "HURT") && this.hasFlag(a, b, "JEALOUS")) || this.hasFlag(a, b, "CONFLICT_ACTIVE")
    );
  }

  shouldSuppressRomantic(a: string, b: string): boolean {
    if (this.hasFlag(a, b, "CONFLICT_ACTIVE") || this.hasFlag(a, b, "ESTRANGED")) return true;
    if (this.sentimentStrength(a, b, "BETRAYED") >= QUERY_THRESHOLDS.romanticSuppressBetrayal) return true;
    return this.axisOr(a, b, "romance", 0) <= QUERY_THRESHOLDS.romanticSuppressRomance;
  }

  shouldSuppressFriendly(a: string, b: string): boolean {
    if (this.hasFlag(a, b, "ESTRANGED")) return true;
    return this.axisOr(a, b, "friendship", 0) <= QUERY_THRESHOLDS.friendlySuppressFriendship;
  }

  /** Multiplier applied to an interaction's selection weight for this pair. */
  interactionWeightModifier(a: string, b: string, kind: RelationshipKind): number {
    const t = QUERY_THRESHOLDS;
    switch (kind) {
      case "romantic": {
        if (this.shouldSuppressRomantic(a, b)) return 0;
        if (!this.relationshipExists(a, b)) return 0.5;
        const romance = this.axisOr(a, b, "romance", 0);
        if (romance > t.warm) return 1.5;
        if (romance > t.fond) return 1.2;
        if (romance < t.cold) return 0.3;
        return 1;
      }
      case "friendly": {
        if (this.shouldSuppressFriendly(a, b)) return 0;
        const friendship = this.axisOr(a, b, "friendship", 0);
        if (friendship > t.warm) return 1.3;
        if (friendship < t.hostile) return 0.5;
        return 1;
      }
      case "professional": {
        const respect = this.axisOr(a, b, "respect", 0);
        if (respect > t.warm) return 1.2;
        if (respect < t.hostile) return 0.7;
        return 1;
      }
      case "bonding":
        return this.bondingWeightModifier(a, b);
    }
  }

  bondingWeightModifier(a: string, b: string): number {
    if (this.hasFlag(a, b, "CONFLICT_ACTIVE")) return 0.3;
    const friendship = this.axisOr(a, b, "friendship", 0);
    if (friendship < QUERY_THRESHOLDS.strained) return 0.5;
    if (friendship > QUERY_THRESHOLDS.warm) return 1.2;
    return 1;
  }

  getSummary(a: string, b: string): RelationshipSummary {
    return {
      a,
      b,
      exists: this.relationshipExists(a, b),
      axes: this.engine.getAxes(a, b),
      sentiments: this.getSentiments(a, b),
      flags: this.getFlags(a, b),
      roles: this.getRoles(a, b),
      states: this.derivedStates(a, b),
      awkward: this.isAwkward(a, b),
    };
  }

  /** Summaries of every stored relationship involving `id`. */
  relationshipsOf(id: string): RelationshipSummary[] {
    return this.engine
      .pairs()
      .filter(([a, b]) => a === id || b === id)
      .map(([a, b]) => (a === id ? this.getSummary(a, b) : this.getSummary(b, a)));
  }

  private axisOr(a: string, b: string, axis: string, fallback: number): number {
    return this.hasAxis(axis) ? this.getAxis(a, b, axis) : fallback;
  }
}
