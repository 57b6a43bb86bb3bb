import { ConfigurationError, RuntimeInvariantError } from "../errors.js";
import { isPairKey } from "../pair.js";
import type { AxesFile } from "../config/schemas.js";

export type AxisScope = "character" | "relationship";

export interface AxisDefinition {
  name: string;
  scope: AxisScope;
  min: number;
  max: number;
  initial: number;
}

/** The two components allowed to write axis values. */
export type AxisOwner = "outcome-applier" | "relationship-engine";

export interface AxisWrite {
  subject: string;
  axis: string;
  delta: number;
}

export interface AxisChange {
  subject: string;
  axis: string;
  delta: number;
  before: number;
  after: number;
}

/** subject → axis → value, keys sorted. */
export type AxisSnapshot = Record<string, Record<string, number>>;

export interface AxisWriter {
  readonly owner: AxisOwner;
  /** Applies one clamped delta and returns the stored value. */
  modify(subject: string, axis: string, delta: number): number;
  /** Validates every write, then applies them all; nothing is applied if any write is invalid. */
  applyBatch(writes: readonly AxisWrite[]): AxisChange[];
}

const OWNER_SCOPES: Record<AxisOwner, ReadonlySet<AxisScope>> = {
  "outcome-applier": new Set(["character", "relationship"]),
  "relationship-engine": new Set(["relationship"]),
};

export function axisDefinitionsFrom(file: AxesFile): AxisDefinition[] {
  return Object.entries(file.axes).map(([name, d]) => ({
    name,
    scope: d.scope,
    min: d.min,
    max: d.max,
    initial: d.initial,
  }));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export class AxisRegistry {
  private readonly defs = new Map<string, AxisDefinition>();
  private values = new Map<string, Map<string, number>>();
  private claimed = new Set<AxisOwner>();

  constructor(definitions: readonly AxisDefinition[]) {
    for (const d of definitions) {
      if (d.min > d.max || d.initial < d.min || d.initial > d.max) {
        throw new ConfigurationError(`axis '${d.name}' has inconsistent bounds`, { key: `axes.${d.name}` });
      }
      this.defs.set(d.name, { ...d });
    }
  }

  hasAxis(axis: string): boolean {
    return this.defs.has(axis);
  }

  definition(axis: string): AxisDefinition {
    const def = this.defs.get(axis);
    if (!def) throw new ConfigurationError(`axis '${axis}' has no registered bounds`, { key: axis });
    return def;
  }

  definitions(): AxisDefinition[] {
    return [...this.defs.values()];
  }

  get(subject: string, axis: string): number {
    const def = this.checkSubject(subject, axis);
    return this.values.get(subject)?.get(axis) ?? def.initial;
  }

  /** True when any axis value has been written for the subject. */
  hasSubject(subject: string): boolean {
    return this.values.has(subject);
  }

  subjects(): string[] {
    return [...this.values.keys()].sort();
  }

  /**
   * Issues the single write capability for `owner`. Each owner may claim
   * once; the registry keeps no other write path.
   */
  claimWriter(owner: AxisOwner): AxisWriter {
    if (this.claimed.has(owner)) {
      throw new RuntimeInvariantError(`axis writer for '${owner}' has already been issued`);
    }
    this.claimed.add(owner);

    const plan = (w: AxisWrite): AxisChange => {
      const def = this.checkSubject(w.subject, w.axis);
      if (!OWNER_SCOPES[owner].has(def.scope)) {
        throw new RuntimeInvariantError(`'${owner}' may not write ${def.scope} axis '${w.axis}'`);
      }
      if (!Number.isFinite(w.delta)) {
        throw new ConfigurationError(`delta for '${w.axis}' must be a finite number`, { key: w.axis });
      }
      const before = this.get(w.subject, w.axis);
      return { ...w, before, after: clamp(before + w.delta, def.min, def.max) };
    };

    const write = (change: AxisChange): void => {
      let axes = this.values.get(change.subject);
      if (!axes) {
        axes = new Map();
        this.values.set(change.subject, axes);
      }
      axes.set(change.axis, change.after);
    };

    return {
      owner,
      modify: (subject, axis, delta) => {
        const change = plan({ subject, axis, delta });
        write(change);
        return change.after;
      },
      applyBatch: (writes) => {
        // Writes to the same subject/axis accumulate, so plan against a scratch view.
        const pending = new Map<string, number>();
        const changes = writes.map((w) => {
          const change = plan(w);
          const key = `${w.subject}\u0000${w.axis}`;
          const before = pending.get(key) ?? change.before;
          const def = this.definition(w.axis);
          const after = clamp(before + w.delta, def.min, def.max);
          pending.set(key, after);
          return { ...change, before, after };
        });
        changes.forEach(write);
        return changes;
      },
    };
  }

  snapshot(): AxisSnapshot {
    const out: AxisSnapshot = {};
    for (const subject of this.subjects()) {
      const axes = this.values.get(subject);
      if (!axes) continue;
      const row: Record<string, number> = {};
      for (const axis of [...axes.keys()].sort()) {
        const value = axes.get(axis);
        if (value !== undefined) row[axis] = value;
      }
      out[subject] = row;
    }
    return out;
  }

  /** Replaces the whole state. Every entry is checked before anything is replaced. */
  restore(snapshot: AxisSnapshot): void {
    const next = new Map<string, Map<string, number>>();
    for (const [subject, axes] of Object.entries(snapshot)) {
      const row = new Map<string, number>();
      for (const [axis, value] of Object.entries(axes)) {
        const def = this.checkSubject(subject, axis);
        if (!Number.isFinite(value) || value < def.min || value > def.max) {
          throw new ConfigurationError(`snapshot value ${value} for '${axis}' is outside [${def.min}, ${def.max}]`, {
            file: "snapshot",
            key: `${subject}.${axis}`,
          });
        }
        row.set(axis, value);
      }
      next.set(subject, row);
    }
    this.values = next;
  }

  private checkSubject(subject: string, axis: string): AxisDefinition {
    const def = this.definition(axis);
    const isPair = isPairKey(subject);
    if ((def.scope === "relationship") !== isPair) {
      throw new ConfigurationError(
        `${def.scope} axis '${axis}' cannot be keyed by ${isPair ? "a pair" : "a single character"} ('${subject}')`,
        { key: axis },
      );
    }
    return def;
  }
}
