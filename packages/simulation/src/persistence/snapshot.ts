import { z } from "zod";
import type { AxisSnapshot } from "../axes/axis-registry.js";
import { ConfigurationError } from "../errors.js";
import type { RelationshipSnapshot } from "../relationships/relationship-engine.js";

export const SNAPSHOT_VERSION = 1;

export interface EngineSnapshot {
  version: typeof SNAPSHOT_VERSION;
  axes: AxisSnapshot;
  relationships: Record<string, RelationshipSnapshot>;
}

const relationshipSnapshotSchema = z
  .object({
    a: z.string().min(1),
    b: z.string().min(1),
    sentiments: z.record(z.object({ strength: z.number().int().min(1), holder: z.string().nullable() }).strict()),
    flags: z.record(z.number().int().min(0)),
    roles: z.record(z.string().min(1)),
  })
  .strict();

export const engineSnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    axes: z.record(z.record(z.number())),
    relationships: z.record(relationshipSnapshotSchema),
  })
  .strict();

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

function sortKeys(value: unknown): Json {
  if (value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === "object") {
    const out: { [key: string]: Json } = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) out[key] = sortKeys(child);
    }
    return out;
  }
  throw new ConfigurationError(`cannot serialize a ${typeof value}`, { file: "snapshot" });
}

/** JSON with object keys sorted at every level, so equal states serialize to equal text. */
export function serializeSnapshot(snapshot: EngineSnapshot): string {
  return JSON.stringify(sortKeys(snapshot), null, 2);
}

export function parseSnapshot(text: string): EngineSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`snapshot is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      file: "snapshot",
    });
  }
  const parsed = engineSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue?.message ?? "invalid snapshot", {
      file: "snapshot",
      key: issue?.path.join("."),
    });
  }
  return parsed.data;
}
