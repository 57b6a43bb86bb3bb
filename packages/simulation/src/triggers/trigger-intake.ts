import { z } from "zod";
import type { PayloadFieldType, TriggerDefinition, TriggersFile } from "../config/schemas.js";
import { TriggerValidationError } from "../errors.js";
import type { TriggerRejectionReason } from "../errors.js";
import type { EventLog } from "../event-log.js";
import type { Logger } from "../logging.js";
import { createConsoleLogger } from "../logging.js";
import type { ProcessResult, RelationshipEngine } from "../relationships/relationship-engine.js";
import type { Trigger, TriggerValue } from "../types.js";
import type { TriggerLedger } from "./trigger-ledger.js";

export type TriggerKind =
  | { tag: "registered"; name: string; definition: TriggerDefinition }
  | { tag: "unknown"; name: string };

export type SubmitResult =
  | { status: "accepted"; trigger: Trigger; result: ProcessResult }
  | { status: "rejected"; error: TriggerValidationError };

export type ValidationResult = { ok: true; trigger: Trigger } | { ok: false; error: TriggerValidationError };

const triggerShapeSchema = z.object({
  kind: z.string().min(1),
  source: z.string().min(1),
  subjects: z.array(z.string()).default([]),
  params: z.record(z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])).default({}),
});

const characterIdSchema = z
  .string()
  .min(1)
  .refine((id) => !id.includes("::"), "character ids may not contain '::'");

function fieldSchema(type: PayloadFieldType): z.ZodTypeAny {
  switch (type) {
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "string":
      return z.string();
    case "boolean":
      return z.boolean();
    case "character_id":
      return characterIdSchema;
    case "character_id[]":
      return z.array(characterIdSchema);
  }
}

function payloadSchema(definition: TriggerDefinition): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, field] of Object.entries(definition.payload_schema)) {
    const schema = fieldSchema(field.type);
    shape[name] = field.optional ? schema.optional() : schema;
  }
  return z.object(shape).strict();
}

export interface TriggerIntakeOptions {
  triggers: TriggersFile;
  ledger: TriggerLedger;
  engine: RelationshipEngine;
  eventLog?: EventLog;
  logger?: Logger;
}

/**
 * The only way into the relationship engine. Checks kind, source and
 * payload against the registry, stamps what it accepts and forwards an
 * immutable copy.
 */
export class TriggerIntake {
  private readonly definitions: ReadonlyMap<string, TriggerDefinition>;
  private readonly schemas = new Map<string, z.ZodTypeAny>();
  private readonly ledger: TriggerLedger;
  private readonly engine: RelationshipEngine;
  private readonly eventLog: EventLog | undefined;
  private readonly logger: Logger;

  constructor(options: TriggerIntakeOptions) {
    this.definitions = new Map(Object.entries(options.triggers.triggers));
    for (const [name, definition] of this.definitions) this.schemas.set(name, payloadSchema(definition));
    this.ledger = options.ledger;
    this.engine = options.engine;
    this.eventLog = options.eventLog;
    this.logger = options.logger ?? createConsoleLogger("trigger-intake");
  }

  kind(name: string): TriggerKind {
    const definition = this.definitions.get(name);
    return definition ? { tag: "registered", name, definition } : { tag: "unknown", name };
  }

  kinds(): string[] {
    return [...this.definitions.keys()].sort();
  }

  /** Character ids a trigger names, from its subjects and its declared id fields. */
  characterIds(input: unknown): string[] {
    const shape = triggerShapeSchema.safeParse(input);
    if (!shape.success) return [];
    const ids = [...shape.data.subjects];
    const known = this.kind(shape.data.kind);
    if (known.tag === "unknown") return ids;
    for (const [name, field] of Object.entries(known.definition.payload_schema)) {
      const value = shape.data.params[name];
      if (field.type === "character_id" && typeof value === "string") ids.push(value);
      if (field.type === "character_id[]" && Array.isArray(value)) ids.push(...value);
    }
    return [...new Set(ids)];
  }

  /** Returns a frozen copy of the trigger, or throws `TriggerValidationError`. */
  validate(input: unknown): Trigger {
    const outcome = this.check(input);
    if (!outcome.ok) throw outcome.error;
    return outcome.trigger;
  }

  check(input: unknown): ValidationResult {
    const shape = triggerShapeSchema.safeParse(input);
    if (!shape.success) {
      const issue = shape.error.issues[0];
      const where = issue ? issue.path.join(".") : "";
      return reject(kindOf(input), "malformed", `malformed trigger: ${where || "root"} ${issue?.message ?? ""}`.trim());
    }
    const { kind, source, subjects, params } = shape.data;

    const known = this.kind(kind);
    if (known.tag === "unknown") {
      return reject(kind, "unknown_kind", `unknown trigger kind '${kind}'`);
    }
    if (!known.definition.allowed_sources.includes(source)) {
      return reject(kind, "unauthorized_source", `source '${source}' may not submit '${kind}'`);
    }

    const schema = this.schemas.get(kind);
    const payload = schema?.safeParse(params);
    if (payload && !payload.success) {
      const issue = payload.error.issues[0];
      if (issue) return reject(kind, ...describeIssue(issue, known.definition));
    }

    return { ok: true, trigger: freeze({ kind, source, subjects, params }) };
  }

  submit(input: unknown): SubmitResult {
    const outcome = this.check(input);
    if (!outcome.ok) {
      const { error } = outcome;
      this.logger.warn(`rejected '${error.kind}': ${error.message}`, { reason: error.reason });
      this.eventLog?.append({
        type: "trigger_rejected",
        kind: error.kind,
        source: sourceOf(input),
        reason: error.reason,
        message: error.message,
      });
      return { status: "rejected", error };
    }

    const { trigger } = outcome;
    this.eventLog?.append({
      type: "trigger_accepted",
      kind: trigger.kind,
      source: trigger.source,
      subjects: [...trigger.subjects],
    });
    this.logger.debug(`accepted '${trigger.kind}'`, { source: trigger.source });
    this.ledger.stamp(trigger);
    const result = this.engine.process(trigger);
    return { status: "accepted", trigger, result };
  }
}

function reject(kind: string, reason: TriggerRejectionReason, message: string, field?: string): ValidationResult {
  return { ok: false, error: new TriggerValidationError(kind, reason, message, field) };
}

function describeIssue(
  issue: z.ZodIssue,
  definition: TriggerDefinition,
): [TriggerRejectionReason, string, string | undefined] {
  if (issue.code === "unrecognized_keys") {
    const field = issue.keys[0];
    return ["unexpected_field", `unexpected field '${field}'`, field];
  }
  const top = issue.path[0];
  const field = top === undefined ? undefined : String(top);
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return ["missing_field", `missing required field '${field}'`, field];
  }
  const declared = field === undefined ? undefined : definition.payload_schema[field]?.type;
  return ["wrong_type", `field '${field}' must be ${declared ?? "valid"}`, field];
}

function freeze(trigger: Trigger): Trigger {
  const params: Record<string, TriggerValue> = {};
  for (const [name, value] of Object.entries(trigger.params)) {
    params[name] = Array.isArray(value) ? [...value] : value;
  }
  return Object.freeze({
    kind: trigger.kind,
    source: trigger.source,
    subjects: Object.freeze([...trigger.subjects]),
    params: Object.freeze(params),
  });
}

function kindOf(input: unknown): string {
  const parsed = z.object({ kind: z.string() }).safeParse(input);
  return parsed.success ? parsed.data.kind : "<unknown>";
}

function sourceOf(input: unknown): string {
  const parsed = z.object({ source: z.string() }).safeParse(input);
  return parsed.success ? parsed.data.source : "<unknown>";
}
