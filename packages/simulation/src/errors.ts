export type MusterErrorCode = "CONFIGURATION" | "TRIGGER_VALIDATION" | "RUNTIME_INVARIANT";

export class MusterError extends Error {
  readonly code: MusterErrorCode;

  constructor(code: MusterErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed or missing configuration, or an effect that references
 * something the configuration never registered. Aborts the current
 * operation before any state changes.
 */
export class ConfigurationError extends MusterError {
  readonly file: string | undefined;
  readonly key: string | undefined;

  constructor(message: string, location: { file?: string; key?: string } = {}) {
    const where = [location.file, location.key].filter(Boolean).join(" @ ");
    super("CONFIGURATION", where ? `${message} (${where})` : message);
    this.file = location.file;
    this.key = location.key;
  }
}

export type TriggerRejectionReason =
  | "unknown_kind"
  | "missing_field"
  | "wrong_type"
  | "unexpected_field"
  | "unauthorized_source"
  | "malformed";

export class TriggerValidationError extends MusterError {
  readonly kind: string;
  readonly reason: TriggerRejectionReason;
  readonly field: string | undefined;

  constructor(kind: string, reason: TriggerRejectionReason, message: string, field?: string) {
    super("TRIGGER_VALIDATION", message);
    this.kind = kind;
    this.reason = reason;
    this.field = field;
  }

  toJSON(): { kind: string; reason: TriggerRejectionReason; field: string | null; message: string } {
    return { kind: this.kind, reason: this.reason, field: this.field ?? null, message: this.message };
  }
}

/** A component tried to write state it does not own. Never caught inside the core. */
export class RuntimeInvariantError extends MusterError {
  constructor(message: string) {
    super("RUNTIME_INVARIANT", message);
  }
}
