import type { Trigger } from "../types.js";

/**
 * Shared between the intake and the relationship engine: the intake stamps
 * every trigger it accepts, the engine consumes the stamp before acting.
 */
export class TriggerLedger {
  private accepted = new WeakSet<Trigger>();

  stamp(trigger: Trigger): void {
    this.accepted.add(trigger);
  }

  consume(trigger: Trigger): boolean {
    if (!this.accepted.has(trigger)) return false;
    this.accepted.delete(trigger);
    return true;
  }
}
