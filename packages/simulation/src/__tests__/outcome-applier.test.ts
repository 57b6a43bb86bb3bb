import { describe, it, expect } from "vitest";
import type { OutcomesFile } from "../config/schemas.js";
import { ConfigurationError } from "../errors.js";
import { silentLogger } from "../logging.js";
import { OUTCOME_SOURCE, OutcomeApplier } from "../outcomes/outcome-applier.js";
import { relationshipStack } from "./fixtures.js";

function setup(outcomes?: OutcomesFile) {
  const stack = relationshipStack();
  const applier = new OutcomeApplier({
    outcomes: outcomes ?? stack.config.outcomes,
    axes: stack.config.axes,
    registry: stack.registry,
    intake: stack.intake,
    logger: silentLogger,
  });
  return { ...stack, applier };
}

const base = { date: "3025-03-01", eventId: "1001" };

describe("OutcomeApplier", () => {
  it("writes relationship axes per pair and character effects per participant", () => {
    const { applier, query, registry } = setup();
    const result = applier.apply({
      ...base,
      interaction: "small_talk",
      tier: "on_great_success",
      participants: ["mw1", "mw2", "mw3"],
    });

    expect(result.status).toBe("applied");
    if (result.status !== "applied") return;
    expect(result.axisChanges).toHaveLength(6);
    expect(query.getAxis("mw1", "mw2", "friendship")).toBe(5);
    expect(query.getAxis("mw2", "mw3", "friendship")).toBe(5);
    expect(registry.get("mw3", "confidence")).toBe(1);
    expect(result.triggers).toEqual([]);
  });

  it("counts a repeated participant once", () => {
    const { applier, registry } = setup();
    applier.apply({ ...base, interaction: "drill", tier: "on_success", participants: ["mw1", "mw1", "mw2"] });
    expect(registry.get("mw1", "xp")).toBe(10);
    expect(registry.get("mw1", "fatigue")).toBe(10);
  });

  it("turns flags into flag triggers for every pair", () => {
    const { applier, query } = setup();
    const result = applier.apply({ ...base, interaction: "apology", tier: "on_failure", participants: ["mw2", "mw1"] });

    expect(result.status).toBe("applied");
    if (result.status !== "applied") return;
    expect(result.triggers).toEqual([
      {
        kind: "RELATIONSHIP_FLAG_SET",
        source: OUTCOME_SOURCE,
        subjects: ["mw2", "mw1"],
        params: { a: "mw2", b: "mw1", flag: "AWKWARD_SILENCE", days: 2 },
      },
    ]);
    expect(query.getFlags("mw1", "mw2")).toEqual({ AWKWARD_SILENCE: 2 });
    expect(query.getAxis("mw1", "mw2", "friendship")).toBe(-2);
  });

  it("binds emitted trigger parameters to the participants", () => {
    const { applier, query, registry } = setup();
    const result = applier.apply({
      ...base,
      interaction: "drill",
      tier: "on_great_success",
      participants: ["mw1", "mw2", "mw3"],
    });

    expect(result.status).toBe("applied");
    if (result.status !== "applied") return;
    expect(result.triggers[0].params).toEqual({ actor: "mw1", witnesses: ["mw2", "mw3"] });
    expect(result.relationshipResults[0].pairs).toEqual(["mw1::mw2", "mw1::mw3"]);
    expect(query.getAxis("mw1", "mw3", "respect")).toBe(5);
    expect(query.getAxis("mw2", "mw3", "respect")).toBe(0);
    expect(registry.get("mw2", "xp")).toBe(20);
    expect(registry.get("mw3", "reputation_pool")).toBe(5);
  });

  it("applies its own writes before the emitted rule", () => {
    const { applier, query, registry } = setup();
    applier.apply({ ...base, interaction: "heated_argument", tier: "on_failure", participants: ["mw2", "mw1"] });

    expect(query.getAxis("mw1", "mw2", "friendship")).toBe(-13);
    expect(query.getFlags("mw1", "mw2")).toEqual({ CONFLICT_ACTIVE: 14 });
    expect(registry.get("mw2", "confidence")).toBe(-2);
  });

  it("does nothing for a tier without effects", () => {
    const { applier } = setup();
    const result = applier.apply({ ...base, interaction: "complaint_filed", tier: "on_failure", participants: ["mw1"] });
    expect(result).toEqual({
      status: "applied",
      interaction: "complaint_filed",
      tier: "on_failure",
      axisChanges: [],
      triggers: [],
      relationshipResults: [],
    });
  });

  it("fails on an unregistered axis before writing anything", () => {
    const { applier, query } = setup({
      interaction_outcomes: { pep_talk: { on_success: { axis_delta: { friendship: 2, morale: 1 } } } },
    });
    const run = () =>
      applier.apply({ ...base, interaction: "pep_talk", tier: "on_success", participants: ["mw1", "mw2"] });

    expect(run).toThrow(ConfigurationError);
    expect(run).toThrow("outcome references unregistered axis 'morale'");
    expect(query.getAxis("mw1", "mw2", "friendship")).toBe(0);
  });

  it("commits nothing when an emitted trigger would be rejected", () => {
    const { applier, query, eventLog } = setup({
      interaction_outcomes: {
        backstab: {
          on_success: {
            axis_delta: { friendship: 3 },
            emit_triggers: [
              { kind: "BETRAYAL_EVENT", params: { initiator: "$initiator", target: "$responder", severity: 2 } },
            ],
          },
        },
      },
    });
    const result = applier.apply({ ...base, interaction: "backstab", tier: "on_success", participants: ["mw1", "mw2"] });

    expect(result.status).toBe("rejected");
    if (result.status !== "rejected") return;
    expect(result.error.reason).toBe("unauthorized_source");
    expect(result.error.message).toBe("source 'outcome_applier' may not submit 'BETRAYAL_EVENT'");
    expect(query.getAxis("mw1", "mw2", "friendship")).toBe(0);
    expect(eventLog.ofType("trigger_accepted")).toEqual([]);
  });

  it("rejects an unknown parameter binding", () => {
    const { applier } = setup({
      interaction_outcomes: {
        roll_call: {
          on_success: { emit_triggers: [{ kind: "HEROIC_ACTION", params: { actor: "$captain", witnesses: [] } }] },
        },
      },
    });
    expect(() =>
      applier.apply({ ...base, interaction: "roll_call", tier: "on_success", participants: ["mw1", "mw2"] }),
    ).toThrow("unknown parameter binding '$captain'");
  });

  it("needs a second participant for a responder binding", () => {
    const { applier } = setup();
    expect(() =>
      applier.apply({ ...base, interaction: "flirt", tier: "on_failure", participants: ["mw1"] }),
    ).toThrow("'$responder' needs a second participant");
  });
});
