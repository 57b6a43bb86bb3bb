import { describe, it, expect, beforeEach } from "vitest";
import { pairKey } from "../pair.js";
import type { TriggerValue } from "../types.js";
import { relationshipStack } from "./fixtures.js";

describe("RelationshipEngine", () => {
  let stack: ReturnType<typeof relationshipStack>;

  beforeEach(() => {
    stack = relationshipStack();
  });

  function submit(kind: string, params: Record<string, TriggerValue>, source = "host") {
    const result = stack.intake.submit({ kind, source, params });
    if (result.status !== "accepted") throw result.error;
    return result.result;
  }

  function tick(days = 1): number {
    return submit("TIME_SKIP", { days_skipped: days }, "calendar").expiredFlags;
  }

  it("applies a pair rule", () => {
    const result = submit("CONFLICT_STARTED", { a: "mw2", b: "mw1" });
    expect(result.pairs).toEqual(["mw1::mw2"]);
    expect(result.axisChanges).toEqual([{ subject: "mw1::mw2", axis: "friendship", delta: -5, before: 0, after: -5 }]);
    expect(stack.query.getFlags("mw1", "mw2")).toEqual({ CONFLICT_ACTIVE: 14 });
  });

  it("keeps a flag of N days through N ticks and drops it on the next", () => {
    submit("RELATIONSHIP_FLAG_SET", { a: "mw1", b: "mw2", flag: "ON_NOTICE", days: 3 });
    for (let day = 1; day <= 3; day++) {
      expect(tick()).toBe(0);
      expect(stack.query.hasFlag("mw1", "mw2", "ON_NOTICE")).toBe(true);
    }
    expect(stack.query.getFlags("mw1", "mw2")).toEqual({ ON_NOTICE: 0 });
    expect(tick()).toBe(1);
    expect(stack.query.hasFlag("mw1", "mw2", "ON_NOTICE")).toBe(false);
  });

  it("counts every day of a multi-day skip", () => {
    submit("RELATIONSHIP_FLAG_SET", { a: "mw1", b: "mw2", flag: "ON_NOTICE", days: 2 });
    submit("RELATIONSHIP_FLAG_SET", { a: "mw1", b: "mw3", flag: "ON_NOTICE", days: 9 });
    expect(tick(3)).toBe(1);
    expect(stack.query.getFlags("mw1", "mw3")).toEqual({ ON_NOTICE: 6 });
    expect(stack.eventLog.ofType("day_advanced").map((r) => r.expiredFlags)).toEqual([0, 0, 1]);
  });

  it("clears a flag set for zero days", () => {
    submit("RELATIONSHIP_FLAG_SET", { a: "mw1", b: "mw2", flag: "ON_NOTICE", days: 5 });
    submit("RELATIONSHIP_FLAG_SET", { a: "mw1", b: "mw2", flag: "ON_NOTICE", days: 0 }, "outcome_applier");
    expect(stack.query.getFlags("mw1", "mw2")).toEqual({});
  });

  it("records a one-sided sentiment with its holder", () => {
    submit("ROMANTIC_REJECTION", { initiator: "mw3", target: "mw1" });
    expect(stack.query.getSentiments("mw1", "mw3")).toEqual({ HURT: { strength: 2, holder: "mw3" } });
    expect(stack.query.getFlags("mw1", "mw3")).toEqual({ JEALOUS: 7 });
    expect(stack.query.getAxis("mw1", "mw3", "romance")).toBe(-5);
    expect(stack.query.isAwkward("mw3", "mw1")).toBe(true);
  });

  it("adjusts an existing sentiment and drops it at zero", () => {
    submit("ROMANTIC_REJECTION", { initiator: "mw3", target: "mw1" });
    submit("ROMANTIC_ACCEPTANCE", { initiator: "mw1", target: "mw3" });
    expect(stack.query.getSentiments("mw1", "mw3")).toEqual({ HURT: { strength: 1, holder: "mw3" } });
    expect(stack.query.getAxis("mw1", "mw3", "romance")).toBe(5);

    submit("APOLOGY_ACCEPTED", { initiator: "mw1", target: "mw3" });
    expect(stack.query.getSentiments("mw1", "mw3")).toEqual({});
  });

  it("derives sentiment strength from a parameter with a cap", () => {
    submit("BETRAYAL_EVENT", { initiator: "mw1", target: "mw2", severity: 1 });
    expect(stack.query.getSentiments("mw1", "mw2")).toEqual({ BETRAYED: { strength: 3, holder: "mw2" } });
    submit("BETRAYAL_EVENT", { initiator: "mw1", target: "mw2", severity: 9 });
    expect(stack.query.sentimentStrength("mw1", "mw2", "BETRAYED")).toBe(5);
    expect(stack.query.getAxis("mw1", "mw2", "romance")).toBe(-60);
  });

  it("fans out from one actor to a list", () => {
    const result = submit("HEROIC_ACTION", { actor: "mw1", witnesses: ["mw2", "mw1", "mw3", "mw2"] });
    expect(result.pairs).toEqual(["mw1::mw2", "mw1::mw3"]);
    expect(stack.query.getAxis("mw1", "mw3", "respect")).toBe(5);
  });

  it("assigns and removes roles", () => {
    submit("MENTORSHIP_STARTED", { mentor: "mw1", student: "mw2" });
    expect(stack.query.roleHolder("mw2", "mw1", "mentor")).toBe("mw1");
    expect(stack.query.getRoles("mw1", "mw2")).toEqual({ mentor: "mw1", student: "mw2" });
    submit("MENTORSHIP_ENDED", { mentor: "mw1", student: "mw2" });
    expect(stack.query.hasRole("mw1", "mw2", "mentor")).toBe(false);
  });

  it("ignores a pair naming one character twice", () => {
    const result = submit("CONFLICT_STARTED", { a: "mw1", b: "mw1" });
    expect(result.pairs).toEqual([]);
    expect(stack.engine.pairs()).toEqual([]);
  });

  it("snapshots and restores sentiments, flags and roles", () => {
    submit("ROMANTIC_REJECTION", { initiator: "mw3", target: "mw1" });
    submit("MENTORSHIP_STARTED", { mentor: "mw1", student: "mw2" });
    const snap = stack.engine.snapshot();
    expect(Object.keys(snap)).toEqual(["mw1::mw2", "mw1::mw3"]);

    submit("ESTRANGEMENT", { a: "mw1", b: "mw2" });
    stack.engine.restore(snap);
    expect(stack.query.getFlags("mw1", "mw2")).toEqual({});
    expect(stack.query.getRoles("mw1", "mw2")).toEqual({ mentor: "mw1", student: "mw2" });
  });

  it("refuses a snapshot keyed under the wrong pair", () => {
    const bad = { "mw1::mw2": { a: "mw1", b: "mw3", sentiments: {}, flags: {}, roles: {} } };
    expect(() => stack.engine.restore(bad)).toThrow("relationship key 'mw1::mw2' does not match its pair");
  });
});

describe("RelationshipStateQuery", () => {
  let stack: ReturnType<typeof relationshipStack>;
  let set: (axis: string, value: number) => void;

  beforeEach(() => {
    stack = relationshipStack();
    const writer = stack.registry.claimWriter("outcome-applier");
    set = (axis, value) => {
      const key = pairKey("a", "b");
      writer.modify(key, axis, value - stack.registry.get(key, axis));
    };
  });

  it("labels derived states at the thresholds", () => {
    set("friendship", 60);
    set("romance", 70);
    expect(stack.query.derivedStates("a", "b")).toEqual(["FRIENDS", "INTERESTED", "PARTNERS"]);
    set("friendship", 59);
    set("respect", -50);
    set("romance", 0);
    expect(stack.query.derivedStates("b", "a")).toEqual(["DISRESPECTED"]);
  });

  it("scales romantic interactions", () => {
    expect(stack.query.interactionWeightModifier("a", "b", "romantic")).toBe(0.5);
    set("romance", 35);
    expect(stack.query.interactionWeightModifier("a", "b", "romantic")).toBe(1.5);
    set("romance", 15);
    expect(stack.query.interactionWeightModifier("a", "b", "romantic")).toBe(1.2);
    set("romance", -15);
    expect(stack.query.interactionWeightModifier("a", "b", "romantic")).toBe(0.3);
    set("romance", -30);
    expect(stack.query.interactionWeightModifier("a", "b", "romantic")).toBe(0);
  });

  it("scales friendly, professional and bonding interactions", () => {
    set("friendship", 35);
    set("respect", 31);
    expect(stack.query.interactionWeightModifier("a", "b", "friendly")).toBe(1.3);
    expect(stack.query.interactionWeightModifier("a", "b", "professional")).toBe(1.2);
    expect(stack.query.interactionWeightModifier("a", "b", "bonding")).toBe(1.2);

    set("friendship", -25);
    set("respect", -31);
    expect(stack.query.interactionWeightModifier("a", "b", "friendly")).toBe(1);
    expect(stack.query.interactionWeightModifier("a", "b", "professional")).toBe(0.7);
    expect(stack.query.interactionWeightModifier("a", "b", "bonding")).toBe(0.5);

    set("friendship", -50);
    expect(stack.query.interactionWeightModifier("a", "b", "friendly")).toBe(0);
  });

  it("suppresses romance after a serious betrayal", () => {
    const result = stack.intake.submit({
      kind: "BETRAYAL_EVENT",
      source: "host",
      params: { initiator: "a", target: "b", severity: 1 },
    });
    expect(result.status).toBe("accepted");
    expect(stack.query.shouldSuppressRomantic("a", "b")).toBe(true);
    expect(stack.query.shouldSuppressFriendly("a", "b")).toBe(false);
  });

  it("summarises a relationship from either side", () => {
    stack.intake.submit({ kind: "CONFLICT_STARTED", source: "host", params: { a: "a", b: "b" } });
    expect(stack.query.getSummary("b", "a")).toEqual({
      a: "b",
      b: "a",
      exists: true,
      axes: { friendship: -5, respect: 0, romance: 0 },
      sentiments: {},
      flags: { CONFLICT_ACTIVE: 14 },
      roles: {},
      states: [],
      awkward: true,
    });
    expect(stack.query.relationshipsOf("a").map((r) => [r.a, r.b])).toEqual([["a", "b"]]);
    expect(stack.query.relationshipsOf("c")).toEqual([]);
  });
});
