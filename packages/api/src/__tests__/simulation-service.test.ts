import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadSimulationConfig, silentLogger } from "@muster/simulation";
import { InMemoryRosterRepository, seedData } from "@muster/roster";
import { SimulationService, addDays } from "../simulation-service.js";
import { SqliteCycleStore } from "../cycle-store/sqlite-cycle-store.js";

const config = loadSimulationConfig();

describe("addDays", () => {
  it("rolls over month and year ends", () => {
    expect(addDays("3025-01-31", 1)).toBe("3025-02-01");
    expect(addDays("3025-12-30", 3)).toBe("3026-01-02");
    expect(addDays("3025-03-01", 0)).toBe("3025-03-01");
  });
});

describe("SimulationService", () => {
  let roster: InMemoryRosterRepository;
  let store: SqliteCycleStore;
  let service: SimulationService;

  beforeEach(async () => {
    roster = new InMemoryRosterRepository();
    await roster.connect();
    await seedData(roster);
    store = new SqliteCycleStore();
    service = new SimulationService(roster, store, {
      config,
      startDate: "3025-01-01",
      seed: "test-seed",
      logger: silentLogger,
      now: () => 42,
    });
  });

  afterEach(() => {
    service.close();
    store.close();
  });

  it("advances the calendar", async () => {
    expect(service.currentDate).toBe("3025-01-01");
    const result = await service.advanceDay(2);
    expect(result).toEqual({ date: "3025-01-03", expiredFlags: 0, scheduled: [] });
    expect(service.currentDate).toBe("3025-01-03");
  });

  it("runs scheduled events on the days the calendar enters", async () => {
    const monthly = service.scheduleEvent({ eventId: "1002", startDate: "3025-01-31", recurrence: "monthly" });
    service.scheduleEvent({ eventId: "1005", startDate: "3024-12-25", recurrence: "once" });

    const result = await service.advanceDay(90);

    expect(result.date).toBe("3025-04-01");
    expect(result.scheduled.map((r) => `${r.scheduleId}:${r.eventId}@${r.date}`)).toEqual([
      `${monthly.id}:1002@3025-01-31`,
      `${monthly.id}:1002@3025-03-31`,
    ]);
    expect(service.getCycleLog().map((c) => c.date)).toEqual(["3025-01-31", "3025-03-31"]);
    expect(service.currentDate).toBe("3025-04-01");
  });

  it("lists what fires on a given date", () => {
    const daily = service.scheduleEvent({ eventId: "1008", startDate: "3025-01-05", recurrence: "daily" });
    const yearly = service.scheduleEvent({ eventId: "1002", startDate: "3025-02-14", recurrence: "yearly" });

    expect(service.scheduledFor("3026-02-14")).toEqual([daily, yearly]);
    expect(service.scheduledFor("3025-01-04")).toEqual([]);
    expect(service.updateSchedule(daily.id, { eventId: "1008", startDate: "3025-01-05", recurrence: "once" })?.recurrence).toBe("once");
    expect(service.scheduledFor("3026-02-14")).toEqual([yearly]);
    expect(service.removeSchedule(yearly.id)).toBe(true);
    expect(service.listSchedule().map((e) => e.id)).toEqual([daily.id]);
  });

  it("caps the in-memory event log while the cycle store keeps every cycle", async () => {
    const lean = new SimulationService(roster, store, {
      config,
      startDate: "3025-01-01",
      seed: "test-seed",
      logger: silentLogger,
      eventLogCapacity: 0,
    });
    await lean.runEventCycle("1002");
    await lean.advanceDay();
    await lean.runEventCycle("1002");

    expect(lean.recentEvents()).toEqual([]);
    expect(lean.getCycleLog().map((c) => c.date)).toEqual(["3025-01-01", "3025-01-02"]);
    lean.close();
  });

  it("keeps only the latest event log entries", async () => {
    const small = new SimulationService(roster, store, {
      config,
      startDate: "3025-01-01",
      logger: silentLogger,
      eventLogCapacity: 2,
    });
    for (let i = 0; i < 4; i++) await small.advanceDay();

    const kept = small.recentEvents();
    expect(kept).toHaveLength(2);
    expect(kept[0].seq).toBe(kept[1].seq - 1);
    expect(kept[1].seq).toBeGreaterThan(2);
    small.close();
  });

  it("reads availability from the current roster", async () => {
    expect((await service.checkAvailability("1001")).available).toBe(true);

    await roster.updateCharacter("c02", { status: "WOUNDED" });
    await roster.updateCharacter("c03", { status: "WOUNDED" });

    expect(await service.checkAvailability("1001")).toEqual({
      available: false,
      reasons: ["Requires 4 MEKWARRIOR(s), found 3"],
    });
  });

  it("lists every catalog event with its availability", async () => {
    const events = await service.listEvents();
    expect(events.map((e) => e.id)).toEqual(["1001", "1002", "1003", "1004", "1005", "1006", "1007", "1008"]);
    const clearing = events.find((e) => e.id === "1004");
    expect(clearing?.available).toBe(false);
  });

  it("records each cycle in the store with the current date", async () => {
    await service.advanceDay();
    const result = await service.runEventCycle("1002");
    const log = service.getCycleLog();

    expect(log).toHaveLength(1);
    expect(log[0].eventId).toBe("1002");
    expect(log[0].date).toBe("3025-01-02");
    expect(log[0].status).toBe(result.status);
    expect(log[0].recordedAt).toBe(42);
    expect(log[0].participants).toHaveLength(2);
  });

  it("records unavailable cycles too", async () => {
    const result = await service.runEventCycle("1004");
    expect(result.status).toBe("unavailable");
    expect(service.getCycleLog({ eventId: "1004" })).toHaveLength(1);
  });

  it("submits host triggers into the relationship engine", async () => {
    const submitted = await service.submitTrigger({ kind: "CONFLICT_STARTED", params: { a: "c02", b: "c03" } });
    expect(submitted.status).toBe("accepted");

    const rel = service.getRelationship("c02", "c03");
    expect(rel.exists).toBe(true);
    expect(rel.flags).toEqual({ CONFLICT_ACTIVE: 14 });
    expect(rel.axes.friendship).toBe(-5);
    expect(service.getAxisState(["c03", "c02"], "friendship")).toBe(-5);
    expect(service.getRelationshipsOf("c03").map((r) => r.b)).toEqual(["c02"]);
  });

  it("returns rejected triggers without touching state", async () => {
    const submitted = await service.submitTrigger({ kind: "CALENDAR_FLIP", params: {} });
    expect(submitted.status).toBe("rejected");
    if (submitted.status === "rejected") expect(submitted.error.reason).toBe("unknown_kind");
    expect(service.getRelationshipsOf("c02")).toEqual([]);
  });

  it("makes a pair in conflict eligible for the mediation event", async () => {
    await service.submitTrigger({ kind: "CONFLICT_STARTED", params: { a: "c02", b: "c03" } });
    expect((await service.checkAvailability("1004")).available).toBe(true);
  });

  it("saves and restores snapshots with their date", async () => {
    await service.submitTrigger({ kind: "CONFLICT_STARTED", params: { a: "c02", b: "c03" } });
    const saved = await service.saveSnapshot("before-leave");
    expect(saved).toEqual({ name: "before-leave", date: "3025-01-01", createdAt: 42 });

    await service.advanceDay(5);
    await service.submitTrigger({ kind: "ESTRANGEMENT", params: { a: "c02", b: "c03" } });
    expect(service.getAxisState(["c02", "c03"], "friendship")).toBe(-15);

    const restored = await service.loadSnapshot("before-leave");
    expect(restored).toEqual(saved);
    expect(service.currentDate).toBe("3025-01-01");
    expect(service.getAxisState(["c02", "c03"], "friendship")).toBe(-5);
    expect(service.getRelationship("c02", "c03").flags).toEqual({ CONFLICT_ACTIVE: 14 });
    expect(service.listSnapshots()).toEqual([saved]);
  });

  it("returns null for an unknown snapshot", async () => {
    expect(await service.loadSnapshot("missing")).toBeNull();
  });

  it("runs queued calls in submission order", async () => {
    const order: string[] = [];
    await Promise.all([
      service.advanceDay().then((r) => order.push(r.date)),
      service.advanceDay().then((r) => order.push(r.date)),
      service.advanceDay().then((r) => order.push(r.date)),
    ]);
    expect(order).toEqual(["3025-01-02", "3025-01-03", "3025-01-04"]);
  });

  it("keeps serving after a failed call", async () => {
    await expect(service.runEventCycle("9999")).rejects.toThrow("unknown event '9999'");
    expect((await service.advanceDay()).date).toBe("3025-01-02");
  });
});
