import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SqliteScheduleStore } from "../schedule-store/sqlite-schedule-store.js";

describe("SqliteScheduleStore", () => {
  let store: SqliteScheduleStore;

  beforeEach(() => {
    store = new SqliteScheduleStore();
  });

  afterEach(() => {
    store.close();
  });

  it("adds entries with increasing ids", () => {
    const first = store.add({ eventId: "1002", startDate: "3025-01-01", recurrence: "daily" });
    const second = store.add({ eventId: "1005", startDate: "3025-01-31", recurrence: "monthly" });

    expect(first).toEqual({ id: 1, eventId: "1002", startDate: "3025-01-01", recurrence: "daily" });
    expect(second.id).toBe(2);
    expect(store.getAll()).toEqual([first, second]);
    expect(store.get(2)).toEqual(second);
  });

  it("updates an entry in place", () => {
    const entry = store.add({ eventId: "1002", startDate: "3025-01-01", recurrence: "daily" });
    const updated = store.update(entry.id, { eventId: "1008", startDate: "3025-02-01", recurrence: "yearly" });

    expect(updated).toEqual({ id: entry.id, eventId: "1008", startDate: "3025-02-01", recurrence: "yearly" });
    expect(store.get(entry.id)).toEqual(updated);
    expect(store.update(99, { eventId: "1002", startDate: "3025-01-01", recurrence: "once" })).toBeNull();
  });

  it("removes entries", () => {
    const entry = store.add({ eventId: "1002", startDate: "3025-01-01", recurrence: "once" });
    expect(store.remove(entry.id)).toBe(true);
    expect(store.remove(entry.id)).toBe(false);
    expect(store.get(entry.id)).toBeNull();
    expect(store.getAll()).toEqual([]);
  });
});
