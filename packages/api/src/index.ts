export { appRouter, type AppRouter } from "./app-router.js";
export type { Context } from "./trpc.js";
export { SimulationService, HOST_SOURCE, DEFAULT_EVENT_LOG_CAPACITY, addDays } from "./simulation-service.js";
export type {
  SimulationServiceOptions,
  EventSummary,
  AdvanceDayResult,
  CycleSettings,
  ScheduledRun,
} from "./simulation-service.js";
export { SqliteCycleStore } from "./cycle-store/sqlite-cycle-store.js";
export type { StoredCycle, StoredSnapshot, SnapshotInfo, CycleQuery, ICycleStore } from "./cycle-store/types.js";
export { SqliteScheduleStore } from "./schedule-store/sqlite-schedule-store.js";
export type { ScheduledEvent, ScheduledEventInput, IScheduleStore } from "./schedule-store/types.js";
export { loadHostConfig, type HostConfig } from "./config.js";
