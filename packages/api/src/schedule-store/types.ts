import type { Recurrence } from "@muster/simulation";

export interface ScheduledEvent {
  id: number;
  eventId: string;
  startDate: string;
  recurrence: Recurrence;
}

export type ScheduledEventInput = Omit<ScheduledEvent, "id">;

export interface IScheduleStore {
  add(entry: ScheduledEventInput): ScheduledEvent;
  /** `null` when no entry has the id. */
  update(id: number, entry: ScheduledEventInput): ScheduledEvent | null;
  remove(id: number): boolean;
  get(id: number): ScheduledEvent | null;
  getAll(): ScheduledEvent[];
  close(): void;
}
