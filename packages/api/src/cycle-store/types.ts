import type { CycleRecord } from "@muster/simulation";

export type CycleStatus = CycleRecord["status"];

export interface StoredCycle {
  id: number;
  recordedAt: number;
  date: string | null;
  eventId: string;
  status: CycleStatus;
  participants: string[];
  interaction: string | null;
  tier: string | null;
  effects: number;
  triggers: string[];
}

export interface StoredSnapshot {
  name: string;
  date: string;
  createdAt: number;
  payload: string;
}

export type SnapshotInfo = Omit<StoredSnapshot, "payload">;

export interface CycleQuery {
  characterId?: string;
  eventId?: string;
  fromDate?: string;
  toDate?: string;
}

export interface ICycleStore {
  append(cycles: Omit<StoredCycle, "id">[]): void;
  query(filter?: CycleQuery): StoredCycle[];
  getAll(): StoredCycle[];
  saveSnapshot(snapshot: StoredSnapshot): void;
  getSnapshot(name: string): StoredSnapshot | null;
  listSnapshots(): SnapshotInfo[];
  close(): void;
}
