import Database from "better-sqlite3";
import { z } from "zod";
import type { CycleQuery, ICycleStore, SnapshotInfo, StoredCycle, StoredSnapshot } from "./types.js";

const stringList = z
  .string()
  .transform((text, ctx) => {
    try {
      return JSON.parse(text);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not JSON" });
      return z.NEVER;
    }
  })
  .pipe(z.array(z.string()));

const cycleRowSchema = z
  .object({
    id: z.number().int(),
    recorded_at: z.number(),
    date: z.string().nullable(),
    event_id: z.string(),
    status: z.enum(["completed", "unavailable", "no_interaction", "rejected"]),
    participants: stringList,
    interaction: z.string().nullable(),
    tier: z.string().nullable(),
    effects: z.number().int(),
    triggers: stringList,
  })
  .transform(
    (r): StoredCycle => ({
      id: r.id,
      recordedAt: r.recorded_at,
      date: r.date,
      eventId: r.event_id,
      status: r.status,
      participants: r.participants,
      interaction: r.interaction,
      tier: r.tier,
      effects: r.effects,
      triggers: r.triggers,
    }),
  );

const snapshotRowSchema = z
  .object({ name: z.string(), date: z.string(), created_at: z.number(), payload: z.string() })
  .transform((r): StoredSnapshot => ({ name: r.name, date: r.date, createdAt: r.created_at, payload: r.payload }));

const snapshotInfoRowSchema = z
  .object({ name: z.string(), date: z.string(), created_at: z.number() })
  .transform((r): SnapshotInfo => ({ name: r.name, date: r.date, createdAt: r.created_at }));

export class SqliteCycleStore implements ICycleStore {
  private db: Database.Database;

  constructor(dbPath: string = ":memory:") {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cycles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        recorded_at INTEGER NOT NULL,
        date TEXT,
        event_id TEXT NOT NULL,
        status TEXT NOT NULL,
        participants TEXT NOT NULL,
        interaction TEXT,
        tier TEXT,
        effects INTEGER NOT NULL,
        triggers TEXT NOT NULL
      )
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cycle_participants (
        cycle_id INTEGER NOT NULL REFERENCES cycles(id),
        character_id TEXT NOT NULL
      )
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        name TEXT PRIMARY KEY,
        date TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        payload TEXT NOT NULL
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_cycles_date ON cycles(date)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_cycles_event ON cycles(event_id)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_participants_character ON cycle_participants(character_id)`);
  }

  append(cycles: Omit<StoredCycle, "id">[]): void {
    const insertCycle = this.db.prepare(`
      INSERT INTO cycles (recorded_at, date, event_id, status, participants, interaction, tier, effects, triggers)
      VALUES (@recordedAt, @date, @eventId, @status, @participants, @interaction, @tier, @effects, @triggers)
    `);
    const insertParticipant = this.db.prepare(
      `INSERT INTO cycle_participants (cycle_id, character_id) VALUES (?, ?)`,
    );

    const insertMany = this.db.transaction((items: Omit<StoredCycle, "id">[]) => {
      for (const c of items) {
        const { lastInsertRowid } = insertCycle.run({
          ...c,
          participants: JSON.stringify(c.participants),
          triggers: JSON.stringify(c.triggers),
        });
        for (const id of new Set(c.participants)) insertParticipant.run(lastInsertRowid, id);
      }
    });

    insertMany(cycles);
  }

  query(filter: CycleQuery = {}): StoredCycle[] {
    let sql = `SELECT * FROM cycles WHERE 1 = 1`;
    const params: (string | number)[] = [];

    if (filter.characterId !== undefined) {
      sql += ` AND id IN (SELECT cycle_id FROM cycle_participants WHERE character_id = ?)`;
      params.push(filter.characterId);
    }
    if (filter.eventId !== undefined) {
      sql += ` AND event_id = ?`;
      params.push(filter.eventId);
    }
    if (filter.fromDate !== undefined) {
      sql += ` AND date >= ?`;
      params.push(filter.fromDate);
    }
    if (filter.toDate !== undefined) {
      sql += ` AND date <= ?`;
      params.push(filter.toDate);
    }
    sql += ` ORDER BY id ASC`;

    return this.db.prepare(sql).all(...params).map(rowToCycle);
  }

  getAll(): StoredCycle[] {
    return this.query();
  }

  saveSnapshot(snapshot: StoredSnapshot): void {
    this.db
      .prepare(
        `INSERT INTO snapshots (name, date, created_at, payload) VALUES (@name, @date, @createdAt, @payload)
         ON CONFLICT(name) DO UPDATE SET date = excluded.date, created_at = excluded.created_at, payload = excluded.payload`,
      )
      .run(snapshot);
  }

  getSnapshot(name: string): StoredSnapshot | null {
    const row: unknown = this.db.prepare(`SELECT * FROM snapshots WHERE name = ?`).get(name);
    return row === undefined ? null : snapshotRowSchema.parse(row);
  }

  listSnapshots(): SnapshotInfo[] {
    return this.db
      .prepare(`SELECT name, date, created_at FROM snapshots ORDER BY created_at ASC, name ASC`)
      .all()
      .map((row) => snapshotInfoRowSchema.parse(row));
  }

  close(): void {
    this.db.close();
  }
}

function rowToCycle(row: unknown): StoredCycle {
  return cycleRowSchema.parse(row);
}
