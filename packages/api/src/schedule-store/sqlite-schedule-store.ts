import Database from "better-sqlite3";
import { z } from "zod";
import { RECURRENCES } from "@muster/simulation";
import type { IScheduleStore, ScheduledEvent, ScheduledEventInput } from "./types.js";

const scheduleRowSchema = z
  .object({
    id: z.number().int(),
    event_id: z.string(),
    start_date: z.string(),
    recurrence: z.enum(RECURRENCES),
  })
  .transform(
    (r): ScheduledEvent => ({ id: r.id, eventId: r.event_id, startDate: r.start_date, recurrence: r.recurrence }),
  );

export class SqliteScheduleStore implements IScheduleStore {
  private db: Database.Database;

  constructor(dbPath: string = ":memory:") {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS scheduled_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id TEXT NOT NULL,
        start_date TEXT NOT NULL,
        recurrence TEXT NOT NULL
      )
    `);
  }

  add(entry: ScheduledEventInput): ScheduledEvent {
    const { lastInsertRowid } = this.db
      .prepare(
        `INSERT INTO scheduled_events (event_id, start_date, recurrence) VALUES (@eventId, @startDate, @recurrence)`,
      )
      .run(fieldsOf(entry));
    return { id: Number(lastInsertRowid), ...fieldsOf(entry) };
  }

  update(id: number, entry: ScheduledEventInput): ScheduledEvent | null {
    const { changes } = this.db
      .prepare(
        `UPDATE scheduled_events SET event_id = @eventId, start_date = @startDate, recurrence = @recurrence WHERE id = @id`,
      )
      .run({ id, ...fieldsOf(entry) });
    return changes === 0 ? null : { id, ...fieldsOf(entry) };
  }

  remove(id: number): boolean {
    return this.db.prepare(`DELETE FROM scheduled_events WHERE id = ?`).run(id).changes > 0;
  }

  get(id: number): ScheduledEvent | null {
    const row: unknown = this.db.prepare(`SELECT * FROM scheduled_events WHERE id = ?`).get(id);
    return row === undefined ? null : scheduleRowSchema.parse(row);
  }

  getAll(): ScheduledEvent[] {
    return this.db
      .prepare(`SELECT * FROM scheduled_events ORDER BY id ASC`)
      .all()
      .map((row) => scheduleRowSchema.parse(row));
  }

  close(): void {
    this.db.close();
  }
}

function fieldsOf(entry: ScheduledEventInput): ScheduledEventInput {
  return { eventId: entry.eventId, startDate: entry.startDate, recurrence: entry.recurrence };
}
