import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { ERROR_KINDS } from "../errors.js";
import { TaskStatusSchema } from "../schemas.js";
import type { TaskSnapshot, TaskStore } from "../tasks/types.js";

const ErrorColumn = z.object({
  kind: z.enum(ERROR_KINDS),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).optional(),
});

const TaskRow = z.object({
  id: z.string(),
  kind: z.string(),
  payload: z.string(),
  status: TaskStatusSchema,
  result: z.string().nullable(),
  error: z.string().nullable(),
  created_at: z.number(),
  started_at: z.number().nullable(),
  finished_at: z.number().nullable(),
});
type TaskRow = z.infer<typeof TaskRow>;

/** SQLite-backed task history. Pass ":memory:" for a throwaway database. */
export class SqliteTaskStore implements TaskStore {
  private db: Database.Database;

  constructor(path: string) {
    if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id          TEXT PRIMARY KEY,
        kind        TEXT NOT NULL,
        payload     TEXT NOT NULL,
        status      TEXT NOT NULL,
        result      TEXT,
        error       TEXT,
        created_at  INTEGER NOT NULL,
        started_at  INTEGER,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at DESC);
    `);
  }

  persistTask(task: TaskSnapshot): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO tasks (id, kind, payload, status, result, error, created_at, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      task.id,
      task.kind,
      JSON.stringify(task.payload ?? null),
      task.status,
      task.status === "succeeded" ? JSON.stringify(task.result ?? null) : null,
      task.error ? JSON.stringify(task.error) : null,
      task.createdAt,
      task.startedAt ?? null,
      task.finishedAt ?? null,
    );
  }

  loadTask(id: string): TaskSnapshot | undefined {
    const row: unknown = this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(id);
    return row === undefined ? undefined : rowToSnapshot(TaskRow.parse(row));
  }

  deleteTask(id: string): boolean {
    const result = this.db.prepare("DELETE FROM tasks WHERE id = ?").run(id);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}

function rowToSnapshot(row: TaskRow): TaskSnapshot {
  const snapshot: TaskSnapshot = {
    id: row.id,
    kind: row.kind,
    payload: parseJson(row.payload),
    status: row.status,
    createdAt: row.created_at,
  };
  if (row.started_at !== null) snapshot.startedAt = row.started_at;
  if (row.finished_at !== null) snapshot.finishedAt = row.finished_at;
  if (row.result !== null) snapshot.result = parseJson(row.result);
  if (row.error !== null) snapshot.error = ErrorColumn.parse(parseJson(row.error));
  return snapshot;
}

function parseJson(text: string): unknown {
  const value: unknown = JSON.parse(text);
  return value;
}
