/**
 * Goal store using SQLite (via better-sqlite3).
 * Every operation opens its own connection and closes it before returning,
 * whether the statement succeeded or threw.
 */
import Database from "better-sqlite3";
import path from "node:path";
import { log } from "../utils/log.js";

export interface Goal {
  id: number;
  ownerId: number;
  text: string;
  isDone: boolean;
  createdAt: string;
}

export type GoalSummary = Pick<Goal, "id" | "text" | "isDone">;

/** What the command router needs from persistence. */
export interface GoalRepository {
  createGoal(ownerId: number, text: string): number;
  listGoals(ownerId: number): GoalSummary[];
  markDone(ownerId: number, goalId: number): number;
  deleteGoal(ownerId: number, goalId: number): number;
}

interface GoalRow {
  id: number;
  owner_id: number;
  text: string;
  is_done: number;
  created_at: string;
}

export class GoalStore implements GoalRepository {
  readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = path.resolve(dbPath);
  }

  private withDb<T>(fn: (db: Database.Database) => T): T {
    const db = new Database(this.dbPath);
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }

  /** Create the goals table if it does not exist yet. Safe to call on every start. */
  init(): void {
    this.withDb((db) => {
      db.pragma("journal_mode = WAL");
      db.exec(`
        CREATE TABLE IF NOT EXISTS goals (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          owner_id INTEGER NOT NULL,
          text TEXT NOT NULL,
          is_done INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_goals_owner ON goals(owner_id, id);
      `);
    });
    log.info(`[store] Goals table ready at ${this.dbPath}`);
  }

  createGoal(ownerId: number, text: string): number {
    const createdAt = new Date().toISOString();
    const info = this.withDb((db) =>
      db
        .prepare<[number, string, string]>(
          "INSERT INTO goals (owner_id, text, is_done, created_at) VALUES (?, ?, 0, ?)"
        )
        .run(ownerId, text, createdAt)
    );
    const id = Number(info.lastInsertRowid);
    log.debug(`[store] Goal #${id} created for owner ${ownerId}`);
    return id;
  }

  /** Newest first. */
  listGoals(ownerId: number): GoalSummary[] {
    const rows = this.withDb((db) =>
      db
        .prepare<[number], Pick<GoalRow, "id" | "text" | "is_done">>(
          "SELECT id, text, is_done FROM goals WHERE owner_id = ? ORDER BY id DESC"
        )
        .all(ownerId)
    );
    return rows.map((r) => ({ id: r.id, text: r.text, isDone: r.is_done === 1 }));
  }

  getGoal(ownerId: number, goalId: number): Goal | undefined {
    const row = this.withDb((db) =>
      db
        .prepare<[number, number], GoalRow>(
          "SELECT id, owner_id, text, is_done, created_at FROM goals WHERE id = ? AND owner_id = ?"
        )
        .get(goalId, ownerId)
    );
    if (!row) return undefined;
    return {
      id: row.id,
      ownerId: row.owner_id,
      text: row.text,
      isDone: row.is_done === 1,
      createdAt: row.created_at,
    };
  }

  /**
   * Returns the number of matching rows, not the number that changed state:
   * marking an already-done goal again still returns 1.
   */
  markDone(ownerId: number, goalId: number): number {
    const info = this.withDb((db) =>
      db.prepare<[number, number]>("UPDATE goals SET is_done = 1 WHERE id = ? AND owner_id = ?").run(goalId, ownerId)
    );
    return info.changes;
  }

  deleteGoal(ownerId: number, goalId: number): number {
    const info = this.withDb((db) =>
      db.prepare<[number, number]>("DELETE FROM goals WHERE id = ? AND owner_id = ?").run(goalId, ownerId)
    );
    if (info.changes > 0) log.debug(`[store] Goal #${goalId} deleted for owner ${ownerId}`);
    return info.changes;
  }
}
