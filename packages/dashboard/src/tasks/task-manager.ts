/**
 * Task System — Task Manager
 *
 * Durable registry of tasks seen by the dashboard. The executor owns live
 * task state; this table keeps a record of every task after it finishes or
 * the process restarts.
 */

import { z } from "zod";
import { TASK_CATEGORIES } from "@cofounder/core";
import type { ListTasksFilter, Task, TaskCategory, TaskStatus } from "@cofounder/core";
import type { DashboardDatabase } from "../db.js";

const taskStatusSchema = z.enum(["pending", "running", "completed", "failed", "paused"]);
const taskCategorySchema = z.enum(TASK_CATEGORIES);

/**
 * Task record as stored by the dashboard
 */
export interface TaskRecord {
  id: string;
  objective: string;
  category: TaskCategory;
  status: TaskStatus;
  totalSteps: number;
  completedSteps: number;
  /** Checkpoint to resume from, when the last run left one */
  checkpointId?: string;
  summary?: string;
  error?: string;
  created: Date;
  updated: Date;
}

export type TaskRecordChanges = Partial<
  Pick<TaskRecord, "status" | "checkpointId" | "summary" | "error">
>;

interface TaskRow {
  id: string;
  objective: string;
  category: string;
  status: string;
  total_steps: number;
  completed_steps: number;
  checkpoint_id: string | null;
  summary: string | null;
  error: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * TaskManager - CRUD operations for task records
 */
export class TaskManager {
  private db: DashboardDatabase;

  constructor(db: DashboardDatabase) {
    this.db = db;
  }

  /**
   * Insert or refresh the record of a live task
   */
  sync(task: Task): TaskRecord {
    const stmt = this.db.prepare(`
      INSERT INTO tasks (
        id, objective, category, status, total_steps, completed_steps,
        created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        total_steps = excluded.total_steps,
        completed_steps = excluded.completed_steps,
        updated_at = excluded.updated_at
    `);

    stmt.run(
      task.id,
      task.objective,
      task.category,
      task.status,
      task.steps.length,
      task.iteration,
      task.created.toISOString(),
      task.updated.toISOString(),
    );

    const record = this.findById(task.id);
    if (!record) {
      throw new Error(`Task ${task.id} was not stored`);
    }
    return record;
  }

  /**
   * Update the outcome fields of a task
   */
  update(id: string, changes: TaskRecordChanges): void {
    const fields: string[] = [];
    const values: Array<string | null> = [];

    if (changes.status !== undefined) {
      fields.push("status = ?");
      values.push(changes.status);
    }

    if ("checkpointId" in changes) {
      fields.push("checkpoint_id = ?");
      values.push(changes.checkpointId ?? null);
    }

    if ("summary" in changes) {
      fields.push("summary = ?");
      values.push(changes.summary ?? null);
    }

    if ("error" in changes) {
      fields.push("error = ?");
      values.push(changes.error ?? null);
    }

    if (fields.length === 0) {
      return;
    }

    fields.push("updated_at = ?");
    values.push(new Date().toISOString());

    const sql = `UPDATE tasks SET ${fields.join(", ")} WHERE id = ?`;
    values.push(id);

    this.db.prepare(sql).run(...values);
  }

  /**
   * Find a task by ID
   */
  findById(id: string): TaskRecord | null {
    const stmt = this.db.prepare<[string], TaskRow>("SELECT * FROM tasks WHERE id = ?");
    const row = stmt.get(id);
    return row ? this.rowToRecord(row) : null;
  }

  /**
   * List tasks, newest first
   */
  list(filter?: ListTasksFilter): TaskRecord[] {
    let sql = "SELECT * FROM tasks";
    const params: Array<string | number> = [];

    if (filter?.status) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
      sql += ` WHERE status IN (${statuses.map(() => "?").join(", ")})`;
      params.push(...statuses);
    }

    sql += " ORDER BY created_at DESC, id DESC";

    if (filter?.limit) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    } else if (filter?.offset) {
      sql += " LIMIT -1";
    }

    if (filter?.offset) {
      sql += " OFFSET ?";
      params.push(filter.offset);
    }

    const rows = this.db.prepare<Array<string | number>, TaskRow>(sql).all(...params);
    return rows.map((row) => this.rowToRecord(row));
  }

  /**
   * Convert a database row to a TaskRecord
   */
  private rowToRecord(row: TaskRow): TaskRecord {
    return {
      id: row.id,
      objective: row.objective,
      category: taskCategorySchema.parse(row.category),
      status: taskStatusSchema.parse(row.status),
      totalSteps: row.total_steps,
      completedSteps: row.completed_steps,
      checkpointId: row.checkpoint_id ?? undefined,
      summary: row.summary ?? undefined,
      error: row.error ?? undefined,
      created: new Date(row.created_at),
      updated: new Date(row.updated_at),
    };
  }
}
