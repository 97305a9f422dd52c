import type { DeletedTodo, TodoDetail, TodoSummary } from "@todo-service/types";
import type { Queryable } from "./db";

/**
 * One SQL statement per call, each committed on its own.
 * `id` is handed to Postgres as received from the path, so a
 * non-numeric id surfaces as a query error rather than "not found".
 */
export class TodoRepository {
  constructor(private readonly db: Queryable) {}

  // description is deliberately not selected for the list view
  async list(): Promise<TodoSummary[]> {
    const { rows } = await this.db.query<TodoSummary>(
      "SELECT id, title, is_done FROM todo ORDER BY id ASC",
    );
    return rows;
  }

  async findById(id: string): Promise<TodoDetail | null> {
    const { rows } = await this.db.query<TodoDetail>(
      "SELECT title, description, is_done FROM todo WHERE id = $1",
      [id],
    );
    return rows[0] ?? null;
  }

  async create(title: string, description: string): Promise<void> {
    await this.db.query("INSERT INTO todo (title, description) VALUES ($1, $2)", [
      title,
      description,
    ]);
  }

  /** Replaces all mutable fields. Resolves `false` when no row has this id. */
  async update(id: string, todo: TodoDetail): Promise<boolean> {
    const { rows } = await this.db.query<{ id: number }>(
      `UPDATE todo SET title = $2, description = $3, is_done = $4
       WHERE id = $1
       RETURNING id`,
      [id, todo.title, todo.description, todo.is_done],
    );
    return rows.length > 0;
  }

  /** Resolves the row as it was before removal, or `null` when absent. */
  async remove(id: string): Promise<DeletedTodo | null> {
    const { rows } = await this.db.query<DeletedTodo>(
      "DELETE FROM todo WHERE id = $1 RETURNING title, description",
      [id],
    );
    return rows[0] ?? null;
  }
}
