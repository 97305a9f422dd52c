import { z } from "zod";
import type { TodoDetail } from "@todo-service/types";

// Every field falls back to its zero value instead of failing
const todoBodySchema = z.object({
  title:       z.string().catch(""),
  description: z.string().catch(""),
  is_done:     z.boolean().catch(false),
});

export function emptyTodo(): TodoDetail {
  return { title: "", description: "", is_done: false };
}

/** Reads a todo from an untrusted request body. Never rejects. */
export function decodeTodoBody(body: unknown): TodoDetail {
  const parsed = todoBodySchema.safeParse(body);
  return parsed.success ? parsed.data : emptyTodo();
}
