import { Router, type Request, type Response } from "express";
import type { DeletedTodo } from "@todo-service/types";
import { decodeTodoBody } from "./decode";
import { failure, success } from "./envelope";
import { logger } from "./logger";
import type { TodoRepository } from "./todoRepository";

export type TodoHandler = (req: Request, res: Response) => Promise<void>;

export interface TodoHandlers {
  list: TodoHandler;
  get: TodoHandler;
  create: TodoHandler;
  update: TodoHandler;
  remove: TodoHandler;
}

// Every path ends in exactly one envelope; nothing is passed on to next()
export function todoHandlers(todos: TodoRepository): TodoHandlers {
  return {
    // LIST — id, title, is_done only
    async list(_req, res) {
      try {
        success(res, await todos.list());
      } catch (err) {
        logger.error({ err }, "List todos failed");
        failure(res, 500);
      }
    },

    // GET single todo
    async get(req, res) {
      try {
        const todo = await todos.findById(req.params.id);
        if (!todo) return failure(res, 404);
        success(res, todo);
      } catch (err) {
        logger.error({ err, id: req.params.id }, "Get todo failed");
        failure(res, 500);
      }
    },

    // CREATE — storage assigns the id and is_done, the response echoes the input
    async create(req, res) {
      const todo = decodeTodoBody(req.body);
      try {
        await todos.create(todo.title, todo.description);
        success(res, todo, 201);
      } catch (err) {
        logger.error({ err }, "Create todo failed");
        failure(res, 500, todo);
      }
    },

    // UPDATE — wholesale replace of title, description and is_done
    async update(req, res) {
      const todo = decodeTodoBody(req.body);
      try {
        const found = await todos.update(req.params.id, todo);
        if (!found) return failure(res, 404);
        success(res, todo);
      } catch (err) {
        logger.error({ err, id: req.params.id }, "Update todo failed");
        failure(res, 500, todo);
      }
    },

    // DELETE — responds with the row as it was
    async remove(req, res) {
      try {
        const deleted = await todos.remove(req.params.id);
        if (!deleted) return failure(res, 404);
        success<DeletedTodo>(res, deleted);
      } catch (err) {
        logger.error({ err, id: req.params.id }, "Delete todo failed");
        failure(res, 500);
      }
    },
  };
}

export function health(_req: Request, res: Response): void {
  success(res, { ok: true });
}

export function createTodoRouter(todos: TodoRepository): Router {
  const handlers = todoHandlers(todos);
  const router = Router();

  router.get("/health", health);

  router.get("/todo", handlers.list);
  router.get("/todo/:id", handlers.get);
  router.post("/todo", handlers.create);
  router.put("/todo/:id", handlers.update);
  router.delete("/todo/:id", handlers.remove);

  return router;
}
