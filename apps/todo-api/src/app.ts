import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import { failure } from "./envelope";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { createTodoRouter } from "./routes";
import type { TodoRepository } from "./todoRepository";

export interface AppDeps {
  todos: TodoRepository;
}

/**
 * Wraps a body parser so an unreadable body never fails the request:
 * the handler sees `{}` and decodes zero values from it.
 */
export function lenientBody(parser: RequestHandler): RequestHandler {
  return (req, res, next) => {
    parser(req, res, (err?: unknown) => {
      if (err) {
        logger.debug({ err: errorMessage(err), path: req.path }, "Ignoring unreadable request body");
        req.body = {};
      }
      next();
    });
  };
}

// Request logger middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on("finish", () => {
    logger.info({
      method: req.method,
      path: req.path,
      status: res.statusCode,
      ms: Date.now() - start,
    });
  });
  next();
}

export function notFound(_req: Request, res: Response): void {
  failure(res, 404);
}

// Error handler — last resort, handlers answer their own failures
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  logger.error({ err }, "Unhandled error");
  failure(res, 500);
}

export function createApp({ todos }: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(compression());
  // Bodies are read as JSON whatever their Content-Type
  app.use(lenientBody(express.json({ limit: "100kb", type: () => true })));
  app.use(requestLogger);

  app.use(createTodoRouter(todos));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
