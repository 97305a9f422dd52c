import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
}

export interface ServiceConfig {
  port: number;
  migrationsDir: string;
  db: DbConfig;
}

const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "..", "migrations");

const envSchema = z.object({
  DB_HOST:        z.string().min(1),
  DB_PORT:        z.coerce.number().int().min(1).max(65535),
  DB_USER:        z.string().min(1),
  DB_PASSWORD:    z.string(),
  DB_NAME:        z.string().min(1),
  // one client holds the migration lock while another applies files
  DB_POOL_MAX:    z.coerce.number().int().min(2).default(10),
  PORT:           z.coerce.number().int().min(0).max(65535).default(8080),
  MIGRATIONS_DIR: z.string().min(1).optional(),
});

/**
 * Validates the database and server settings found in `env`.
 * Call after `dotenv` has populated `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${problems}`, { cause: parsed.error });
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    migrationsDir: vars.MIGRATIONS_DIR ?? DEFAULT_MIGRATIONS_DIR,
    db: {
      host:     vars.DB_HOST,
      port:     vars.DB_PORT,
      database: vars.DB_NAME,
      user:     vars.DB_USER,
      password: vars.DB_PASSWORD,
      max:      vars.DB_POOL_MAX,
    },
  };
}
