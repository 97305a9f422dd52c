export type StartupStage = "config" | "database" | "migration" | "listen";

/**
 * Raised by any step that runs before the service accepts traffic.
 * Only the process entry point decides to abort on one of these.
 */
export class StartupError extends Error {
  readonly stage: StartupStage;

  constructor(stage: StartupStage, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "StartupError";
    this.stage = stage;
  }
}

export class ConfigError extends StartupError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

export class MigrationError extends StartupError {
  /** Version of the failing migration, when one was being applied. */
  readonly version: number | null;

  constructor(message: string, version: number | null, options: { cause?: unknown } = {}) {
    super("migration", message, options);
    this.name = "MigrationError";
    this.version = version;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
