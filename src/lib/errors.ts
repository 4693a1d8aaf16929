/**
 * errors.ts — Error types shared by the bot modules.
 *
 * Handlers catch these by class: config errors stop the process at startup,
 * persistence and external API errors are logged and the event is dropped.
 */

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

/** A file under our ownership could not be written. */
export class PersistenceError extends Error {
  readonly path: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to write ${filePath}: ${describeError(cause)}`, { cause });
    this.name = "PersistenceError";
    this.path = filePath;
  }
}

/** A call to OpenAI or Discord failed (auth, rate limit, failed run, ...). */
export class ExternalApiError extends Error {
  readonly service: "openai" | "discord";

  constructor(service: "openai" | "discord", message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ExternalApiError";
    this.service = service;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
