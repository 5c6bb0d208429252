/**
 * Error taxonomy for a chat turn.
 *
 * Identity and persistence errors surface immediately. Generation, timeout
 * and database errors are absorbed by the self-healing executor until its
 * retry budget runs out.
 */

export class IdentityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IdentityError";
  }
}

export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Persistence failure during ${operation}: ${errorMessage(cause)}`, { cause });
    this.name = "PersistenceError";
    this.operation = operation;
  }
}

export class GenerationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "GenerationError";
  }
}

/**
 * Raised by a target database. `message` is the database's own diagnostic,
 * untouched, so it can be fed back into generation.
 */
export class DatabaseError extends Error {
  readonly code: string | null;

  constructor(message: string, code: string | null = null, cause?: unknown) {
    super(message, { cause });
    this.name = "DatabaseError";
    this.code = code;
  }
}

export class TimeoutError extends Error {
  readonly stage: "generation" | "execution";
  readonly timeoutMs: number;

  constructor(stage: "generation" | "execution", timeoutMs: number) {
    super(`${stage} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.stage = stage;
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Run a storage operation, rethrowing anything it raises as a PersistenceError.
 */
export function withPersistence<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof PersistenceError || error instanceof IdentityError) throw error;
    throw new PersistenceError(operation, error);
  }
}
