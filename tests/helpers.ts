import { createStores, initDB, type DB, type Stores } from "../src/db/index.js";
import type { GenerateOptions, GenerationResult, TextGenerator } from "../src/agent/generator.js";
import { DatabaseError } from "../src/errors.js";
import type { ExecuteOptions, ExecutionResult, SchemaSnapshot, TargetDatabase } from "../src/target/types.js";

export interface Clock {
  now: () => number;
  advance: (ms: number) => void;
}

export function manualClock(start: number = 1_700_000_000_000): Clock {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export function memoryStores(clock: Clock = manualClock()): { db: DB; stores: Stores; clock: Clock } {
  const db = initDB(":memory:");
  return { db, stores: createStores(db, clock.now), clock };
}

type Scripted = string | Error | ((prompt: string, options: GenerateOptions) => Promise<GenerationResult>);

/**
 * Replies in order; the last entry repeats once the script runs out.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly calls: Array<{ prompt: string; options: GenerateOptions }> = [];
  private index = 0;

  constructor(private readonly script: Scripted[]) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    this.calls.push({ prompt, options });
    const step = this.script[Math.min(this.index, this.script.length - 1)];
    this.index += 1;

    if (step instanceof Error) throw step;
    if (typeof step === "function") return step(prompt, options);
    return { text: step, usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } };
  }
}

/**
 * Never settles until aborted
 */
export function hangingReply(_prompt: string, options: GenerateOptions): Promise<GenerationResult> {
  return new Promise((_, reject) => {
    options.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export const EMPTY_RESULT: ExecutionResult = { columns: [], rows: [], rowsAffected: 0, lastInsertId: null };

/**
 * Target whose outcome is decided per statement by `respond`
 */
export class ScriptedTarget implements TargetDatabase {
  readonly dialect = "mysql" as const;
  readonly executed: string[] = [];
  closed = false;

  constructor(
    private readonly respond: (sql: string, attempt: number) => ExecutionResult | DatabaseError,
    private readonly snapshot: SchemaSnapshot = { database: "shop", tables: [], views: [] }
  ) {}

  async execute(sql: string, _options: ExecuteOptions = {}): Promise<ExecutionResult> {
    this.executed.push(sql);
    const outcome = this.respond(sql, this.executed.length);
    if (outcome instanceof DatabaseError) throw outcome;
    return outcome;
  }

  async describe(): Promise<SchemaSnapshot> {
    return this.snapshot;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function sqlReply(sql: string, prose: string = "Running the query."): string {
  return `${prose}\n\n\`\`\`sql\n${sql}\n\`\`\``;
}
