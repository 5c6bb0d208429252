import type { QueryHistory } from "../db/queryHistory.js";
import { DatabaseError, TimeoutError, errorMessage } from "../errors.js";
import type { ExecutionResult, TargetDatabase } from "../target/types.js";
import { logger } from "../utils/logger.js";
import { linkedAbort, withTimeout } from "../utils/timeout.js";
import type { TextGenerator } from "./generator.js";
import type { ThreadId } from "./identity.js";
import { buildCorrectionContext, extractSql, isDestructive } from "./prompts.js";
import { EMPTY_USAGE, sumUsage, type TokenUsage } from "./tokenCounter.js";

/**
 * Self-healing executor
 *
 * One user turn is an explicit state machine:
 *
 *   generating -> executing -> succeeded
 *                           -> failing(n) -> generating   (n < maxRetries)
 *                                         -> exhausted    (n >= maxRetries)
 *
 * plus `answered` (the first reply carried no SQL), `declined` (a destructive
 * statement was refused at confirmation) and `cancelled`. A correction that
 * repeats the failed statement ends the turn as exhausted at once. The
 * attempt counter is data on the state, so the cap holds no matter which
 * stage failed. A generation failure or timeout burns an attempt just like a
 * database error. Every execution is written to query history.
 */

export type ExecutorState =
  | { kind: "generating"; attempt: number; lastSql: string | null; lastDbError: string | null }
  | { kind: "executing"; attempt: number; sql: string; reply: string; lastDbError: string | null }
  | { kind: "failing"; attempt: number; lastSql: string | null; lastDbError: string | null; error: string }
  | { kind: "succeeded"; attempt: number; sql: string; reply: string; result: ExecutionResult }
  | { kind: "exhausted"; attempt: number; sql: string | null; error: string; reason: ExhaustionReason }
  | { kind: "answered"; reply: string }
  | { kind: "declined"; attempt: number; sql: string; reply: string }
  | { kind: "cancelled"; attempt: number };

/** Why a turn gave up: the retry budget ran out, or the correction repeated the failed statement */
export type ExhaustionReason = "budget" | "repeated_sql";

export interface AttemptRecord {
  attempt: number;
  stage: "generation" | "execution";
  sql: string | null;
  success: boolean;
  error: string | null;
  durationMs: number;
}

export type ExecutionOutcome =
  | { status: "succeeded"; sql: string; reply: string; result: ExecutionResult; attempts: AttemptRecord[]; usage: TokenUsage }
  | {
      status: "exhausted";
      sql: string | null;
      error: string;
      reason: ExhaustionReason;
      attempts: AttemptRecord[];
      usage: TokenUsage;
    }
  | { status: "answered"; reply: string; attempts: AttemptRecord[]; usage: TokenUsage }
  | { status: "declined"; sql: string; reply: string; attempts: AttemptRecord[]; usage: TokenUsage }
  | { status: "cancelled"; attempts: AttemptRecord[]; usage: TokenUsage };

export interface ExecutorOptions {
  maxRetries: number;
  generationTimeoutMs: number;
  executionTimeoutMs: number;
}

export interface TurnInput {
  threadId: ThreadId;
  /** Message the attempts are filed under in query history */
  messageId: string | null;
  prompt: string;
  system?: string;
  signal?: AbortSignal;
  /** Asked before a destructive statement runs; false stops the turn */
  confirm?: (sql: string) => Promise<boolean>;
}

export const DEFAULT_MAX_RETRIES = 3;

/**
 * Where a failed attempt leads. Pure, so the cap is testable on its own.
 */
export function afterFailure(
  state: Extract<ExecutorState, { kind: "failing" }>,
  maxRetries: number
): Extract<ExecutorState, { kind: "generating" | "exhausted" }> {
  if (state.attempt < maxRetries) {
    return { kind: "generating", attempt: state.attempt, lastSql: state.lastSql, lastDbError: state.lastDbError };
  }
  // Surface the database's own words when there are any
  return {
    kind: "exhausted",
    attempt: state.attempt,
    sql: state.lastSql,
    error: state.lastDbError ?? state.error,
    reason: "budget",
  };
}

/**
 * Human-readable account of the failed attempts of a turn. Empty when the
 * first attempt went through.
 */
export function formatHealReport(attempts: AttemptRecord[]): string {
  if (!attempts.some((a) => !a.success)) return "";

  const clip = (text: string) => (text.length > 80 ? `${text.substring(0, 80)}...` : text);
  const lines = ["Self-healing report:"];
  for (const a of attempts) {
    lines.push(`  Attempt ${a.attempt}: ${a.success ? "succeeded" : "failed"} (${a.stage})`);
    if (a.error) lines.push(`    Error: ${clip(a.error)}`);
    if (a.sql) lines.push(`    SQL: ${clip(a.sql)}`);
  }
  return lines.join("\n");
}

export class SelfHealingExecutor {
  private readonly options: ExecutorOptions;

  constructor(
    private readonly deps: { generator: TextGenerator; target: TargetDatabase; history: QueryHistory },
    options: Partial<ExecutorOptions> = {}
  ) {
    this.options = {
      maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      generationTimeoutMs: options.generationTimeoutMs ?? 120_000,
      executionTimeoutMs: options.executionTimeoutMs ?? 30_000,
    };
    if (this.options.maxRetries < 1) {
      throw new Error("maxRetries must be at least 1");
    }
  }

  async run(input: TurnInput): Promise<ExecutionOutcome> {
    const attempts: AttemptRecord[] = [];
    const usages: TokenUsage[] = [];
    let state: ExecutorState = { kind: "generating", attempt: 0, lastSql: null, lastDbError: null };

    for (;;) {
      switch (state.kind) {
        case "generating":
          state = input.signal?.aborted
            ? { kind: "cancelled", attempt: state.attempt }
            : await this.generate(state, input, attempts, usages);
          break;

        case "executing":
          state = input.signal?.aborted
            ? { kind: "cancelled", attempt: state.attempt }
            : await this.execute(state, input, attempts);
          break;

        case "failing":
          logger.warn(
            { threadId: input.threadId, attempt: state.attempt, maxRetries: this.options.maxRetries, error: state.error },
            "Attempt failed"
          );
          state = input.signal?.aborted
            ? { kind: "cancelled", attempt: state.attempt }
            : afterFailure(state, this.options.maxRetries);
          break;

        case "succeeded": {
          if (state.attempt > 0) {
            logger.info({ threadId: input.threadId, attempt: state.attempt }, "Self-healing succeeded");
          }
          const usage = usages.length > 0 ? sumUsage(usages) : EMPTY_USAGE;
          return { status: "succeeded", sql: state.sql, reply: state.reply, result: state.result, attempts, usage };
        }

        case "exhausted": {
          logger.error(
            { threadId: input.threadId, attempts: state.attempt, reason: state.reason, error: state.error },
            "Self-healing exhausted"
          );
          const usage = usages.length > 0 ? sumUsage(usages) : EMPTY_USAGE;
          return { status: "exhausted", sql: state.sql, error: state.error, reason: state.reason, attempts, usage };
        }

        case "declined": {
          logger.info({ threadId: input.threadId, sql: state.sql }, "Destructive statement declined");
          const usage = usages.length > 0 ? sumUsage(usages) : EMPTY_USAGE;
          return { status: "declined", sql: state.sql, reply: state.reply, attempts, usage };
        }

        case "answered": {
          const usage = usages.length > 0 ? sumUsage(usages) : EMPTY_USAGE;
          return { status: "answered", reply: state.reply, attempts, usage };
        }

        case "cancelled": {
          logger.info({ threadId: input.threadId, attempt: state.attempt }, "Turn cancelled");
          const usage = usages.length > 0 ? sumUsage(usages) : EMPTY_USAGE;
          return { status: "cancelled", attempts, usage };
        }
      }
    }
  }

  private async generate(
    state: Extract<ExecutorState, { kind: "generating" }>,
    input: TurnInput,
    attempts: AttemptRecord[],
    usages: TokenUsage[]
  ): Promise<ExecutorState> {
    const errorContext =
      state.lastSql !== null && state.lastDbError !== null
        ? buildCorrectionContext(state.lastSql, state.lastDbError)
        : undefined;
    const correcting = errorContext !== undefined;

    const started = performance.now();
    const { controller, dispose } = linkedAbort(input.signal);
    try {
      const reply = await withTimeout(
        this.deps.generator.generate(input.prompt, { system: input.system, errorContext, signal: controller.signal }),
        this.options.generationTimeoutMs,
        "generation",
        () => controller.abort()
      );
      usages.push(reply.usage);

      const sql = extractSql(reply.text);
      if (sql !== null && correcting && state.lastSql !== null && sql.trim() === state.lastSql.trim()) {
        const error = "Correction repeated the failed statement";
        attempts.push({
          attempt: state.attempt + 1,
          stage: "generation",
          sql,
          success: false,
          error,
          durationMs: performance.now() - started,
        });
        logger.warn({ threadId: input.threadId, attempt: state.attempt + 1 }, "Correction repeated the failed SQL; stopping");
        return {
          kind: "exhausted",
          attempt: state.attempt + 1,
          sql: state.lastSql,
          error: state.lastDbError ?? error,
          reason: "repeated_sql",
        };
      }
      if (sql !== null) {
        return { kind: "executing", attempt: state.attempt, sql, reply: reply.text, lastDbError: state.lastDbError };
      }
      if (!correcting) {
        return { kind: "answered", reply: reply.text };
      }

      const error = "Correction reply contained no SQL statement";
      attempts.push({
        attempt: state.attempt + 1,
        stage: "generation",
        sql: null,
        success: false,
        error,
        durationMs: performance.now() - started,
      });
      return { kind: "failing", attempt: state.attempt + 1, lastSql: state.lastSql, lastDbError: state.lastDbError, error };
    } catch (err) {
      const error = errorMessage(err);
      attempts.push({
        attempt: state.attempt + 1,
        stage: "generation",
        sql: null,
        success: false,
        error,
        durationMs: performance.now() - started,
      });
      return { kind: "failing", attempt: state.attempt + 1, lastSql: state.lastSql, lastDbError: state.lastDbError, error };
    } finally {
      dispose();
    }
  }

  private async execute(
    state: Extract<ExecutorState, { kind: "executing" }>,
    input: TurnInput,
    attempts: AttemptRecord[]
  ): Promise<ExecutorState> {
    if (input.confirm && isDestructive(state.sql)) {
      const approved = await input.confirm(state.sql);
      if (!approved) {
        return { kind: "declined", attempt: state.attempt, sql: state.sql, reply: state.reply };
      }
      if (input.signal?.aborted) {
        return { kind: "cancelled", attempt: state.attempt };
      }
    }

    const attempt = state.attempt + 1;
    const started = performance.now();
    const { controller, dispose } = linkedAbort(input.signal);

    try {
      const result = await withTimeout(
        this.deps.target.execute(state.sql, {
          signal: controller.signal,
          timeoutMs: this.options.executionTimeoutMs,
        }),
        this.options.executionTimeoutMs,
        "execution",
        () => controller.abort()
      );
      const durationMs = performance.now() - started;

      this.deps.history.record({
        threadId: input.threadId,
        messageId: input.messageId,
        sqlText: state.sql,
        executionMs: durationMs,
        rowsAffected: result.rowsAffected > 0 ? result.rowsAffected : result.rows.length,
        success: true,
        errorMessage: null,
      });
      attempts.push({ attempt, stage: "execution", sql: state.sql, success: true, error: null, durationMs });

      return { kind: "succeeded", attempt: state.attempt, sql: state.sql, reply: state.reply, result };
    } catch (err) {
      const durationMs = performance.now() - started;
      const error = errorMessage(err);
      if (!(err instanceof DatabaseError) && !(err instanceof TimeoutError)) {
        logger.warn({ threadId: input.threadId, error }, "Target raised a non-database error");
      }

      this.deps.history.record({
        threadId: input.threadId,
        messageId: input.messageId,
        sqlText: state.sql,
        executionMs: durationMs,
        rowsAffected: 0,
        success: false,
        errorMessage: error,
      });
      attempts.push({ attempt, stage: "execution", sql: state.sql, success: false, error, durationMs });

      return { kind: "failing", attempt, lastSql: state.sql, lastDbError: error, error };
    } finally {
      dispose();
    }
  }
}
