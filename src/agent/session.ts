import type { Stores } from "../db/index.js";
import type { Message } from "../db/messages.js";
import type { RecordedQuery } from "../db/queryHistory.js";
import { isStale, type CachedSchema } from "../db/schemaCache.js";
import { errorMessage } from "../errors.js";
import type { ExecutionResult, TargetDatabase } from "../target/types.js";
import { logger } from "../utils/logger.js";
import type { ThreadLock } from "../utils/threadLock.js";
import { RollingSummaryCompactor, type CompactionOutcome } from "./compactor.js";
import { ContextBuilder, renderPrompt } from "./contextBuilder.js";
import { SelfHealingExecutor, type AttemptRecord, type ExecutionOutcome } from "./executor.js";
import type { TextGenerator } from "./generator.js";
import type { ConnectionIdentity, ThreadId } from "./identity.js";
import { explanationText, formatSchemaForPrompt, isDestructive, sqlWriterSystemPrompt } from "./prompts.js";
import { estimateTokens } from "./tokenCounter.js";

/**
 * Chat session - ties the stores, the executor and the compactor together
 * This is the interface the CLI drives, one instance per target database
 */

export interface ChatDeps extends Stores {
  generator: TextGenerator;
  target: TargetDatabase;
  lock: ThreadLock;
}

export interface ChatOptions {
  maxRetries: number;
  generationTimeoutMs: number;
  executionTimeoutMs: number;
  windowSize: number;
  keepTail: number;
  maxSummaryLength: number;
  schemaMaxAgeMs: number;
}

export type TurnStatus = "succeeded" | "exhausted" | "answered" | "declined" | "cancelled";

export interface SendOptions {
  signal?: AbortSignal;
  /** Asked before a DELETE, DROP, TRUNCATE or UPDATE runs */
  confirm?: (sql: string) => Promise<boolean>;
}

export interface TurnResult {
  threadId: ThreadId;
  status: TurnStatus;
  userMessage: Message;
  /** Null only for a cancelled turn */
  assistantMessage: Message | null;
  sql: string | null;
  /** The statement in `sql` deletes or rewrites data */
  destructive: boolean;
  result: ExecutionResult | null;
  /** Last raw database error when the turn exhausted its retries */
  error: string | null;
  attempts: AttemptRecord[];
  compaction: CompactionOutcome | null;
}

export interface SessionState {
  threadId: ThreadId;
  identity: ConnectionIdentity;
  messageCount: number;
  summary: string | null;
  summarizedUpToSeq: number;
  schema: CachedSchema | null;
}

export class ChatSession {
  private readonly executor: SelfHealingExecutor;
  private readonly compactor: RollingSummaryCompactor;
  private readonly contextBuilder: ContextBuilder;

  private constructor(
    private readonly deps: ChatDeps,
    private readonly options: ChatOptions,
    readonly identity: ConnectionIdentity,
    readonly threadId: ThreadId
  ) {
    this.executor = new SelfHealingExecutor(deps, {
      maxRetries: options.maxRetries,
      generationTimeoutMs: options.generationTimeoutMs,
      executionTimeoutMs: options.executionTimeoutMs,
    });
    this.compactor = new RollingSummaryCompactor(deps, {
      windowSize: options.windowSize,
      keepTail: options.keepTail,
      maxSummaryLength: options.maxSummaryLength,
      timeoutMs: options.generationTimeoutMs,
    });
    this.contextBuilder = new ContextBuilder(deps, { windowSize: options.windowSize });
  }

  /**
   * Open the thread for a target database, creating it on first contact
   */
  static open(deps: ChatDeps, options: ChatOptions, identity: ConnectionIdentity): ChatSession {
    const threadId = deps.sessions.ensureSession(identity.host, identity.user, identity.database);
    const session = new ChatSession(deps, options, identity, threadId);

    logger.info(
      { threadId, database: identity.database, messages: deps.messages.count(threadId) },
      "Opened chat session"
    );

    return session;
  }

  getState(): SessionState {
    const summary = this.deps.summaries.get(this.threadId);
    return {
      threadId: this.threadId,
      identity: this.identity,
      messageCount: this.deps.messages.count(this.threadId),
      summary: summary?.summaryText ?? null,
      summarizedUpToSeq: summary?.summarizedUpToSeq ?? 0,
      schema: this.deps.schemaCache.get(this.threadId),
    };
  }

  /**
   * Run one user turn. Turns on the same thread queue behind each other.
   */
  send(userText: string, options: SendOptions = {}): Promise<TurnResult> {
    return this.deps.lock.run(this.threadId, () => this.runTurn(userText, options));
  }

  private async runTurn(userText: string, { signal, confirm }: SendOptions): Promise<TurnResult> {
    const { sessions, messages } = this.deps;

    // Re-ensure rather than touch, so a purged thread comes back empty
    sessions.ensureSession(this.identity.host, this.identity.user, this.identity.database);

    const schema = await this.loadSchema();
    const context = this.contextBuilder.build(this.threadId);
    const prompt = renderPrompt(context, userText, schema ? formatSchemaForPrompt(schema.snapshot) : null);

    const userMessage = messages.append(this.threadId, "user", userText, {
      tokensUsed: estimateTokens(userText),
    });

    logger.info({ threadId: this.threadId, sequenceNo: userMessage.sequenceNo }, "Processing user message");

    const outcome = await this.executor.run({
      threadId: this.threadId,
      messageId: userMessage.id,
      prompt,
      system: sqlWriterSystemPrompt(this.deps.target.dialect, this.identity.database),
      signal,
      confirm,
    });

    if (outcome.status === "cancelled") {
      return {
        threadId: this.threadId,
        status: "cancelled",
        userMessage,
        assistantMessage: null,
        sql: null,
        destructive: false,
        result: null,
        error: null,
        attempts: outcome.attempts,
        compaction: null,
      };
    }

    const { assistantMessage, sql, result, error } = this.recordReply(outcome);
    const compaction = await this.compact(signal);

    return {
      threadId: this.threadId,
      status: outcome.status,
      userMessage,
      assistantMessage,
      sql,
      destructive: sql !== null && isDestructive(sql),
      result,
      error,
      attempts: outcome.attempts,
      compaction,
    };
  }

  /**
   * Persist the assistant side of a finished turn. A successful turn stores
   * the SQL that actually ran; an exhausted one stores the database's error.
   */
  private recordReply(outcome: Exclude<ExecutionOutcome, { status: "cancelled" }>): {
    assistantMessage: Message;
    sql: string | null;
    result: ExecutionResult | null;
    error: string | null;
  } {
    const { messages } = this.deps;
    const tokensUsed = outcome.usage.totalTokens;

    if (outcome.status === "succeeded") {
      const assistantMessage = messages.append(
        this.threadId,
        "assistant",
        explanationText(outcome.reply) || "Query executed.",
        {
          sqlText: outcome.sql,
          result: outcome.result,
          tokensUsed: tokensUsed || estimateTokens(outcome.reply),
          metadata: { status: "succeeded", attempts: outcome.attempts.length },
        }
      );
      return { assistantMessage, sql: outcome.sql, result: outcome.result, error: null };
    }

    if (outcome.status === "exhausted") {
      const assistantMessage = messages.append(this.threadId, "assistant", outcome.error, {
        sqlText: outcome.sql,
        tokensUsed,
        metadata: { status: "exhausted", reason: outcome.reason, attempts: outcome.attempts.length },
      });
      return { assistantMessage, sql: outcome.sql, result: null, error: outcome.error };
    }

    if (outcome.status === "declined") {
      const assistantMessage = messages.append(
        this.threadId,
        "assistant",
        "Declined to run a destructive statement.",
        {
          sqlText: outcome.sql,
          tokensUsed,
          metadata: { status: "declined" },
        }
      );
      return { assistantMessage, sql: outcome.sql, result: null, error: null };
    }

    const assistantMessage = messages.append(this.threadId, "assistant", outcome.reply.trim(), {
      tokensUsed: tokensUsed || estimateTokens(outcome.reply),
      metadata: { status: "answered" },
    });
    return { assistantMessage, sql: null, result: null, error: null };
  }

  /**
   * Cached schema, refreshed first when absent or older than the max age.
   * A failed refresh falls back to whatever is cached.
   */
  private async loadSchema(): Promise<CachedSchema | null> {
    const cached = this.deps.schemaCache.get(this.threadId);
    if (!isStale(cached, this.options.schemaMaxAgeMs)) {
      return cached;
    }
    try {
      return await this.refreshSchema();
    } catch (error) {
      logger.warn({ threadId: this.threadId, error: errorMessage(error) }, "Schema refresh failed; using cached copy");
      return cached;
    }
  }

  /**
   * Re-read the target's structure and replace the cached snapshot
   */
  async refreshSchema(): Promise<CachedSchema> {
    const snapshot = await this.deps.target.describe();
    return this.deps.schemaCache.refresh(this.threadId, snapshot);
  }

  /**
   * Compaction failures never fail the turn; the next turn retries from the
   * unchanged summary.
   */
  private async compact(signal: AbortSignal | undefined): Promise<CompactionOutcome | null> {
    try {
      return await this.compactor.maybeCompact(this.threadId, signal);
    } catch (error) {
      logger.warn({ threadId: this.threadId, error: errorMessage(error) }, "Compaction skipped");
      return null;
    }
  }

  /**
   * Wipe this thread's messages, summary and schema cache. Query history stays.
   */
  purge(): Promise<boolean> {
    return this.deps.lock.run(this.threadId, async () => this.deps.sessions.purge(this.threadId));
  }

  history(limit: number = 20): Message[] {
    return this.deps.messages.recent(this.threadId, limit);
  }

  queries(limit: number = 20): RecordedQuery[] {
    return this.deps.history.list(this.threadId, limit);
  }
}
