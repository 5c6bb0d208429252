import { afterEach, describe, it, expect } from "vitest";
import { ChatSession, type ChatOptions } from "../src/agent/session.js";
import type { GenerateOptions, GenerationResult } from "../src/agent/generator.js";
import { SqliteTarget } from "../src/target/sqlite.js";
import { ThreadLock } from "../src/utils/threadLock.js";
import { ScriptedGenerator, memoryStores, sqlReply } from "./helpers.js";

const options: ChatOptions = {
  maxRetries: 3,
  generationTimeoutMs: 1000,
  executionTimeoutMs: 1000,
  windowSize: 60,
  keepTail: 40,
  maxSummaryLength: 8000,
  schemaMaxAgeMs: 0,
};

const identity = { host: "localhost", user: "root", database: "shop" };

let targets: SqliteTarget[] = [];

afterEach(async () => {
  await Promise.all(targets.map((t) => t.close()));
  targets = [];
});

async function setup(script: ConstructorParameters<typeof ScriptedGenerator>[0], overrides: Partial<ChatOptions> = {}) {
  const { stores } = memoryStores();
  const target = new SqliteTarget(":memory:", "shop");
  targets.push(target);
  await target.execute("CREATE TABLE orders (id INTEGER PRIMARY KEY, total REAL NOT NULL)");
  await target.execute("INSERT INTO orders (total) VALUES (9.5), (20)");

  const generator = new ScriptedGenerator(script);
  const chat = ChatSession.open({ ...stores, generator, target, lock: new ThreadLock() }, { ...options, ...overrides }, identity);
  return { stores, generator, target, chat };
}

describe("ChatSession", () => {
  it("stores the statement that finally succeeded", async () => {
    const { stores, generator, chat } = await setup([
      sqlReply("SELECT COUNT(*) AS n FROM order_rows", "Counting."),
      sqlReply("SELECT COUNT(*) AS n FROM orders", "Counting orders."),
    ]);

    const turn = await chat.send("how many orders?");

    expect(turn.status).toBe("succeeded");
    expect(turn.sql).toBe("SELECT COUNT(*) AS n FROM orders");
    expect(turn.result?.rows).toEqual([[2]]);

    const [user, assistant] = stores.messages.readRange(chat.threadId, 1);
    expect(user).toMatchObject({ sequenceNo: 1, role: "user", content: "how many orders?" });
    expect(assistant).toMatchObject({
      sequenceNo: 2,
      role: "assistant",
      content: "Counting orders.",
      sqlText: "SELECT COUNT(*) AS n FROM orders",
      metadata: { status: "succeeded", attempts: 2 },
    });

    expect(stores.history.list(chat.threadId).map((h) => [h.success, h.errorMessage, h.messageId])).toEqual([
      [false, "no such table: order_rows", user.id],
      [true, null, user.id],
    ]);

    expect(generator.calls[0].prompt).toContain(
      "## Schema\n\nDatabase shop (1 tables)\ntable orders(id INTEGER PK, total REAL NOT NULL)"
    );
  });

  it("stores the raw database error when retries run out", async () => {
    const { stores, chat } = await setup([
      sqlReply("SELECT nope FROM orders"),
      sqlReply("SELECT nope2 FROM orders"),
      sqlReply("SELECT nope3 FROM orders"),
    ]);

    const turn = await chat.send("show nope");

    expect(turn.status).toBe("exhausted");
    expect(turn.error).toBe("no such column: nope3");
    expect(turn.attempts).toHaveLength(3);
    expect(stores.messages.readRange(chat.threadId, 2, 2)[0]).toMatchObject({
      role: "assistant",
      content: "no such column: nope3",
      sqlText: "SELECT nope3 FROM orders",
      metadata: { status: "exhausted", reason: "budget", attempts: 3 },
    });
    expect(stores.history.list(chat.threadId)).toHaveLength(3);
  });

  it("answers plain questions without touching the database", async () => {
    const { stores, chat } = await setup(["  The orders table holds purchases.  "]);

    const turn = await chat.send("what is in here?");

    expect(turn.status).toBe("answered");
    expect(turn.assistantMessage?.content).toBe("The orders table holds purchases.");
    expect(stores.history.list(chat.threadId)).toEqual([]);
  });

  it("feeds earlier turns into the next prompt", async () => {
    const { generator, chat } = await setup([
      sqlReply("SELECT COUNT(*) AS n FROM orders", "Counting orders."),
      "Two orders.",
    ]);

    await chat.send("how many orders?");
    await chat.send("say that in words");

    expect(generator.calls[1].prompt).toContain(
      "## Recent Conversation\n\nUser: how many orders?\nAssistant: Counting orders.\n[SQL: SELECT COUNT(*) AS n FROM orders]\n\n## New Request\n\nUser: say that in words"
    );
  });

  it("compacts once the thread outgrows the window", async () => {
    const { stores, chat } = await setup(["Noted."], { windowSize: 4, keepTail: 2 });

    await chat.send("one");
    const second = await chat.send("two");
    const third = await chat.send("three");

    expect(second.compaction).toEqual({ compacted: false, reason: "below_threshold", unsummarized: 4 });
    expect(third.compaction).toMatchObject({ compacted: true, summarizedUpToSeq: 4, folded: 4 });
    expect(stores.summaries.get(chat.threadId)?.summaryText).toBe("Noted.");
    expect(chat.getState()).toMatchObject({ messageCount: 6, summary: "Noted.", summarizedUpToSeq: 4 });
  });

  it("keeps the turn when compaction fails", async () => {
    const reply = async (_prompt: string, opts: GenerateOptions): Promise<GenerationResult> => {
      if (opts.system?.startsWith("You are a precise conversation summarizer")) {
        throw new Error("summarizer offline");
      }
      return { text: "Noted.", usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 } };
    };
    const { stores, chat } = await setup([reply], { windowSize: 2, keepTail: 1 });

    await chat.send("one");
    const turn = await chat.send("two");

    expect(turn.status).toBe("answered");
    expect(turn.compaction).toBeNull();
    expect(stores.summaries.get(chat.threadId)).toBeNull();
    expect(stores.messages.count(chat.threadId)).toBe(4);
  });

  it("records the user message but no reply for a cancelled turn", async () => {
    const { stores, chat } = await setup([sqlReply("SELECT 1")]);
    const controller = new AbortController();
    controller.abort();

    const turn = await chat.send("never mind", { signal: controller.signal });

    expect(turn.status).toBe("cancelled");
    expect(turn.assistantMessage).toBeNull();
    expect(stores.messages.readRange(chat.threadId, 1).map((m) => m.role)).toEqual(["user"]);
  });

  it("serializes concurrent turns on one thread", async () => {
    const { stores, chat } = await setup(["ok"]);

    await Promise.all([chat.send("first"), chat.send("second")]);

    expect(stores.messages.readRange(chat.threadId, 1).map((m) => `${m.role}:${m.content}`)).toEqual([
      "user:first",
      "assistant:ok",
      "user:second",
      "assistant:ok",
    ]);
  });

  it("starts over after a purge", async () => {
    const { stores, chat } = await setup(["ok"]);
    await chat.send("first");

    expect(await chat.purge()).toBe(true);
    const turn = await chat.send("again");

    expect(turn.userMessage.sequenceNo).toBe(1);
    expect(stores.messages.count(chat.threadId)).toBe(2);
    expect(stores.sessions.get(chat.threadId)?.database).toBe("shop");
  });

  it("flags destructive statements and records a declined one", async () => {
    const { stores, target, chat } = await setup([sqlReply("DELETE FROM orders", "Removing every order.")]);

    const turn = await chat.send("delete all orders", { confirm: async () => false });

    expect(turn).toMatchObject({ status: "declined", sql: "DELETE FROM orders", destructive: true, result: null });
    expect(stores.messages.readRange(chat.threadId, 2, 2)[0]).toMatchObject({
      content: "Declined to run a destructive statement.",
      sqlText: "DELETE FROM orders",
      metadata: { status: "declined" },
    });
    expect((await target.execute("SELECT COUNT(*) FROM orders")).rows).toEqual([[2]]);
    expect(stores.history.list(chat.threadId)).toEqual([]);
  });

  it("runs a confirmed destructive statement", async () => {
    const { stores, chat } = await setup([sqlReply("DELETE FROM orders WHERE total < 10", "Removing small orders.")]);

    const turn = await chat.send("delete small orders", { confirm: async () => true });

    expect(turn).toMatchObject({ status: "succeeded", destructive: true });
    expect(turn.result?.rowsAffected).toBe(1);
    expect(stores.history.list(chat.threadId).map((h) => h.rowsAffected)).toEqual([1]);
  });

  it("refreshes the cached schema on demand", async () => {
    const { chat } = await setup(["ok"]);

    const cached = await chat.refreshSchema();

    expect(cached.tableCount).toBe(1);
    expect(chat.getState().schema?.snapshot.tables[0].name).toBe("orders");
  });
});
