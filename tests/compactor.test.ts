import { describe, it, expect } from "vitest";
import { RollingSummaryCompactor, type CompactorOptions } from "../src/agent/compactor.js";
import { GenerationError, TimeoutError } from "../src/errors.js";
import { ScriptedGenerator, hangingReply, memoryStores } from "./helpers.js";

const options: CompactorOptions = { windowSize: 6, keepTail: 4, maxSummaryLength: 8000, timeoutMs: 1000 };

function setup(script: ConstructorParameters<typeof ScriptedGenerator>[0], overrides: Partial<CompactorOptions> = {}) {
  const { stores } = memoryStores();
  const threadId = stores.sessions.ensureSession("h", "u", "shop");
  const generator = new ScriptedGenerator(script);
  const compactor = new RollingSummaryCompactor({ ...stores, generator }, { ...options, ...overrides });
  const append = (count: number) => {
    for (let i = 0; i < count; i++) {
      const next = stores.messages.latestSequence(threadId) + 1;
      stores.messages.append(threadId, next % 2 === 1 ? "user" : "assistant", `message ${next}`);
    }
  };
  return { stores, threadId, generator, compactor, append };
}

describe("RollingSummaryCompactor", () => {
  it("rejects a window smaller than the kept tail", () => {
    const { stores } = memoryStores();
    const generator = new ScriptedGenerator(["x"]);
    expect(
      () => new RollingSummaryCompactor({ ...stores, generator }, { ...options, windowSize: 3, keepTail: 4 })
    ).toThrow("windowSize must be >= keepTail");
  });

  it("does nothing until the unsummarized tail exceeds the window", async () => {
    const { threadId, generator, compactor, append } = setup(["digest"]);
    append(6);

    const outcome = await compactor.maybeCompact(threadId);

    expect(outcome).toEqual({ compacted: false, reason: "below_threshold", unsummarized: 6 });
    expect(generator.calls).toHaveLength(0);
  });

  it("folds everything except the kept tail", async () => {
    const { stores, threadId, generator, compactor, append } = setup(["digest one"]);
    append(7);

    const outcome = await compactor.maybeCompact(threadId);

    expect(outcome).toEqual({ compacted: true, summarizedUpToSeq: 3, folded: 3, foldedCount: 3, summaryLength: 10 });
    const summary = stores.summaries.get(threadId);
    expect(summary?.summaryText).toBe("digest one");
    expect((summary?.summarizedUpToSeq ?? 0) + options.keepTail).toBe(stores.messages.latestSequence(threadId));

    const prompt = generator.calls[0].prompt;
    expect(prompt).toContain("This is the first compaction.");
    expect(prompt).toContain("User: message 1\nAssistant: message 2\nUser: message 3");
    expect(prompt).not.toContain("message 4");
  });

  it("merges later folds into the existing summary", async () => {
    const { stores, threadId, generator, compactor, append } = setup(["digest one", "digest two"]);
    append(7);
    await compactor.maybeCompact(threadId);
    append(3);

    const outcome = await compactor.maybeCompact(threadId);

    expect(outcome).toEqual({ compacted: true, summarizedUpToSeq: 6, folded: 3, foldedCount: 6, summaryLength: 10 });
    expect(generator.calls[1].prompt).toContain("## Existing Summary\n\ndigest one");
    expect(generator.calls[1].prompt).toContain("User: message 5");
    expect(stores.summaries.get(threadId)?.summaryText).toBe("digest two");
  });

  it("writes nothing when generation fails and succeeds on retry", async () => {
    const { stores, threadId, compactor, append } = setup([new GenerationError("provider down"), "digest"]);
    append(8);

    await expect(compactor.maybeCompact(threadId)).rejects.toThrow("provider down");
    expect(stores.summaries.get(threadId)).toBeNull();

    const retried = await compactor.maybeCompact(threadId);
    expect(retried).toMatchObject({ compacted: true, summarizedUpToSeq: 4, folded: 4 });
  });

  it("rejects an empty summary", async () => {
    const { stores, threadId, compactor, append } = setup(["<think>pondering</think>"]);
    append(7);

    await expect(compactor.maybeCompact(threadId)).rejects.toThrow(GenerationError);
    expect(stores.summaries.get(threadId)).toBeNull();
  });

  it("truncates an oversized summary", async () => {
    const { stores, threadId, compactor, append } = setup(["abcdefghijklmnop"], { maxSummaryLength: 10 });
    append(7);

    await compactor.maybeCompact(threadId);

    expect(stores.summaries.get(threadId)?.summaryText).toBe("abcdefghij\n\n[Summary truncated due to length]");
  });

  it("times out a hung summarizer without writing", async () => {
    const { stores, threadId, compactor, append } = setup([hangingReply], { timeoutMs: 20 });
    append(7);

    await expect(compactor.maybeCompact(threadId)).rejects.toThrow(TimeoutError);
    expect(stores.summaries.get(threadId)).toBeNull();
  });
});
