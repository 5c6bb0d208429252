import type { MessageLog } from "../db/messages.js";
import type { SummaryStore } from "../db/summaries.js";
import { GenerationError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { linkedAbort, withTimeout } from "../utils/timeout.js";
import type { TextGenerator } from "./generator.js";
import type { ThreadId } from "./identity.js";
import { buildCompactionPrompt, stripThinking } from "./prompts.js";
import { shouldCompact } from "./tokenCounter.js";

/**
 * Rolling summary compactor
 * Folds old turns into one dense digest per thread so the prompt stays bounded
 */

export interface CompactorOptions {
  /** Compaction is due once more than this many messages sit after the summary */
  windowSize: number;
  /** Most recent messages that are never folded */
  keepTail: number;
  /** Max length for summary to prevent infinite growth */
  maxSummaryLength: number;
  timeoutMs: number;
}

export type CompactionOutcome =
  | { compacted: false; reason: "below_threshold" | "nothing_to_fold" | "superseded"; unsummarized: number }
  | {
      compacted: true;
      summarizedUpToSeq: number;
      folded: number;
      foldedCount: number;
      summaryLength: number;
    };

const SUMMARIZER_SYSTEM = "You are a precise conversation summarizer. Output only the summary, no preamble.";

export class RollingSummaryCompactor {
  constructor(
    private readonly deps: { messages: MessageLog; summaries: SummaryStore; generator: TextGenerator },
    private readonly options: CompactorOptions
  ) {
    if (options.windowSize < options.keepTail) {
      throw new Error("windowSize must be >= keepTail");
    }
  }

  /**
   * Fold `(summarizedUpTo, latest - keepTail]` into the summary when the
   * unsummarized tail exceeds the window. Nothing is written unless the
   * generation call succeeds, so a failed run can simply be retried.
   */
  async maybeCompact(threadId: ThreadId, signal?: AbortSignal): Promise<CompactionOutcome> {
    const { messages, summaries, generator } = this.deps;
    const { windowSize, keepTail } = this.options;

    const existing = summaries.get(threadId);
    const upTo = existing?.summarizedUpToSeq ?? 0;
    const unsummarized = messages.countAfter(threadId, upTo);

    if (!shouldCompact(unsummarized, windowSize)) {
      return { compacted: false, reason: "below_threshold", unsummarized };
    }

    const latest = messages.latestSequence(threadId);
    const cutoff = latest - keepTail;
    const toFold = cutoff > upTo ? messages.readRange(threadId, upTo + 1, cutoff) : [];

    if (toFold.length === 0) {
      return { compacted: false, reason: "nothing_to_fold", unsummarized };
    }

    logger.info(
      {
        threadId,
        unsummarized,
        toFold: toFold.length,
        keepTail,
        hasExistingSummary: existing !== null,
      },
      "Starting compaction"
    );

    const prompt = buildCompactionPrompt(existing?.summaryText, toFold);

    const { controller, dispose } = linkedAbort(signal);
    let text: string;
    try {
      const result = await withTimeout(
        generator.generate(prompt, { system: SUMMARIZER_SYSTEM, signal: controller.signal }),
        this.options.timeoutMs,
        "generation",
        () => controller.abort()
      );
      text = stripThinking(result.text);
    } catch (error) {
      logger.error({ threadId, error }, "Compaction failed");
      throw error;
    } finally {
      dispose();
    }

    if (text.length === 0) {
      throw new GenerationError("Summarizer returned an empty summary");
    }

    let newSummary = text;
    if (newSummary.length > this.options.maxSummaryLength) {
      logger.warn({ originalLength: newSummary.length }, "Summary too long, truncating");
      newSummary = newSummary.substring(0, this.options.maxSummaryLength) + "\n\n[Summary truncated due to length]";
    }

    const foldedCount = (existing?.foldedCount ?? 0) + toFold.length;
    const saved = summaries.save(threadId, newSummary, cutoff, foldedCount);
    if (!saved) {
      logger.warn({ threadId, cutoff }, "Summary already advanced past this cutoff; discarding");
      return { compacted: false, reason: "superseded", unsummarized };
    }

    logger.info(
      { threadId, folded: toFold.length, summarizedUpToSeq: cutoff, summaryLength: newSummary.length },
      "Compaction completed"
    );

    return {
      compacted: true,
      summarizedUpToSeq: cutoff,
      folded: toFold.length,
      foldedCount,
      summaryLength: newSummary.length,
    };
  }
}
