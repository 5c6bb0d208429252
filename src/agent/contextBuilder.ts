import type { Message, MessageLog } from "../db/messages.js";
import type { SummaryStore } from "../db/summaries.js";
import { logger } from "../utils/logger.js";
import type { ThreadId } from "./identity.js";
import { formatTranscript } from "./prompts.js";

export interface TurnContext {
  summary: string;
  summarizedUpToSeq: number;
  recentMessages: Message[];
  /** Unsummarized messages left out because the tail outgrew the window */
  omitted: number;
}

/**
 * Two-tier read model: the rolling summary plus the verbatim tail after it.
 */
export class ContextBuilder {
  constructor(
    private readonly deps: { messages: MessageLog; summaries: SummaryStore },
    private readonly options: { windowSize: number }
  ) {}

  build(threadId: ThreadId): TurnContext {
    const summary = this.deps.summaries.get(threadId);
    const upTo = summary?.summarizedUpToSeq ?? 0;

    const recentMessages = this.deps.messages.readAfter(threadId, upTo, this.options.windowSize);
    const total = this.deps.messages.countAfter(threadId, upTo);
    const omitted = Math.max(0, total - recentMessages.length);

    if (omitted > 0) {
      logger.warn({ threadId, omitted, windowSize: this.options.windowSize }, "Unsummarized tail exceeds window");
    }

    logger.debug(
      { threadId, messageCount: recentMessages.length, hasSummary: summary !== null },
      "Built prompt context"
    );

    return {
      summary: summary?.summaryText ?? "",
      summarizedUpToSeq: upTo,
      recentMessages,
      omitted,
    };
  }
}

/**
 * The single prompt handed to generation for a new user turn
 */
export function renderPrompt(context: TurnContext, userText: string, schemaText: string | null): string {
  const sections: string[] = [];

  sections.push(`## Schema\n\n${schemaText ?? "Schema not loaded yet."}`);

  if (context.summary) {
    sections.push(`## Previous Conversation Summary\n\n${context.summary}`);
  }

  if (context.recentMessages.length > 0) {
    sections.push(`## Recent Conversation\n\n${formatTranscript(context.recentMessages)}`);
  }

  sections.push(`## New Request\n\nUser: ${userText}`);

  return sections.join("\n\n");
}
