import type { LanguageModelUsage } from "ai";
import { logger } from "../utils/logger.js";

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export const EMPTY_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };

/**
 * Extract usage information from a generation result
 * Use this after any generateText call
 */
export function extractUsage(usage: LanguageModelUsage): TokenUsage {
  return {
    inputTokens: usage.inputTokens ?? 0,
    outputTokens: usage.outputTokens ?? 0,
    totalTokens: usage.totalTokens ?? 0,
  };
}

/**
 * Calculate cumulative token count across several generation calls
 * (one per self-healing attempt in a turn)
 */
export function sumUsage(usages: TokenUsage[]): TokenUsage {
  let inputTokens = 0;
  let outputTokens = 0;
  let totalTokens = 0;

  for (const usage of usages) {
    inputTokens += usage.inputTokens;
    outputTokens += usage.outputTokens;
    totalTokens += usage.totalTokens;
  }

  logger.debug({ inputTokens, outputTokens, totalTokens }, "Summed token usage");

  return { inputTokens, outputTokens, totalTokens };
}

/**
 * Rough token estimate for text we did not get usage for (~4 chars/token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Compaction is due once the unsummarized tail exceeds the window
 */
export function shouldCompact(unsummarizedCount: number, windowSize: number): boolean {
  return unsummarizedCount > windowSize;
}
