import { generateText, type LanguageModel } from "ai";
import { createGateway } from "@ai-sdk/gateway";
import { GenerationError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import { extractUsage, type TokenUsage } from "./tokenCounter.js";

export interface GenerateOptions {
  /** Diagnostics from a failed attempt, appended after the prompt */
  errorContext?: string;
  system?: string;
  signal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  usage: TokenUsage;
}

/**
 * Stateless text generation: one call in, one reply out.
 */
export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<GenerationResult>;
}

export interface GatewayGeneratorOptions {
  apiKey: string;
  model: string;
  maxOutputTokens?: number;
  temperature?: number;
}

/**
 * TextGenerator over the AI SDK gateway provider
 */
export class GatewayGenerator implements TextGenerator {
  private readonly model: LanguageModel;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;

  constructor(options: GatewayGeneratorOptions) {
    const gateway = createGateway({ apiKey: options.apiKey });
    this.model = gateway(options.model);
    this.maxOutputTokens = options.maxOutputTokens ?? 4000;
    this.temperature = options.temperature ?? 0.1;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const fullPrompt = options.errorContext ? `${prompt}\n\n${options.errorContext}` : prompt;

    try {
      const result = await generateText({
        model: this.model,
        system: options.system,
        prompt: fullPrompt,
        maxOutputTokens: this.maxOutputTokens,
        temperature: this.temperature,
        abortSignal: options.signal,
      });

      const usage = extractUsage(result.usage);
      logger.debug({ usage, correcting: Boolean(options.errorContext) }, "Generation completed");

      return { text: result.text, usage };
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Generation failed");
      throw new GenerationError(`Text generation failed: ${errorMessage(error)}`, error);
    }
  }
}
