import type { AIProvider } from '../../config.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface AIResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  finishReason?: string;
  latencyMs?: number;
}

export interface GenerateOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * A single-shot text completion endpoint. Implementations make exactly one
 * upstream call per `generate` and never retry.
 */
export interface TextGenerator {
  readonly provider: AIProvider;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<AIResponse>;
}
