import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenAI } from '@google/genai';
import type { AIConfig } from '../../config.js';
import { createLogger, errorMessage } from '../../utils/logger.js';
import { correlationHeaders, llmCallContext } from './call-context.js';
import type { AIResponse, GenerateOptions, TextGenerator, TokenUsage } from './types.js';

const logger = createLogger('ai-clients');

type Completion = Omit<AIResponse, 'model' | 'latencyMs'>;

// ---------------------------------------------------------------------------
// Provider calls
// ---------------------------------------------------------------------------
async function completeWithClaude(
  client: Anthropic,
  model: string,
  prompt: string,
  options: Required<Pick<GenerateOptions, 'maxTokens'>> & GenerateOptions,
): Promise<Completion> {
  const response = await client.messages.create(
    {
      model,
      max_tokens: options.maxTokens,
      temperature: options.temperature ?? 0.7,
      system: options.systemPrompt ?? '',
      messages: [{ role: 'user', content: prompt }],
    },
    { headers: correlationHeaders(), maxRetries: 0 },
  );

  const text = response.content
    .filter((block): block is Anthropic.TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');

  return {
    text,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    },
    finishReason: response.stop_reason ?? undefined,
  };
}

async function completeWithGemini(
  client: GoogleGenAI,
  model: string,
  prompt: string,
  options: Required<Pick<GenerateOptions, 'maxTokens'>> & GenerateOptions,
): Promise<Completion> {
  const response = await client.models.generateContent({
    model,
    contents: [
      {
        role: 'user',
        parts: [{ text: options.systemPrompt ? `${options.systemPrompt}\n\n${prompt}` : prompt }],
      },
    ],
    config: {
      maxOutputTokens: options.maxTokens,
      temperature: options.temperature ?? 0.7,
      httpOptions: { headers: correlationHeaders() },
    },
  });

  const usageMeta = response.usageMetadata;
  const usage: TokenUsage = {
    inputTokens: usageMeta?.promptTokenCount ?? 0,
    outputTokens: usageMeta?.candidatesTokenCount ?? 0,
    totalTokens: usageMeta?.totalTokenCount ?? 0,
  };

  return {
    text: response.text ?? '',
    usage,
    finishReason: response.candidates?.[0]?.finishReason ?? undefined,
  };
}

// ---------------------------------------------------------------------------
// createTextGenerator
// ---------------------------------------------------------------------------
export function createTextGenerator(aiConfig: AIConfig): TextGenerator {
  const { provider, model } = aiConfig;

  // Lazy-initialized so a missing key only fails when generation is attempted
  let anthropicClient: Anthropic | null = null;
  let googleClient: GoogleGenAI | null = null;

  function getAnthropicClient(): Anthropic {
    if (!anthropicClient) {
      if (!aiConfig.apiKeys.anthropic) {
        throw new Error('ANTHROPIC_API_KEY is not configured');
      }
      anthropicClient = new Anthropic({ apiKey: aiConfig.apiKeys.anthropic });
    }
    return anthropicClient;
  }

  function getGoogleClient(): GoogleGenAI {
    if (!googleClient) {
      if (!aiConfig.apiKeys.googleAi) {
        throw new Error('GOOGLE_AI_API_KEY is not configured');
      }
      googleClient = new GoogleGenAI({ apiKey: aiConfig.apiKeys.googleAi });
    }
    return googleClient;
  }

  async function generate(prompt: string, options: GenerateOptions = {}): Promise<AIResponse> {
    const ctx = llmCallContext.getStore();
    const callOptions = { ...options, maxTokens: options.maxTokens ?? aiConfig.maxTokens };

    logger.info('LLM call', {
      provider,
      model,
      purpose: ctx?.purpose ?? 'unknown',
      correlationId: ctx?.correlationId,
      promptLength: prompt.length,
    });

    const startTime = performance.now();

    try {
      const completion = provider === 'anthropic'
        ? await completeWithClaude(getAnthropicClient(), model, prompt, callOptions)
        : await completeWithGemini(getGoogleClient(), model, prompt, callOptions);

      const latencyMs = Math.round(performance.now() - startTime);

      logger.debug('LLM response received', {
        provider,
        model,
        inputTokens: completion.usage.inputTokens,
        outputTokens: completion.usage.outputTokens,
        finishReason: completion.finishReason,
        latencyMs,
      });

      return { ...completion, model, latencyMs };
    } catch (error) {
      logger.error('LLM generation failed', {
        provider,
        model,
        correlationId: ctx?.correlationId,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  return { provider, model, generate };
}
