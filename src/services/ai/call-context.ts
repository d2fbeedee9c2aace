// AsyncLocalStorage-based context for threading purpose/correlation id through
// async call chains without changing function signatures.

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LLMCallContext {
  purpose: string;
  contentId?: number;
  correlationId?: string;
}

export const llmCallContext = new AsyncLocalStorage<LLMCallContext>();

/**
 * Run an async function with LLM call context attached.
 * Every LLM call made within `fn` logs this context and forwards its
 * correlation id upstream.
 */
export function withLLMContext<T>(ctx: LLMCallContext, fn: () => Promise<T>): Promise<T> {
  return llmCallContext.run(ctx, fn);
}

export function correlationHeaders(): Record<string, string> {
  const correlationId = llmCallContext.getStore()?.correlationId;
  return correlationId ? { 'X-Correlation-ID': correlationId } : {};
}
