/**
 * Anthropic client for single-page re-extraction, with retry and cost logging.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock, DocumentBlockParam } from '@anthropic-ai/sdk/resources/messages';
import { callWithRetry, type RetryDecision } from './retry';

/** Per-token pricing (USD) */
const PRICES: Record<string, { input: number; output: number }> = {
  'claude-sonnet-4-5-20250929': { input: 3 / 1_000_000, output: 15 / 1_000_000 },
  'claude-opus-4-6': { input: 15 / 1_000_000, output: 75 / 1_000_000 },
};
const DEFAULT_PRICE = { input: 3 / 1_000_000, output: 15 / 1_000_000 };

export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey });
}

function calculateCost(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = PRICES[model] ?? DEFAULT_PRICE;
  return inputTokens * pricing.input + outputTokens * pricing.output;
}

/**
 * Rate limits wait for the server's retry-after hint when given; 5xx and 529
 * (overloaded) use the default schedule.
 */
export function classifyAnthropicError(error: Error): RetryDecision {
  if (!(error instanceof Anthropic.APIError)) return { retry: false };
  const status = error.status;

  if (status === 429) {
    const retryAfter = error.headers?.['retry-after'];
    const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
    return {
      retry: true,
      delayMs: Number.isFinite(seconds) ? seconds * 1000 : undefined,
      reason: 'Rate limited',
    };
  }
  if (status === 529) {
    return { retry: true, reason: 'API overloaded' };
  }
  if (status !== undefined && status >= 500) {
    return { retry: true, reason: `Server error (${status})` };
  }
  return { retry: false };
}

export interface ClaudePdfCallParams {
  model: string;
  system: string;
  userMessage: string;
  /** Base64-encoded PDF */
  pdfBase64: string;
  maxTokens?: number;
}

/**
 * Send a PDF plus instructions and return the concatenated text of the reply.
 */
export async function callClaudeForText(
  anthropic: Anthropic,
  params: ClaudePdfCallParams,
  label = 'Claude'
): Promise<string> {
  const document: DocumentBlockParam = {
    type: 'document',
    source: {
      type: 'base64',
      media_type: 'application/pdf',
      data: params.pdfBase64,
    },
  };

  const response = await callWithRetry(
    () =>
      anthropic.messages.create({
        model: params.model,
        max_tokens: params.maxTokens ?? 8192,
        temperature: 0,
        system: params.system,
        messages: [
          {
            role: 'user',
            content: [document, { type: 'text', text: params.userMessage }],
          },
        ],
      }),
    classifyAnthropicError
  );

  const { input_tokens: inputTokens, output_tokens: outputTokens } = response.usage;
  const cost = calculateCost(params.model, inputTokens, outputTokens);
  console.log(
    `[${label}] input: ${inputTokens} tokens, output: ${outputTokens} tokens, cost: $${cost.toFixed(4)} (${params.model})`
  );

  return response.content
    .filter((block: ContentBlock) => block.type === 'text')
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('\n');
}
