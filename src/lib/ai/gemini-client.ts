/**
 * Google Gemini client for single-page re-extraction, with retry and cost logging.
 */

import { GoogleGenerativeAI, type Part } from '@google/generative-ai';
import { callWithRetry, classifyByMessage } from './retry';

/** Per-token pricing (USD), Gemini 2.x */
const PRICES: Record<string, { input: number; output: number }> = {
  'gemini-2.5-flash': { input: 0.15 / 1_000_000, output: 0.6 / 1_000_000 },
  'gemini-2.5-pro': { input: 1.25 / 1_000_000, output: 10 / 1_000_000 },
  'gemini-2.0-flash': { input: 0.1 / 1_000_000, output: 0.4 / 1_000_000 },
};
const DEFAULT_PRICE = { input: 0.15 / 1_000_000, output: 0.6 / 1_000_000 };

export function createGeminiClient(apiKey: string): GoogleGenerativeAI {
  return new GoogleGenerativeAI(apiKey);
}

function calculateCost(model: string, inputTokens: number, outputTokens: number): number {
  const baseModel = model.replace(/-preview.*$/, '');
  const pricing = PRICES[baseModel] ?? DEFAULT_PRICE;
  return inputTokens * pricing.input + outputTokens * pricing.output;
}

export interface GeminiTextCallParams {
  model: string;
  system: string;
  userMessage: string;
  /** Inline file data (the page PDF) */
  inlineData?: Array<{ mimeType: string; data: string }>;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Generate plain text from Gemini. Retries on rate limits and server errors.
 */
export async function callGeminiForText(
  genAI: GoogleGenerativeAI,
  params: GeminiTextCallParams,
  label = 'Gemini'
): Promise<string> {
  const model = genAI.getGenerativeModel({
    model: params.model,
    systemInstruction: params.system,
    generationConfig: {
      temperature: params.temperature ?? 0,
      maxOutputTokens: params.maxOutputTokens ?? 8192,
    },
  });

  const parts: Part[] = [];
  for (const data of params.inlineData ?? []) {
    parts.push({ inlineData: { mimeType: data.mimeType, data: data.data } });
  }
  parts.push({ text: params.userMessage });

  const result = await callWithRetry(() => model.generateContent(parts), classifyByMessage);
  const response = result.response;

  const usage = response.usageMetadata;
  const inputTokens = usage?.promptTokenCount ?? 0;
  const outputTokens = usage?.candidatesTokenCount ?? 0;
  const cost = calculateCost(params.model, inputTokens, outputTokens);
  console.log(
    `[${label}] input: ${inputTokens} tokens, output: ${outputTokens} tokens, cost: $${cost.toFixed(4)} (${params.model})`
  );

  return response.text();
}
