/**
 * Secondary extractors: re-read one page of the source PDF with a different
 * provider so the primary extraction can be checked or replaced.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { GoogleGenerativeAI } from '@google/generative-ai';
import type { ProviderConfig } from '@/lib/config';
import { extractSinglePage } from '@/lib/pdf/page-splitter';
import { callClaudeForText, createAnthropicClient } from './client';
import { callGeminiForText, createGeminiClient } from './gemini-client';
import { DEFAULT_PROMPTS, renderUserPrompt, type PromptPair } from './prompts/page-extraction';

export interface SecondaryExtractor {
  readonly name: string;
  /**
   * Extract page `pageIndex` (zero-based) of the document as markdown.
   * Defaults to the general page-extraction prompts.
   */
  extractPage(documentBytes: Uint8Array, pageIndex: number, prompts?: PromptPair): Promise<string>;
}

async function pagePdfBase64(documentBytes: Uint8Array, pageIndex: number): Promise<string> {
  const page = await extractSinglePage(documentBytes, pageIndex);
  return Buffer.from(page).toString('base64');
}

export class GeminiPageExtractor implements SecondaryExtractor {
  readonly name = 'gemini';

  constructor(
    private readonly genAI: GoogleGenerativeAI,
    private readonly model: string
  ) {}

  async extractPage(
    documentBytes: Uint8Array,
    pageIndex: number,
    prompts: PromptPair = DEFAULT_PROMPTS
  ): Promise<string> {
    const data = await pagePdfBase64(documentBytes, pageIndex);
    return callGeminiForText(
      this.genAI,
      {
        model: this.model,
        system: prompts.system,
        userMessage: renderUserPrompt(prompts.user, pageIndex + 1),
        inlineData: [{ mimeType: 'application/pdf', data }],
      },
      `Gemini page ${pageIndex + 1}`
    );
  }
}

export class ClaudePageExtractor implements SecondaryExtractor {
  readonly name = 'anthropic';

  constructor(
    private readonly anthropic: Anthropic,
    private readonly model: string
  ) {}

  async extractPage(
    documentBytes: Uint8Array,
    pageIndex: number,
    prompts: PromptPair = DEFAULT_PROMPTS
  ): Promise<string> {
    const pdfBase64 = await pagePdfBase64(documentBytes, pageIndex);
    return callClaudeForText(
      this.anthropic,
      {
        model: this.model,
        system: prompts.system,
        userMessage: renderUserPrompt(prompts.user, pageIndex + 1),
        pdfBase64,
      },
      `Claude page ${pageIndex + 1}`
    );
  }
}

/**
 * Build the configured extractor, or null when its API key is missing.
 */
export function createSecondaryExtractor(config: ProviderConfig): SecondaryExtractor | null {
  if (config.provider === 'gemini') {
    if (!config.geminiApiKey) {
      console.warn('[AI] GOOGLE_AI_API_KEY is not set, cross-validation disabled');
      return null;
    }
    return new GeminiPageExtractor(createGeminiClient(config.geminiApiKey), config.geminiModel);
  }

  if (!config.anthropicApiKey) {
    console.warn('[AI] ANTHROPIC_API_KEY is not set, cross-validation disabled');
    return null;
  }
  return new ClaudePageExtractor(createAnthropicClient(config.anthropicApiKey), config.anthropicModel);
}
