import type { LanguageModel } from 'ai';

import type { ExtractionConfig } from './extraction-config';

import { createOpenAI } from '@ai-sdk/openai';

/**
 * Build the vision model for an OpenAI-compatible chat completions endpoint
 */
export function createExtractionModel(
  config: Pick<ExtractionConfig, 'apiKey' | 'baseUrl' | 'model'>,
): LanguageModel {
  const provider = createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
  });
  return provider.chat(config.model);
}
