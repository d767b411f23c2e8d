/**
 * LLM client factory
 */

import { AssistantConfig, LLMProvider } from '../../config/config-types';
import { LLMClient } from './interface';
import { ClaudeClient } from './clients/claude-client';
import { OpenAIClient } from './clients/openai-client';

export type ClientType = LLMProvider;

/**
 * Client for the configured provider, or null when no API key is set
 */
export function createLLMClient(config: AssistantConfig): LLMClient | null {
  if (!config.apiKey) {
    return null;
  }

  const common = {
    apiKey: config.apiKey,
    model: config.model || undefined,
    baseUrl: config.baseUrl || undefined,
    timeout: config.timeoutMs,
    defaultMaxTokens: config.maxOutputTokens,
    defaultTemperature: config.temperature
  };

  const type: ClientType = config.provider;
  switch (type) {
    case 'anthropic':
      return new ClaudeClient(common);
    case 'openai':
      return new OpenAIClient(common);
  }
}
