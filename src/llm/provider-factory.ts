import { LLMProvider, LLMProviderConfig } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { logger } from '../observability/logger';

/**
 * Build the LLM provider from environment configuration.
 *
 * Returns `undefined` when no API key is set. The service still starts; every
 * LLM-stage call then fails and uncertain bios resolve to "no".
 */
export function buildProvider(envConfig: { openai: LLMProviderConfig }): LLMProvider | undefined {
  const log = logger.child({ component: 'provider-factory' });

  if (!envConfig.openai.apiKey) {
    log.warn('OPENAI_API_KEY not set; LLM fallback disabled, uncertain bios will be labelled "no"');
    return undefined;
  }

  const provider = new OpenAIProvider(envConfig.openai);
  log.info({ model: envConfig.openai.model, timeoutMs: envConfig.openai.timeoutMs }, 'OpenAI provider initialized');
  return provider;
}
